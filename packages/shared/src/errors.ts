export class ValidationError extends Error {
  override name = "ValidationError";

  constructor(message: string) {
    super(message);
  }
}

/** Raised by vector operations whose denominator is (nearly) zero. */
export class DegenerateVectorError extends ValidationError {
  override name = "DegenerateVectorError";
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) throw new ValidationError(message);
}

export function assertNever(value: never, message = "Unexpected value"): never {
  throw new ValidationError(`${message}: ${String(value)}`);
}
