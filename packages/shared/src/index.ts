export * from "./errors";
export * from "./points";
export * from "./units";
