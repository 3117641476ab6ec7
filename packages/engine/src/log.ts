export type Logger = {
  warn: (message: string) => void;
};

export const consoleLogger: Logger = {
  warn(message) {
    const maybeConsole = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
    maybeConsole?.warn?.(message);
  },
};

export const silentLogger: Logger = {
  warn() {},
};
