export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

export const consoleLogger: Logger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

/** Keeps stdout free for protocols that own it (stdio MCP). */
export const stderrLogger: Logger = {
  info: (msg) => console.error(msg),
  warn: (msg) => console.error(msg),
  error: (msg) => console.error(msg),
};
