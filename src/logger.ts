export const C = {
  reset: "\x1b[0m",
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  blue: (s: string) => `\x1b[34m${s}\x1b[0m`,
  magenta: (s: string) => `\x1b[35m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

export class Logger {
  private static _verbose = false;
  private static _silent = false;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  /** Suppress info/warn output (tests, embedded use). Errors still print. */
  static setSilent(s: boolean) { Logger._silent = s; }

  static info(...args: unknown[]) {
    if (!Logger._silent) console.log(...args);
  }

  static warn(...args: unknown[]) {
    if (!Logger._silent) console.warn(...args);
  }

  static error(...args: unknown[]) { console.error(...args); }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND CREWLINE_LOG_LEVEL=DEBUG
    const debugLevel = (process.env.CREWLINE_LOG_LEVEL ?? "").toUpperCase() === "DEBUG";
    if (Logger._verbose && debugLevel) console.log(...args);
  }
}
