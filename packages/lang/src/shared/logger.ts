import util from "node:util";
import { ConfigurationManager } from "./config.js";
import type { LogConfig } from "./types.js";

export type LogData = Record<string, unknown> | string;

export class Logger {
  constructor(private readonly config: LogConfig) {}

  isEnabled(id: string): boolean {
    if (!this.config.enabled) return false;
    if (this.config.deniedIds.has(id)) return false;
    if (this.config.allowedIds.size > 0 && !this.config.allowedIds.has(id)) {
      return false;
    }
    return true;
  }

  /**
   * Pass a thunk when the data is costly to build; it only runs for ids
   * that will actually be printed.
   */
  log(id: string, data: LogData | (() => LogData)): void {
    if (!this.isEnabled(id)) return;

    const out = typeof data === "function" ? data() : data;

    if (typeof out === "string") {
      console.log(`[${id}] ${out}`);
    } else {
      console.log(
        `[${id}]`,
        util.inspect(out, {
          depth: null,
          colors: true,
        }),
      );
    }
  }
}

let defaultLoggerInstance: Logger | null = null;

export function getDefaultLogger(): Logger {
  if (!defaultLoggerInstance) {
    defaultLoggerInstance = new Logger(
      ConfigurationManager.createDefault().logging,
    );
  }
  return defaultLoggerInstance;
}
