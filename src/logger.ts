/**
 * Component-scoped console logging.
 *
 * @example
 * ```typescript
 * const log = Logger.for("scheduler");
 * log.debug("Simulation finished", { segments: 4 });
 * ```
 */
import { loadConfig } from "./config";
import type { LogLevel } from "./config";

export type LogComponent = "scheduler" | "api" | "worker";

type EntryLevel = Exclude<LogLevel, "silent">;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function initialLevel(): LogLevel {
  try {
    return loadConfig().logLevel;
  } catch (err) {
    console.error(
      `[config] ${err instanceof Error ? err.message : String(err)}; using "info"`
    );
    return "info";
  }
}

export class Logger {
  private static level: LogLevel = initialLevel();

  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  static setLevel(level: LogLevel): void {
    Logger.level = level;
  }

  static getLevel(): LogLevel {
    return Logger.level;
  }

  static isEnabled(level: EntryLevel): boolean {
    return RANK[level] >= RANK[Logger.level];
  }

  static format(
    level: EntryLevel,
    component: LogComponent,
    message: string,
    data?: unknown
  ): string {
    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${component}] ${message}`;
    return line + Logger.formatData(data);
  }

  private static formatData(data: unknown): string {
    if (data === undefined) return "";
    if (data instanceof Error) return ` ${data.name}: ${data.message}`;
    try {
      return ` ${JSON.stringify(data)}`;
    } catch {
      return ` [Unserializable data: ${typeof data}]`;
    }
  }

  static log(
    level: EntryLevel,
    component: LogComponent,
    message: string,
    data?: unknown
  ): void {
    if (!Logger.isEnabled(level)) return;

    const line = Logger.format(level, component, message, data);
    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "debug":
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

export class ComponentLogger {
  constructor(readonly component: LogComponent) {}

  debug(message: string, data?: unknown): void {
    Logger.log("debug", this.component, message, data);
  }

  info(message: string, data?: unknown): void {
    Logger.log("info", this.component, message, data);
  }

  warn(message: string, data?: unknown): void {
    Logger.log("warn", this.component, message, data);
  }

  error(message: string, data?: unknown): void {
    Logger.log("error", this.component, message, data);
  }
}
