import { ExecutionException } from "./exceptions";

export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

type MessageType = string | Error;

export type LogFunction = (message: string) => void;

/**
 * Provides a customizable logging mechanism across different levels of verbosity.
 */
export class Logger {
  private logFunctions: Map<LogLevel, LogFunction | undefined>;
  private jsonLogs: Map<LogLevel, string[]>;
  private showTimestamps: boolean;

  constructor(
    logMapping?: Partial<Record<LogLevel, LogFunction | undefined>>,
    private saveJson: boolean = false,
    showTimestamps: boolean = false,
  ) {
    this.showTimestamps = showTimestamps;
    this.jsonLogs = new Map([
      [LogLevel.DEBUG, []],
      [LogLevel.INFO, []],
      [LogLevel.WARN, []],
      [LogLevel.ERROR, []],
    ]);
    this.logFunctions = new Map<LogLevel, LogFunction | undefined>([
      [LogLevel.DEBUG, undefined],
      [LogLevel.INFO, console.log],
      [LogLevel.WARN, console.warn],
      [LogLevel.ERROR, console.error],
    ]);
    if (logMapping) {
      for (const level of [
        LogLevel.DEBUG,
        LogLevel.INFO,
        LogLevel.WARN,
        LogLevel.ERROR,
      ]) {
        if (level in logMapping) {
          this.logFunctions.set(level, logMapping[level]);
        }
      }
    }
  }

  public getJsonLogs(): Record<string, string[]> {
    if (!this.saveJson) {
      throw ExecutionException.make(
        "JSON logging not enabled for this logger instance",
      );
    }
    return {
      debug: this.jsonLogs.get(LogLevel.DEBUG) ?? [],
      info: this.jsonLogs.get(LogLevel.INFO) ?? [],
      warn: this.jsonLogs.get(LogLevel.WARN) ?? [],
      error: this.jsonLogs.get(LogLevel.ERROR) ?? [],
    };
  }

  /**
   * Returns `true` if messages of `level` go anywhere.
   * Use it to skip formatting large debug output nobody reads.
   */
  public isEnabled(level: LogLevel): boolean {
    return this.saveJson || this.logFunctions.get(level) !== undefined;
  }

  /**
   * Formats the current time as [HH:MM:SS.ms]
   */
  private getTimestamp(): string {
    const now = new Date();
    const hours = now.getHours().toString().padStart(2, "0");
    const minutes = now.getMinutes().toString().padStart(2, "0");
    const seconds = now.getSeconds().toString().padStart(2, "0");
    const milliseconds = now.getMilliseconds().toString().padStart(3, "0");
    return `[${hours}:${minutes}:${seconds}.${milliseconds}]`;
  }

  private formatMessage(msg: MessageType, context?: string): string {
    const contextPrefix = context === undefined ? "" : `[${context}] `;
    const timestampPrefix = this.showTimestamps
      ? `${this.getTimestamp()} `
      : "";
    const text = msg instanceof Error ? msg.message : msg;
    return `${timestampPrefix}${contextPrefix}${text}`;
  }

  /**
   * Logs a message at the specified log level.
   * With JSON output enabled the message is saved instead of being printed.
   * @param context Optional prefix, such as the table the message is about.
   */
  protected log(level: LogLevel, msg: MessageType, context?: string): void {
    const formatted = this.formatMessage(msg, context);
    if (this.saveJson) {
      this.jsonLogs.get(level)?.push(formatted);
      return;
    }
    const logFunction = this.logFunctions.get(level);
    if (logFunction) {
      logFunction(formatted);
    }
  }

  public debug(msg: MessageType, context?: string): void {
    this.log(LogLevel.DEBUG, msg, context);
  }

  public info(msg: MessageType, context?: string): void {
    this.log(LogLevel.INFO, msg, context);
  }

  public warn(msg: MessageType, context?: string): void {
    this.log(LogLevel.WARN, msg, context);
  }

  public error(msg: MessageType, context?: string): void {
    this.log(LogLevel.ERROR, msg, context);
  }
}

/**
 * Logger that silences all logs.
 */
export class QuietLogger extends Logger {
  constructor(saveJson: boolean = false, showTimestamps: boolean = false) {
    super(
      {
        [LogLevel.INFO]: undefined,
        [LogLevel.WARN]: undefined,
        [LogLevel.ERROR]: undefined,
      },
      saveJson,
      showTimestamps,
    );
  }
}

/**
 * Logger that enables debug level logging to stdout.
 */
export class DebugLogger extends Logger {
  constructor(saveJson: boolean = false, showTimestamps: boolean = false) {
    super(
      {
        [LogLevel.DEBUG]: console.log,
      },
      saveJson,
      showTimestamps,
    );
  }
}

function trace(message: string): void {
  console.log(message);
  console.trace();
}

/**
 * Logger that adds backtraces to each log function.
 */
export class TraceLogger extends Logger {
  constructor(saveJson: boolean = false, showTimestamps: boolean = false) {
    super(
      {
        [LogLevel.DEBUG]: trace,
        [LogLevel.INFO]: trace,
        [LogLevel.WARN]: trace,
        [LogLevel.ERROR]: trace,
      },
      saveJson,
      showTimestamps,
    );
  }
}
