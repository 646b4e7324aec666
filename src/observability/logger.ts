import type { LogFields, LogLevel } from "./types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.context.minLevel ?? "info"];
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    if (level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}
