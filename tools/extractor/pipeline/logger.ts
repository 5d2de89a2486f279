import type { EventType, StageName } from "./types.js";
import { emitEvent, type LogLevel } from "./events.js";

export interface LogMeta {
  document?: string;
  stage?: StageName | "system";
  eventType?: EventType;
  phase?: "start" | "end" | "fail" | "progress";
  durationMs?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export class Logger {
  debug(message: string, meta: LogMeta = {}): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta: LogMeta): void {
    emitEvent({
      level,
      message,
      eventType: meta.eventType ?? "document.lifecycle",
      ...meta,
    });
  }
}

export const logger = new Logger();
