import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/json.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type { PipelineEvent, EventType, LogRuntimeConfig } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  document?: string;
  stage?: PipelineEvent["stage"];
  phase?: PipelineEvent["phase"];
  durationMs?: number;
  bytes?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

const BASE_KEYS = ["ts", "runId", "level", "document", "stage", "eventType", "message"];

class EventEmitter {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, ...rest } = input;
    const event = redactEvent({
      ...rest,
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      document: input.document ?? ctx.document,
      stage: input.stage ?? ctx.stage,
      eventType: input.eventType ?? "document.lifecycle",
      message,
    });

    if (this.config.terminal) {
      this.writeTerminal(event);
    }

    if (this.config.eventFilePath) {
      ensureDir(dirname(this.config.eventFilePath));
      appendFileSync(this.config.eventFilePath, `${JSON.stringify(event)}\n`);
    }
  }

  private writeTerminal(event: PipelineEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }

    const line = this.renderTerminalLine(event);

    if (event.level === "error") {
      console.error(line);
      return;
    }
    if (event.level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  }

  private renderTerminalLine(event: PipelineEvent): string {
    if (this.config.format === "json") {
      return JSON.stringify(event);
    }
    if (this.config.verbose) {
      return this.renderPretty(event);
    }
    return this.renderCondensed(event);
  }

  renderPretty(event: PipelineEvent): string {
    const prefix = `${event.ts} [${event.document}/${event.stage}] [${event.eventType}]`;
    const extras = Object.entries(event)
      .filter(([key]) => !BASE_KEYS.includes(key))
      .filter(([, value]) => value !== undefined && value !== null && value !== "")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");

    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  renderCondensed(event: PipelineEvent): string {
    const time = formatShortTime(event.ts);
    const phase = event.phase ? ` ${event.phase}` : "";
    const prefix = `[${time}] ${event.document}${phase}`;
    const extras = renderCondensedExtras(event);
    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }
}

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  globalEmitter = new EventEmitter(config);
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

export function emitEvent(input: EmitInput): void {
  if (!globalEmitter) {
    return;
  }
  globalEmitter.emit(input);
}

export function redactEventForTest(event: PipelineEvent): PipelineEvent {
  return redactEvent(event);
}

export function formatPrettyForTest(event: PipelineEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: true,
    terminal: false,
  });
  return emitter.renderPretty(event);
}

export function formatCondensedForTest(event: PipelineEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: false,
    terminal: false,
  });
  return emitter.renderCondensed(event);
}

export function shouldPrintToTerminalForTest(event: PipelineEvent, verbose: boolean): boolean {
  return shouldPrintToTerminal(event, verbose);
}

function redactEvent(event: PipelineEvent): PipelineEvent {
  const redacted: PipelineEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    if (key === "message") {
      continue;
    }
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

function redactValue(key: string, value: unknown): unknown {
  if (value == null) {
    return value;
  }

  if (isSensitiveKey(key.toLowerCase())) {
    return "[REDACTED]";
  }

  if (typeof value === "string") {
    return truncate(value, 240);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactValue(k, v);
    }
    return out;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return (
    key.includes("token") ||
    key.includes("apikey") ||
    key.includes("api_key") ||
    key.includes("secret") ||
    key.includes("password") ||
    key.includes("authorization")
  );
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

function shouldPrintToTerminal(event: PipelineEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }

  if (event.level === "error" || event.level === "warn") {
    return true;
  }

  if (event.level === "debug") {
    return false;
  }

  if (event.eventType === "file.read" || event.eventType === "file.write") {
    return false;
  }

  if (event.eventType === "extract.table" || event.eventType === "extract.plot") {
    return false;
  }

  if (event.eventType === "document.lifecycle") {
    return event.phase === "end" || event.phase === "fail";
  }

  return true;
}

function renderCondensedExtras(event: PipelineEvent): string {
  const keys: string[] = ["rowCount", "warningCount", "durationMs", "errorCode"];
  const out: string[] = [];
  for (const key of keys) {
    const value = event[key];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    out.push(`${key}=${JSON.stringify(value)}`);
  }
  return out.join(" ");
}

function formatShortTime(ts: string): string {
  const match = ts.match(/T(\d{2}:\d{2}:\d{2})/);
  if (match) {
    return match[1];
  }
  return ts;
}
