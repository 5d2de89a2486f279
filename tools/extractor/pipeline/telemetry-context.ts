import { AsyncLocalStorage } from "async_hooks";
import type { StageName } from "./types.js";

export interface TelemetryContextValue {
  document: string;
  stage: StageName | "system";
}

const storage = new AsyncLocalStorage<TelemetryContextValue>();

export function runWithTelemetryContext<T>(value: TelemetryContextValue, fn: () => T): T {
  return storage.run(value, fn);
}

export function getTelemetryContext(): TelemetryContextValue {
  return storage.getStore() ?? { document: "-", stage: "system" };
}
