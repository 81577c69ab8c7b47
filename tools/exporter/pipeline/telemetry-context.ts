import { AsyncLocalStorage } from "async_hooks";
import type { StageName } from "./types.js";

export interface TelemetryContextValue {
  stage: StageName | "system";
  index?: number;
}

const storage = new AsyncLocalStorage<TelemetryContextValue>();

export function runWithTelemetryContext<T>(
  value: TelemetryContextValue,
  fn: () => Promise<T>
): Promise<T> {
  return storage.run(value, fn);
}

export function getTelemetryContext(): TelemetryContextValue {
  return storage.getStore() ?? { stage: "system" };
}
