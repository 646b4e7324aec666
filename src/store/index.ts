import type { AppConfig } from "../config";
import { JsonDumpStore } from "./jsonDumpStore";
import type { DumpStore } from "./types";

export function createStore(config: AppConfig): DumpStore {
  return new JsonDumpStore(config.dataRoot);
}

export * from "./jsonDumpStore";
export * from "./memoryStore";
export * from "./paths";
export * from "./types";
