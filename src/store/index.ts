import type { AppConfig } from "../config";
import type { ArchiveStore } from "./types";
import { SqliteStore } from "./sqliteStore";

export function createStore(config: Pick<AppConfig, "storePath">): ArchiveStore {
  return new SqliteStore(config.storePath);
}

export { SqliteStore };
export * from "./types";
export * from "./updates";
