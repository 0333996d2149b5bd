import { InMemoryEntryStore } from "./memoryStore";
import type { EntryStore } from "./types";

export function createStore(): EntryStore {
  return new InMemoryEntryStore();
}

export { InMemoryEntryStore };
export * from "./types";
