import { InconsistentStateError } from "../core/errors";
import type { Attachment, Entry } from "../types";
import type { EntryStore } from "./types";

/**
 * Map-backed entry store. Each method runs to completion without yielding, so
 * concurrent detail fetches never observe a half-applied insert or append.
 */
export class InMemoryEntryStore implements EntryStore {
  private readonly entries = new Map<string, Entry>();
  private isFrozen = false;

  get size(): number {
    return this.entries.size;
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  register(entry: Entry): void {
    this.ensureWritable(`register ${entry.entryUrl}`);
    // re-inserting moves a duplicate to the position it was last seen at
    this.entries.delete(entry.entryUrl);
    this.entries.set(entry.entryUrl, entry);
  }

  get(entryUrl: string): Entry | undefined {
    return this.entries.get(entryUrl);
  }

  has(entryUrl: string): boolean {
    return this.entries.has(entryUrl);
  }

  appendAttachment(entryUrl: string, attachment: Attachment): void {
    this.ensureWritable(`append attachment to ${entryUrl}`);
    const entry = this.entries.get(entryUrl);
    if (!entry) {
      throw new InconsistentStateError(`news entry not found for URL ${entryUrl}`);
    }
    entry.attachments.push(Object.freeze({ ...attachment }));
  }

  values(): Entry[] {
    return [...this.entries.values()];
  }

  freeze(): readonly Readonly<Entry>[] {
    this.isFrozen = true;
    return Object.freeze(this.values().map((entry) => Object.freeze({ ...entry, attachments: [...entry.attachments] })));
  }

  private ensureWritable(action: string): void {
    if (this.isFrozen) {
      throw new InconsistentStateError(`cannot ${action}: store is frozen`);
    }
  }
}
