import type { Attachment, Entry } from "../types";

export interface EntryStore {
  readonly size: number;
  /** Adds or replaces the entry keyed by its URL; the newest registration wins. */
  register(entry: Entry): void;
  get(entryUrl: string): Entry | undefined;
  has(entryUrl: string): boolean;
  appendAttachment(entryUrl: string, attachment: Attachment): void;
  values(): Entry[];
  /** Ends the mutation window and returns the final entries. */
  freeze(): readonly Readonly<Entry>[];
  readonly frozen: boolean;
}
