import type { Entry } from "../types";
import { truncateToDay } from "./dates";

/** Entries published on `cutoff`'s calendar day or later, in input order. */
export function sinceIncluding<T extends Pick<Entry, "publishedOn">>(entries: readonly T[], cutoff: Date): T[] {
  const threshold = truncateToDay(cutoff).getTime();
  return entries.filter((entry) => truncateToDay(entry.publishedOn).getTime() >= threshold);
}
