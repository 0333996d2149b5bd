import type { Attachment, Entry } from "../types";
import { formatDate } from "./dates";

const MISSING_DATE = "-";

export function formatAttachment(attachment: Attachment): string {
  return `${attachment.filename}: ${attachment.url}`;
}

export function formatEntry(entry: Entry): string {
  const lines = [
    `Title: ${entry.title}`,
    `Published on: ${formatDate(entry.publishedOn)}`,
    `Published until: ${entry.publishedUntil ? formatDate(entry.publishedUntil) : MISSING_DATE}`,
    `URL: ${entry.entryUrl}`,
  ];

  if (entry.attachments.length > 0) {
    lines.push("Attachments:");
    for (const attachment of entry.attachments) {
      lines.push(`  ${formatAttachment(attachment)}`);
    }
  }

  return lines.map((line) => `${line}\n`).join("");
}

export function formatEntries(entries: readonly Entry[]): string {
  return entries.map(formatEntry).join("\n");
}
