export interface Attachment {
  readonly filename: string;
  readonly url: string;
}

/**
 * One notice-board record. Dates are calendar days held as midnight UTC.
 *
 * Everything except `attachments` is fixed when the listing page is parsed; the
 * detail pass only appends to `attachments`.
 */
export interface Entry {
  readonly publishedOn: Date;
  readonly publishedUntil?: Date;
  readonly title: string;
  readonly entryUrl: string;
  readonly attachments: Attachment[];
}

export type ListingItem = Omit<Entry, "attachments">;
