import { load } from "cheerio";
import { parseDate } from "../core/dates";
import { MarkupError } from "../core/errors";
import type { Attachment, ListingItem } from "../types";

const SELECTORS = {
  board: ".c-office-board",
  item: ".c-office-board__content-item",
  dateColumn: ".c-office-board__col-date",
  nameColumn: ".c-office-board__col-name-content",
  card: ".c-card",
  fileWrapper: ".c-files-wrapper",
} as const;

const DATE_COLUMNS_PER_ITEM = 2;

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Extracts one item per notice-board row. The board markup is assumed stable:
 * any row whose shape differs is reported as a {@link MarkupError}.
 */
export function parseListingPage(html: string, baseUrl: string): ListingItem[] {
  const $ = load(html);
  const items: ListingItem[] = [];

  $(SELECTORS.board)
    .find(SELECTORS.item)
    .each((index, element) => {
      const row = $(element);

      const dateTexts = row
        .find(SELECTORS.dateColumn)
        .toArray()
        .map((column) => {
          // first span is the column label, second one holds the value
          const span = $(column).find("span").eq(1);
          if (span.length === 0) {
            throw new MarkupError(`board item ${index + 1}: date column without a value span`, "listing");
          }
          return sanitizeText(span.text());
        });

      if (dateTexts.length !== DATE_COLUMNS_PER_ITEM) {
        throw new MarkupError(
          `board item ${index + 1}: expected ${DATE_COLUMNS_PER_ITEM} date columns, found ${dateTexts.length}`,
          "listing",
        );
      }

      const anchor = row.find(SELECTORS.nameColumn).first().find("a");
      const href = anchor.attr("href");
      if (!href) {
        throw new MarkupError(`board item ${index + 1}: missing detail link`, "listing");
      }

      const entryUrl = normalizeUrl(baseUrl, href.trim());
      if (!entryUrl) {
        throw new MarkupError(`board item ${index + 1}: invalid detail link "${href.trim()}"`, "listing");
      }

      const [publishedOnText, publishedUntilText] = dateTexts;
      items.push({
        publishedOn: parseDate(publishedOnText),
        publishedUntil: publishedUntilText ? parseDate(publishedUntilText) : undefined,
        title: sanitizeText(anchor.text()),
        entryUrl,
      });
    });

  return items;
}

/** Attachments of a detail page, in document order. */
export function parseDetailPage(html: string, pageUrl: string): Attachment[] {
  const $ = load(html);
  const attachments: Attachment[] = [];

  $(SELECTORS.card).each((_, card) => {
    $(card)
      .find(SELECTORS.fileWrapper)
      .each((__, wrapper) => {
        const node = $(wrapper);
        const href = node.find("a[href]").first().attr("href")?.trim();
        attachments.push({
          filename: sanitizeText(node.find("h3").text()),
          url: href ? (normalizeUrl(pageUrl, href) ?? href) : "",
        });
      });
  });

  return attachments;
}
