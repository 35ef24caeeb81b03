import type { BusinessReview, MarkdownSection } from "../journal/types.js";
import { buildSection, escapeCell, foldWhitespace, oneDecimal, tableLines, textOr, truncate } from "./markdown.js";

export const REVIEWS_MARKER = "## Yelp Reviews";

export const COMMENT_LIMIT = 100;

const HEADERS = ["Business", "Rating", "Review"] as const;

export function renderReviews(reviews: ReadonlyArray<Readonly<BusinessReview>>): MarkdownSection {
  const rows = reviews.map((review) => [
    escapeCell(textOr(review.businessName)),
    oneDecimal(review.rating),
    escapeCell(truncate(foldWhitespace(review.comment), COMMENT_LIMIT))
  ]);
  return buildSection(REVIEWS_MARKER, [tableLines(HEADERS, rows)]);
}
