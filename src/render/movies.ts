import type { MarkdownSection, MovieListing } from "../journal/types.js";
import {
  UNKNOWN_TITLE,
  buildSection,
  escapeCell,
  foldWhitespace,
  oneDecimal,
  tableLines,
  textOr,
  truncate
} from "./markdown.js";

export const MOVIES_MARKER = "## Box Office";

export const DESCRIPTION_LIMIT = 300;

const HEADERS = ["Title", "Release Date", "Rating", "Description"] as const;

export function renderMovies(movies: ReadonlyArray<Readonly<MovieListing>>): MarkdownSection {
  const rows = movies.map((movie) => [
    escapeCell(textOr(movie.title, UNKNOWN_TITLE)),
    escapeCell(textOr(movie.releaseDate)),
    oneDecimal(movie.rating),
    escapeCell(truncate(foldWhitespace(textOr(movie.description)), DESCRIPTION_LIMIT))
  ]);
  return buildSection(MOVIES_MARKER, [tableLines(HEADERS, rows)]);
}
