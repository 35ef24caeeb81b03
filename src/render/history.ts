import type {
  EventAttendance,
  ListeningEntry,
  MarkdownSection,
  TicketPurchase,
  ViewingEntry
} from "../journal/types.js";
import { UNKNOWN_TITLE, buildSection, foldWhitespace, textOr, uniqueLines } from "./markdown.js";

export const STREAMING_MARKER = "## Netflix Viewing History";
export const MUSIC_MARKER = "## Music Listening History";
export const PURCHASE_MARKER = "## Movies Attended";
export const EVENT_MARKER = "## Events";

function bullets(values: readonly string[]): string[] {
  return uniqueLines(values.map((v) => `- ${foldWhitespace(v)}`));
}

export function renderViewing(entries: ReadonlyArray<Readonly<ViewingEntry>>): MarkdownSection {
  return buildSection(STREAMING_MARKER, [bullets(entries.map((e) => e.title))]);
}

export function renderListening(entries: ReadonlyArray<Readonly<ListeningEntry>>): MarkdownSection {
  return buildSection(MUSIC_MARKER, [bullets(entries.map((e) => e.trackName))]);
}

function describePurchase(p: Readonly<TicketPurchase>): string {
  const movie = textOr(p.movieName, UNKNOWN_TITLE);
  const theater = p.theaterName?.trim();
  const address = p.theaterAddress?.trim();
  if (theater && address) return `**${movie}** at ${theater} (${address})`;
  if (theater) return `**${movie}** at ${theater}`;
  return `**${movie}**`;
}

export function renderPurchases(purchases: ReadonlyArray<Readonly<TicketPurchase>>): MarkdownSection {
  return buildSection(PURCHASE_MARKER, [bullets(purchases.map(describePurchase))]);
}

export function renderEvents(events: ReadonlyArray<Readonly<EventAttendance>>): MarkdownSection {
  const described = uniqueLines(
    events.map((e) => {
      const event = foldWhitespace(e.event);
      const location = e.location ? foldWhitespace(e.location) : "";
      return location ? `${event}, ${location}` : event;
    })
  );
  return buildSection(EVENT_MARKER, [described.map((text, i) => `${i + 1}. ${text}`)]);
}
