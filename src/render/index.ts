import type { MarkdownSection, RecordPayloads, SourceKind } from "../journal/types.js";
import { CHART_MARKER, renderChart } from "./chart.js";
import {
  EVENT_MARKER,
  MUSIC_MARKER,
  PURCHASE_MARKER,
  STREAMING_MARKER,
  renderEvents,
  renderListening,
  renderPurchases,
  renderViewing
} from "./history.js";
import type { RenderContext } from "./markdown.js";
import { MOVIES_MARKER, renderMovies } from "./movies.js";
import { NEWS_MARKER, renderNews } from "./news.js";
import { REVIEWS_MARKER, renderReviews } from "./reviews.js";
import { WEATHER_MARKER, renderWeather } from "./weather.js";

export type { RenderContext } from "./markdown.js";

export type SectionRenderer<K extends SourceKind> = (
  records: ReadonlyArray<Readonly<RecordPayloads[K]>>,
  ctx: RenderContext
) => MarkdownSection;

export const SECTION_MARKERS: Readonly<Record<SourceKind, string>> = {
  news: NEWS_MARKER,
  weather: WEATHER_MARKER,
  movies: MOVIES_MARKER,
  chart: CHART_MARKER,
  streaming: STREAMING_MARKER,
  music: MUSIC_MARKER,
  purchase: PURCHASE_MARKER,
  review: REVIEWS_MARKER,
  event: EVENT_MARKER
};

const SECTION_RENDERERS: { readonly [K in SourceKind]: SectionRenderer<K> } = {
  news: renderNews,
  weather: renderWeather,
  movies: renderMovies,
  chart: renderChart,
  streaming: renderViewing,
  music: renderListening,
  purchase: renderPurchases,
  review: renderReviews,
  event: renderEvents
};

export function renderSection<K extends SourceKind>(
  kind: K,
  records: ReadonlyArray<Readonly<RecordPayloads[K]>>,
  ctx: RenderContext
): MarkdownSection {
  const render: SectionRenderer<K> = SECTION_RENDERERS[kind];
  return render(records, ctx);
}
