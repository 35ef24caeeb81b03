import { apiEndpointFor, type AppConfig } from "../config.js";
import type { CanonicalDate, SourceKind } from "../journal/types.js";
import { createApiSource } from "./api.js";
import { parseChartResponse } from "./chart.js";
import { createFandangoSource } from "./fandango.js";
import type { FetchFn, HttpOptions } from "./http.js";
import { parseMoviesResponse } from "./movies.js";
import { createAppleMusicSource } from "./music.js";
import { createNetflixSource } from "./netflix.js";
import { parseNewsResponse } from "./news.js";
import { createTicketmasterSource } from "./ticketmaster.js";
import type { AnyRecordSource, RecordSource } from "./types.js";
import { parseWeatherResponse } from "./weather.js";
import { createYelpSource } from "./yelp.js";

export type SourceContext = {
  /** Journal day for API sources (run date + API_DAY_OFFSET). */
  apiDate: CanonicalDate;
  fetchFn?: FetchFn;
};

type SourceFactory<K extends SourceKind> = (cfg: AppConfig, ctx: SourceContext) => RecordSource<K>;

function httpOptions(cfg: AppConfig, ctx: SourceContext): HttpOptions {
  return { timeoutMs: cfg.HTTP_TIMEOUT_MS, retries: cfg.HTTP_RETRIES, fetchFn: ctx.fetchFn };
}

const SOURCE_FACTORIES: { readonly [K in SourceKind]: SourceFactory<K> } = {
  news: (cfg, ctx) =>
    createApiSource({
      kind: "news",
      name: "news-api",
      api: apiEndpointFor(cfg, "NEWS"),
      http: httpOptions(cfg, ctx),
      journalDate: ctx.apiDate,
      parse: parseNewsResponse
    }),
  weather: (cfg, ctx) =>
    createApiSource({
      kind: "weather",
      name: "weather-api",
      api: apiEndpointFor(cfg, "WEATHER"),
      http: httpOptions(cfg, ctx),
      journalDate: ctx.apiDate,
      parse: parseWeatherResponse
    }),
  movies: (cfg, ctx) =>
    createApiSource({
      kind: "movies",
      name: "box-office-api",
      api: apiEndpointFor(cfg, "MOVIES"),
      http: httpOptions(cfg, ctx),
      journalDate: ctx.apiDate,
      parse: parseMoviesResponse
    }),
  chart: (cfg, ctx) =>
    createApiSource({
      kind: "chart",
      name: "billboard-api",
      api: apiEndpointFor(cfg, "CHART"),
      http: httpOptions(cfg, ctx),
      journalDate: ctx.apiDate,
      parse: parseChartResponse
    }),
  streaming: (cfg) => createNetflixSource(cfg.NETFLIX_FILE_LOCATION, cfg.DELETE_AFTER_PROCESSING),
  music: (cfg) => createAppleMusicSource(cfg.APPLE_MUSIC_FILE_PATH, cfg.DELETE_AFTER_PROCESSING),
  purchase: (cfg) => createFandangoSource(cfg.FANDANGO_CSV_FILE, cfg.DELETE_AFTER_PROCESSING),
  review: (cfg) => createYelpSource(cfg.YELP_USER_REVIEWS_HTML, cfg.DELETE_AFTER_PROCESSING),
  event: (cfg) => createTicketmasterSource(cfg.TICKET_MASTER_CSV_FILE, cfg.DELETE_AFTER_PROCESSING)
};

export function buildSources(cfg: AppConfig, kinds: readonly SourceKind[], ctx: SourceContext): AnyRecordSource[] {
  return kinds.map((kind) => SOURCE_FACTORIES[kind](cfg, ctx));
}
