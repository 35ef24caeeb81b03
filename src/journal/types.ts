/**
 * Canonical `YYYY-MM-DD` day key. It is the join key between source records
 * and journal files.
 */
export type CanonicalDate = string;

export const SOURCE_KINDS = [
  "news",
  "weather",
  "movies",
  "chart",
  "streaming",
  "music",
  "purchase",
  "review",
  "event"
] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

export type NewsHeadline = {
  title: string;
  link: string;
};

export type WeatherDay = {
  dayNumber: number;
  forecastStart?: string;
  conditionCode?: string;
  temperatureMaxC?: number;
  temperatureMinC?: number;
  /** 0..1 */
  precipitationChance?: number;
  precipitationAmountMm?: number;
  windSpeedKmh?: number;
};

export type MovieListing = {
  title?: string;
  releaseDate?: string;
  rating?: number;
  description?: string;
};

export type ChartEntry = {
  rank?: number;
  title?: string;
  artist?: string;
  lastWeek?: number;
  peakPosition?: number;
  weeksOnChart?: number;
};

export type ViewingEntry = {
  title: string;
};

export type ListeningEntry = {
  trackName: string;
};

export type TicketPurchase = {
  movieName: string;
  theaterName?: string;
  theaterAddress?: string;
};

export type BusinessReview = {
  businessName: string;
  rating?: number;
  comment: string;
};

export type EventAttendance = {
  event: string;
  location?: string;
};

export type RecordPayloads = {
  news: NewsHeadline;
  weather: WeatherDay;
  movies: MovieListing;
  chart: ChartEntry;
  streaming: ViewingEntry;
  music: ListeningEntry;
  purchase: TicketPurchase;
  review: BusinessReview;
  event: EventAttendance;
};

export type DatedRecord<K extends SourceKind = SourceKind> = {
  readonly date: CanonicalDate;
  readonly kind: K;
  readonly payload: Readonly<RecordPayloads[K]>;
};

/** Records of one kind grouped by day, insertion order kept. */
export type DateBucket<K extends SourceKind> = Map<CanonicalDate, Array<Readonly<RecordPayloads[K]>>>;

export type MarkdownSection = {
  marker: string;
  body: string;
};

export type SectionFailureReason = "directory_unwritable" | "file_unwritable" | "io_error";

export type SectionResult =
  | { status: "created" }
  | { status: "appended" }
  | { status: "skipped" }
  | { status: "failed"; reason: SectionFailureReason; message: string };

