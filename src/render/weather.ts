import { normalizeDate } from "../journal/dates.js";
import type { MarkdownSection, WeatherDay } from "../journal/types.js";
import {
  NOT_AVAILABLE,
  buildSection,
  celsiusToFahrenheit,
  escapeCell,
  fractionToPercent,
  generatedOn,
  kmhToMph,
  mmToInches,
  oneDecimal,
  tableLines,
  type RenderContext
} from "./markdown.js";

export const WEATHER_MARKER = "## Weather Forecast";

const HEADERS = [
  "Day",
  "Date",
  "Condition",
  "High (°F)",
  "Low (°F)",
  "Precip. Chance",
  "Precip. (in)",
  "Wind (mph)"
] as const;

/** `MostlyCloudy` -> `Mostly Cloudy` */
export function humanizeCondition(code: string | undefined): string {
  const trimmed = code?.trim();
  if (!trimmed) return NOT_AVAILABLE;
  return escapeCell(trimmed.replace(/([a-z])([A-Z])/g, "$1 $2"));
}

function convert(value: number | undefined, fn: (n: number) => number): number | undefined {
  return value === undefined ? undefined : fn(value);
}

function forecastDate(start: string | undefined): string {
  const parsed = normalizeDate(start, ["iso"]);
  return parsed.ok ? parsed.date : NOT_AVAILABLE;
}

export function renderWeather(days: ReadonlyArray<Readonly<WeatherDay>>, ctx: RenderContext): MarkdownSection {
  const rows = days.map((day) => [
    String(day.dayNumber),
    forecastDate(day.forecastStart),
    humanizeCondition(day.conditionCode),
    oneDecimal(convert(day.temperatureMaxC, celsiusToFahrenheit)),
    oneDecimal(convert(day.temperatureMinC, celsiusToFahrenheit)),
    fractionToPercent(day.precipitationChance),
    oneDecimal(convert(day.precipitationAmountMm, mmToInches)),
    oneDecimal(convert(day.windSpeedKmh, kmhToMph))
  ]);
  return buildSection(WEATHER_MARKER, [[generatedOn(ctx)], tableLines(HEADERS, rows)]);
}
