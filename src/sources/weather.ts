import { z } from "zod";
import type { WeatherDay } from "../journal/types.js";
import type { ParsedItems } from "./api.js";

const OptionalNumber = z
  .number()
  .nullish()
  .transform((v) => v ?? undefined);

const OptionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const WeatherResponseSchema = z.object({
  forecastDaily: z.object({
    days: z.array(
      z.object({
        forecastStart: OptionalString,
        temperatureMax: OptionalNumber,
        temperatureMin: OptionalNumber,
        daytimeForecast: z
          .object({
            conditionCode: OptionalString,
            precipitationChance: OptionalNumber,
            precipitationAmount: OptionalNumber,
            windSpeed: OptionalNumber
          })
          .nullish()
      })
    )
  })
});

/**
 * Daily forecast in metric units (°C, mm, km/h, chance as 0..1).
 * Conversion happens at render time.
 */
export function parseWeatherResponse(json: unknown): ParsedItems<WeatherDay> {
  const parsed = WeatherResponseSchema.safeParse(json);
  if (!parsed.success) return { ok: false, message: "response has no 'forecastDaily.days' array" };

  const items = parsed.data.forecastDaily.days.map((day, i): WeatherDay => {
    const daytime = day.daytimeForecast ?? undefined;
    return {
      dayNumber: i + 1,
      forecastStart: day.forecastStart,
      conditionCode: daytime?.conditionCode,
      temperatureMaxC: day.temperatureMax,
      temperatureMinC: day.temperatureMin,
      precipitationChance: daytime?.precipitationChance,
      precipitationAmountMm: daytime?.precipitationAmount,
      windSpeedKmh: daytime?.windSpeed
    };
  });
  return { ok: true, items, dropped: 0 };
}
