import { z } from "zod";
import type { ChartEntry } from "../journal/types.js";
import type { ParsedItems } from "./api.js";

// Chart APIs send positions as numbers or strings ("-" for new entries).
const Position = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return undefined;
    const n = typeof v === "number" ? v : Number.parseInt(v, 10);
    return Number.isFinite(n) ? n : undefined;
  });

const OptionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const ChartResponseSchema = z.object({
  content: z.record(
    z.object({
      rank: Position,
      title: OptionalString,
      artist: OptionalString,
      "last week": Position,
      "peak position": Position,
      "weeks on chart": Position
    })
  )
});

export function parseChartResponse(json: unknown): ParsedItems<ChartEntry> {
  const parsed = ChartResponseSchema.safeParse(json);
  if (!parsed.success) return { ok: false, message: "response has no 'content' map" };

  const items = Object.values(parsed.data.content).map(
    (e): ChartEntry => ({
      rank: e.rank,
      title: e.title,
      artist: e.artist,
      lastWeek: e["last week"],
      peakPosition: e["peak position"],
      weeksOnChart: e["weeks on chart"]
    })
  );
  return { ok: true, items, dropped: 0 };
}
