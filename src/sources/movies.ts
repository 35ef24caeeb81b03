import { z } from "zod";
import type { MovieListing } from "../journal/types.js";
import type { ParsedItems } from "./api.js";

const OptionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const MoviesResponseSchema = z.object({
  results: z.array(
    z.object({
      title: OptionalString,
      overview: OptionalString,
      release_date: OptionalString,
      vote_average: z
        .union([z.number(), z.string()])
        .nullish()
        .transform((v) => {
          if (v === null || v === undefined || v === "") return undefined;
          const n = Number(v);
          return Number.isFinite(n) ? n : undefined;
        })
    })
  )
});

export function parseMoviesResponse(json: unknown): ParsedItems<MovieListing> {
  const parsed = MoviesResponseSchema.safeParse(json);
  if (!parsed.success) return { ok: false, message: "response has no 'results' array" };

  const items = parsed.data.results.map(
    (m): MovieListing => ({
      title: m.title,
      releaseDate: m.release_date,
      rating: m.vote_average,
      description: m.overview
    })
  );
  return { ok: true, items, dropped: 0 };
}
