import { z } from "zod";
import type { NewsHeadline } from "../journal/types.js";
import type { ParsedItems } from "./api.js";

export const NewsResponseSchema = z.object({
  data: z.array(
    z
      .object({
        title: z.string().nullish(),
        link: z.string().nullish()
      })
      .passthrough()
  )
});

/** Articles without both a title and a link are dropped. */
export function parseNewsResponse(json: unknown): ParsedItems<NewsHeadline> {
  const parsed = NewsResponseSchema.safeParse(json);
  if (!parsed.success) return { ok: false, message: "response has no 'data' array" };

  const items: NewsHeadline[] = [];
  let dropped = 0;
  for (const article of parsed.data.data) {
    const title = article.title?.trim();
    const link = article.link?.trim();
    if (title && link) {
      items.push({ title, link });
    } else {
      dropped += 1;
    }
  }
  return { ok: true, items, dropped };
}
