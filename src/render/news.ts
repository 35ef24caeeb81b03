import type { MarkdownSection, NewsHeadline } from "../journal/types.js";
import { buildSection, escapeLinkText, generatedOn, uniqueLines, type RenderContext } from "./markdown.js";

export const NEWS_MARKER = "## News Headlines";

export function renderNews(items: ReadonlyArray<Readonly<NewsHeadline>>, ctx: RenderContext): MarkdownSection {
  const bullets = uniqueLines(items.map((item) => `- [${escapeLinkText(item.title.trim())}](${item.link.trim()})`));
  return buildSection(NEWS_MARKER, [[generatedOn(ctx)], bullets]);
}
