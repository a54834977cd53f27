import { getErrorMessage } from "../lib/errors";
import type { LogSink } from "../lib/log";
import type { FetchLike } from "../reference/fetchReferenceTable";

export type PageContext = {
  title: string;
  description: string;
};

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === "#") {
      const code =
        entity[1] === "x" || entity[1] === "X"
          ? Number.parseInt(entity.slice(2), 16)
          : Number.parseInt(entity.slice(1), 10);
      return Number.isFinite(code) ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function clean(text: string | undefined): string {
  if (!text) return "";
  return decodeEntities(text).replace(/\s+/g, " ").trim();
}

function metaContent(html: string, name: string): string {
  const tags = html.match(/<meta\b[^>]*>/gi) ?? [];
  for (const tag of tags) {
    const key = tag.match(/\b(?:name|property)\s*=\s*["']([^"']*)["']/i)?.[1];
    if (!key || key.toLowerCase() !== name) continue;
    const content = tag.match(/\bcontent\s*=\s*"([^"]*)"/i)?.[1] ?? tag.match(/\bcontent\s*=\s*'([^']*)'/i)?.[1];
    if (content) return clean(content);
  }
  return "";
}

export function extractPageContext(html: string): PageContext {
  const title = clean(html.match(/<title[^>]*>([\s\S]*?)<\/title>/i)?.[1]);
  const description = metaContent(html, "description") || metaContent(html, "og:description");
  return { title, description };
}

/** Title and meta description of a page, or null when the page cannot be read. */
export async function fetchPageContext(
  url: string,
  options: { timeoutMs: number; fetchImpl?: FetchLike; log?: LogSink }
): Promise<PageContext | null> {
  const fetchImpl = options.fetchImpl ?? fetch;
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
    if (!response.ok) {
      (options.log ?? console).warn(`[report] page context for ${url}: status ${response.status}`);
      return null;
    }
    const context = extractPageContext(await response.text());
    return context.title || context.description ? context : null;
  } catch (err) {
    (options.log ?? console).warn(`[report] page context for ${url} unavailable: ${getErrorMessage(err)}`);
    return null;
  }
}
