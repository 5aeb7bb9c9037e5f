import * as cheerio from "cheerio";

export const USER_AGENT = "Mozilla/5.0 (compatible; doc-qa-rag/0.1; +https://www.npmjs.com/)";

const BLOCK_ELEMENTS = "p, div, li, tr, br, h1, h2, h3, h4, h5, h6, section, article, header, footer, blockquote, pre";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type PageText = {
  title: string;
  text: string;
};

/** Visible page text, one non-empty line per block; title falls back to "Webpage". */
export function extractPageText(html: string): PageText {
  const $ = cheerio.load(html);
  $("script, style, noscript, template").remove();
  const title = $("title").first().text().trim() || "Webpage";
  $(BLOCK_ELEMENTS).append("\n");
  const raw = $("body").length ? $("body").text() : $.root().text();
  const text = raw
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
  return { title, text };
}

export async function fetchPage(url: string, fetchImpl: FetchLike, timeoutMs: number): Promise<PageText> {
  const res = await fetchImpl(url, {
    headers: { "user-agent": USER_AGENT, accept: "text/html,application/xhtml+xml" },
    signal: AbortSignal.timeout(timeoutMs)
  });
  if (!res.ok) throw new Error(`HTTP ${res.status} ${res.statusText}`);
  return extractPageText(await res.text());
}
