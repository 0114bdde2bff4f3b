import { load } from "cheerio";

const BLOCKS = "h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, td, th, figcaption, dt, dd, address, div";
const NOISE = "script, style, noscript, template, svg, iframe";
const BULLET = /^[•●○◦▪▫‣⁃\-*]\s/;

function clean(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

/**
 * Splits an HTML document into the text of its innermost block elements,
 * document order. The page title leads when present.
 */
export function partitionHtml(html: string): string[] {
  const $ = load(html);
  $(NOISE).remove();

  const segments: string[] = [];
  const title = clean($("head > title").first().text());
  if (title) segments.push(title);

  $("body")
    .find(BLOCKS)
    .filter((_, el) => $(el).find(BLOCKS).length === 0)
    .each((_, el) => {
      const text = clean($(el).text());
      if (text) segments.push(text);
    });

  if (!segments.length) {
    const body = clean($.root().text());
    if (body) segments.push(body);
  }
  return segments;
}

export function partitionText(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function partitionDocument(body: string, contentType: string): string[] {
  if (contentType.includes("text/plain")) return partitionText(body);
  return partitionHtml(body);
}

/**
 * Rejoins lines that a renderer hard-wrapped inside a paragraph. Paragraphs
 * made only of short lines (headings, menus) and bullet lists keep their
 * line breaks.
 */
export function groupBrokenParagraphs(text: string): string {
  const grouped: string[] = [];

  for (const paragraph of text.split(/\s*\n\s*\n\s*/)) {
    const trimmed = paragraph.trim();
    if (!trimmed) continue;

    const lines = trimmed
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
    const allShort = lines.every((l) => l.split(" ").length < 5);

    if (BULLET.test(trimmed) || allShort) grouped.push(...lines);
    else grouped.push(trimmed.replace(/\s*\n\s*/g, " "));
  }

  return grouped.join("\n\n");
}
