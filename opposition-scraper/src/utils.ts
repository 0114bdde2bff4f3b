import { MAX_CONTENT_CHARS, TRUNCATION_MARKER } from "./constants";

export function truncateContent(text: string, max = MAX_CONTENT_CHARS): string {
  return text.length > max ? text.slice(0, max) + TRUNCATION_MARKER : text;
}

export async function sleep(ms: number) {
  if (ms <= 0) return;
  return new Promise((r) => setTimeout(r, ms));
}
