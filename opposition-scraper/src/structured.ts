import { ZodType, ZodTypeDef } from "zod";
import { errorMessage } from "./errors";

export type StructuredVia = "fenced" | "braces" | "fallback";

export type StructuredReply<T> = {
  data: T;
  via: StructuredVia;
  error?: string;
};

const FENCED_JSON = /```json\s*([\s\S]*?)(?:```|$)/;

/**
 * Pulls a JSON candidate out of free model text. A ```json fence wins over a
 * bare object; only when neither exists is there no candidate at all.
 */
export function findJsonCandidate(reply: string): { text: string; via: Exclude<StructuredVia, "fallback"> } | null {
  const fenced = FENCED_JSON.exec(reply);
  if (fenced) return { text: fenced[1].trim(), via: "fenced" };

  const start = reply.indexOf("{");
  const end = reply.lastIndexOf("}");
  if (start >= 0 && end > start) return { text: reply.slice(start, end + 1), via: "braces" };

  return null;
}

/**
 * Best-effort structured output: fenced block, then first-to-last brace, then
 * the caller's deterministic default. A candidate that fails to parse or
 * validate goes straight to the default; the next tier is not tried.
 */
export function parseStructuredReply<T>(
  reply: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fallback: () => T
): StructuredReply<T> {
  const candidate = findJsonCandidate(reply.trim());
  if (!candidate) return { data: fallback(), via: "fallback", error: "no JSON found in reply" };

  let raw: unknown;
  try {
    raw = JSON.parse(candidate.text);
  } catch (err) {
    return { data: fallback(), via: "fallback", error: errorMessage(err) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { data: fallback(), via: "fallback", error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }
  return { data: parsed.data, via: candidate.via };
}
