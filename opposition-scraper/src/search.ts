import { AxiosInstance } from "axios";
import { load } from "cheerio";
import { z } from "zod";
import { GOOGLE_SEARCH_URL, MAX_RESULTS_PER_QUERY, SERP_ENDPOINT } from "./constants";
import { readBody } from "./http";
import { SearchLanguage, SearchResult, SearchResultSet } from "./types";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const log = createLogger("search");

// Organic result container in Google's rendered SERP. Not a documented API.
const RESULT_SELECTOR = "div.tF2Cxc";
const NAV_WORDS = ["web", "images", "videos", "news", "shopping"];
const UI_BOILERPLATE = ["Press/to jump to the search box", "Accessibility help"];

const EnvelopeSchema = z.object({ body: z.string() }).passthrough();

function clean(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export function emptyResultSet(queryText: string, language: SearchLanguage): SearchResultSet {
  return { results: [], queryText, language, totalCount: 0 };
}

export function searchUrl(query: string): string {
  return `${GOOGLE_SEARCH_URL}?${new URLSearchParams({ q: query }).toString()}`;
}

/**
 * Heuristic extraction of organic results from rendered SERP markup. Only
 * the first ten result blocks are considered.
 */
export function parseSerpHtml(html: string): SearchResult[] {
  const $ = load(html);
  const results: SearchResult[] = [];

  $(RESULT_SELECTOR)
    .toArray()
    .slice(0, MAX_RESULTS_PER_QUERY)
    .forEach((block, i) => {
      const $block = $(block);
      const anchor = $block.find("a[href]").first();

      let title = "";
      let link = "";
      if (anchor.length) {
        link = anchor.attr("href") ?? "";
        const heading = anchor.find("h3").first();
        title = clean(heading.length ? heading.text() : anchor.text());
      }

      let description = "";
      for (const span of $block.find("span").toArray()) {
        const text = clean($(span).text());
        const lower = text.toLowerCase();
        if (text.length > 20 && !NAV_WORDS.some((w) => lower.includes(w))) {
          description = text;
          break;
        }
      }

      if (!description) {
        const all = clean($block.text());
        description = title && all.includes(title) ? all.replaceAll(title, "") : all;
      }
      for (const chrome of UI_BOILERPLATE) description = description.replaceAll(chrome, "");
      description = description.trim();

      if (title || link) {
        results.push({ title, link, description, position: i + 1 });
      }
    });

  return results;
}

export type SearchClientOptions = {
  apiKey: string;
  zone?: string;
  endpoint?: string;
};

export class SearchClient {
  private readonly zone: string;
  private readonly endpoint: string;

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: SearchClientOptions
  ) {
    this.zone = options.zone ?? "serp";
    this.endpoint = options.endpoint ?? SERP_ENDPOINT;
  }

  /** Never throws: any upstream or parsing problem yields an empty set for this language. */
  async search(query: string, language: SearchLanguage): Promise<SearchResultSet> {
    log.info(`Searching (${language}) for: ${query}`);
    try {
      const res = await this.http.post<unknown>(
        this.endpoint,
        { zone: this.zone, url: searchUrl(query), format: "json" },
        {
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            "Content-Type": "application/json",
          },
        }
      );

      if (res.status !== 200) {
        log.error(`SERP proxy error: ${res.status} - ${readBody(res.data).slice(0, 500)}`);
        return emptyResultSet(query, language);
      }

      let envelope: unknown;
      try {
        envelope = JSON.parse(readBody(res.data));
      } catch (err) {
        log.error(`SERP envelope is not JSON: ${errorMessage(err)}`);
        return emptyResultSet(query, language);
      }

      const parsed = EnvelopeSchema.safeParse(envelope);
      if (!parsed.success) {
        log.warn("SERP envelope has no HTML body");
        return emptyResultSet(query, language);
      }

      const results = parseSerpHtml(parsed.data.body);
      for (const r of results) log.debug(`Result ${r.position}: ${r.title.slice(0, 50)} -> ${r.link}`);
      log.info(`Found ${results.length} organic results (${language})`);
      return { results, queryText: query, language, totalCount: results.length };
    } catch (err) {
      log.error(`Error searching (${language}): ${errorMessage(err)}`);
      return emptyResultSet(query, language);
    }
  }
}

/** Concatenates per-language sets without removing duplicate URLs. */
export function mergeResultSets(english: SearchResultSet, bangla: SearchResultSet): SearchResultSet {
  return {
    results: [...english.results, ...bangla.results],
    queryText: `English: ${english.queryText} | Bangla: ${bangla.queryText}`,
    language: "mixed",
    totalCount: english.totalCount + bangla.totalCount,
  };
}
