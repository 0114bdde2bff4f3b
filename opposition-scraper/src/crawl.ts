import { Extractor } from "./readers";
import { RawContentSink } from "./save";
import { groupBrokenParagraphs } from "./parse";
import { ContentArtifact, SearchResultSet } from "./types";
import { sleep, truncateContent } from "./utils";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const log = createLogger("content");

export type ContentFetcherOptions = {
  primary: Extractor;
  fallback: Extractor;
  sink?: RawContentSink;
  delayMs?: number;
};

export type RawContent = { text: string; via: string };

export class ContentFetcher {
  private readonly delayMs: number;

  constructor(private readonly options: ContentFetcherOptions) {
    this.delayMs = options.delayMs ?? 2000;
  }

  /** Primary extractor first; the fallback only runs when it fails. */
  async fetchRaw(url: string): Promise<RawContent> {
    const { primary, fallback } = this.options;
    try {
      const text = await primary.extract(url);
      log.info(`Extracted ${url} via ${primary.name}`);
      return { text, via: primary.name };
    } catch (err) {
      log.warn(`${primary.name} failed for ${url}: ${errorMessage(err)}, trying ${fallback.name}`);
    }
    const text = await fallback.extract(url);
    log.info(`Extracted ${url} via ${fallback.name}`);
    return { text, via: fallback.name };
  }

  private async keepRaw(projectId: string, index: number, text: string) {
    const { sink } = this.options;
    if (!sink) return;
    try {
      const path = await sink.saveRawContent(projectId, index, text);
      log.debug(`Saved raw output to ${path}`);
    } catch (err) {
      log.warn(`Could not save raw output #${index} for ${projectId}: ${errorMessage(err)}`);
    }
  }

  /**
   * One artifact per result, input order. A failing URL becomes a failed
   * artifact and extraction carries on with the next one.
   */
  async extract(set: SearchResultSet, projectId: string): Promise<ContentArtifact[]> {
    const total = set.results.length;
    log.info(`Extracting content from ${total} URLs`);
    const artifacts: ContentArtifact[] = [];

    for (const [i, result] of set.results.entries()) {
      if (i > 0) await sleep(this.delayMs);
      log.info(`Extracting ${i + 1}/${total}: ${result.link}`);

      try {
        if (!result.link) throw new Error("search result has no link");
        const raw = await this.fetchRaw(result.link);
        await this.keepRaw(projectId, i + 1, raw.text);

        const text = truncateContent(groupBrokenParagraphs(raw.text));
        artifacts.push({ url: result.link, title: result.title, text, success: true });
        log.info(`Extracted ${text.length} characters from ${result.link}`);
      } catch (err) {
        log.error(`Error extracting content from ${result.link}: ${errorMessage(err)}`);
        artifacts.push({ url: result.link, title: result.title, text: "", success: false, error: errorMessage(err) });
      }
    }

    return artifacts;
  }
}
