import { EvidenceAnalyzer } from "./analyze";
import { ContentFetcher } from "./crawl";
import { PipelineConfig } from "./env";
import { createHttp } from "./http";
import { GeminiModel, GenerativeModel } from "./model";
import { PipelineOrchestrator } from "./pipeline";
import { QuerySynthesizer } from "./queries";
import { PartitionExtractor, ReaderExtractor } from "./readers";
import { ArtifactStore } from "./save";
import { SearchClient } from "./search";

export type PipelineOverrides = {
  model?: GenerativeModel;
  store?: ArtifactStore;
};

export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): PipelineOrchestrator {
  const http = createHttp({ timeoutMs: config.timeoutMs, userAgent: config.userAgent });
  const model =
    overrides.model ?? new GeminiModel({ apiKey: config.geminiApiKey, model: config.geminiModel, timeoutMs: config.timeoutMs });
  const store = overrides.store ?? new ArtifactStore(config.dataDir);

  return new PipelineOrchestrator(
    {
      queries: new QuerySynthesizer(model),
      search: new SearchClient(http, { apiKey: config.serpApiKey, zone: config.serpZone }),
      content: new ContentFetcher({
        primary: new ReaderExtractor(http),
        fallback: new PartitionExtractor(http),
        sink: store,
        delayMs: config.fetchDelayMs,
      }),
      analyzer: new EvidenceAnalyzer(model),
      store,
    },
    { searchDelayMs: config.searchDelayMs, resume: config.resume }
  );
}
