import pLimit from "p-limit";
import { EvidenceAnalyzer } from "./analyze";
import { ContentFetcher } from "./crawl";
import { QuerySynthesizer } from "./queries";
import { ArtifactStore } from "./save";
import { SearchClient, mergeResultSets } from "./search";
import { SearchStage } from "./serialize";
import { ContentArtifact, ProjectRecord, ProjectReport, QueryPair } from "./types";
import { sleep } from "./utils";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const log = createLogger("pipeline");

export type PipelineDeps = {
  queries: QuerySynthesizer;
  search: SearchClient;
  content: ContentFetcher;
  analyzer: EvidenceAnalyzer;
  store: ArtifactStore;
};

export type PipelineOptions = {
  /** Pause between the English and Bangla searches. */
  searchDelayMs?: number;
  /** Reuse valid query, search and content artifacts already on disk; search results only when they match the queries. */
  resume?: boolean;
};

export interface ProjectRunner {
  run(project: ProjectRecord): Promise<ProjectReport>;
}

export class PipelineOrchestrator implements ProjectRunner {
  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions = {}
  ) {}

  private async queriesFor(project: ProjectRecord): Promise<QueryPair> {
    const { queries, store } = this.deps;
    if (this.options.resume) {
      const saved = await store.readQueries(project.id);
      if (saved) {
        log.info(`Reusing saved queries for ${project.id}`);
        return saved;
      }
    }
    const pair = await queries.synthesize(project);
    await store.saveQueries(project.id, pair);
    return pair;
  }

  private async searchFor(project: ProjectRecord, pair: QueryPair): Promise<SearchStage> {
    const { search, store } = this.deps;
    if (this.options.resume) {
      const saved = await store.readSearch(project.id);
      if (saved && saved.english.queryText === pair.englishQuery && saved.bangla.queryText === pair.banglaQuery) {
        log.info(`Reusing saved search results for ${project.id}`);
        return saved;
      }
      if (saved) log.info(`Saved search results for ${project.id} were for other queries; searching again`);
    }
    const english = await search.search(pair.englishQuery, "en");
    await sleep(this.options.searchDelayMs ?? 0);
    const bangla = await search.search(pair.banglaQuery, "bn");
    const stage = { english, bangla, combined: mergeResultSets(english, bangla) };
    await store.saveSearch(project.id, stage);
    return stage;
  }

  private async contentFor(project: ProjectRecord, stage: SearchStage): Promise<ContentArtifact[]> {
    const { content, store } = this.deps;
    if (this.options.resume) {
      const saved = await store.readContent(project.id);
      if (saved && saved.length === stage.combined.results.length) {
        log.info(`Reusing saved content for ${project.id}`);
        return saved;
      }
    }
    const artifacts = await content.extract(stage.combined, project.id);
    await store.saveContent(project.id, artifacts);
    return artifacts;
  }

  /** Never throws: anything escaping the stages becomes an error report for this project. */
  async run(project: ProjectRecord): Promise<ProjectReport> {
    log.info(`Starting analysis for project ${project.id}: ${project.name}`);
    try {
      const pair = await this.queriesFor(project);
      const stage = await this.searchFor(project, pair);
      const artifacts = await this.contentFor(project, stage);

      const extracted = artifacts.filter((a) => a.success);
      log.info(`Found ${extracted.length} successful content extractions`);
      for (const [i, a] of extracted.slice(0, 3).entries()) {
        log.debug(`Content ${i + 1} preview: ${a.text.slice(0, 200)}...`);
      }

      const verdict = await this.deps.analyzer.analyze(project, artifacts);
      await this.deps.store.saveVerdict(project.id, verdict);

      log.info(`Analysis complete for project ${project.id}`);
      return {
        status: "ok",
        projectId: project.id,
        projectName: project.name,
        verdict,
        urlsFound: stage.combined.results.length,
        urlsExtracted: extracted.length,
      };
    } catch (err) {
      log.error(`Error analyzing project ${project.id}: ${errorMessage(err)}`);
      return { status: "error", projectId: project.id, projectName: project.name, error: errorMessage(err) };
    }
  }
}

export type BatchOptions = {
  concurrency?: number;
  onReport?: (report: ProjectReport) => void;
};

/**
 * Runs many projects through one orchestrator. Distinct ids may overlap up to
 * `concurrency`; a repeated id is only run once.
 */
export async function runBatch(
  orchestrator: ProjectRunner,
  projects: ProjectRecord[],
  { concurrency = 1, onReport }: BatchOptions = {}
): Promise<ProjectReport[]> {
  const seen = new Set<string>();
  const unique = projects.filter((p) => {
    if (seen.has(p.id)) {
      log.warn(`Skipping duplicate project id ${p.id}`);
      return false;
    }
    seen.add(p.id);
    return true;
  });

  const limit = pLimit(concurrency);
  return Promise.all(
    unique.map((p) =>
      limit(async () => {
        const report = await orchestrator.run(p);
        try {
          onReport?.(report);
        } catch (err) {
          log.error(`Report callback failed for ${p.id}: ${errorMessage(err)}`);
        }
        return report;
      })
    )
  );
}
