import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { STAGE_DIRS } from "./constants";
import {
  SearchStage,
  artifactsFromDoc,
  artifactsToDoc,
  queryPairFromDoc,
  queryPairToDoc,
  searchStageFromDoc,
  searchStageToDoc,
  stringifyDoc,
  verdictFromDoc,
  verdictToDoc,
} from "./serialize";
import { ContentArtifact, OppositionVerdict, QueryPair, StageName } from "./types";
import { createLogger } from "./logger";

const log = createLogger("store");

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

export function isSafeProjectId(id: string): boolean {
  return SAFE_ID.test(id);
}

/** Where raw extractor output for one URL is kept for later re-analysis. */
export interface RawContentSink {
  saveRawContent(projectId: string, index: number, text: string): Promise<string>;
}

/**
 * One JSON document per project and stage under `<baseDir>/<stage>/<id>.json`.
 * Writes land in a temporary sibling first and are renamed into place.
 */
export class ArtifactStore implements RawContentSink {
  constructor(readonly baseDir = "data") {}

  async init() {
    await Promise.all(STAGE_DIRS.map((d) => mkdir(join(this.baseDir, d), { recursive: true })));
  }

  pathFor(stage: StageName, projectId: string): string {
    if (!isSafeProjectId(projectId)) throw new Error(`Unsafe project id: ${JSON.stringify(projectId)}`);
    return join(this.baseDir, stage, `${projectId}.json`);
  }

  rawContentPath(projectId: string, index: number): string {
    if (!isSafeProjectId(projectId)) throw new Error(`Unsafe project id: ${JSON.stringify(projectId)}`);
    return join(this.baseDir, "content", `${projectId}_${index}.md`);
  }

  private async writeAtomic(path: string, text: string) {
    const tmp = `${path}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(tmp, text, "utf-8");
    await rename(tmp, path);
  }

  private async writeDoc(stage: StageName, projectId: string, doc: unknown) {
    const path = this.pathFor(stage, projectId);
    await mkdir(join(this.baseDir, stage), { recursive: true });
    await this.writeAtomic(path, stringifyDoc(doc));
    log.info(`Saved ${stage} data to ${path}`);
    return path;
  }

  private async readDoc(stage: StageName, projectId: string): Promise<unknown | null> {
    try {
      const text = await readFile(this.pathFor(stage, projectId), "utf-8");
      return JSON.parse(text);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      if (err instanceof SyntaxError) {
        log.warn(`Ignoring unreadable ${stage} artifact for ${projectId}: ${err.message}`);
        return null;
      }
      throw err;
    }
  }

  saveQueries(projectId: string, queries: QueryPair) {
    return this.writeDoc("search", projectId, queryPairToDoc(queries));
  }

  saveSearch(projectId: string, stage: SearchStage) {
    return this.writeDoc("result", projectId, searchStageToDoc(stage));
  }

  saveContent(projectId: string, artifacts: ContentArtifact[]) {
    return this.writeDoc("content", projectId, artifactsToDoc(artifacts));
  }

  saveVerdict(projectId: string, verdict: OppositionVerdict) {
    return this.writeDoc("summary", projectId, verdictToDoc(verdict));
  }

  async saveRawContent(projectId: string, index: number, text: string) {
    const path = this.rawContentPath(projectId, index);
    await mkdir(join(this.baseDir, "content"), { recursive: true });
    await this.writeAtomic(path, text);
    return path;
  }

  async readQueries(projectId: string): Promise<QueryPair | null> {
    return queryPairFromDoc(await this.readDoc("search", projectId));
  }

  async readSearch(projectId: string): Promise<SearchStage | null> {
    return searchStageFromDoc(await this.readDoc("result", projectId));
  }

  async readContent(projectId: string): Promise<ContentArtifact[] | null> {
    return artifactsFromDoc(await this.readDoc("content", projectId));
  }

  async readVerdict(projectId: string): Promise<OppositionVerdict | null> {
    return verdictFromDoc(await this.readDoc("summary", projectId));
  }
}
