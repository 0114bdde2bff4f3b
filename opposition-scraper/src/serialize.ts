import { z } from "zod";
import { SCHEMA_VERSION } from "./constants";
import {
  ContentArtifact,
  OppositionVerdict,
  ProjectReport,
  QueryPair,
  SearchResult,
  SearchResultSet,
} from "./types";

// Persisted documents use snake_case field names; these schemas are the
// on-disk contract and are also used to read artifacts back on resume.

const QueryPairDoc = z.object({
  schema_version: z.literal(SCHEMA_VERSION),
  english_query: z.string().min(1),
  bangla_query: z.string().min(1),
});

const SearchResultDoc = z.object({
  title: z.string(),
  link: z.string(),
  description: z.string(),
  position: z.number().int().positive(),
});

const SearchResultSetDoc = z.object({
  organic_results: z.array(SearchResultDoc),
  total_count: z.number().int().nonnegative(),
  query_text: z.string(),
  language: z.enum(["en", "bn", "mixed"]),
});

const ResultStageDoc = z.object({
  schema_version: z.literal(SCHEMA_VERSION),
  english_search: SearchResultSetDoc,
  bangla_search: SearchResultSetDoc,
  combined_results: SearchResultSetDoc,
});

const ContentArtifactDoc = z.object({
  url: z.string(),
  title: z.string(),
  text: z.string(),
  success: z.boolean(),
  error: z.string().optional(),
});

const VerdictDoc = z.object({
  schema_version: z.literal(SCHEMA_VERSION),
  has_evidence: z.boolean(),
  opposition_types: z.array(z.string()),
  summary: z.string(),
  confidence: z.number().min(0).max(1),
  sources: z.array(z.string()),
});

export type QueryPairDoc = z.infer<typeof QueryPairDoc>;
export type ResultStageDoc = z.infer<typeof ResultStageDoc>;
export type ContentArtifactDoc = z.infer<typeof ContentArtifactDoc>;
export type VerdictDoc = z.infer<typeof VerdictDoc>;
type SearchResultSetDoc = z.infer<typeof SearchResultSetDoc>;

export function queryPairToDoc(q: QueryPair): QueryPairDoc {
  return { schema_version: SCHEMA_VERSION, english_query: q.englishQuery, bangla_query: q.banglaQuery };
}

export function queryPairFromDoc(raw: unknown): QueryPair | null {
  const parsed = QueryPairDoc.safeParse(raw);
  if (!parsed.success) return null;
  return { englishQuery: parsed.data.english_query, banglaQuery: parsed.data.bangla_query };
}

function resultSetToDoc(set: SearchResultSet): SearchResultSetDoc {
  return {
    organic_results: set.results.map((r) => ({
      title: r.title,
      link: r.link,
      description: r.description,
      position: r.position,
    })),
    total_count: set.totalCount,
    query_text: set.queryText,
    language: set.language,
  };
}

function resultSetFromDoc(doc: SearchResultSetDoc): SearchResultSet {
  return {
    results: doc.organic_results.map((r): SearchResult => ({ ...r })),
    totalCount: doc.total_count,
    queryText: doc.query_text,
    language: doc.language,
  };
}

export type SearchStage = {
  english: SearchResultSet;
  bangla: SearchResultSet;
  combined: SearchResultSet;
};

export function searchStageToDoc(stage: SearchStage): ResultStageDoc {
  return {
    schema_version: SCHEMA_VERSION,
    english_search: resultSetToDoc(stage.english),
    bangla_search: resultSetToDoc(stage.bangla),
    combined_results: resultSetToDoc(stage.combined),
  };
}

export function searchStageFromDoc(raw: unknown): SearchStage | null {
  const parsed = ResultStageDoc.safeParse(raw);
  if (!parsed.success) return null;
  return {
    english: resultSetFromDoc(parsed.data.english_search),
    bangla: resultSetFromDoc(parsed.data.bangla_search),
    combined: resultSetFromDoc(parsed.data.combined_results),
  };
}

export function artifactsToDoc(artifacts: ContentArtifact[]): ContentArtifactDoc[] {
  return artifacts.map((a) => {
    const doc: ContentArtifactDoc = { url: a.url, title: a.title, text: a.text, success: a.success };
    if (a.error !== undefined) doc.error = a.error;
    return doc;
  });
}

export function artifactsFromDoc(raw: unknown): ContentArtifact[] | null {
  const parsed = z.array(ContentArtifactDoc).safeParse(raw);
  return parsed.success ? parsed.data.map((a) => ({ ...a })) : null;
}

export function verdictToDoc(v: OppositionVerdict): VerdictDoc {
  return {
    schema_version: SCHEMA_VERSION,
    has_evidence: v.hasEvidence,
    opposition_types: [...v.oppositionTypes],
    summary: v.summary,
    confidence: v.confidence,
    sources: [...v.sources],
  };
}

export function verdictFromDoc(raw: unknown): OppositionVerdict | null {
  const parsed = VerdictDoc.safeParse(raw);
  if (!parsed.success) return null;
  const d = parsed.data;
  return {
    hasEvidence: d.has_evidence,
    oppositionTypes: d.opposition_types,
    summary: d.summary,
    confidence: d.confidence,
    sources: d.sources,
  };
}

export type ReportDoc =
  | {
      project_id: string;
      project_name: string;
      verdict: VerdictDoc;
      urls_found: number;
      urls_extracted: number;
    }
  | { project_id: string; project_name: string; error: string };

export function reportToDoc(report: ProjectReport): ReportDoc {
  if (report.status === "error") {
    return { project_id: report.projectId, project_name: report.projectName, error: report.error };
  }
  return {
    project_id: report.projectId,
    project_name: report.projectName,
    verdict: verdictToDoc(report.verdict),
    urls_found: report.urlsFound,
    urls_extracted: report.urlsExtracted,
  };
}

/** 2-space indented, non-ASCII kept as-is, trailing newline. */
export function stringifyDoc(doc: unknown): string {
  return JSON.stringify(doc, null, 2) + "\n";
}
