export type ProjectRecord = {
  readonly id: string;
  readonly name: string;
  readonly location: string;
  readonly capacity: string;
  readonly agency: string;
  readonly status: string;
};

export type QueryPair = {
  englishQuery: string;
  banglaQuery: string;
};

export type SearchLanguage = "en" | "bn" | "mixed";

export type SearchResult = {
  title: string;
  link: string;
  description: string;
  position: number; // 1-based, within its language
};

export type SearchResultSet = {
  results: SearchResult[];
  queryText: string;
  language: SearchLanguage;
  totalCount: number;
};

export type ContentArtifact = {
  url: string;
  title: string;
  text: string;
  success: boolean;
  error?: string;
};

export type OppositionVerdict = {
  hasEvidence: boolean;
  oppositionTypes: string[];
  summary: string;
  confidence: number; // 0..1
  sources: string[];
};

type ReportBase = {
  projectId: string;
  projectName: string;
};

export type ProjectReport =
  | (ReportBase & {
      status: "ok";
      verdict: OppositionVerdict;
      urlsFound: number;
      urlsExtracted: number;
    })
  | (ReportBase & { status: "error"; error: string });

export type StageName = "search" | "result" | "content" | "summary";
