export const SERP_ENDPOINT = "https://api.brightdata.com/request";
export const GOOGLE_SEARCH_URL = "https://www.google.com/search";
export const READER_BASE_URL = "https://r.jina.ai/";

export const MAX_RESULTS_PER_QUERY = 10;
export const MAX_CONTENT_CHARS = 15_000;
export const TRUNCATION_MARKER = "... [Content truncated]";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export const STAGE_DIRS = ["search", "result", "content", "summary"] as const;

export const SCHEMA_VERSION = 1;
