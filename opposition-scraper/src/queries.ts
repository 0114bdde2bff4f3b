import { z } from "zod";
import { GenerativeModel } from "./model";
import { parseStructuredReply } from "./structured";
import { ProjectRecord, QueryPair } from "./types";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const log = createLogger("queries");

const QueryReplySchema = z
  .object({
    english_query: z.string().trim().min(1),
    bangla_query: z.string().trim().min(1),
  })
  .transform((r): QueryPair => ({ englishQuery: r.english_query, banglaQuery: r.bangla_query }));

export function projectContext(project: ProjectRecord): string {
  return [
    `Project Name: ${project.name}`,
    `Location: ${project.location}`,
    `Capacity: ${project.capacity}`,
    `Agency: ${project.agency}`,
    `Status: ${project.status}`,
  ].join("\n");
}

export function fallbackQueries(project: ProjectRecord): QueryPair {
  return {
    englishQuery: `${project.name} ${project.location} conflict`,
    banglaQuery: `${project.name} ${project.location} সংঘাত`,
  };
}

export function buildQueryPrompt(project: ProjectRecord): string {
  return `Based on the following renewable energy project information, generate two simple search queries to find any information about this project:

${projectContext(project)}

Generate:
1. An English search query with the project name, location and conflict. Keep it simple and general, NO QUOTES.
2. A Bangla search query with the project name, location and conflict in Bangla (terms such as কৃষক জমি দখল আন্দোলন প্রতিবাদ অভিযোগ). Keep it simple and general, NO QUOTES.

The queries should be broad enough to find news articles, reports, EIA documents, land acquisition disputes, protests or any other project-related content. Do not use quotes around any part of the query.

Return the queries in JSON format with fields "english_query" and "bangla_query".`;
}

export class QuerySynthesizer {
  constructor(private readonly model: GenerativeModel) {}

  /** Always yields a usable pair; model or parsing failures fall back to name + location + "conflict". */
  async synthesize(project: ProjectRecord): Promise<QueryPair> {
    log.info(`Generating search queries for project: ${project.name}`);
    try {
      const reply = await this.model.generate(buildQueryPrompt(project));
      const { data, via, error } = parseStructuredReply(reply, QueryReplySchema, () => fallbackQueries(project));
      if (via === "fallback") log.warn(`Unusable query reply (${error}), using fallback queries`);
      log.info(`English query: ${data.englishQuery}`);
      log.info(`Bangla query: ${data.banglaQuery}`);
      return data;
    } catch (err) {
      log.error(`Error generating search queries: ${errorMessage(err)}`);
      return fallbackQueries(project);
    }
  }
}
