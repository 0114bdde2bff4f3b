import { z } from "zod";
import { GenerativeModel } from "./model";
import { projectContext } from "./queries";
import { parseStructuredReply } from "./structured";
import { ContentArtifact, OppositionVerdict, ProjectRecord } from "./types";
import { createLogger } from "./logger";
import { errorMessage } from "./errors";

const log = createLogger("analyze");

export const NO_CONTENT_SUMMARY = "No content could be extracted from search results to analyze.";
export const UNPARSEABLE_SUMMARY = "Could not parse analysis results";

const clamp01 = (n: number) => Math.min(1, Math.max(0, n));

const VerdictReplySchema = z
  .object({
    has_evidence: z.boolean(),
    opposition_types: z.array(z.string()).default([]),
    summary: z.string(),
    confidence: z.number().finite(),
    sources: z.array(z.string()).default([]),
  })
  .transform(
    (r): OppositionVerdict => ({
      hasEvidence: r.has_evidence,
      oppositionTypes: r.opposition_types,
      summary: r.summary,
      confidence: clamp01(r.confidence),
      sources: r.sources,
    })
  );

export function noEvidenceVerdict(summary: string): OppositionVerdict {
  return { hasEvidence: false, oppositionTypes: [], summary, confidence: 0, sources: [] };
}

export function usableArtifacts(artifacts: ContentArtifact[]): ContentArtifact[] {
  return artifacts.filter((a) => a.success && a.text.trim().length > 0);
}

export function buildEvidenceBlock(artifacts: ContentArtifact[]): string {
  return artifacts
    .map((a) => `--- Content from ${a.url} ---\nTitle: ${a.title}\nContent: ${a.text}`)
    .join("\n\n");
}

export function buildAnalysisPrompt(project: ProjectRecord, artifacts: ContentArtifact[]): string {
  return `Analyze the following content for any information related to this renewable energy project, including opposition, conflict, or any other project details:

PROJECT INFORMATION:
${projectContext(project)}

EXTRACTED CONTENT:
${buildEvidenceBlock(artifacts)}

Please analyze this content and determine:
1. Is there evidence of opposition or conflict related to this specific project (land disputes, protests, environmental objections)?
2. What types of opposition are mentioned (e.g. land acquisition protests, environmental concerns, farmer protests)?
3. What other project information is available (EIA reports, financial details, tariff rates, PPA information, etc.)?
4. Provide a detailed summary of all findings.
5. Rate your confidence in this analysis (0.0 to 1.0).
6. List the specific URLs that contained evidence.

Return your analysis in JSON format with these fields:
- has_evidence: boolean
- opposition_types: array of strings
- summary: detailed string
- confidence: number between 0.0 and 1.0
- sources: array of URLs that contained evidence

Be specific about the project name and location. Include any relevant project information found, not just opposition.`;
}

export class EvidenceAnalyzer {
  constructor(private readonly model: GenerativeModel) {}

  /** Never throws. Empty evidence short-circuits without a model call. */
  async analyze(project: ProjectRecord, artifacts: ContentArtifact[]): Promise<OppositionVerdict> {
    const usable = usableArtifacts(artifacts);
    log.info(`Analyzing ${usable.length} successful extractions for ${project.name}`);
    if (!usable.length) return noEvidenceVerdict(NO_CONTENT_SUMMARY);

    try {
      const reply = await this.model.generate(buildAnalysisPrompt(project, usable));
      const { data, via, error } = parseStructuredReply(reply, VerdictReplySchema, () =>
        noEvidenceVerdict(UNPARSEABLE_SUMMARY)
      );
      if (via === "fallback") log.warn(`Unusable analysis reply: ${error}`);
      log.info(`Analysis complete - opposition found: ${data.hasEvidence}, confidence ${data.confidence}`);
      return data;
    } catch (err) {
      log.error(`Error analyzing opposition: ${errorMessage(err)}`);
      return noEvidenceVerdict(`Error during analysis: ${errorMessage(err)}`);
    }
  }
}
