export * from "./types";
export { ConfigError, UpstreamError, errorMessage } from "./errors";
export { loadConfig } from "./env";
export type { PipelineConfig } from "./env";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
export type { GenerativeModel } from "./model";
export { GeminiModel } from "./model";
export { ArtifactStore, isSafeProjectId } from "./save";
export { reportToDoc, verdictToDoc } from "./serialize";
export type { ReportDoc, VerdictDoc } from "./serialize";
export { toProjectRecord, loadProjects, parseProjectsCsv } from "./projects";
export { PipelineOrchestrator, runBatch } from "./pipeline";
export type { ProjectRunner, PipelineOptions } from "./pipeline";
export { createPipeline } from "./factory";
