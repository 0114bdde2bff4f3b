import * as dotenv from "dotenv";
dotenv.config();

import { loadConfig } from "./env";
import { createPipeline } from "./factory";
import { runBatch } from "./pipeline";
import { loadProjects } from "./projects";
import { ArtifactStore } from "./save";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("batch");

async function main() {
  const config = loadConfig();
  const projects = await loadProjects(config.projectsCsv);
  log.info(`Loaded ${projects.length} projects from ${config.projectsCsv}`);

  const store = new ArtifactStore(config.dataDir);
  await store.init();
  const orchestrator = createPipeline(config, { store });

  let done = 0;
  const reports = await runBatch(orchestrator, projects, {
    concurrency: config.batchConcurrency,
    onReport: (r) => log.info(`[${++done}/${projects.length}] ${r.projectId}: ${r.status === "ok" ? `evidence=${r.verdict.hasEvidence}` : `error: ${r.error}`}`),
  });

  const failed = reports.filter((r) => r.status === "error").length;
  log.info(`Batch finished: ${reports.length - failed} ok, ${failed} failed`);
}

main().catch((e) => {
  console.error("Error:", errorMessage(e));
  process.exit(1);
});
