import * as dotenv from "dotenv";
dotenv.config();

import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { loadConfig } from "./env";
import { createPipeline } from "./factory";
import { loadProjects } from "./projects";
import { ArtifactStore } from "./save";
import { reportToDoc, stringifyDoc } from "./serialize";
import { errorMessage } from "./errors";

async function askProjectId(): Promise<string> {
  const rl = createInterface({ input, output });
  const ans = await rl.question("Project id to analyze: ");
  rl.close();
  return ans.trim();
}

async function main() {
  const config = loadConfig();

  const idx = process.argv.findIndex((a) => a === "--id");
  let id: string | undefined = undefined;
  if (idx >= 0 && process.argv[idx + 1]) id = process.argv[idx + 1].trim();
  if (!id) id = await askProjectId();

  const projects = await loadProjects(config.projectsCsv);
  const project = projects.find((p) => p.id === id);
  if (!project) {
    console.error(`Project ${id} not found in ${config.projectsCsv}`);
    process.exitCode = 1;
    return;
  }

  const store = new ArtifactStore(config.dataDir);
  await store.init();
  const report = await createPipeline(config, { store }).run(project);

  console.log("\nAnalysis Result:");
  console.log(stringifyDoc(reportToDoc(report)));
}

main().catch((e) => {
  console.error("Error:", errorMessage(e));
  process.exit(1);
});
