import "dotenv/config";
import { ArtifactStore, createLogger, createPipeline, errorMessage, loadConfig } from "opposition-scraper";
import { createApp } from "./app";

const log = createLogger("api");

async function main() {
  const config = loadConfig();
  const store = new ArtifactStore(config.dataDir);
  await store.init();

  const app = createApp({ store, runner: createPipeline(config, { store }) });
  app.listen(config.port, () => {
    log.info(`listening on http://localhost:${config.port}`);
    log.info(`artifacts read from: ${store.baseDir}`);
  });
}

main().catch((e) => {
  console.error("Error:", errorMessage(e));
  process.exit(1);
});
