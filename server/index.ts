import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createDocumentStore, createPipelineStores } from "./domain/store.js";

async function start(): Promise<void> {
  const config = loadConfig();
  const documents = createDocumentStore(config);
  const app = createApp(createPipelineStores(documents));

  app.listen(config.apiPort, () => {
    console.log(`dirsubmit report API listening on http://localhost:${config.apiPort} (${documents.kind} store)`);
  });
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
