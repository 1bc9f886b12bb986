import { loadConfig } from "./config";
import { createApp } from "./app";
import JsonRecordStore from "./infrastructure/persistence/jsonRecordStore";
import JsonFileTodoRepository from "./infrastructure/repositories/jsonFileTodoRepository";

function main() {
  const config = loadConfig();

  // A corrupt data file throws here and stops the process before it listens.
  const store = new JsonRecordStore(config.dataFile);
  const repo = new JsonFileTodoRepository(store);
  const app = createApp(repo, { logFormat: config.logFormat });

  app.listen(config.port, () => {
    console.log(`Todo API on :${config.port} (${store.size} todos from ${store.path})`);
  });
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
