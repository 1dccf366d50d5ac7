import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { openTodoStore } from "./infrastructure/store";

async function main() {
  const config = loadConfig();
  const store = openTodoStore(config);

  const seeded = await store.repo.seedIfEmpty();
  if (seeded > 0) {
    console.log(`Seeded ${seeded} sample todos`);
  }

  const app = createApp({ repo: store.repo, logFormat: config.logFormat, enableReset: config.enableReset });
  const server = app.listen(config.port, () => {
    console.log(`Todo API on :${config.port} (${config.storeDriver} store)`);
    if (config.enableReset) {
      console.log("POST /admin/reset is enabled");
    }
  });

  server.on("error", err => {
    console.error(`Todo API could not listen on :${config.port}`, err);
    store.close();
    process.exit(1);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`${signal} received, shutting down`);
    server.close(err => {
      store.close();
      if (err) {
        console.error("Error while closing server", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch(err => {
  console.error("Failed to start Todo API", err);
  process.exit(1);
});
