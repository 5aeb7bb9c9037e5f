import "dotenv/config";
import http from "node:http";
import { loadSettings } from "./config/settings.js";
import { createRagApp } from "./app/ragApp.js";
import { RagApiRouter } from "./rag/api/router.js";
import { ShutdownManager } from "./shutdown/shutdown.js";

const settings = loadSettings();
const app = createRagApp(settings);
const router = new RagApiRouter(app);
const logger = app.logger.child({ component: "server" });

const server = http.createServer((req, res) => {
  router.handle(req, res).catch((e: unknown) => {
    logger.error("server.request.unhandled", { error: e });
    if (!res.headersSent) res.statusCode = 500;
    res.end();
  });
});

const shutdown = new ShutdownManager(logger)
  .register({
    name: "http",
    fn: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
  })
  .register({ name: "vectorStore", fn: () => app.close(), timeoutMs: 10_000 });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info("server.signal", { signal });
    shutdown.execute().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error("server.shutdown.failed", { error: e });
        process.exit(1);
      }
    );
  });
}

server.listen(settings.port, () => {
  logger.info("server.listening", { port: settings.port });
  // warm the store
  app.store.getOrCreate().catch((e: unknown) => logger.error("store.init.failed", { error: e }));
});
