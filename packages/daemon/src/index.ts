import { loadDaemonConfigFromEnv } from "./config.js";
import { createDaemonServer } from "./server.js";

const config = loadDaemonConfigFromEnv();

void (async () => {
  const app = await createDaemonServer({}, { config });
  const shutdown = (signal: string) => {
    app.log.info({ signal }, "shutting down");
    app.close().catch((error: unknown) => {
      app.log.error({ err: error }, "shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  await app.listen({ host: config.host, port: config.port });
  app.log.info({ host: config.host, port: config.port }, "software center daemon started");
})().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error("[daemon] startup failed", message);
  process.exitCode = 1;
});
