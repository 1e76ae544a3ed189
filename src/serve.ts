/**
 * HTTP entry point
 */

import { serve } from "@hono/node-server";
import { app } from "./web-server";
import { config, getConfigSummary } from "./config";
import { createLogger, setLogLevel } from "./logging";

const log = createLogger("server");

setLogLevel(config.logging.level);

const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  log.info("Server started", { api: `http://localhost:${info.port}/api`, config: getConfigSummary() });
});

function shutdown(signal: string): void {
  log.info("Shutting down", { signal });
  server.close((err) => {
    if (err) {
      log.error("Error while closing server", { error: err });
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
