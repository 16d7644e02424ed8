// ===========================================================================
//  src/server/app.ts   (process entry: wiring, startup sweep, shutdown)
// ===========================================================================

import { createServer } from "node:http";

import { ConfigError, loadConfig } from "./config";
import { createApp } from "./http";
import { PasteService } from "./core/paste-service";
import { renderPastePage } from "./render/page";
import { FileContentStore } from "./storage/file-content-store";
import { JsonIndexStore } from "./storage/json-index-store";
import { logger, startupLogger, logError, logPerformance } from "./utils/logger";

const startTime = Date.now();

try {
  const config = loadConfig();
  startupLogger.info({
    dataDir: config.dataDir,
    baseUrl: config.baseUrl,
    maxSize: config.maxSize,
    defaultExpiryHours: config.defaultExpiryHours,
    port: config.port,
    NODE_ENV: process.env.NODE_ENV,
  }, "Starting Quick Paste server");

  // ────────────────  Instantiate domain objects  ──────────────────────────
  const content = new FileContentStore(config.dataDir);
  await content.init();
  const index = await JsonIndexStore.create(config.dataDir);

  const service = new PasteService(content, index, {
    baseUrl: config.baseUrl,
    maxSize: config.maxSize,
    defaultExpiryHours: config.defaultExpiryHours,
    render: renderPastePage,
  });

  const purged = await service.purgeExpired();
  startupLogger.info({ pastes: service.count(), purged }, "Index loaded");

  // ────────────────  HTTP  ─────────────────────────────────────────────────
  const http = createServer(createApp(service, { maxSize: config.maxSize }));

  http.listen(config.port, () => {
    logPerformance(startupLogger, "server-startup", startTime);
    startupLogger.info({ port: config.port }, `📋 Quick Paste listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    http.close(error => {
      if (error) {
        logError(logger, error, { context: "shutdown" });
        process.exit(1);
      }
      logger.info("HTTP server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

} catch (error) {
  if (error instanceof ConfigError) {
    startupLogger.fatal({ issues: error.issues }, "Invalid configuration");
  } else {
    logError(startupLogger, error, { context: "startup-failure" });
  }
  process.exit(1);
}
