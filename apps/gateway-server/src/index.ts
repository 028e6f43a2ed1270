// apps/gateway-server/src/index.ts
import { createLogger } from "@tapline/observability";
import { MemoryExchangeCache } from "@tapline/token-exchange";

import { buildApp } from "./app";
import { ConfigError, configFromEnv, type GatewayConfig } from "./config";

const bootLogger = createLogger({ component: "boot" });

function loadConfig(): GatewayConfig {
  try {
    return configFromEnv(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      bootLogger.error("config.invalid", { issues: err.issues });
      process.exit(1);
    }
    throw err;
  }
}

const config = loadConfig();
const logger = createLogger({
  serviceName: config.serviceName,
  environment: config.environment,
  level: config.logLevel,
});

const cache = new MemoryExchangeCache({ refreshBufferMs: config.exchange.refreshBufferMs });
if (config.exchange.sweepIntervalMs > 0) {
  cache.startSweep(config.exchange.sweepIntervalMs);
}

const app = buildApp(config, { cache, logger });

const server = app.listen(config.port, () => {
  logger.child("boot").info("server.listening", {
    port: config.port,
    routes: config.routes.map((r) => r.id),
    unmappedPolicy: config.unmapped.mode,
  });
});

function shutdown(signal: string): void {
  logger.child("boot").info("server.stopping", { signal });
  cache.stopSweep();
  server.close();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
