import Fastify from "fastify";
import { config } from "./config";
import { logger } from "./logger";
import { registerHealthRoutes } from "./health";
import { registerRoutes } from "./api/routes";
import { closeDb, getDb, migrate } from "./db";
import { createDecisionServices } from "./services";
import { startTelemetry, stopTelemetry } from "./telemetry";

const app = Fastify({ logger: false });

async function start(): Promise<void> {
  await startTelemetry(config);
  await migrate(config);
  const services = createDecisionServices({}, config);
  logger.info(
    {
      classifier: services.classifier?.name ?? null,
      chatModel: services.chat?.model ?? null
    },
    "Decision services ready"
  );

  await registerHealthRoutes(app, getDb(config));
  await registerRoutes(app, services);

  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port }, "Decision service listening");
}

async function shutdown(): Promise<void> {
  logger.info("Shutting down decision service");
  await app.close();
  await closeDb();
  await stopTelemetry();
}

function handleSignal(signal: NodeJS.Signals): void {
  shutdown().catch((error) => {
    logger.error({ error, signal }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", handleSignal);
process.on("SIGTERM", handleSignal);

start().catch((error) => {
  logger.error({ error }, "Failed to start decision service");
  process.exit(1);
});
