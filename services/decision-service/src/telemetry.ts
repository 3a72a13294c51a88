import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { ConsoleSpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { SEMRESATTRS_SERVICE_NAME, SEMRESATTRS_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import { config } from "./config";
import type { ServiceConfig } from "./config";
import { logger } from "./logger";

let sdk: NodeSDK | null = null;

export function buildTelemetrySdk(settings: ServiceConfig): NodeSDK {
  return new NodeSDK({
    resource: new Resource({
      [SEMRESATTRS_SERVICE_NAME]: settings.serviceName,
      [SEMRESATTRS_SERVICE_VERSION]: settings.serviceVersion
    }),
    spanProcessor: new SimpleSpanProcessor(new ConsoleSpanExporter()),
    instrumentations: [getNodeAutoInstrumentations({ "@opentelemetry/instrumentation-fs": { enabled: false } })]
  });
}

/** Returns whether tracing was started by this call. */
export async function startTelemetry(settings: ServiceConfig = config): Promise<boolean> {
  if (!settings.telemetryEnabled || sdk) {
    return false;
  }
  sdk = buildTelemetrySdk(settings);
  await sdk.start();
  logger.info({ serviceName: settings.serviceName }, "Tracing started");
  return true;
}

export async function stopTelemetry(): Promise<void> {
  if (!sdk) {
    return;
  }
  const running = sdk;
  sdk = null;
  await running.shutdown();
}
