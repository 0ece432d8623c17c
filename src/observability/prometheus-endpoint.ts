import type { Request, Response } from "express";
import { StructuredLogger, toLogError } from "../common/logging/structured-logger";
import { TelemetryMetrics } from "./metrics-registry";

const METRICS_CACHE_CONTROL = "no-store, max-age=0";

export async function prometheusMetricsHandler(
  _req: Request,
  res: Response,
): Promise<void> {
  TelemetryMetrics.refreshEnvironment();
  const registry = TelemetryMetrics.registry();

  try {
    const body = await registry.metrics();
    res.setHeader("Content-Type", registry.contentType);
    res.setHeader("Cache-Control", METRICS_CACHE_CONTROL);
    res.send(body);
  } catch (error) {
    StructuredLogger.error("metrics.scrape", {
      status: "failed",
      error: toLogError(error, "metrics.collect_failed"),
    });
    res.status(500).send("metrics unavailable");
  }
}
