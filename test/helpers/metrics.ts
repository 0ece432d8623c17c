import { TelemetryMetrics } from "../../src/observability/metrics-registry";

export async function getMetricValue(
  metricName: string,
  labels: Record<string, string> = {},
): Promise<number> {
  const metric = TelemetryMetrics.registry().getSingleMetric(metricName);
  if (!metric) {
    return 0;
  }
  const snapshot = await metric.get();
  // Prom-client returns label/value pairs using plain objects, so we scan for a full match.
  const entry = snapshot.values.find((value) =>
    Object.entries(labels).every(
      ([key, expected]) => value.labels?.[key] === expected,
    ),
  );
  return entry?.value ?? 0;
}

export function resetMetrics(): void {
  TelemetryMetrics.registry().resetMetrics();
  TelemetryMetrics.refreshEnvironment();
}
