import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { StructuredLogger } from "../common/logging/structured-logger";
import { resolveCorrelationId } from "../common/logging/correlation";
import { TelemetryMetrics } from "../observability/metrics-registry";

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
      correlationId?: string;
    }
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Attaches request and correlation ids. Both are echoed back so a caller can
 * quote them when chasing a message through the pipeline logs.
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const requestId = headerValue(req.headers["x-request-id"]) || uuidv4();
  const correlationId = resolveCorrelationId(
    req.headers["x-correlation-id"],
    requestId,
  );
  req.requestId = requestId;
  req.startTime = Date.now();
  req.correlationId = correlationId;

  res.setHeader("X-Request-ID", requestId);
  res.setHeader("X-Correlation-ID", correlationId);

  next();
}

export function requestLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const { method, originalUrl, ip } = req;
  const requestId = req.requestId;
  const correlationId = req.correlationId;

  StructuredLogger.info("http.request", {
    requestId,
    correlationId,
    endpoint: `${method} ${originalUrl}`,
    status: "received",
    data: {
      method,
      url: originalUrl,
      ip,
    },
  });

  res.once("finish", () => {
    const duration = Date.now() - (req.startTime || Date.now());
    TelemetryMetrics.recordHttpRequest(method, res.statusCode);

    StructuredLogger.info("http.response", {
      requestId,
      correlationId,
      endpoint: `${method} ${originalUrl}`,
      status: res.statusCode,
      durationMs: duration,
      data: {
        method,
        url: originalUrl,
        ip,
        statusCode: res.statusCode,
      },
    });
  });

  next();
}
