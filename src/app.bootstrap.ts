import { INestApplication, ValidationPipe } from "@nestjs/common";
import type { Express, NextFunction, Request, Response } from "express";
import {
  requestIdMiddleware,
  requestLoggingMiddleware,
} from "./middleware/logging";
import { createRateLimitMiddleware } from "./middleware/rateLimiter";
import { getEnv } from "./config/environment";
import { DeliveryErrorFilter } from "./common/filters/delivery-error.filter";
import { RateLimiterService } from "./common/services/rate-limiter.service";
import { prometheusMetricsHandler } from "./observability/prometheus-endpoint";
import { TelemetryMetrics } from "./observability/metrics-registry";

const METRICS_ROUTE_FLAG = Symbol.for("__metrics_route_registered__");

/**
 * HTTP configuration shared by main.ts and the endpoint tests, so both see
 * the same prefix, middleware order, filter and validation.
 */
export function configureApp(app: INestApplication): void {
  const env = getEnv();
  TelemetryMetrics.refreshEnvironment();

  // Correlation ids first so every later log line carries them.
  app.use(requestIdMiddleware);
  app.use(requestLoggingMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new DeliveryErrorFilter());

  app.enableCors({
    origin: [...env.service.corsOrigins],
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: [
      "Content-Type",
      "Authorization",
      "X-Request-ID",
      "X-Correlation-ID",
      "X-User-ID",
    ],
    exposedHeaders: [
      "X-Request-ID",
      "X-Correlation-ID",
      "X-RateLimit-Retry-After",
    ],
    maxAge: 3600,
  });

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("Referrer-Policy", "no-referrer");
    next();
  });

  app.use(createRateLimitMiddleware(app.get(RateLimiterService)));

  const server: Express = app.getHttpAdapter().getInstance();
  if (!Reflect.get(server, METRICS_ROUTE_FLAG)) {
    server.get("/metrics", prometheusMetricsHandler);
    Reflect.set(server, METRICS_ROUTE_FLAG, true);
  }

  app.setGlobalPrefix("api/v1");
}
