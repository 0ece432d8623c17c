import { NextFunction, Request, RequestHandler, Response } from "express";
import { getEnv } from "../config/environment";
import { RateLimitExceededError } from "../common/errors/delivery.errors";
import { StructuredLogger, toLogError } from "../common/logging/structured-logger";
import { RateLimiterService } from "../common/services/rate-limiter.service";

/**
 * Ingress rate limiting.
 *
 * Subject is the caller's `x-user-id` when present, otherwise the client IP.
 * Health checks and metric scrapes are never limited.
 *
 * Set RATE_LIMIT_ENABLED=false to disable (load testing only).
 */

const UNLIMITED_PATHS = ["/metrics", "/api/v1/health"];

function headerValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function rateLimitSubject(req: Request): string {
  const userId = headerValue(req.headers["x-user-id"]);
  if (userId) {
    return `user:${userId}`;
  }
  return `ip:${req.ip ?? req.socket.remoteAddress ?? "unknown"}`;
}

export function createRateLimitMiddleware(
  limiter: RateLimiterService,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (
      !getEnv().rateLimit.enabled ||
      UNLIMITED_PATHS.some((path) => req.path.startsWith(path))
    ) {
      next();
      return;
    }

    limiter
      .check(rateLimitSubject(req))
      .then((decision) => {
        if (decision.allowed) {
          next();
          return;
        }
        const error = new RateLimitExceededError(
          decision.limit,
          decision.scope,
          decision.retryAfterSeconds,
        );
        res.setHeader(
          "X-RateLimit-Retry-After",
          String(decision.retryAfterSeconds),
        );
        res.status(429).json(error.toResponse());
      })
      .catch((error: unknown) => {
        // check() falls back locally and does not reject; admit if it ever does.
        StructuredLogger.error("rate_limit.middleware", {
          requestId: req.requestId,
          error: toLogError(error, "rate_limit.unexpected"),
        });
        next();
      });
  };
}
