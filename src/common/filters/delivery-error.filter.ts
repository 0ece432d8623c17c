import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
} from "@nestjs/common";
import { Request, Response } from "express";
import { DeliveryError, RateLimitExceededError } from "../errors/delivery.errors";
import { StructuredLogger, toLogError } from "../logging/structured-logger";

@Catch()
export class DeliveryErrorFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    if (exception instanceof RateLimitExceededError) {
      response.setHeader(
        "X-RateLimit-Retry-After",
        String(exception.retryAfterSeconds),
      );
    }

    if (exception instanceof DeliveryError) {
      response.status(exception.statusCode).json(exception.toResponse());
      return;
    }

    if (exception instanceof HttpException) {
      response.status(exception.getStatus()).json({
        error: {
          code: "HTTP_ERROR",
          message: exception.message,
          details: exception.getResponse(),
        },
      });
      return;
    }

    StructuredLogger.error("http.unhandled_error", {
      requestId: request.requestId,
      endpoint: request.originalUrl,
      status: 500,
      error: toLogError(exception, "http.unhandled"),
    });

    response.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message: "Internal server error",
      },
    });
  }
}
