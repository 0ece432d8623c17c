/**
 * Delivery router - bootstrap
 *
 * One process hosts the HTTP ingress, the live gateway and the partition
 * workers for ASSIGNED_PARTITIONS. Workers drain on SIGTERM/SIGINT before
 * the Redis connections close.
 */

import "reflect-metadata";

// Load .env file BEFORE importing any other modules
import dotenv from "dotenv";
dotenv.config();

import { NestFactory } from "@nestjs/core";
import { ExpressAdapter } from "@nestjs/platform-express";
import express from "express";
import { AppModule } from "./app.module";
import { configureApp } from "./app.bootstrap";
import { loadEnvironment } from "./config/environment";
import { StructuredLogger, toLogError } from "./common/logging/structured-logger";

async function bootstrap(): Promise<void> {
  const env = loadEnvironment();
  const server = express();
  const app = await NestFactory.create(AppModule, new ExpressAdapter(server));
  configureApp(app);

  await app.listen(env.service.port);

  StructuredLogger.info("service.started", {
    data: {
      url: `http://localhost:${env.service.port}/api/v1`,
      partition: env.streams.assignedPartitions.join(","),
      consumer: env.service.instanceId,
    },
  });

  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    StructuredLogger.info("service.shutdown", { data: { reason: signal } });

    try {
      // Stops HTTP, then workers (onModuleDestroy), then Redis connections.
      await app.close();
      process.exit(0);
    } catch (error) {
      StructuredLogger.error("service.shutdown", {
        status: "failed",
        error: toLogError(error, "service.shutdown_failed"),
      });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => {
    void gracefulShutdown("SIGTERM");
  });
  process.on("SIGINT", () => {
    void gracefulShutdown("SIGINT");
  });
}

bootstrap().catch((error: unknown) => {
  StructuredLogger.error("service.start", {
    status: "failed",
    error: toLogError(error, "service.start_failed"),
  });
  process.exit(1);
});
