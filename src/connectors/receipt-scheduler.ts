import { Injectable, OnModuleDestroy } from "@nestjs/common";
import { StructuredLogger, toLogError } from "../common/logging/structured-logger";

export type ScheduledTask = () => Promise<void>;

/**
 * Delayed, cancellable background tasks. Nothing here blocks a worker: the
 * task runs on its own timer and every pending timer is cleared on shutdown.
 */
@Injectable()
export class ReceiptScheduler implements OnModuleDestroy {
  private readonly timers = new Set<NodeJS.Timeout>();
  private closed = false;

  schedule(delayMs: number, label: string, task: ScheduledTask): boolean {
    if (this.closed) {
      return false;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      task().catch((error: unknown) => {
        StructuredLogger.warn("receipt.task", {
          status: "failed",
          data: { operation: label },
          error: toLogError(error, "receipt.task_failed"),
        });
      });
    }, delayMs);
    timer.unref();
    this.timers.add(timer);
    return true;
  }

  get pending(): number {
    return this.timers.size;
  }

  onModuleDestroy(): void {
    this.cancelAll();
  }

  cancelAll(): void {
    this.closed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
