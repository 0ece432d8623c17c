import { MessageStatus } from "../../src/infra/queue/message-event.interface";
import type {
  CompareAndSetResult,
  MessageStatusRecord,
  MessageStatusRepository,
  StatusHistoryEntry,
} from "../../src/infra/repositories/message-status.repository";

/**
 * Same contract as the Redis repository, held in maps.
 */
export class InMemoryStatusRepository implements MessageStatusRepository {
  readonly records = new Map<string, MessageStatusRecord>();
  readonly changes = new Map<string, StatusHistoryEntry[]>();

  async create(record: MessageStatusRecord): Promise<boolean> {
    if (this.records.has(record.messageId)) {
      return false;
    }
    this.records.set(record.messageId, record);
    return true;
  }

  async find(messageId: string): Promise<MessageStatusRecord | null> {
    return this.records.get(messageId) ?? null;
  }

  async compareAndSet(
    expected: MessageStatus,
    next: MessageStatusRecord,
    change: StatusHistoryEntry,
  ): Promise<CompareAndSetResult> {
    const current = this.records.get(next.messageId);
    if (!current) {
      return "missing";
    }
    if (current.status !== expected) {
      return "conflict";
    }
    this.records.set(next.messageId, next);
    this.changes.set(next.messageId, [
      ...(this.changes.get(next.messageId) ?? []),
      change,
    ]);
    return "applied";
  }

  async history(messageId: string): Promise<StatusHistoryEntry[]> {
    return [...(this.changes.get(messageId) ?? [])];
  }

  async remove(messageId: string): Promise<void> {
    this.records.delete(messageId);
    this.changes.delete(messageId);
  }

  statusOf(messageId: string): MessageStatus | undefined {
    return this.records.get(messageId)?.status;
  }
}
