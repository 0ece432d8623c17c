import { Inject, Injectable } from "@nestjs/common";
import type { Redis } from "ioredis";
import { REDIS_CLIENT } from "../redis/redis-manager";
import {
  Channel,
  MessageStatus,
  isChannel,
  isMessageStatus,
} from "../queue/message-event.interface";

export interface MessageStatusRecord {
  readonly messageId: string;
  readonly conversationId: string;
  readonly senderId: string;
  readonly recipientIds: readonly string[];
  readonly channel: Channel;
  readonly status: MessageStatus;
  readonly updatedAt: string;
  readonly updatedBy: string;
}

export interface StatusHistoryEntry {
  readonly oldStatus: MessageStatus;
  readonly newStatus: MessageStatus;
  readonly timestamp: string;
  readonly updatedBy: string;
  readonly errorMessage?: string;
}

/**
 * - `applied`: the stored status still matched `expected` and was replaced
 * - `conflict`: someone else moved the status first; re-read and re-validate
 * - `missing`: no record for that messageId
 */
export type CompareAndSetResult = "applied" | "conflict" | "missing";

export interface MessageStatusRepository {
  /** Returns false when a record already exists; the stored one is kept. */
  create(record: MessageStatusRecord): Promise<boolean>;
  find(messageId: string): Promise<MessageStatusRecord | null>;
  compareAndSet(
    expected: MessageStatus,
    next: MessageStatusRecord,
    change: StatusHistoryEntry,
  ): Promise<CompareAndSetResult>;
  history(messageId: string): Promise<StatusHistoryEntry[]>;
  /** Drops a record that never made it onto the event log. */
  remove(messageId: string): Promise<void>;
}

export const MESSAGE_STATUS_REPOSITORY = Symbol("MESSAGE_STATUS_REPOSITORY");

const CREATE_IF_ABSENT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
redis.call('HSET', KEYS[1], 'status', ARGV[1], 'record', ARGV[2])
return 1
`;

const COMPARE_AND_SET = `
local current = redis.call('HGET', KEYS[1], 'status')
if not current then
  return -1
end
if current ~= ARGV[1] then
  return 0
end
redis.call('HSET', KEYS[1], 'status', ARGV[2], 'record', ARGV[3])
redis.call('RPUSH', KEYS[2], ARGV[4])
return 1
`;

function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseRecord(raw: string | null): MessageStatusRecord | null {
  if (!raw) {
    return null;
  }
  const value: unknown = JSON.parse(raw);
  if (
    !isRecordLike(value) ||
    typeof value.messageId !== "string" ||
    typeof value.conversationId !== "string" ||
    typeof value.senderId !== "string" ||
    !Array.isArray(value.recipientIds) ||
    !isChannel(value.channel) ||
    !isMessageStatus(value.status) ||
    typeof value.updatedAt !== "string" ||
    typeof value.updatedBy !== "string"
  ) {
    throw new Error("Stored message status record is malformed");
  }
  return {
    messageId: value.messageId,
    conversationId: value.conversationId,
    senderId: value.senderId,
    recipientIds: value.recipientIds.filter(
      (id): id is string => typeof id === "string",
    ),
    channel: value.channel,
    status: value.status,
    updatedAt: value.updatedAt,
    updatedBy: value.updatedBy,
  };
}

function parseHistoryEntry(raw: string): StatusHistoryEntry | null {
  const value: unknown = JSON.parse(raw);
  if (
    !isRecordLike(value) ||
    !isMessageStatus(value.oldStatus) ||
    !isMessageStatus(value.newStatus) ||
    typeof value.timestamp !== "string" ||
    typeof value.updatedBy !== "string"
  ) {
    return null;
  }
  return {
    oldStatus: value.oldStatus,
    newStatus: value.newStatus,
    timestamp: value.timestamp,
    updatedBy: value.updatedBy,
    errorMessage:
      typeof value.errorMessage === "string" ? value.errorMessage : undefined,
  };
}

/**
 * Status records in Redis.
 *
 * `msg:status:<id>` is a hash holding the bare `status` (what the CAS script
 * compares) and the full `record` as JSON. Accepted transitions are appended
 * to the list `msg:status:<id>:history` inside the same script.
 */
@Injectable()
export class RedisMessageStatusRepository implements MessageStatusRepository {
  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  recordKey(messageId: string): string {
    return `msg:status:${messageId}`;
  }

  historyKey(messageId: string): string {
    return `msg:status:${messageId}:history`;
  }

  async create(record: MessageStatusRecord): Promise<boolean> {
    const created = await this.redis.eval(
      CREATE_IF_ABSENT,
      1,
      this.recordKey(record.messageId),
      record.status,
      JSON.stringify(record),
    );
    return Number(created) === 1;
  }

  async find(messageId: string): Promise<MessageStatusRecord | null> {
    const raw = await this.redis.hget(this.recordKey(messageId), "record");
    return parseRecord(raw);
  }

  async compareAndSet(
    expected: MessageStatus,
    next: MessageStatusRecord,
    change: StatusHistoryEntry,
  ): Promise<CompareAndSetResult> {
    const result = Number(
      await this.redis.eval(
        COMPARE_AND_SET,
        2,
        this.recordKey(next.messageId),
        this.historyKey(next.messageId),
        expected,
        next.status,
        JSON.stringify(next),
        JSON.stringify(change),
      ),
    );
    if (result === 1) {
      return "applied";
    }
    return result === -1 ? "missing" : "conflict";
  }

  async history(messageId: string): Promise<StatusHistoryEntry[]> {
    const raw = await this.redis.lrange(this.historyKey(messageId), 0, -1);
    const entries: StatusHistoryEntry[] = [];
    for (const item of raw) {
      const entry = parseHistoryEntry(item);
      if (entry) {
        entries.push(entry);
      }
    }
    return entries;
  }

  async remove(messageId: string): Promise<void> {
    await this.redis.del(this.recordKey(messageId), this.historyKey(messageId));
  }
}
