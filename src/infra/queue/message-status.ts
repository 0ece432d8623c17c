import { MessageStatus } from "./message-event.interface";

const STATUS_RANK: Record<MessageStatus, number> = {
  [MessageStatus.PENDING]: 0,
  [MessageStatus.RECEIVED]: 1,
  [MessageStatus.SENT]: 2,
  [MessageStatus.DELIVERED]: 3,
  [MessageStatus.READ]: 4,
  [MessageStatus.FAILED]: 5,
};

const TERMINAL_STATUSES: ReadonlySet<MessageStatus> = new Set([
  MessageStatus.READ,
  MessageStatus.RECEIVED,
  MessageStatus.FAILED,
]);

export type TransitionVerdict = "legal" | "duplicate" | "illegal";

export function statusRank(status: MessageStatus): number {
  return STATUS_RANK[status];
}

export function isTerminal(status: MessageStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Forward-only: FAILED is reachable from any non-terminal state, anything else
 * must outrank the current state. Terminal states accept nothing.
 */
export function canTransition(
  current: MessageStatus,
  next: MessageStatus,
): boolean {
  if (isTerminal(current)) {
    return false;
  }
  if (next === MessageStatus.FAILED) {
    return true;
  }
  return STATUS_RANK[next] > STATUS_RANK[current];
}

/**
 * Same as {@link canTransition} but tells a replayed transition apart from a
 * genuinely illegal one, so consumers can treat redelivery as a no-op.
 */
export function classifyTransition(
  current: MessageStatus,
  next: MessageStatus,
): TransitionVerdict {
  if (current === next) {
    return "duplicate";
  }
  return canTransition(current, next) ? "legal" : "illegal";
}
