import { randomUUID } from "crypto";

const MAX_CORRELATION_LENGTH = 64;

function coerceToString(input: unknown): string | undefined {
  if (input === undefined || input === null) {
    return undefined;
  }

  if (typeof input === "string") {
    const trimmed = input.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  if (Array.isArray(input)) {
    return coerceToString(input[0]);
  }

  return undefined;
}

/**
 * First usable candidate wins; header arrays collapse to their first value.
 * Falls back to a fresh UUID so every log line and event carries an id.
 */
export function resolveCorrelationId(...candidates: unknown[]): string {
  for (const candidate of candidates) {
    const value = coerceToString(candidate);
    if (value) {
      return value.slice(0, MAX_CORRELATION_LENGTH);
    }
  }

  return randomUUID();
}

export function correlationIdOf(event: {
  readonly messageId: string;
  readonly metadata: Readonly<Record<string, string>>;
}): string {
  return resolveCorrelationId(event.metadata.correlationId, event.messageId);
}
