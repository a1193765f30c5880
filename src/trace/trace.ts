import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";

export function ensureTraceId(candidate?: string | null): string {
  if (candidate && candidate.trim().length > 0) {
    return candidate;
  }
  return uuidv4();
}

export function withTraceId(logger: Logger, traceId: string): Logger {
  return logger.child({ traceId });
}
