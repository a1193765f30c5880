import { config } from "../config";
import type { AuditLog } from "./audit-store";
import type { AuditLogFilters, AuditRecord } from "./types";

/**
 * Append-only log of evaluations. Records are frozen on append and returned in call
 * order. Appends are synchronous, so evaluations sharing one log cannot interleave a
 * write.
 */
export class InMemoryAuditLog<L extends string> implements AuditLog<L> {
  private readonly records: Readonly<AuditRecord<L>>[] = [];

  append(record: AuditRecord<L>): Readonly<AuditRecord<L>> {
    const frozen = Object.freeze({ ...record });
    this.records.push(frozen);
    return frozen;
  }

  recent(limit: number = config.auditRecentLimit): AuditRecord<L>[] {
    const requested = Number.isNaN(limit) ? config.auditRecentLimit : limit;
    const count = Math.max(0, Math.floor(requested));
    if (count === 0) {
      return [];
    }
    return this.records.slice(-count);
  }

  list(filters?: AuditLogFilters<L>): AuditRecord<L>[] {
    const since = filters?.since?.getTime();
    const until = filters?.until?.getTime();
    const limit = filters?.limit;

    return this.records
      .filter((record) => {
        if (filters?.caseId && record.caseId !== filters.caseId) {
          return false;
        }
        if (filters?.level && record.level !== filters.level) {
          return false;
        }
        if (filters?.requiresReview !== undefined && record.requiresReview !== filters.requiresReview) {
          return false;
        }
        const recordedAt = new Date(record.recordedAt).getTime();
        if (since !== undefined && recordedAt < since) {
          return false;
        }
        if (until !== undefined && recordedAt > until) {
          return false;
        }
        return true;
      })
      .slice(0, limit ?? this.records.length);
  }

  size(): number {
    return this.records.length;
  }
}
