import type { AuditLogFilters, AuditRecord } from "./types";

export type AuditLog<L extends string> = {
  append: (record: AuditRecord<L>) => Readonly<AuditRecord<L>>;
  recent: (limit?: number) => AuditRecord<L>[];
  list: (filters?: AuditLogFilters<L>) => AuditRecord<L>[];
  size: () => number;
};
