import { expect, test } from "vitest";
import { InMemoryAuditLog } from "../src/escalation/audit-store.memory";
import type { AuditRecord } from "../src/escalation/types";

type Level = "LOW" | "HIGH";

function buildRecord(partial: Partial<AuditRecord<Level>>): AuditRecord<Level> {
  return {
    id: partial.id ?? "record-1",
    traceId: partial.traceId ?? "trace-1",
    caseId: partial.caseId ?? "case-1",
    signalName: partial.signalName ?? "risk",
    signal: partial.signal ?? 0.1,
    tableId: partial.tableId ?? "table-1",
    level: partial.level ?? "LOW",
    requiresReview: partial.requiresReview ?? false,
    recordedAt: partial.recordedAt ?? "2024-02-01T00:00:00.000Z"
  };
}

function seededLog(): InMemoryAuditLog<Level> {
  const log = new InMemoryAuditLog<Level>();
  log.append(buildRecord({ id: "r1", caseId: "case-1", recordedAt: "2024-02-01T00:00:00.000Z" }));
  log.append(
    buildRecord({ id: "r2", caseId: "case-2", level: "HIGH", requiresReview: true, recordedAt: "2024-02-02T00:00:00.000Z" })
  );
  log.append(buildRecord({ id: "r3", caseId: "case-1", recordedAt: "2024-02-03T00:00:00.000Z" }));
  log.append(
    buildRecord({ id: "r4", caseId: "case-3", level: "HIGH", requiresReview: true, recordedAt: "2024-02-04T00:00:00.000Z" })
  );
  return log;
}

test("recent returns the newest records in call order", () => {
  const log = seededLog();

  expect(log.recent(2).map((record) => record.id)).toEqual(["r3", "r4"]);
  expect(log.recent(10).map((record) => record.id)).toEqual(["r1", "r2", "r3", "r4"]);
  expect(log.recent(0)).toEqual([]);
  expect(log.recent(-3)).toEqual([]);
});

test("appended records are frozen copies", () => {
  const log = new InMemoryAuditLog<Level>();
  const source = buildRecord({ id: "r1" });

  const stored = log.append(source);
  source.level = "HIGH";

  expect(Object.isFrozen(stored)).toBe(true);
  expect(log.recent(1)[0].level).toBe("LOW");
});

test("list filters by case, level, review flag and time window", () => {
  const log = seededLog();

  expect(log.list({ caseId: "case-1" }).map((record) => record.id)).toEqual(["r1", "r3"]);
  expect(log.list({ level: "HIGH" }).map((record) => record.id)).toEqual(["r2", "r4"]);
  expect(log.list({ requiresReview: false }).map((record) => record.id)).toEqual(["r1", "r3"]);
  expect(
    log
      .list({ since: new Date("2024-02-02T00:00:00.000Z"), until: new Date("2024-02-03T00:00:00.000Z") })
      .map((record) => record.id)
  ).toEqual(["r2", "r3"]);
  expect(log.list({ limit: 1 }).map((record) => record.id)).toEqual(["r1"]);
  expect(log.size()).toBe(4);
});

test("recent falls back to the default window for a NaN limit", () => {
  const log = new InMemoryAuditLog<Level>();
  for (let index = 1; index <= 25; index += 1) {
    log.append(buildRecord({ id: `r${index}` }));
  }

  const window = log.recent(Number.NaN);
  expect(window).toHaveLength(20);
  expect(window[0].id).toBe("r6");
  expect(log.recent(Number.POSITIVE_INFINITY)).toHaveLength(25);
  expect(log.list()).toHaveLength(25);
});
