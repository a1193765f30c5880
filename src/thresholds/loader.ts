import { existsSync, readFileSync } from "node:fs";
import { createHash } from "node:crypto";
import path from "node:path";
import type { Logger } from "pino";
import { parse as parseYaml } from "yaml";
import { ZodError, type ZodType } from "zod";
import { config } from "../config";
import { ConfigurationError } from "../escalation/errors";
import type { ThresholdBand, ThresholdTable } from "../escalation/types";
import { logger as defaultLogger } from "../logger";
import { thresholdDocumentSchema, type ThresholdDocument } from "./schema";

export type ThresholdInfo = {
  version: string;
  hash: string;
  loadedAt: string;
  path: string;
};

export type ThresholdSnapshot = {
  document: ThresholdDocument | null;
  info: ThresholdInfo;
  source: "loaded" | "fallback";
};

export type ThresholdLoader = {
  getSnapshot: () => ThresholdSnapshot;
  reload: () => ThresholdSnapshot;
  /** Stops listening for SIGHUP. */
  close: () => void;
};

export type ResolvedThresholdTable<L extends string> = {
  table: ThresholdTable<L>;
  reviewAbove: L;
};

function resolveThresholdRoot(): string {
  const roots = [
    process.cwd(),
    path.resolve(process.cwd(), ".."),
    path.resolve(process.cwd(), "..", "..")
  ];

  for (const candidate of roots) {
    const thresholdDir = path.resolve(candidate, "thresholds");
    if (existsSync(thresholdDir)) {
      return thresholdDir;
    }
  }

  return path.resolve(process.cwd(), "thresholds");
}

export function defaultThresholdPath(): string {
  return config.thresholdsPath
    ? path.resolve(config.thresholdsPath)
    : path.resolve(resolveThresholdRoot(), "thresholds.v1.yaml");
}

function hashDocument(raw: string): string {
  return createHash("sha256").update(raw).digest("hex");
}

function describeZodError(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function parseThresholdDocument(raw: string): ThresholdDocument {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError("Threshold document is not valid YAML.", [message]);
  }
  const result = thresholdDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError("Threshold document failed validation:", describeZodError(result.error));
  }
  return result.data;
}

function loadFromDisk(thresholdPath: string): ThresholdSnapshot {
  const raw = readFileSync(thresholdPath, "utf-8");
  const document = parseThresholdDocument(raw);
  return {
    document,
    info: {
      version: document.version,
      hash: hashDocument(raw),
      loadedAt: new Date().toISOString(),
      path: thresholdPath
    },
    source: "loaded"
  };
}

export function createThresholdLoader(options?: {
  path?: string;
  handleSignals?: boolean;
  logger?: Logger;
}): ThresholdLoader {
  const thresholdPath = options?.path ? path.resolve(options.path) : defaultThresholdPath();
  const log = options?.logger ?? defaultLogger;
  let lastGood: ThresholdSnapshot | null = null;
  let current: ThresholdSnapshot | null = null;

  const load = (): ThresholdSnapshot => {
    try {
      const snapshot = loadFromDisk(thresholdPath);
      lastGood = snapshot;
      current = snapshot;
      return snapshot;
    } catch (error) {
      if (lastGood) {
        log.warn({ error, path: thresholdPath }, "Threshold reload failed; keeping last good document");
        current = lastGood;
        return lastGood;
      }
      log.warn({ error, path: thresholdPath }, "Threshold document unavailable; no tables loaded");
      const fallback: ThresholdSnapshot = {
        document: null,
        info: {
          version: "v1",
          hash: "unavailable",
          loadedAt: new Date().toISOString(),
          path: thresholdPath
        },
        source: "fallback"
      };
      current = fallback;
      return fallback;
    }
  };

  load();

  const onHangup = (): void => {
    load();
  };
  const handleSignals = options?.handleSignals ?? config.thresholdReloadEnabled;
  if (handleSignals) {
    process.on("SIGHUP", onHangup);
  }

  return {
    getSnapshot: () => current ?? load(),
    reload: () => load(),
    close: () => {
      if (handleSignals) {
        process.off("SIGHUP", onHangup);
      }
    }
  };
}

/**
 * Looks up a table by id and narrows its levels to the closed set described by
 * `levelSchema`.
 */
export function resolveThresholdTable<L extends string>(
  document: ThresholdDocument | null,
  id: string,
  levelSchema: ZodType<L>
): ResolvedThresholdTable<L> {
  if (!document) {
    throw new ConfigurationError(`Threshold table ${id} requested but no threshold document is loaded.`);
  }
  const entry = document.tables.find((table) => table.id === id);
  if (!entry) {
    throw new ConfigurationError(`Threshold table ${id} is not defined.`);
  }

  const issues: string[] = [];
  const narrow = (value: string, where: string): L | null => {
    const result = levelSchema.safeParse(value);
    if (!result.success) {
      issues.push(`${where}: unknown level ${value}`);
      return null;
    }
    return result.data;
  };

  const levels: L[] = [];
  entry.levels.forEach((level, index) => {
    const narrowed = narrow(level, `levels[${index}]`);
    if (narrowed !== null) {
      levels.push(narrowed);
    }
  });

  const bands: ThresholdBand<L>[] = [];
  entry.bands.forEach((band, index) => {
    const narrowed = narrow(band.level, `bands[${index}].level`);
    if (narrowed !== null) {
      bands.push({ upTo: band.upTo ?? Number.POSITIVE_INFINITY, level: narrowed });
    }
  });

  const reviewAbove = narrow(entry.reviewAbove, "reviewAbove");

  if (issues.length > 0 || reviewAbove === null) {
    throw new ConfigurationError(`Threshold table ${id} uses levels outside its closed set:`, issues);
  }

  return {
    table: {
      id: entry.id,
      levels,
      bands,
      boundary: entry.boundary,
      domain: {
        min: entry.domain.min,
        max: entry.domain.max ?? Number.POSITIVE_INFINITY
      }
    },
    reviewAbove
  };
}
