import {
  EVIDENCE_FIELDS,
  IDENTITY_FIELDS,
  METRIC_FIELDS,
  isEvidenceField,
  isMetricField,
  isRegisteredField,
  type MetricField,
  type ToxicologyRecord,
} from "@toxedit/contracts";
import { cloneJson, isPlainObject, type JsonObject } from "./json-values.js";
import { LOG_PREFIX, consoleLogger, type EditLogger } from "./logger.js";
import { normalizeEvidenceEntry, normalizeSource, referenceTitle, tryNormalizeMetricEntry } from "./record-fields.js";

export type MergeOptions = {
  logger?: EditLogger;
};

const NESTED_CONTAINERS = ["toxicology", "toxicology_data", "metrics"];

const CANONICAL_FIELD_NAMES = new Map<string, string>(
  [...EVIDENCE_FIELDS, ...METRIC_FIELDS, ...IDENTITY_FIELDS].map((name) => [name.toLowerCase(), name]),
);

function isPlaceholderList(value: unknown): boolean {
  return Array.isArray(value) && value.length === 1 && value[0] === "...";
}

/**
 * Repairs the shapes text generators commonly produce: upper-case INCI,
 * miscased field names, nested toxicology containers and `["..."]` lists.
 */
export function fixUpUpdates(updates: JsonObject): JsonObject {
  const fixed: JsonObject = {};

  for (const [key, value] of Object.entries(updates)) {
    if (NESTED_CONTAINERS.includes(key) && isPlainObject(value)) {
      continue;
    }
    fixed[key] = value;
  }

  for (const container of NESTED_CONTAINERS) {
    const nested = updates[container];
    if (!isPlainObject(nested)) {
      continue;
    }
    for (const [key, value] of Object.entries(nested)) {
      if (!Object.hasOwn(fixed, key)) {
        fixed[key] = value;
      }
    }
  }

  if (Object.hasOwn(fixed, "INCI") && !Object.hasOwn(fixed, "inci")) {
    fixed.inci = fixed.INCI;
    delete fixed.INCI;
  }

  for (const key of Object.keys(fixed)) {
    if (isRegisteredField(key)) {
      continue;
    }
    const canonical = CANONICAL_FIELD_NAMES.get(key.toLowerCase());
    if (canonical && !Object.hasOwn(fixed, canonical)) {
      fixed[canonical] = fixed[key];
      delete fixed[key];
    }
  }

  for (const [key, value] of Object.entries(fixed)) {
    if (isPlaceholderList(value)) {
      delete fixed[key];
    }
  }

  return fixed;
}

export function listUpdatedFields(updates: JsonObject): string[] {
  return Object.entries(fixUpUpdates(updates))
    .filter(([, value]) => value !== null && value !== undefined)
    .map(([key]) => key);
}

/**
 * Returns a new, unvalidated record; neither argument is mutated.
 * Entries that cannot be normalized are kept as given so that record
 * validation rejects them.
 */
export function mergeRecordUpdates(
  record: ToxicologyRecord,
  updates: JsonObject,
  options: MergeOptions = {},
): JsonObject {
  const logger = options.logger ?? consoleLogger;
  const merged: JsonObject = cloneJson(record);

  for (const [key, rawValue] of Object.entries(fixUpUpdates(updates))) {
    if (rawValue === null || rawValue === undefined) {
      continue;
    }
    const value = cloneJson(rawValue);

    if (key === "inci") {
      merged.inci_ori = value;
      merged.inci = value;
      continue;
    }

    if (isMetricField(key)) {
      merged[key] = replaceMetricEntries(key, value);
      continue;
    }

    if (isEvidenceField(key)) {
      merged[key] = appendEvidenceEntries(merged[key], value);
      continue;
    }

    if (!isRegisteredField(key) && !Object.hasOwn(merged, key)) {
      logger.warn(`${LOG_PREFIX} adding unregistered field: ${key}`);
    }
    merged[key] = value;
  }

  return merged;
}

function replaceMetricEntries(field: MetricField, value: unknown): unknown[] {
  const entries = Array.isArray(value) ? value : [value];
  return entries.map((entry) => tryNormalizeMetricEntry(field, entry) ?? entry);
}

function evidenceSource(entry: JsonObject): unknown {
  return typeof entry.source === "string" ? normalizeSource(entry.source) : entry.source;
}

function appendEvidenceEntries(current: unknown, value: unknown): unknown {
  const incoming = Array.isArray(value) ? value : isPlainObject(value) ? [value] : null;
  if (!incoming) {
    return value;
  }

  const result: unknown[] = Array.isArray(current) ? [...current] : [];

  for (const entry of incoming) {
    if (!isPlainObject(entry)) {
      result.push(entry);
      continue;
    }

    const matchIndex = result.findIndex(
      (existing) =>
        isPlainObject(existing) &&
        evidenceSource(existing) === evidenceSource(entry) &&
        referenceTitle(existing.reference) === referenceTitle(entry.reference),
    );

    const existing = result[matchIndex];
    if (matchIndex >= 0 && isPlainObject(existing)) {
      const folded: JsonObject = { ...existing, ...entry };
      if (typeof folded.source === "string") {
        folded.source = normalizeSource(folded.source);
      }
      result[matchIndex] = folded;
    } else {
      result.push(normalizeEvidenceEntry(entry));
    }
  }

  return result;
}
