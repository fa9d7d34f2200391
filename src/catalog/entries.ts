/**
 * Reading catalog tables from plain data (the bundled JSON tables and the
 * `catalog` section of a config file).
 *
 * Entry shape:
 *   { on: resolved|written, mode: exact|prefix|suffix|substring, value,
 *     ignore_case?, <classification field> }
 * where the classification field is `framework` for ORM queries,
 * `alternative` (optional) for blocking I/O, `kind` for memory loads and
 * `type` for type conversions. Invalid entries are skipped with a warning.
 */

import { logger } from "../logger";
import {
  BlockingIoClass,
  CatalogEntry,
  CatalogExtension,
  MatchMode,
  MatchTarget,
  MemoryLoadKind,
  OrmFramework,
} from "./types";

type Fields = Record<string, unknown>;

const MATCH_MODES: readonly MatchMode[] = ["exact", "prefix", "suffix", "substring"];
const MATCH_TARGETS: readonly MatchTarget[] = ["resolved", "written"];
const ORM_FRAMEWORKS: readonly OrmFramework[] = ["django", "sqlalchemy", "generic"];
const MEMORY_LOAD_KINDS: readonly MemoryLoadKind[] = ["json", "pickle", "readlines", "read", "other"];

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

type ClassificationReader<C> = (fields: Fields) => C | undefined;

const readFramework: ClassificationReader<OrmFramework> = (fields) =>
  oneOf(ORM_FRAMEWORKS, fields.framework);

const readBlockingClass: ClassificationReader<BlockingIoClass> = (fields) => {
  if (fields.alternative === undefined) return Object.freeze({});
  return typeof fields.alternative === "string" && fields.alternative.length > 0
    ? Object.freeze({ alternative: fields.alternative })
    : undefined;
};

const readMemoryKind: ClassificationReader<MemoryLoadKind> = (fields) =>
  oneOf(MEMORY_LOAD_KINDS, fields.kind);

const readConversionType: ClassificationReader<string> = (fields) =>
  typeof fields.type === "string" && fields.type.length > 0 ? fields.type : undefined;

function readEntry<C>(raw: unknown, readClassification: ClassificationReader<C>): CatalogEntry<C> | undefined {
  if (!isRecord(raw)) return undefined;

  const on = oneOf(MATCH_TARGETS, raw.on);
  const mode = oneOf(MATCH_MODES, raw.mode);
  const value = typeof raw.value === "string" && raw.value.length > 0 ? raw.value : undefined;
  const ignoreCase = raw.ignore_case;
  const classification = readClassification(raw);

  if (!on || !mode || !value || classification === undefined) return undefined;
  if (ignoreCase !== undefined && typeof ignoreCase !== "boolean") return undefined;

  return Object.freeze({
    on,
    match: Object.freeze(ignoreCase ? { mode, value, ignoreCase } : { mode, value }),
    classification,
  });
}

function readTable<C>(
  raw: unknown,
  key: string,
  origin: string,
  readClassification: ClassificationReader<C>
): readonly CatalogEntry<C>[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) {
    logger.warn("Ignoring catalog table that is not a list", { origin, table: key });
    return undefined;
  }

  const entries: CatalogEntry<C>[] = [];
  raw.forEach((item: unknown, index: number) => {
    const entry = readEntry(item, readClassification);
    if (entry) {
      entries.push(entry);
    } else {
      logger.warn("Skipping invalid catalog entry", { origin, table: key, index });
    }
  });
  return Object.freeze(entries);
}

/**
 * Read whichever catalog tables `raw` holds.
 *
 * @param origin - where the data came from, for log messages
 */
export function readCatalogTables(raw: unknown, origin: string): CatalogExtension {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    logger.warn("Ignoring catalog section that is not a mapping", { origin });
    return {};
  }

  const ormQueries = readTable(raw.orm_queries, "orm_queries", origin, readFramework);
  const blockingIo = readTable(raw.blocking_io, "blocking_io", origin, readBlockingClass);
  const memoryLoads = readTable(raw.memory_loads, "memory_loads", origin, readMemoryKind);
  const typeConversions = readTable(raw.type_conversions, "type_conversions", origin, readConversionType);

  return {
    ...(ormQueries && { ormQueries }),
    ...(blockingIo && { blockingIo }),
    ...(memoryLoads && { memoryLoads }),
    ...(typeConversions && { typeConversions }),
  };
}
