/**
 * Default catalog and the classification helpers the rules use.
 *
 * Every helper takes the callee as written plus the resolved name when the
 * resolver found one, and an optional catalog (the default one otherwise).
 */

import defaultTables from "./default-catalog.json";
import { readCatalogTables } from "./entries";
import { classify } from "./matching";
import {
  BlockingIoClass,
  CatalogExtension,
  MemoryLoadKind,
  OrmFramework,
  PatternCatalog,
} from "./types";

const bundled = readCatalogTables(defaultTables, "default-catalog.json");

export const DEFAULT_CATALOG: PatternCatalog = Object.freeze({
  ormQueries: bundled.ormQueries ?? [],
  blockingIo: bundled.blockingIo ?? [],
  memoryLoads: bundled.memoryLoads ?? [],
  typeConversions: bundled.typeConversions ?? [],
});

/**
 * A new catalog whose tables try `extra`'s entries before `base`'s.
 */
export function extendCatalog(base: PatternCatalog, extra: CatalogExtension): PatternCatalog {
  return Object.freeze({
    ormQueries: Object.freeze([...(extra.ormQueries ?? []), ...base.ormQueries]),
    blockingIo: Object.freeze([...(extra.blockingIo ?? []), ...base.blockingIo]),
    memoryLoads: Object.freeze([...(extra.memoryLoads ?? []), ...base.memoryLoads]),
    typeConversions: Object.freeze([...(extra.typeConversions ?? []), ...base.typeConversions]),
  });
}

// ORM queries

export function classifyOrmQuery(
  written: string,
  resolved?: string,
  catalog: PatternCatalog = DEFAULT_CATALOG
): OrmFramework | undefined {
  return classify(catalog.ormQueries, written, resolved);
}

export function isOrmQuery(written: string, resolved?: string, catalog?: PatternCatalog): boolean {
  return classifyOrmQuery(written, resolved, catalog) !== undefined;
}

const ORM_SUGGESTIONS: Record<OrmFramework, string> = {
  django:
    "Use select_related() for foreign keys or prefetch_related() for many-to-many relationships " +
    "to fetch related objects in a single query",
  sqlalchemy: "Use joinedload() or subqueryload() to eager load related objects and reduce query count",
  generic:
    "Consider fetching all required data before the loop or using a JOIN query to reduce database round-trips",
};

export function getOrmSuggestion(framework: OrmFramework): string {
  return ORM_SUGGESTIONS[framework];
}

// Blocking I/O

export function classifyBlockingIo(
  written: string,
  resolved?: string,
  catalog: PatternCatalog = DEFAULT_CATALOG
): BlockingIoClass | undefined {
  return classify(catalog.blockingIo, written, resolved);
}

export function isBlockingIo(written: string, resolved?: string, catalog?: PatternCatalog): boolean {
  return classifyBlockingIo(written, resolved, catalog) !== undefined;
}

export function getAsyncAlternative(
  written: string,
  resolved?: string,
  catalog?: PatternCatalog
): string | undefined {
  return classifyBlockingIo(written, resolved, catalog)?.alternative;
}

// Memory loads

export function classifyMemoryLoad(
  written: string,
  resolved?: string,
  catalog: PatternCatalog = DEFAULT_CATALOG
): MemoryLoadKind | undefined {
  return classify(catalog.memoryLoads, written, resolved);
}

export function isMemoryIntensive(written: string, resolved?: string, catalog?: PatternCatalog): boolean {
  return classifyMemoryLoad(written, resolved, catalog) !== undefined;
}

const MEMORY_SUGGESTIONS: Record<MemoryLoadKind, string> = {
  json: "Use ijson for streaming JSON parsing to avoid loading entire file into memory",
  pickle: "Consider streaming pickle data or using memory-mapped files for large pickle files",
  readlines: "Iterate over the file object directly instead of readlines() to process line-by-line",
  read: "Read file in chunks or line-by-line for large files to reduce memory usage",
  other: "Consider streaming or chunked processing to reduce memory usage",
};

export function getMemoryOptimizationSuggestion(kind: MemoryLoadKind): string {
  return MEMORY_SUGGESTIONS[kind];
}

export function describeMemoryLoad(kind: MemoryLoadKind, callName: string): string {
  switch (kind) {
    case "json":
      return `Loading entire JSON file with ${callName}() loads all data into memory`;
    case "pickle":
      return `Loading entire pickle file with ${callName}() loads all data into memory`;
    case "readlines":
      return `Reading all lines with ${callName}() loads entire file into memory`;
    case "read":
      return `Reading entire file with ${callName}() loads all data into memory`;
    case "other":
      return `Memory-intensive operation ${callName}() loads large amount of data into memory`;
  }
}

// Type conversions

export function isTypeConversion(
  written: string,
  resolved?: string,
  catalog: PatternCatalog = DEFAULT_CATALOG
): boolean {
  return classify(catalog.typeConversions, written, resolved) !== undefined;
}
