/**
 * Pattern catalog types.
 *
 * A catalog is a set of ordered tables. Each entry pairs a name matcher
 * with the classification a matching call receives; the first matching
 * entry wins, so more specific entries go first.
 */

export type MatchMode = "exact" | "prefix" | "suffix" | "substring";

/**
 * Which name an entry is tried against: the resolved fully-qualified
 * callee, or the callee text as written.
 */
export type MatchTarget = "resolved" | "written";

export interface NameMatcher {
  readonly mode: MatchMode;
  readonly value: string;
  readonly ignoreCase?: boolean;
}

export interface CatalogEntry<C> {
  readonly on: MatchTarget;
  readonly match: NameMatcher;
  readonly classification: C;
}

export type CatalogTable<C> = readonly CatalogEntry<C>[];

export type OrmFramework = "django" | "sqlalchemy" | "generic";

export interface BlockingIoClass {
  /** Awaitable replacement, when one is known */
  readonly alternative?: string;
}

export type MemoryLoadKind = "json" | "pickle" | "readlines" | "read" | "other";

export interface PatternCatalog {
  readonly ormQueries: CatalogTable<OrmFramework>;
  readonly blockingIo: CatalogTable<BlockingIoClass>;
  readonly memoryLoads: CatalogTable<MemoryLoadKind>;
  /** Classification is the target type, e.g. "int" */
  readonly typeConversions: CatalogTable<string>;
}

/**
 * Partial catalog, e.g. the extra entries of a configuration file.
 */
export type CatalogExtension = {
  readonly [K in keyof PatternCatalog]?: PatternCatalog[K];
};
