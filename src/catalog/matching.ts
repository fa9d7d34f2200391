import { CatalogTable, NameMatcher } from "./types";

export function matchesName(matcher: NameMatcher, name: string): boolean {
  const subject = matcher.ignoreCase ? name.toLowerCase() : name;
  const value = matcher.ignoreCase ? matcher.value.toLowerCase() : matcher.value;

  switch (matcher.mode) {
    case "exact":
      return subject === value;
    case "prefix":
      return subject.startsWith(value);
    case "suffix":
      return subject.endsWith(value);
    case "substring":
      return subject.includes(value);
  }
}

/**
 * Classify a call against one table.
 *
 * A resolved name is only tried against `resolved` entries; written-name
 * entries are the fallback for calls the resolver could not anchor.
 */
export function classify<C>(
  table: CatalogTable<C>,
  written: string,
  resolved?: string
): C | undefined {
  const target = resolved !== undefined ? "resolved" : "written";
  const name = resolved ?? written;

  for (const entry of table) {
    if (entry.on === target && matchesName(entry.match, name)) {
      return entry.classification;
    }
  }
  return undefined;
}
