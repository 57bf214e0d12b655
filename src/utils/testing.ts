/**
 * Helpers for tests: nested plain objects <-> nested maps
 */

import type { SitePages } from "../types";

type NestedRecord = Record<string, Record<string, string>>;

export function pagesOf(data: NestedRecord): SitePages {
  return new Map(
    Object.entries(data).map(([key, pages]): [string, Map<string, string>] => [
      key,
      new Map(Object.entries(pages)),
    ]),
  );
}

export function toObject(pages: SitePages): NestedRecord {
  return Object.fromEntries(
    [...pages].map(([key, inner]): [string, Record<string, string>] => [
      key,
      Object.fromEntries(inner),
    ]),
  );
}
