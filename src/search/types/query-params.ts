// search/types/query-params.ts
export const SORT_MODES = [
  "name_asc",
  "name_desc",
  "price_asc",
  "price_desc",
  "score",
  "default",
] as const;

export type SortMode = (typeof SORT_MODES)[number];

export type PropertyFilter = Readonly<Record<string, readonly string[]>>;

export type QueryParams = Readonly<{
  from: number;
  query?: string;
  priceMin?: number;
  priceMax?: number;
  properties: PropertyFilter;
  taxonIds: readonly number[];
  // carried through, no effect on the compiled request
  browseMode: boolean;
  sorting: SortMode;
}>;

export type QueryParamsInput = {
  from?: number;
  query?: string | null;
  priceMin?: number | null;
  priceMax?: number | null;
  properties?: Record<string, readonly string[]> | null;
  taxonIds?: readonly number[] | null;
  browseMode?: boolean | null;
  sorting?: string | null;
};

export function isSortMode(value: unknown): value is SortMode {
  return (
    typeof value === "string" &&
    (SORT_MODES as readonly string[]).includes(value)
  );
}

function unique<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}

/**
 * Builds a frozen parameter set with every default applied, so the compiler
 * never has to special-case null. Never throws: blank text, empty maps and
 * unknown sort modes are all resolved downstream or here.
 */
export function createQueryParams(input: QueryParamsInput = {}): QueryParams {
  const properties: Record<string, readonly string[]> = {};
  for (const [key, values] of Object.entries(input.properties ?? {})) {
    properties[key] = Object.freeze(unique(values));
  }

  return Object.freeze({
    from: input.from ?? 0,
    query: input.query ?? undefined,
    priceMin: input.priceMin ?? undefined,
    priceMax: input.priceMax ?? undefined,
    properties: Object.freeze(properties),
    taxonIds: Object.freeze(unique(input.taxonIds ?? [])),
    browseMode: input.browseMode ?? false,
    sorting: isSortMode(input.sorting) ? input.sorting : "default",
  });
}
