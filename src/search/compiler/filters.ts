// search/compiler/filters.ts
import {
  NOW_ROUNDED_TO_HOUR,
  PRODUCT_FIELDS,
  toPropertyToken,
} from "../types/index.fields";
import { FilterClause, RangeClause } from "../types/os-types";
import { PropertyFilter, QueryParams } from "../types/query-params";

/**
 * One terms clause per property key. Clauses are ANDed by the caller, the
 * tokens inside one clause are ORed by the engine:
 *
 *   { color: ["red", "blue"], size: ["M"] }
 *   -> { terms: { properties: ["color||red", "color||blue"] } }
 *      { terms: { properties: ["size||M"] } }
 */
export function buildPropertyFilters(
  properties: PropertyFilter,
): FilterClause[] {
  return Object.entries(properties)
    .filter(([, values]) => values.length > 0)
    .map(([key, values]) => ({
      terms: {
        [PRODUCT_FIELDS.PROPERTIES]: values.map((value) =>
          toPropertyToken(key, value),
        ),
      },
    }));
}

// taxon_ids holds each product's taxons plus all their ancestors
export function buildTaxonFilter(
  taxonIds: readonly number[],
): FilterClause | null {
  if (taxonIds.length === 0) return null;
  return { terms: { [PRODUCT_FIELDS.TAXON_IDS]: [...taxonIds] } };
}

export function buildAvailabilityFilter(): FilterClause {
  return {
    range: { [PRODUCT_FIELDS.AVAILABLE_ON]: { lte: NOW_ROUNDED_TO_HOUR } },
  };
}

export function buildDiscontinuationFilter(): FilterClause {
  return {
    bool: {
      should: [
        {
          bool: {
            must_not: { exists: { field: PRODUCT_FIELDS.DISCONTINUE_ON } },
          },
        },
        {
          range: {
            [PRODUCT_FIELDS.DISCONTINUE_ON]: { gte: NOW_ROUNDED_TO_HOUR },
          },
        },
      ],
    },
  };
}

/**
 * Filters that narrow both hits and facet counts. They go inside the scored
 * query so aggregations are computed over the same set.
 */
export function buildFacetFilters(params: QueryParams): FilterClause[] {
  const filters = buildPropertyFilters(params.properties);

  const taxon = buildTaxonFilter(params.taxonIds);
  if (taxon) filters.push(taxon);

  filters.push(buildAvailabilityFilter(), buildDiscontinuationFilter());
  return filters;
}

/**
 * Price is a slider, not a facet: the range lives outside the query so the
 * price stats keep showing the whole span. Partial or inverted ranges are
 * dropped.
 */
export function buildPriceFilter(
  priceMin?: number,
  priceMax?: number,
): RangeClause | null {
  if (priceMin == null || priceMax == null) return null;
  if (!Number.isFinite(priceMin) || !Number.isFinite(priceMax)) return null;
  if (!(priceMin < priceMax)) return null;
  return {
    range: { [PRODUCT_FIELDS.PRICE]: { gte: priceMin, lte: priceMax } },
  };
}
