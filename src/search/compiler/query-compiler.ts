// search/compiler/query-compiler.ts
import { SearchRequest } from "../types/os-types";
import { QueryParams } from "../types/query-params";
import { buildAggregations } from "./aggregations";
import { buildFacetFilters, buildPriceFilter } from "./filters";
import { buildSort } from "./sorting";
import { buildTextQuery } from "./text-query";

export const MIN_SCORE = 0.1;

/**
 * Compiles search parameters into a products search body.
 *
 * Facet-affecting filters sit in `query.bool.filter`; the price range sits in
 * the top-level `filter` so it never narrows the aggregations. `browseMode`
 * is not consulted: taxon placement is the same in both modes.
 */
export function compile(params: QueryParams): SearchRequest {
  const must = buildTextQuery(params.query);
  const facetFilters = buildFacetFilters(params);
  const priceFilter = buildPriceFilter(params.priceMin, params.priceMax);

  return {
    min_score: MIN_SCORE,
    query: {
      bool: {
        must,
        ...(facetFilters.length > 0
          ? { filter: { bool: { must: facetFilters } } }
          : {}),
      },
    },
    ...(priceFilter ? { filter: priceFilter } : {}),
    sort: buildSort(params.sorting),
    from: params.from,
    aggregations: buildAggregations(),
  };
}
