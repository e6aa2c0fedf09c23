// search/compiler/aggregations.ts
import { PRODUCT_FIELDS } from "../types/index.fields";
import { ProductAggregations } from "../types/os-types";

// large enough to return every bucket of any real catalog
export const UNBOUNDED_BUCKETS = 1_000_000;

export function buildAggregations(): ProductAggregations {
  return {
    price: { stats: { field: PRODUCT_FIELDS.PRICE } },
    properties: {
      terms: {
        field: PRODUCT_FIELDS.PROPERTIES,
        order: { _count: "asc" },
        size: UNBOUNDED_BUCKETS,
      },
    },
    taxon_ids: {
      terms: { field: PRODUCT_FIELDS.TAXON_IDS, size: UNBOUNDED_BUCKETS },
    },
  };
}
