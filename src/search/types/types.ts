// search/types/types.ts
export type ProductHit = {
  id: string;
  name: string;
  price: number;
  sku?: string;
  description?: string;
  taxonIds: number[];
  properties: string[];
  score: number | null;
};

export type PriceStats = {
  count: number;
  min: number | null;
  max: number | null;
  avg: number | null;
  sum: number;
};

export type ProductFacets = {
  price?: PriceStats;
  // property -> value -> doc count
  properties: Record<string, Record<string, number>>;
  // taxon id -> doc count
  taxonIds: Record<string, number>;
};

export type SearchProductsResponse = {
  items: ProductHit[];
  total: number;
  from: number;
  facets: ProductFacets;
};

export type ProductDocument = {
  id: string;
  source: Record<string, unknown>;
};
