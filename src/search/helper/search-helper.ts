import { fromPropertyToken, PRODUCT_FIELDS } from "../types/index.fields";
import {
  RawHit,
  RawSearchBody,
  SearchRequest,
  SearchRequestBody,
  TermsBucket,
} from "../types/os-types";
import { PriceStats, ProductFacets, ProductHit } from "../types/types";

// OpenSearch has no top-level `filter`; post_filter has the same effect of
// narrowing hits after aggregations are computed.
export function toRequestBody(request: SearchRequest): SearchRequestBody {
  const { filter, ...rest } = request;
  return filter ? { ...rest, post_filter: filter } : rest;
}

export function readTotal(body: RawSearchBody): number {
  const totalRaw = body.hits?.total;
  return typeof totalRaw === "number" ? totalRaw : (totalRaw?.value ?? 0);
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value == null ? [] : [value];
}

export function mapHit(h: RawHit): ProductHit | null {
  const s = h._source;
  if (!s) return null;

  return {
    id: String(s.id ?? h._id ?? ""),
    name: asString(s[PRODUCT_FIELDS.NAME]) ?? "",
    price: asNumber(s[PRODUCT_FIELDS.PRICE]) ?? 0,
    sku: asString(s[PRODUCT_FIELDS.SKU]),
    description: asString(s[PRODUCT_FIELDS.DESCRIPTION]),
    taxonIds: asArray(s[PRODUCT_FIELDS.TAXON_IDS])
      .map(Number)
      .filter(Number.isFinite),
    properties: asArray(s[PRODUCT_FIELDS.PROPERTIES]).filter(
      (p): p is string => typeof p === "string",
    ),
    score: h._score ?? null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readBuckets(agg: unknown): TermsBucket[] {
  if (!isRecord(agg) || !Array.isArray(agg.buckets)) return [];
  return agg.buckets.filter(
    (b): b is TermsBucket =>
      isRecord(b) &&
      (typeof b.key === "string" || typeof b.key === "number") &&
      typeof b.doc_count === "number",
  );
}

function readPriceStats(agg: unknown): PriceStats | undefined {
  if (!isRecord(agg) || typeof agg.count !== "number") return undefined;
  return {
    count: agg.count,
    min: asNumber(agg.min) ?? null,
    max: asNumber(agg.max) ?? null,
    avg: asNumber(agg.avg) ?? null,
    sum: asNumber(agg.sum) ?? 0,
  };
}

/**
 * Turns the raw aggregation buckets into facets. Property tokens are split
 * back into property and value; tokens without a separator are skipped.
 */
export function mapFacets(aggs: Record<string, unknown> = {}): ProductFacets {
  const properties: ProductFacets["properties"] = {};
  for (const b of readBuckets(aggs.properties)) {
    const pair = fromPropertyToken(String(b.key));
    if (!pair) continue;
    properties[pair.property] ??= {};
    properties[pair.property][pair.value] = b.doc_count;
  }

  const taxonIds: ProductFacets["taxonIds"] = {};
  for (const b of readBuckets(aggs.taxon_ids)) {
    taxonIds[String(b.key)] = b.doc_count;
  }

  const price = readPriceStats(aggs.price);
  return { ...(price ? { price } : {}), properties, taxonIds };
}
