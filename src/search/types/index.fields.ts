// search/types/index.fields.ts
// Field names of the products index. The indexing side owns the mapping;
// everything that builds or reads a search body goes through these.
export const PRODUCT_FIELDS = {
  NAME: "name",
  UNTOUCHED_NAME: "untouched_name",
  DESCRIPTION: "description",
  SKU: "sku",
  PRICE: "price",
  AVAILABLE_ON: "available_on",
  DISCONTINUE_ON: "discontinue_on",
  TAXON_IDS: "taxon_ids",
  PROPERTIES: "properties",
} as const;

// "color||red"
export const PROPERTY_TOKEN_SEPARATOR = "||";

// date math: now rounded down to the hour
export const NOW_ROUNDED_TO_HOUR = "now/1h";

export function toPropertyToken(property: string, value: string): string {
  return `${property}${PROPERTY_TOKEN_SEPARATOR}${value}`;
}

export function fromPropertyToken(
  token: string,
): { property: string; value: string } | null {
  const at = token.indexOf(PROPERTY_TOKEN_SEPARATOR);
  if (at < 0) return null;
  return {
    property: token.slice(0, at),
    value: token.slice(at + PROPERTY_TOKEN_SEPARATOR.length),
  };
}
