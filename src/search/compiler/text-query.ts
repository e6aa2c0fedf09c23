// search/compiler/text-query.ts
import { PRODUCT_FIELDS } from "../types/index.fields";
import { TextClause } from "../types/os-types";

export const TEXT_QUERY_FIELDS = [
  `${PRODUCT_FIELDS.NAME}^5`,
  PRODUCT_FIELDS.DESCRIPTION,
  PRODUCT_FIELDS.SKU,
];

// query_string unescapes one level itself, so quotes need one more on top
export function escapeQuotes(text: string): string {
  return text.replace(/"/g, '\\"');
}

export function buildTextQuery(text?: string): TextClause {
  if (!text?.trim()) return { match_all: {} };

  return {
    query_string: {
      query: escapeQuotes(text),
      fields: [...TEXT_QUERY_FIELDS],
      default_operator: "AND",
      use_dis_max: true,
    },
  };
}
