// search/compiler/sorting.ts
import { PRODUCT_FIELDS } from "../types/index.fields";
import { SortKey, SortOrder } from "../types/os-types";
import { SortMode } from "../types/query-params";

const SCORE: SortKey = "_score";

// untouched_name is the keyword copy of name, stable for ordering
const byName = (order: SortOrder): SortKey => ({
  [PRODUCT_FIELDS.UNTOUCHED_NAME]: { order },
});

const byPrice = (order: SortOrder): SortKey => ({
  [PRODUCT_FIELDS.PRICE]: { order },
});

export function buildSort(sorting: SortMode | string): SortKey[] {
  switch (sorting) {
    case "name_asc":
      return [byName("asc"), byPrice("asc"), SCORE];
    case "name_desc":
      return [byName("desc"), byPrice("asc"), SCORE];
    case "price_asc":
      return [byPrice("asc"), byName("asc"), SCORE];
    case "price_desc":
      return [byPrice("desc"), byName("asc"), SCORE];
    case "score":
    default:
      return [SCORE, byName("asc"), byPrice("asc")];
  }
}
