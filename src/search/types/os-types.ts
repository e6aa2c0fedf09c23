// search/types/os-types.ts
// ---------- request ----------

export type MatchAllClause = { match_all: Record<string, never> };

export type QueryStringClause = {
  query_string: {
    query: string;
    fields: string[];
    default_operator: "AND" | "OR";
    use_dis_max: boolean;
  };
};

export type TextClause = MatchAllClause | QueryStringClause;

export type TermsClause = { terms: Record<string, (string | number)[]> };

export type RangeBounds = {
  gte?: number | string;
  lte?: number | string;
};

export type RangeClause = { range: Record<string, RangeBounds> };

export type ExistsClause = { exists: { field: string } };

export type BoolClause = {
  bool: {
    must?: FilterClause[];
    should?: FilterClause[];
    must_not?: FilterClause;
  };
};

export type FilterClause =
  | TermsClause
  | RangeClause
  | ExistsClause
  | BoolClause;

export type SortOrder = "asc" | "desc";

export type SortKey = "_score" | Record<string, { order: SortOrder }>;

export type StatsAggregation = { stats: { field: string } };

export type TermsAggregation = {
  terms: {
    field: string;
    size: number;
    order?: { _count: SortOrder };
  };
};

export type ProductAggregations = {
  price: StatsAggregation;
  properties: TermsAggregation;
  taxon_ids: TermsAggregation;
};

export type SearchRequest = {
  min_score: number;
  query: {
    bool: {
      must: TextClause;
      filter?: { bool: { must: FilterClause[] } };
    };
  };
  // facet-neutral: aggregations never see it
  filter?: RangeClause;
  sort: SortKey[];
  from: number;
  aggregations: ProductAggregations;
};

// what goes over the wire: the facet-neutral range travels as post_filter
export type SearchRequestBody = Omit<SearchRequest, "filter"> & {
  post_filter?: RangeClause;
};

// ---------- response ----------

export interface TermsBucket {
  key: string | number;
  doc_count: number;
}

export interface StatsAgg {
  count: number;
  min: number | null;
  max: number | null;
  avg: number | null;
  sum: number;
}

export interface RawHit {
  _id?: string;
  _score?: number | null;
  _source?: Record<string, unknown>;
}

export interface RawSearchBody {
  hits?: {
    total?: number | { value: number };
    hits?: RawHit[];
  };
  aggregations?: Record<string, unknown>;
}
