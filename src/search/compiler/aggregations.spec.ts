import { buildAggregations } from "./aggregations";

describe("buildAggregations", () => {
  it("defines price stats, property and taxon terms", () => {
    expect(buildAggregations()).toEqual({
      price: { stats: { field: "price" } },
      properties: {
        terms: {
          field: "properties",
          order: { _count: "asc" },
          size: 1000000,
        },
      },
      taxon_ids: { terms: { field: "taxon_ids", size: 1000000 } },
    });
  });

  it("returns a fresh document each call", () => {
    expect(buildAggregations()).not.toBe(buildAggregations());
  });
});
