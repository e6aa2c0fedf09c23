import { buildSort } from "./sorting";

const nameAsc = { untouched_name: { order: "asc" } };
const nameDesc = { untouched_name: { order: "desc" } };
const priceAsc = { price: { order: "asc" } };
const priceDesc = { price: { order: "desc" } };

const cases: [string, unknown[]][] = [
  ["name_asc", [nameAsc, priceAsc, "_score"]],
  ["name_desc", [nameDesc, priceAsc, "_score"]],
  ["price_asc", [priceAsc, nameAsc, "_score"]],
  ["price_desc", [priceDesc, nameAsc, "_score"]],
  ["score", ["_score", nameAsc, priceAsc]],
  ["default", ["_score", nameAsc, priceAsc]],
];

describe("buildSort", () => {
  it.each(cases)("resolves %s", (mode, expected) => {
    expect(buildSort(mode)).toEqual(expected);
  });

  it("falls back to the score ordering for unknown modes", () => {
    expect(buildSort("xyz")).toEqual(buildSort("score"));
  });

  it("sorts names on the untouched field", () => {
    expect(buildSort("name_asc")[0]).toEqual({
      untouched_name: { order: "asc" },
    });
  });
});
