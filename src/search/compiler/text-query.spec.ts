import { buildTextQuery, escapeQuotes } from "./text-query";

describe("buildTextQuery", () => {
  it.each([undefined, "", "   ", "\t\n"])(
    "matches everything for blank text %j",
    (text) => {
      expect(buildTextQuery(text)).toEqual({ match_all: {} });
    },
  );

  it("builds a boosted dis_max query over the text fields", () => {
    expect(buildTextQuery("red shirt")).toEqual({
      query_string: {
        query: "red shirt",
        fields: ["name^5", "description", "sku"],
        default_operator: "AND",
        use_dis_max: true,
      },
    });
  });

  it("escapes each double quote exactly once", () => {
    const clause = buildTextQuery('the "big" one');
    expect(clause).toEqual(
      expect.objectContaining({
        query_string: expect.objectContaining({
          query: 'the \\"big\\" one',
        }),
      }),
    );
  });

  it("keeps the original text when unescaped once", () => {
    const escaped = escapeQuotes('a "b" c');
    expect(escaped.replace(/\\"/g, '"')).toBe('a "b" c');
    expect(escaped.match(/\\/g)).toHaveLength(2);
  });

  it("leaves text without quotes untouched", () => {
    expect(escapeQuotes("plain text")).toBe("plain text");
  });
});
