import { NotFoundException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import { errors } from "@opensearch-project/opensearch";
import searchConfig from "../config/search.config";
import { OPENSEARCH_CLIENT } from "./opensearch.module";
import { SearchService } from "./search.service";
import { createQueryParams } from "./types/query-params";

function notFound() {
  return Object.assign(Object.create(errors.ResponseError.prototype), {
    meta: { statusCode: 404, body: { found: false } },
  });
}

describe("SearchService", () => {
  let service: SearchService;
  const os = { search: jest.fn(), get: jest.fn() };

  beforeEach(async () => {
    os.search.mockReset();
    os.get.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SearchService,
        { provide: OPENSEARCH_CLIENT, useValue: os },
        {
          provide: searchConfig.KEY,
          useValue: {
            node: "http://localhost:9200",
            productsIndex: "products_test",
            requestTimeout: 1000,
          },
        },
      ],
    }).compile();

    service = module.get<SearchService>(SearchService);
  });

  it("should be defined", () => {
    expect(service).toBeDefined();
  });

  describe("searchProducts", () => {
    it("sends the compiled request and maps the response", async () => {
      os.search.mockResolvedValue({
        body: {
          hits: {
            total: { value: 1 },
            hits: [
              {
                _id: "7",
                _score: 2,
                _source: { name: "Tee", price: 12, properties: ["size||M"] },
              },
              { _id: "8" },
            ],
          },
          aggregations: {
            price: { count: 1, min: 12, max: 12, avg: 12, sum: 12 },
            properties: { buckets: [{ key: "size||M", doc_count: 1 }] },
            taxon_ids: { buckets: [{ key: 3, doc_count: 1 }] },
          },
        },
      });

      const result = await service.searchProducts(
        createQueryParams({
          query: "tee",
          priceMin: 10,
          priceMax: 20,
          from: 20,
        }),
      );

      expect(os.search).toHaveBeenCalledTimes(1);
      const [{ index, body }] = os.search.mock.calls[0];
      expect(index).toBe("products_test");
      expect(body.post_filter).toEqual({
        range: { price: { gte: 10, lte: 20 } },
      });
      expect(body).not.toHaveProperty("filter");
      expect(body.from).toBe(20);
      expect(body.min_score).toBe(0.1);

      expect(result).toEqual({
        items: [
          {
            id: "7",
            name: "Tee",
            price: 12,
            taxonIds: [],
            properties: ["size||M"],
            score: 2,
          },
        ],
        total: 1,
        from: 20,
        facets: {
          price: { count: 1, min: 12, max: 12, avg: 12, sum: 12 },
          properties: { size: { M: 1 } },
          taxonIds: { "3": 1 },
        },
      });
    });

    it("rethrows engine errors", async () => {
      os.search.mockRejectedValue(new Error("connection refused"));

      await expect(
        service.searchProducts(createQueryParams()),
      ).rejects.toThrow("connection refused");
    });
  });

  describe("getProduct", () => {
    it("returns the stored document", async () => {
      os.get.mockResolvedValue({
        body: { _id: "7", found: true, _source: { name: "Tee" } },
      });

      await expect(service.getProduct("7")).resolves.toEqual({
        id: "7",
        source: { name: "Tee" },
      });
      expect(os.get).toHaveBeenCalledWith({ index: "products_test", id: "7" });
    });

    it("maps a missing document to NotFoundException", async () => {
      os.get.mockRejectedValue(notFound());

      await expect(service.getProduct("404")).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });

    it("rethrows other errors", async () => {
      os.get.mockRejectedValue(new Error("timeout"));

      await expect(service.getProduct("7")).rejects.toThrow("timeout");
    });
  });
});
