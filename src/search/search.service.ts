// search/search.service.ts
import { Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { Client, errors } from "@opensearch-project/opensearch";
import searchConfig from "../config/search.config";
import { compile } from "./compiler";
import { OPENSEARCH_CLIENT } from "./opensearch.module";
import {
  mapFacets,
  mapHit,
  readTotal,
  toRequestBody,
} from "./helper/search-helper";
import { RawSearchBody } from "./types/os-types";
import { QueryParams } from "./types/query-params";
import {
  ProductDocument,
  ProductHit,
  SearchProductsResponse,
} from "./types/types";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(
    @Inject(OPENSEARCH_CLIENT) private readonly os: Client,
    @Inject(searchConfig.KEY)
    private readonly config: ConfigType<typeof searchConfig>,
  ) {}

  async searchProducts(params: QueryParams): Promise<SearchProductsResponse> {
    const request = compile(params);
    const filterCount = request.query.bool.filter?.bool.must.length ?? 0;
    this.logger.debug(
      `search ${this.config.productsIndex} from=${request.from} sort=${params.sorting} filters=${filterCount} price=${request.filter ? "on" : "off"}`,
    );

    let body: RawSearchBody;
    try {
      const res = await this.os.search({
        index: this.config.productsIndex,
        body: toRequestBody(request),
      });
      body = res.body;
    } catch (err) {
      this.logger.error(
        `Product search failed on ${this.config.productsIndex}: ${errorMessage(err)}`,
      );
      throw err;
    }

    const items = (body.hits?.hits ?? [])
      .map(mapHit)
      .filter((h): h is ProductHit => h !== null);

    return {
      items,
      total: readTotal(body),
      from: request.from,
      facets: mapFacets(body.aggregations),
    };
  }

  // direct lookup, bypasses the compiler
  async getProduct(id: string): Promise<ProductDocument> {
    try {
      const res = await this.os.get({ index: this.config.productsIndex, id });
      const source: Record<string, unknown> = res.body._source ?? {};
      return { id: String(res.body._id ?? id), source };
    } catch (err) {
      if (err instanceof errors.ResponseError && err.statusCode === 404) {
        throw new NotFoundException(`Product ${id} not found`);
      }
      this.logger.error(
        `Product fetch failed for ${id}: ${errorMessage(err)}`,
      );
      throw err;
    }
  }
}
