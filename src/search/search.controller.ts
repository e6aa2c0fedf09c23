// search.controller.ts
import { Controller, Get, Param, Query } from "@nestjs/common";
import { SearchService } from "./search.service";
import {
  SearchProductsQueryDto,
  toQueryParams,
} from "./dto/search-products.query.dto";

@Controller("search")
export class SearchController {
  constructor(private readonly search: SearchService) {}

  // GET /search/products?q=shirt&properties[color]=red,blue&taxonIds=5,9
  @Get("products")
  async searchProducts(@Query() query: SearchProductsQueryDto) {
    return this.search.searchProducts(toQueryParams(query));
  }

  // GET /search/products/:id
  @Get("products/:id")
  async getProduct(@Param("id") id: string) {
    return this.search.getProduct(id);
  }
}
