// search/search.module.ts
import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import searchConfig from "../config/search.config";
import { OpenSearchModule } from "./opensearch.module";
import { SearchService } from "./search.service";
import { SearchController } from "./search.controller";

@Module({
  imports: [ConfigModule.forFeature(searchConfig), OpenSearchModule],
  providers: [SearchService],
  controllers: [SearchController],
  exports: [SearchService],
})
export class SearchModule {}
