// search/opensearch.module.ts
import { Module } from "@nestjs/common";
import { ConfigModule, ConfigType } from "@nestjs/config";
import { Client } from "@opensearch-project/opensearch";
import searchConfig from "../config/search.config";

export const OPENSEARCH_CLIENT = "OPENSEARCH_CLIENT";

@Module({
  imports: [ConfigModule.forFeature(searchConfig)],
  providers: [
    {
      provide: OPENSEARCH_CLIENT,
      inject: [searchConfig.KEY],
      useFactory: (config: ConfigType<typeof searchConfig>) =>
        new Client({
          node: config.node,
          auth: config.auth,
          ssl: { rejectUnauthorized: true },
          requestTimeout: config.requestTimeout,
        }),
    },
  ],
  exports: [OPENSEARCH_CLIENT],
})
export class OpenSearchModule {}
