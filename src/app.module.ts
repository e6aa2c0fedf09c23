import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { SearchModule } from "./search/search.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
    }),
    SearchModule,
  ],
})
export class AppModule {}
