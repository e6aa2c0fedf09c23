// src/search/dto/search-products.query.dto.ts
import { Transform, Type } from "class-transformer";
import {
  IsBoolean,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Min,
} from "class-validator";
import { createQueryParams, QueryParams } from "../types/query-params";

function splitList(value: unknown): string[] {
  const parts = Array.isArray(value) ? value : [value];
  return parts
    .filter(
      (v): v is string | number =>
        typeof v === "string" || typeof v === "number",
    )
    .flatMap((v) => String(v).split(","))
    .map((v) => v.trim())
    .filter(Boolean);
}

// ?properties[color]=red,blue&properties[size]=M
export function toPropertyMap(value: unknown): Record<string, string[]> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  const map: Record<string, string[]> = {};
  for (const [key, raw] of Object.entries(value)) {
    map[key] = splitList(raw);
  }
  return map;
}

// a blank ?priceMin= is an absent bound, not 0
export function toOptionalNumber(value: unknown): number | undefined {
  if (value == null) return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  return Number(value);
}

// ?taxonIds=5,9 or ?taxonIds=5&taxonIds=9
export function toTaxonIds(value: unknown): number[] {
  return splitList(value).map(Number);
}

export class SearchProductsQueryDto {
  @IsOptional() @IsString() q?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  from?: number = 0;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsNumber()
  priceMin?: number;

  @IsOptional()
  @Transform(({ value }) => toOptionalNumber(value))
  @IsNumber()
  priceMax?: number;

  @IsOptional()
  @Transform(({ value }) => toPropertyMap(value))
  @IsObject()
  properties?: Record<string, string[]>;

  @IsOptional()
  @Transform(({ value }) => toTaxonIds(value))
  @IsInt({ each: true })
  taxonIds?: number[];

  // unknown values sort by relevance
  @IsOptional() @IsString() sorting?: string;

  @IsOptional()
  @Transform(
    ({ value }) => value === true || value === "1" || value === "true",
  )
  @IsBoolean()
  browseMode?: boolean;
}

export function toQueryParams(dto: SearchProductsQueryDto): QueryParams {
  return createQueryParams({
    from: dto.from,
    query: dto.q,
    priceMin: dto.priceMin,
    priceMax: dto.priceMax,
    properties: dto.properties,
    taxonIds: dto.taxonIds,
    browseMode: dto.browseMode,
    sorting: dto.sorting,
  });
}
