// src/config/search.config.ts
import { registerAs } from "@nestjs/config";

export type SearchConfig = {
  node: string;
  auth?: { username: string; password: string };
  productsIndex: string;
  requestTimeout: number;
};

export function parseAuth(
  raw?: string,
): { username: string; password: string } | undefined {
  if (!raw) return undefined;
  const at = raw.indexOf(":");
  if (at < 0) return undefined;
  return { username: raw.slice(0, at), password: raw.slice(at + 1) };
}

export default registerAs(
  "search",
  (): SearchConfig => ({
    // e.g. https://your-os-domain:443
    node: process.env.SEARCH_NODE ?? "http://localhost:9200",
    auth: parseAuth(process.env.SEARCH_AUTH), // "user:pass"
    productsIndex: process.env.SEARCH_PRODUCTS_INDEX ?? "products_v1",
    requestTimeout: Number(process.env.SEARCH_REQUEST_TIMEOUT) || 5000,
  }),
);
