import { z } from 'zod';
import { createInvalidConfigError } from './errors';

const ConfigSchema = z.object({
  CATALOG_SITE_NAME: z.string().min(1).default('Metadata Standards Catalog'),
  CATALOG_BASE_URL: z
    .string()
    .default('')
    .transform((url) => url.replace(/\/+$/, '')),
  CATALOG_STYLESHEET: z.string().min(1).default('/static/css/catalog.css'),
  CATALOG_API_PAGE_SIZE: z.coerce.number().int().positive().default(10),
});

export interface CatalogConfig {
  siteName: string;
  baseUrl: string;
  stylesheet: string;
  apiPageSize: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw createInvalidConfigError(parsed.error.issues);
  }
  return {
    siteName: parsed.data.CATALOG_SITE_NAME,
    baseUrl: parsed.data.CATALOG_BASE_URL,
    stylesheet: parsed.data.CATALOG_STYLESHEET,
    apiPageSize: parsed.data.CATALOG_API_PAGE_SIZE,
  };
}

let cached: CatalogConfig | null = null;

export function getConfig(): CatalogConfig {
  if (!cached) cached = loadConfig();
  return cached;
}

export function resetConfigCache(): void {
  cached = null;
}
