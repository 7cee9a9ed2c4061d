import { z } from 'zod';

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

const flag = z
  .string()
  .default('0')
  .transform((value) => TRUTHY.has(value.trim().toLowerCase()));

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  INGEST_URL: z.string().url().optional(),
  INGEST_TOKEN: z.string().min(1).optional(),
  TEAMS: commaList('Cruzeiro,Atletico-MG,America-MG'),
  DAYS_BACK: z.coerce.number().int().min(0).default(7),
  DAYS_FORWARD: z.coerce.number().int().min(0).default(180),
  DRY_RUN: flag,
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(1500),
  MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  LOCAL_TIMEZONE: z.string().default('America/Sao_Paulo'),
  /** Empty means every registered source */
  SOURCES: commaList(''),
  API_FOOTBALL_KEY: z.string().min(1).optional(),
  API_FOOTBALL_HOST: z.string().default('v3.football.api-sports.io'),
  /** Save every downloaded ge page to GE_CACHE_FILE */
  GE_CACHE: flag,
  /** Read GE_CACHE_FILE instead of downloading the ge page */
  GE_OFFLINE: flag,
  GE_CACHE_FILE: z.string().min(1).default('.cache/ge_mineiro.html'),
  /** Empty disables saving unreadable ge pages */
  GE_DEBUG_HTML: z.string().default('debug_ge_mineiro.html'),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return envSchema.parse(env);
}

export const config = loadConfig();
