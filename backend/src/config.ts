import { config as loadEnv } from 'dotenv';
import path from 'node:path';
import { z } from 'zod';

loadEnv();

const DEV_ACCESS_SECRET = 'dev-access-secret-change-me';
const DEV_REFRESH_SECRET = 'dev-refresh-secret-change-me';

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : undefined;
}

function parseOptionalBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  return ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
}

const ConfigSchema = z.object({
  nodeEnv: z.string().default('development'),
  port: z.coerce.number().int().positive().default(4030),
  logLevel: z.string().default('info'),
  /** Honour X-Forwarded-For when resolving the client address; only behind a proxy that sets it. */
  trustProxy: z.boolean().default(false),
  databasePath: z.string().min(1),
  roleSeedPath: z.string().min(1),
  auth: z
    .object({
      secretKey: z.string().min(16, 'AUTH_SECRET_KEY must be at least 16 characters'),
      refreshSecretKey: z.string().min(16, 'AUTH_REFRESH_SECRET_KEY must be at least 16 characters'),
      algorithm: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
      accessTokenExpireMinutes: z.number().int().positive().default(15),
      refreshTokenExpireMinutes: z.number().int().positive().default(24 * 60),
      passwordHashRounds: z.number().int().min(4).max(15).default(12),
      loginRateLimit: z.object({
        windowMs: z.number().int().positive().default(60_000),
        limit: z.number().int().positive().default(10),
      }),
    })
    .superRefine((value, ctx) => {
      if (value.secretKey === value.refreshSecretKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'AUTH_SECRET_KEY and AUTH_REFRESH_SECRET_KEY must differ',
        });
      }
    }),
  cache: z.object({
    backend: z.enum(['sqlite', 'memory']).default('sqlite'),
    roleScopesTtlSeconds: z.number().int().positive().default(3600),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const nodeEnv = env.NODE_ENV ?? 'development';
  const isProd = nodeEnv === 'production';

  // Development keeps working without a .env file; production must be explicit.
  if (isProd) {
    const missing = ['AUTH_SECRET_KEY', 'AUTH_REFRESH_SECRET_KEY'].filter((key) => !env[key]);
    if (missing.length > 0) {
      throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
    }
  }

  return ConfigSchema.parse({
    nodeEnv,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    trustProxy: parseOptionalBool(env.TRUST_PROXY),
    databasePath: env.DATABASE_FILE ?? path.resolve('backend/data/storefront.sqlite'),
    roleSeedPath: env.ROLE_SEED_FILE ?? path.resolve('backend/data/roles.json'),
    auth: {
      secretKey: env.AUTH_SECRET_KEY ?? DEV_ACCESS_SECRET,
      refreshSecretKey: env.AUTH_REFRESH_SECRET_KEY ?? DEV_REFRESH_SECRET,
      algorithm: env.AUTH_ALGORITHM,
      accessTokenExpireMinutes: parseOptionalInt(env.AUTH_ACCESS_TOKEN_EXPIRE_MINUTES),
      refreshTokenExpireMinutes: parseOptionalInt(env.AUTH_REFRESH_TOKEN_EXPIRE_MINUTES),
      passwordHashRounds: parseOptionalInt(env.AUTH_PASSWORD_HASH_ROUNDS),
      loginRateLimit: {
        windowMs: parseOptionalInt(env.AUTH_LOGIN_RATE_WINDOW_MS),
        limit: parseOptionalInt(env.AUTH_LOGIN_RATE_LIMIT),
      },
    },
    cache: {
      backend: env.ROLE_SCOPES_CACHE,
      roleScopesTtlSeconds: parseOptionalInt(env.ROLE_SCOPES_CACHE_TTL_SECONDS),
    },
  });
}

export const config: AppConfig = loadConfig(process.env);
