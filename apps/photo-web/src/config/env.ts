import { z } from 'zod';

function positiveInt(name: string, fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed <= 0) {
        throw new Error(`Invalid ${name} value: ${value}`);
      }
      return parsed;
    });
}

/**
 * Zod schema describing the environment contract of the web front-end. It
 * enforces the Flickr credentials, validates URLs, and normalises optional
 * values like the HTTP port, store driver and cache lifetimes.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
  PORT: positiveInt('PORT', 8000),
  FLICKR_API_KEY: z.string().min(1, 'FLICKR_API_KEY is required'),
  FLICKR_API_SECRET: z.string().min(1, 'FLICKR_API_SECRET is required'),
  CALLBACK_URL: z
    .string()
    .url('CALLBACK_URL must be a valid URL')
    .default('http://localhost:8000/callback'),
  STORE_DRIVER: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'memory'))
    .pipe(z.enum(['memory', 'redis'])),
  REDIS_URL: z.string().url('REDIS_URL must be a valid URL').optional(),
  REDIS_FRIENDS_CACHE_TTL: positiveInt('REDIS_FRIENDS_CACHE_TTL', 60 * 60 * 2),
  REDIS_PHOTO_DETAILS_CACHE_TTL: positiveInt('REDIS_PHOTO_DETAILS_CACHE_TTL', 60 * 60 * 48),
  FRIENDS_PHOTO_STRATEGY: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'per-contact'))
    .pipe(z.enum(['per-contact', 'snapshot'])),
  COOKIE_SECURE: z
    .string()
    .optional()
    .transform((value) => value === 'true' || value === '1'),
  LOG_LEVEL: z.string().optional(),
  API_RATE_LIMIT_MAX: positiveInt('API_RATE_LIMIT_MAX', 120),
  API_RATE_LIMIT_WINDOW: z
    .string()
    .optional()
    .transform((value) => value ?? '1 minute'),
});

export type StoreDriver = z.infer<typeof envSchema>['STORE_DRIVER'];
export type FriendsPhotoStrategy = z.infer<typeof envSchema>['FRIENDS_PHOTO_STRATEGY'];

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  flickr: {
    apiKey: string;
    apiSecret: string;
    callbackUrl: string;
  };
  store: {
    driver: StoreDriver;
    redisUrl?: string;
  };
  cache: {
    friendsTtlSeconds: number;
    photoDetailsTtlSeconds: number;
  };
  friendsPhotoStrategy: FriendsPhotoStrategy;
  cookie: {
    secure: boolean;
  };
  rateLimit: {
    max: number;
    timeWindow: string;
  };
  logLevel?: string;
}

/**
 * Parse and validate configuration from the provided environment source,
 * returning a strongly typed settings object or throwing a descriptive error
 * if any required variable is missing or malformed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new Error(firstError?.message ?? 'Invalid environment configuration');
  }

  const {
    NODE_ENV,
    PORT,
    FLICKR_API_KEY,
    FLICKR_API_SECRET,
    CALLBACK_URL,
    STORE_DRIVER,
    REDIS_URL,
    REDIS_FRIENDS_CACHE_TTL,
    REDIS_PHOTO_DETAILS_CACHE_TTL,
    FRIENDS_PHOTO_STRATEGY,
    COOKIE_SECURE,
    LOG_LEVEL,
    API_RATE_LIMIT_MAX,
    API_RATE_LIMIT_WINDOW,
  } = result.data;

  return {
    env: NODE_ENV,
    port: PORT,
    flickr: {
      apiKey: FLICKR_API_KEY,
      apiSecret: FLICKR_API_SECRET,
      callbackUrl: CALLBACK_URL,
    },
    store: {
      driver: STORE_DRIVER,
      redisUrl: REDIS_URL,
    },
    cache: {
      friendsTtlSeconds: REDIS_FRIENDS_CACHE_TTL,
      photoDetailsTtlSeconds: REDIS_PHOTO_DETAILS_CACHE_TTL,
    },
    friendsPhotoStrategy: FRIENDS_PHOTO_STRATEGY,
    cookie: {
      secure: COOKIE_SECURE,
    },
    rateLimit: {
      max: API_RATE_LIMIT_MAX,
      timeWindow: API_RATE_LIMIT_WINDOW,
    },
    logLevel: LOG_LEVEL,
  };
}
