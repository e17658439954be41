import 'dotenv/config';
import { z } from 'zod';

const positiveInt = (name: string, fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .refine((v) => Number.isInteger(v) && v > 0, {
      message: `${name} must be a positive integer`
    });

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: positiveInt('PORT', '4000'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  // true/1/yes; si no viene, se decide según NODE_ENV
  DATABASE_SSL: z
    .string()
    .trim()
    .toLowerCase()
    .transform((v) => v === 'true' || v === '1' || v === 'yes')
    .optional(),
  DATABASE_POOL_MAX: positiveInt('DATABASE_POOL_MAX', '5'),
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  PUBLIC_BASE_URL: z
    .string()
    .url('PUBLIC_BASE_URL must be an absolute URL')
    .default('http://localhost:4000')
    .refine((v) => /^https?:\/\//i.test(v), {
      message: 'PUBLIC_BASE_URL must use http or https'
    })
    .transform((v) => v.replace(/\/+$/, ''))
});

export type Env = z.infer<typeof envSchema>;

/** Lo que necesita la app HTTP; la DB se configura aparte en server.ts. */
export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  jwtSecret: string;
  publicBaseUrl: string;
}

export function toAppConfig(env: Env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    jwtSecret: env.JWT_SECRET,
    publicBaseUrl: env.PUBLIC_BASE_URL
  };
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const _env = envSchema.safeParse(source);

  if (!_env.success) {
    console.error('❌ Invalid environment variables');
    console.error(_env.error.flatten().fieldErrors);
    process.exit(1);
  }

  return _env.data;
}
