// server/config/env.ts
import 'dotenv/config';
import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const schema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal','error','warn','info','debug','trace','silent'])
    .default('info'),
  CLIENT_ORIGIN: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  UPLOAD_SIZE_LIMIT_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  STRICT_UPLOAD_FORMATS: z
    .enum(['true','false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export type AppEnv = z.infer<typeof schema>;

export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv => schema.parse(source);

export const env = parseEnv(process.env);
