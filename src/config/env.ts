import { z } from 'zod';
import 'dotenv/config';
import { engineEnvSchema, toEngineConfig } from './engine.js';

const envSchema = engineEnvSchema.extend({
  DATABASE_URL: z.string().url(),
  BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is required'),
  MINI_APP_URL: z.string().url().default('http://localhost:5173'),
  API_PORT: z.coerce.number().int().positive().default(3000),
  LIVENESS_CHECK_CHANNEL_ID: z.coerce.number().int(),
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);

export const engineConfig = toEngineConfig(env);
