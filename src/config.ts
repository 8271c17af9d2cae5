import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // App
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Uploads
  MAX_UPLOAD_MB: z.coerce.number().positive().default(25),     // raw workbook body limit
});

type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('\n  ');
    throw new Error(`Invalid configuration:\n  ${missing}`);
  }
  return result.data;
}

export const config = loadConfig();
export type { Config };
