import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  OPEN_ROUTER_API_KEY: z.string().optional(),
  TOKENIZER: z.enum(['regex', 'pos']).default('regex'),
});

export type AppConfig = z.infer<typeof envSchema>;

export const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  return result.data;
};

export const config: AppConfig = parseConfig(process.env);
