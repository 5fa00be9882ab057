import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  RULES_PATH: z.string().optional(),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().default(10),
  TOP_RESPONSES: z.coerce.number().int().positive().default(10)
});

export type Env = z.infer<typeof envSchema>;

export const readEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment variable ${issue.path.join('.')}: ${issue.message}`);
  }
  return parsed.data;
};
