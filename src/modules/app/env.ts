import { z } from 'zod';

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const boolish = z
  .string()
  .optional()
  .refine((v) => (v ? ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'].includes(v.trim().toLowerCase()) : true), 'must be a boolean flag');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z
    .string()
    .optional()
    .refine((v) => (v ? !Number.isNaN(Number(v)) : true), 'PORT must be a number'),

  // Generative model. Without a key every request falls back to the static devotional.
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().trim().min(1).optional().default('gemini-2.0-flash'),

  // Calendar day (date + weekday) used in prompts and the fallback insight.
  DEVOTIONAL_TIME_ZONE: z
    .string()
    .trim()
    .optional()
    .default('America/New_York')
    .refine(isValidTimeZone, 'DEVOTIONAL_TIME_ZONE must be an IANA time zone (e.g. America/New_York)'),

  // In-memory preferences: idle sessions are dropped after the TTL; the oldest go first past the cap.
  PREFERENCES_SESSION_TTL_MINUTES: z
    .string()
    .optional()
    .refine((v) => (v ? Number(v) > 0 : true), 'PREFERENCES_SESSION_TTL_MINUTES must be a positive number'),
  PREFERENCES_MAX_SESSIONS: z
    .string()
    .optional()
    .refine((v) => (v ? Number.isInteger(Number(v)) && Number(v) > 0 : true), 'PREFERENCES_MAX_SESSIONS must be a positive integer'),

  SESSION_COOKIE_SECURE: boolish,
  LOG_REQUESTS: boolish,
  LOG_STARTUP_INFO: boolish,
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>) => {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // Nest expects thrown errors to abort bootstrap.
      throw new Error(
        `Invalid environment variables:\n${parsed.error.issues
          .map((i) => `- ${i.path.join('.')}: ${i.message}`)
          .join('\n')}`,
      );
    }
    return parsed.data;
  };
}
