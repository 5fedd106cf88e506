// Service configuration loaded from environment variables
// server.ts loads .env through dotenv before anything reads these values
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const SettingsSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.string().default('development'),
  FRONTEND_URL: z.string().optional(),
  REQUEST_BODY_LIMIT: z.string().default('10mb'),

  // Text generation service (protocol v1.2)
  TEXT_SERVICE_URL: z.string().url().default('http://localhost:8001'),
  TEXT_SERVICE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  TEXT_SERVICE_SLIDE_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  TEXT_SERVICE_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  TEXT_SERVICE_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),

  // Stage behaviour
  STAGE_DEADLINE_MS: z.coerce.number().int().positive().default(300000),
  CONTENT_GENERATION_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(1),
  CONTENT_GENERATED_POLICY: z.enum(['any', 'all']).default('any'),

  // Downstream deck builder (optional)
  DECK_BUILDER_ENABLED: booleanFlag.default('false'),
  DECK_BUILDER_API_URL: z.string().url().default('http://localhost:8000'),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Parse settings from an environment object.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = SettingsSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
};

let cachedSettings: Settings | null = null;

export const getSettings = (): Settings => {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }
  return cachedSettings;
};
