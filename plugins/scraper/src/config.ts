import { z } from 'zod';

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  SCRAPER_HEADLESS: flag('true'),
  SCRAPER_CHROME_PATH: z.string().min(1).optional(),
  SCRAPER_CDP_URL: z.string().url().optional(),
  SCRAPER_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SCRAPER_HTML_MODE: z.enum(['static', 'rendered']).default('static'),
  SCRAPER_LOG_REQUESTS: flag('false'),
});

export type HtmlMode = 'static' | 'rendered';

export interface ScraperConfig {
  headless: boolean;
  chromePath?: string;
  cdpUrl?: string;
  navigationTimeoutMs: number;
  htmlMode: HtmlMode;
  logRequests: boolean;
}

/**
 * Reads the SCRAPER_* variables. Empty strings count as unset so a blank
 * line in .env does not fail validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    headless: values.SCRAPER_HEADLESS,
    chromePath: values.SCRAPER_CHROME_PATH,
    cdpUrl: values.SCRAPER_CDP_URL,
    navigationTimeoutMs: values.SCRAPER_NAVIGATION_TIMEOUT_MS,
    htmlMode: values.SCRAPER_HTML_MODE,
    logRequests: values.SCRAPER_LOG_REQUESTS,
  };
}
