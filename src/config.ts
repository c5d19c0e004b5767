/**
 * Engine configuration: zod schema, defaults, and loading from JSON files.
 *
 * Durations are expressed in seconds, matching the CLI flags and config files.
 */
import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const EXPORT_FORMATS = ['json', 'csv', 'excel'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/** File extensions that never lead to an HTML page worth visiting. */
export const DEFAULT_SKIP_EXTENSIONS = [
  '.pdf',
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
];

export const ScrapeConfigSchema = z
  .object({
    baseDelay: z.number().min(0).max(600).default(2),
    maxRetries: z.number().int().min(0).max(20).default(3),
    timeout: z.number().positive().max(600).default(30),
    maxDepth: z.number().int().min(0).max(100).default(3),
    maxPages: z.number().int().positive().max(10_000).default(50),
    exportFormats: z.array(z.enum(EXPORT_FORMATS)).min(1).default(['json']),
    maxConcurrentFetches: z.number().int().positive().max(50).default(5),
    maxBackoff: z.number().min(0).max(3600).default(30),
    jitter: z.number().min(0).max(60).default(0),
    allowCrossDomain: z.boolean().default(false),
    includeSubdomains: z.boolean().default(false),
    respectRobots: z.boolean().default(true),
    maxCrawlDelay: z.number().min(0).max(3600).default(30),
    userAgent: z.string().min(1).optional(),
    preset: z.string().min(1).optional(),
    include: z.array(z.string().min(1)).optional(),
    exclude: z.array(z.string().min(1)).optional(),
    skipExtensions: z
      .array(z.string().regex(/^\.[a-z0-9]+$/i, 'extensions look like ".pdf"'))
      .default(DEFAULT_SKIP_EXTENSIONS),
  })
  .strict();

export type ScrapeConfig = z.output<typeof ScrapeConfigSchema>;
export type ScrapeConfigInput = z.input<typeof ScrapeConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate user-supplied configuration and fill in defaults.
 * Throws ConfigError listing every problem found.
 */
export function resolveConfig(input: unknown = {}): ScrapeConfig {
  const parsed = ScrapeConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Read a JSON configuration file and validate it like any other input. */
export function loadConfigFile(path: string): ScrapeConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigError([`cannot read config file ${path}: ${String(e)}`]);
  }
  return resolveConfig(raw);
}

/**
 * Check that a seed URL is an absolute http(s) URL.
 * Returns the parsed URL or throws ConfigError.
 */
export function validateSeedUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError([`malformed URL: ${url}`]);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError([`URL must use http or https: ${url}`]);
  }
  return parsed;
}
