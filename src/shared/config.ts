import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getRingfeedDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const RateLimitSchema = z
  .object({
    per_minute: z.number().int().positive().default(10),
    per_hour: z.number().int().positive().default(100),
  })
  .default({});

const CircuitBreakerSchema = z
  .object({
    failure_threshold: z.number().int().positive().default(5),
    success_threshold: z.number().int().positive().default(2),
    timeout_ms: z.number().int().nonnegative().default(300_000),
  })
  .default({});

const SourceBase = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  rate_limit: RateLimitSchema,
  circuit_breaker: CircuitBreakerSchema,
});

export const WikipediaSourceSchema = SourceBase.extend({
  kind: z.literal('wikipedia'),
  url: z.string().url().default('https://en.wikipedia.org/w/api.php'),
  options: z
    .object({
      categories: z
        .array(z.string())
        .min(1)
        .default([
          'American_professional_wrestlers',
          'Japanese_professional_wrestlers',
          'Mexican_professional_wrestlers',
          'Canadian_professional_wrestlers',
          'British_professional_wrestlers',
          'WWE_Hall_of_Fame_inductees',
        ]),
      per_request: z.number().int().min(1).max(20).default(20),
    })
    .default({}),
});

export const RssSourceSchema = SourceBase.extend({
  kind: z.literal('rss'),
  url: z.string().url(),
  options: z
    .object({
      max_items: z.number().int().positive().default(50),
    })
    .default({}),
});

export const MatchDbSourceSchema = SourceBase.extend({
  kind: z.literal('match_db'),
  url: z.string().url().default('https://www.cagematch.net'),
  options: z
    .object({
      listing_path: z.string().default('/en/?id=1&view=cards'),
      max_events: z.number().int().positive().default(50),
    })
    .default({}),
});

export const SourceSchema = z.discriminatedUnion('kind', [
  WikipediaSourceSchema,
  RssSourceSchema,
  MatchDbSourceSchema,
]);

export type SourceDefinition = z.infer<typeof SourceSchema>;
export type SourceKind = SourceDefinition['kind'];

const DEFAULT_SOURCES: Array<z.input<typeof SourceSchema>> = [
  {
    name: 'wikipedia',
    kind: 'wikipedia',
    rate_limit: { per_minute: 30, per_hour: 1000 },
  },
  {
    name: 'wrestlinginc',
    kind: 'rss',
    url: 'https://www.wrestlinginc.com/feed/',
    // Feeds are cheap; a very high cap rather than no limiter at all.
    rate_limit: { per_minute: 1000, per_hour: 100_000 },
  },
  {
    name: 'cagematch',
    kind: 'match_db',
    rate_limit: { per_minute: 5, per_hour: 60 },
  },
];

export const DEFAULT_KEYWORDS = [
  'wrestling',
  'wrestler',
  'wwe',
  'aew',
  'njpw',
  'tna',
  'impact',
  'roh',
  'ppv',
  'raw',
  'smackdown',
  'dynamite',
  'collision',
  'nxt',
  'championship',
  'title match',
  'tag team',
  'royal rumble',
  'wrestlemania',
  'summerslam',
  'survivor series',
  'lucha',
  'cagematch',
  'hall of fame',
];

export const ConfigSchema = z.object({
  api: z
    .object({
      base_url: z.string().default('http://localhost:8000/api/wrestlebot'),
      token: z.string().default(''),
      timeout_ms: z.number().int().positive().default(30_000),
      user_agent: z.string().default('Ringfeed/1.0'),
    })
    .default({}),

  sources: z
    .array(SourceSchema)
    .default(DEFAULT_SOURCES)
    .superRefine((sources, ctx) => {
      const seen = new Set<string>();
      for (const [i, source] of sources.entries()) {
        if (seen.has(source.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate source name: ${source.name}`,
            path: [i, 'name'],
          });
        }
        seen.add(source.name);
      }
    }),

  rate_limit: z
    .object({
      max_backoff_multiplier: z.number().min(1).default(10),
      decay_step: z.number().positive().default(0.25),
    })
    .default({}),

  workers: z
    .object({
      max_concurrent_sources: z.number().int().positive().default(5),
      publish_concurrency: z.number().int().positive().default(3),
    })
    .default({}),

  cycle: z
    .object({
      source_timeout_ms: z.number().int().positive().default(300_000),
      delay_ms: z.number().int().nonnegative().default(0),
      idle_delay_ms: z.number().int().nonnegative().default(1000),
      error_backoff_ms: z.number().int().nonnegative().default(10_000),
    })
    .default({}),

  retry: z
    .object({
      delays_ms: z
        .array(z.number().int().positive())
        .min(1)
        .default([60_000, 300_000, 900_000, 3_600_000]),
    })
    .default({}),

  publish: z
    .object({
      batch_size: z.number().int().positive().default(1),
    })
    .default({}),

  verifier: z
    .object({
      url: z.string().default(''),
      token: z.string().default(''),
      timeout_ms: z.number().int().positive().default(10_000),
    })
    .default({}),

  processor: z
    .object({
      keywords: z.array(z.string()).default(DEFAULT_KEYWORDS),
    })
    .default({}),

  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(15_000),
      user_agent: z.string().default('Ringfeed/1.0 (wrestling encyclopedia collector)'),
    })
    .default({}),

  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
      token: z.string().default(''),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.ringfeed/ringfeed.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validate a raw (file-shaped) config object, applying env overrides.
 */
export function parseConfig(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const envUrl = env['RINGFEED_API_URL'];
  const envToken = env['RINGFEED_API_TOKEN'];

  if (envUrl || envToken) {
    const api: Record<string, unknown> = isRecord(raw['api']) ? { ...raw['api'] } : {};
    if (envUrl) api['base_url'] = envUrl;
    if (envToken) api['token'] = envToken;
    raw = { ...raw, api };
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('ringfeed', {
    searchPlaces: ['ringfeed.config.yaml', 'ringfeed.config.yml', '.ringfeedrc.yaml', '.ringfeedrc.yml'],
  });

  const envConfigPath = process.env['RINGFEED_CONFIG'];
  const defaultConfigPath = path.join(getRingfeedDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else if (fs.existsSync(defaultConfigPath)) {
    const loaded: unknown = (await explorer.load(defaultConfigPath))?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(rawConfig);
  return cachedConfig;
}
