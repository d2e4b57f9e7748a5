import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import logger from './logger';
import env, { Env } from './env';
import { parseCommaList } from './naming';
import { isRecognizedApiKey } from './apiKey';

// --- Zod Schemas ---

const LANGUAGE_CODE = /^[a-z]{2}(-[A-Z]{2})?$/;

const LanguageSchema = z.string().regex(LANGUAGE_CODE, "Format must be 'xx' or 'xx-XX'");

const InputSchema = z.object({
  file: z.string().min(1).optional(),
  format: z.enum(['auto', 'text', 'json', 'csv']).default('auto'),
  csvHasHeader: z.boolean().default(false),
  titles: z.array(z.string()).default([]),
}).refine(input => input.file !== undefined || input.titles.length > 0, {
  message: 'Provide an input file (INPUT_FILE / input.file) or inline titles (TITLES / input.titles)',
});

const RunConfigSchema = z.object({
  apiKey: z.string().min(1, 'A TMDB API key is required (TMDB_API_KEY / apiKey)'),
  language: LanguageSchema.default('en-US'),
  fallbackLanguages: z.array(LanguageSchema).default(['en', 'ja', 'es']),
  mediaType: z.enum(['movie', 'tv', 'both']).default('both'),
  quality: z.enum(['original', 'w500', 'w342', 'w185']).default('original'),
  outputDir: z.string().min(1).default('output/posters'),
  overwritePolicy: z.enum(['skip-if-exists', 'overwrite']).default('skip-if-exists'),
  maxRetries: z.number().int().min(0).max(10).default(2),
  retryDelaySeconds: z.number().min(0).max(60).default(1),
  requestDelaySeconds: z.number().min(0).max(2).default(0.5),
  requestTimeoutSeconds: z.number().positive().max(300).default(15),
  saveMetadata: z.boolean().default(true),
  zipOutput: z.boolean().default(true),
  verifyApiKey: z.boolean().default(true),
});

const ConfigSchema = RunConfigSchema.extend({
  input: InputSchema,
});

export type RunConfig = Readonly<z.infer<typeof RunConfigSchema>>;
export type InputSource = Readonly<z.infer<typeof InputSchema>>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export interface AppConfig {
  run: RunConfig;
  input: InputSource;
}

/** Builds a frozen run configuration from partial settings, applying defaults. */
export function createRunConfig(settings: RunConfigInput): RunConfig {
  return Object.freeze(RunConfigSchema.parse(settings));
}

// --- Loader Logic ---

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readYaml(configPath: string): RawConfig {
  logger.info(`Loading configuration from ${configPath}`);
  let loaded: unknown;
  try {
    loaded = yaml.load(fs.readFileSync(configPath, 'utf8'));
  } catch (e) {
    logger.error(`Failed to parse config.yaml: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }

  if (loaded === undefined || loaded === null) return {};
  if (!isRecord(loaded)) {
    logger.error('config.yaml must contain a mapping of settings');
    process.exit(1);
  }
  return loaded;
}

function envOverrides(source: Env): RawConfig {
  const overrides: RawConfig = {
    apiKey: source.TMDB_API_KEY,
    language: source.LANGUAGE,
    fallbackLanguages: source.FALLBACK_LANGUAGES,
    mediaType: source.MEDIA_TYPE,
    quality: source.QUALITY,
    outputDir: source.OUTPUT_DIR,
    maxRetries: source.MAX_RETRIES,
    retryDelaySeconds: source.RETRY_DELAY_SECONDS,
    requestDelaySeconds: source.REQUEST_DELAY_SECONDS,
    requestTimeoutSeconds: source.REQUEST_TIMEOUT_SECONDS,
    saveMetadata: source.SAVE_METADATA,
    zipOutput: source.ZIP_OUTPUT,
    verifyApiKey: source.VERIFY_API_KEY,
  };

  if (source.OVERWRITE_EXISTING !== undefined) {
    overrides.overwritePolicy = source.OVERWRITE_EXISTING ? 'overwrite' : 'skip-if-exists';
  }

  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

function inputOverrides(source: Env): RawConfig {
  const overrides: RawConfig = {
    file: source.INPUT_FILE,
    format: source.INPUT_FORMAT,
    csvHasHeader: source.CSV_HAS_HEADER,
    titles: source.TITLES !== undefined ? parseCommaList(source.TITLES) : undefined,
  };
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/**
 * Layers defaults <- config.yaml <- environment variables and validates the result.
 * Looks for config/config.yaml first, then config.yaml at the working directory root.
 */
function loadConfig(): AppConfig {
  const configPath = path.resolve(process.cwd(), 'config', 'config.yaml');
  const fallbackPath = path.resolve(process.cwd(), 'config.yaml');

  let loadedConfig: RawConfig = {};

  if (fs.existsSync(configPath)) {
    loadedConfig = readYaml(configPath);
  } else if (fs.existsSync(fallbackPath)) {
    loadedConfig = readYaml(fallbackPath);
  } else {
    logger.info('No config.yaml found. Using Environment Variables only.');
  }

  const yamlInput = isRecord(loadedConfig.input) ? loadedConfig.input : {};
  const merged = {
    ...loadedConfig,
    ...envOverrides(env),
    input: { ...yamlInput, ...inputOverrides(env) },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    logger.error('Configuration validation failed:');
    result.error.issues.forEach(err => {
      logger.error(`- ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }

  const { input, ...run } = result.data;

  if (!isRecognizedApiKey(run.apiKey)) {
    logger.warn('TMDB API key does not look like a v3 key (32 alphanumerics) or a v4 read access token.');
  }

  return {
    run: Object.freeze(run),
    input: Object.freeze(input),
  };
}

export { loadConfig };
