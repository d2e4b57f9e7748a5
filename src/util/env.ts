import { z } from 'zod';

const booleanFlag = z.enum(['true', 'false', 'TRUE', 'FALSE', 'True', 'False']).transform(val => val.toLowerCase() === 'true');
const numeric = z.string().trim().regex(/^\d+(\.\d+)?$/, 'Must be a non-negative number').transform(Number);
const commaList = z.string().transform(val => val.split(',').map(t => t.trim()).filter(t => t.length > 0));

// Every run setting is optional here: config.ts layers these over config.yaml and the defaults.
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  TMDB_API_KEY: z.string().optional(),
  LANGUAGE: z.string().optional(),
  FALLBACK_LANGUAGES: commaList.optional(),
  MEDIA_TYPE: z.enum(['movie', 'tv', 'both']).optional(),
  QUALITY: z.enum(['original', 'w500', 'w342', 'w185']).optional(),
  OUTPUT_DIR: z.string().optional(),
  OVERWRITE_EXISTING: booleanFlag.optional(),
  MAX_RETRIES: numeric.optional(),
  RETRY_DELAY_SECONDS: numeric.optional(),
  REQUEST_DELAY_SECONDS: numeric.optional(),
  REQUEST_TIMEOUT_SECONDS: numeric.optional(),
  SAVE_METADATA: booleanFlag.optional(),
  ZIP_OUTPUT: booleanFlag.optional(),
  VERIFY_API_KEY: booleanFlag.optional(),
  INPUT_FILE: z.string().optional(),
  INPUT_FORMAT: z.enum(['auto', 'text', 'json', 'csv']).optional(),
  CSV_HAS_HEADER: booleanFlag.optional(),
  TITLES: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(error => {
      console.error(`- ${error.path.join('.')}: ${error.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

const env = validateEnv();
export default env;
