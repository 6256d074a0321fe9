import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const MIB = 1024 * 1024;

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true' || normalized === '1') {
      return true;
    }
    if (normalized === 'false' || normalized === '0') {
      return false;
    }
  }
  return value;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const optionalString = () => z.preprocess(emptyToUndefined, z.string().min(1).optional());

const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).default(5000)),
  API_BIND_SCOPE: z.preprocess(emptyToUndefined, z.enum(['loopback', 'all']).default('loopback')),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  SERVICE_NAME: z.preprocess(emptyToUndefined, z.string().min(1).default('Local Transcription API')),
  SERVICE_VERSION: z.preprocess(emptyToUndefined, z.string().min(1).default('0.1.0')),

  MAX_BODY_BYTES: positiveInt(500 * MIB),
  MAX_HEADER_BYTES: positiveInt(64 * 1024),
  READ_CHUNK_BYTES: positiveInt(64 * 1024),
  INACTIVITY_TIMEOUT_MS: positiveInt(30_000),
  PROCESSING_TIMEOUT_MS: positiveInt(20 * 60_000),
  LARGE_UPLOAD_THRESHOLD_BYTES: positiveInt(25 * MIB),
  LARGE_UPLOAD_TIMEOUT_MS: positiveInt(60 * 60_000),
  LARGE_UPLOAD_CHUNK_BYTES: positiveInt(8 * MIB),
  KEEP_ALIVE_INTERVAL_MS: positiveInt(30_000),
  LARGE_UPLOAD_INTERIM_RESPONSES: z.preprocess(stringToBoolean, z.boolean().default(false)),

  TRANSCRIPTION_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(1).default('auto')),
  DEFAULT_MODEL: optionalString(),
  MODELS_DIR: optionalString(),
  CLOUD_MODELS: optionalString(),
  WHISPER_URL: z.preprocess(emptyToUndefined, z.string().min(1).default('http://127.0.0.1:8178')),
  CLOUD_TRANSCRIBE_URL: optionalString(),
  CLOUD_API_KEY: optionalString(),
  ENGINE_TIMEOUT_MS: positiveInt(15 * 60_000),
  FFMPEG_PATH: z.preprocess(emptyToUndefined, z.string().min(1).default('ffmpeg')),
  TEMP_DIR: optionalString(),

  WORD_REPLACEMENT_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),
  WORD_REPLACEMENTS_PATH: optionalString(),

  ENHANCEMENT_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),
  ENHANCEMENT_URL: optionalString(),
  ENHANCEMENT_API_KEY: optionalString(),
  ENHANCEMENT_MODEL: optionalString(),
  ENHANCEMENT_TIMEOUT_MS: positiveInt(30_000),

  DIARIZATION_FAILURE_POLICY: z.preprocess(
    emptyToUndefined,
    z.enum(['degrade', 'fail']).default('degrade'),
  ),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = parsed.data;
