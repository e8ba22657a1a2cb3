import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

const outputFormatSchema = z.enum(['docx', 'pdf']);

export type OutputFormat = z.infer<typeof outputFormatSchema>;

const settingsSchema = z
  .object({
    server: z.object({
      port: z.coerce.number().int().min(0).max(65535).default(8000),
      corsOrigins: z.array(z.string().min(1)).default([]),
      internalApiKey: z.string().min(1).optional(),
      bodyLimit: z.string().default('1mb'),
    }),
    storage: z.object({
      driver: z.enum(['s3', 'memory']).default('s3'),
      accountId: z.string().min(1).optional(),
      endpoint: z.string().url().optional(),
      region: z.string().min(1).default('auto'),
      bucket: z.string().min(1).optional(),
      accessKeyId: z.string().min(1).optional(),
      secretAccessKey: z.string().min(1).optional(),
    }),
    verification: z.object({
      baseUrl: z.string().url().optional(),
    }),
    images: z.object({
      signatureMaxWidth: z.coerce.number().int().positive().default(800),
      signatureMaxHeight: z.coerce.number().int().positive().default(300),
      embedWidthMm: z.coerce.number().positive().default(30),
    }),
    conversion: z.object({
      executable: z.string().min(1).default('libreoffice'),
      timeoutMs: z.coerce.number().int().positive().default(60_000),
      defaultFormat: outputFormatSchema.default('docx'),
    }),
    logLevel: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  })
  .superRefine((settings, ctx) => {
    if (settings.storage.driver !== 's3') return;
    const { bucket, accessKeyId, secretAccessKey, endpoint, accountId } = settings.storage;
    if (!bucket) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['storage', 'bucket'], message: 'R2_BUCKET_NAME not set' });
    }
    if (!accessKeyId || !secretAccessKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['storage', 'accessKeyId'],
        message: 'R2_ACCESS_KEY_ID and R2_SECRET_ACCESS_KEY must both be set',
      });
    }
    if (!endpoint && !accountId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['storage', 'endpoint'],
        message: 'Either R2_ENDPOINT or R2_ACCOUNT_ID must be set',
      });
    }
  });

export type Settings = z.infer<typeof settingsSchema>;

type Env = Record<string, string | undefined>;

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const nonEmpty = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const parseList = (value: string | undefined) =>
  value === undefined
    ? undefined
    : value
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean);

function section(file: JsonObject, name: string): JsonObject {
  const value = file[name];
  return isObject(value) ? value : {};
}

function withoutUndefined(values: JsonObject): JsonObject {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Builds settings from an optional settings file with environment variables laid over it.
 * Throws with every validation issue listed when the result is unusable.
 */
export function parseSettings(env: Env, file: JsonObject = {}): Settings {
  const merged = {
    server: {
      ...section(file, 'server'),
      ...withoutUndefined({
        port: nonEmpty(env.PORT),
        corsOrigins: parseList(env.CORS_ORIGINS),
        internalApiKey: nonEmpty(env.INTERNAL_API_KEY),
        bodyLimit: nonEmpty(env.BODY_LIMIT),
      }),
    },
    storage: {
      ...section(file, 'storage'),
      ...withoutUndefined({
        driver: nonEmpty(env.STORAGE_DRIVER),
        accountId: nonEmpty(env.R2_ACCOUNT_ID),
        endpoint: nonEmpty(env.R2_ENDPOINT),
        region: nonEmpty(env.R2_REGION),
        bucket: nonEmpty(env.R2_BUCKET_NAME),
        accessKeyId: nonEmpty(env.R2_ACCESS_KEY_ID),
        secretAccessKey: nonEmpty(env.R2_SECRET_ACCESS_KEY),
      }),
    },
    verification: {
      ...section(file, 'verification'),
      ...withoutUndefined({ baseUrl: nonEmpty(env.VERIFY_BASE_URL) }),
    },
    images: section(file, 'images'),
    conversion: {
      ...section(file, 'conversion'),
      ...withoutUndefined({
        executable: nonEmpty(env.LIBREOFFICE_PATH),
        timeoutMs: nonEmpty(env.CONVERSION_TIMEOUT_MS),
        defaultFormat: nonEmpty(env.DEFAULT_OUTPUT_FORMAT),
      }),
    },
    logLevel: nonEmpty(env.LOG_LEVEL) ?? file.logLevel,
  };

  const parsed = settingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid settings: ${issues}`);
  }
  return parsed.data;
}

export function resolveStorageEndpoint(storage: Settings['storage']): string | undefined {
  if (storage.endpoint) return storage.endpoint;
  if (storage.accountId) return `https://${storage.accountId}.r2.cloudflarestorage.com`;
  return undefined;
}

export class SettingsService {
  private static instance: SettingsService;
  private config?: Settings;

  private constructor() {}

  static getInstance() {
    if (!SettingsService.instance) {
      SettingsService.instance = new SettingsService();
    }
    return SettingsService.instance;
  }

  async load(env: Env = process.env): Promise<Settings> {
    if (this.config) {
      return this.config;
    }
    const settingsPath = nonEmpty(env.CERTGEN_SETTINGS);
    let file: JsonObject = {};
    if (settingsPath) {
      const raw: unknown = JSON.parse(await readFile(path.resolve(process.cwd(), settingsPath), 'utf-8'));
      if (!isObject(raw)) {
        throw new Error(`Settings file ${settingsPath} must contain a JSON object`);
      }
      file = raw;
    }
    this.config = parseSettings(env, file);
    return this.config;
  }
}
