import { z } from 'zod';
import { ConfigurationError } from './errors';

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  OPENREVIEW_USERNAME: optionalSecret,
  OPENREVIEW_PASSWORD: optionalSecret,
  OPENREVIEW_BASE_URL: z.string().url().default('https://api2.openreview.net'),
  DEEPSEEK_API_KEY: optionalSecret,
  DEEPSEEK_BASE_URL: z.string().url().default('https://api.deepseek.com'),
  DEEPSEEK_MODEL: z.string().min(1).default('deepseek-chat'),
});

export interface AppConfig {
  openreview: {
    baseUrl: string;
    username?: string;
    password?: string;
  };
  deepseek: {
    baseUrl: string;
    model: string;
    apiKey?: string;
  };
}

export interface OpenReviewCredentials {
  username: string;
  password: string;
}

/**
 * Build the application config from an environment map.
 * Missing credentials are not an error here; commands that need them call
 * the require* helpers below.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }

  const vars = parsed.data;
  return {
    openreview: {
      baseUrl: vars.OPENREVIEW_BASE_URL.replace(/\/+$/, ''),
      username: vars.OPENREVIEW_USERNAME,
      password: vars.OPENREVIEW_PASSWORD,
    },
    deepseek: {
      baseUrl: vars.DEEPSEEK_BASE_URL,
      model: vars.DEEPSEEK_MODEL,
      apiKey: vars.DEEPSEEK_API_KEY,
    },
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

export function requireOpenReviewCredentials(config: AppConfig): OpenReviewCredentials {
  const { username, password } = config.openreview;
  if (!username || !password) {
    throw new ConfigurationError(
      'Please set OPENREVIEW_USERNAME and OPENREVIEW_PASSWORD environment variables.'
    );
  }
  return { username, password };
}

export function requireDeepSeekKey(config: AppConfig, override?: string): string {
  const apiKey = override?.trim() || config.deepseek.apiKey;
  if (!apiKey) {
    throw new ConfigurationError(
      'A DeepSeek API key is required (pass --api-key or set DEEPSEEK_API_KEY).'
    );
  }
  return apiKey;
}
