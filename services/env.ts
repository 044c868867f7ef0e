import { z } from 'zod';
import { ConfigError } from '../lib/errors';
import type { ToolPolicy } from './agriToolbox';

export const DEFAULT_GROQ_MODEL = 'meta-llama/llama-4-maverick-17b-128e-instruct';

const EnvSchema = z.object({
  GROQ_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  SERPER_API_KEY: z.string().optional(),
  IMAGE_CLASSIFIER: z.enum(['groq', 'gemini']).default('groq'),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  GROQ_MODEL: z.string().default(DEFAULT_GROQ_MODEL),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  TOOL_RETRIES: z.coerce.number().int().min(0).default(0),
});

export type ClassifierConfig =
  | { provider: 'groq'; apiKey: string; model: string }
  | { provider: 'gemini'; model: string };

export interface AppConfig {
  classifier: ClassifierConfig;
  googleApiKey: string;
  serperApiKey: string;
  geminiModel: string;
  toolPolicy: ToolPolicy;
}

const present = (value: string | undefined): value is string => !!value && value.trim() !== '';

/**
 * Validates the process environment once at startup.
 * Every missing credential is reported together in one ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  const missing: string[] = [];

  const required = (name: string, value: string | undefined): string => {
    if (present(value)) return value;
    missing.push(name);
    return '';
  };

  const googleApiKey = required('GOOGLE_API_KEY', parsed.GOOGLE_API_KEY);
  const serperApiKey = required('SERPER_API_KEY', parsed.SERPER_API_KEY);
  const classifier: ClassifierConfig = parsed.IMAGE_CLASSIFIER === 'gemini'
    ? { provider: 'gemini', model: parsed.GEMINI_MODEL }
    : { provider: 'groq', apiKey: required('GROQ_API_KEY', parsed.GROQ_API_KEY), model: parsed.GROQ_MODEL };

  if (missing.length > 0) throw new ConfigError(missing);

  return {
    classifier,
    googleApiKey,
    serperApiKey,
    geminiModel: parsed.GEMINI_MODEL,
    toolPolicy: { timeoutMs: parsed.TOOL_TIMEOUT_MS, retries: parsed.TOOL_RETRIES },
  };
}

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];
  if (!present(value)) throw new ConfigError([name]);
  return value;
}
