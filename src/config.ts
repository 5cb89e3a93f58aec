import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const generationBackendSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'ollama']),
  model: z.string().min(1),
  base_url: z.string().url().optional()
});

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8088),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  auth: z
    .object({
      api_keys: z.array(z.string().min(1)).default([process.env.POLICYGUARD_API_KEY || 'dev-key']),
      allowed_origins: z.array(z.string()).default(['http://localhost:*'])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_second: z.number().positive().default(10),
      max_input_chars: z.number().int().positive().default(4000)
    })
    .default({}),
  embedding: z
    .object({
      type: z.enum(['openai', 'ollama']).default('openai'),
      model: z.string().default('text-embedding-3-small'),
      base_url: z.string().url().optional(),
      timeout_ms: z.number().int().positive().default(10000),
      retries: z.number().int().min(0).max(5).default(2)
    })
    .default({}),
  generation: z
    .object({
      primary: generationBackendSchema.default({ name: 'claude', type: 'anthropic', model: 'claude-3-5-sonnet-latest' }),
      fallback: generationBackendSchema.nullable().default({ name: 'local', type: 'ollama', model: 'mistral' }),
      attempt_timeout_ms: z.number().int().positive().default(15000),
      max_retries: z.number().int().min(0).max(5).default(2),
      retry_delay_ms: z.number().int().min(0).default(250),
      decide_timeout_ms: z.number().int().positive().default(60000),
      max_output_tokens: z.number().int().positive().default(512)
    })
    .default({}),
  retrieval: z
    .object({
      top_k: z.number().int().positive().default(5),
      prompt_char_budget: z.number().int().positive().default(8000)
    })
    .default({}),
  audit: z
    .object({
      log_path: z.string().default(resolve(homedir(), '.policyguard', 'logs', 'audit.jsonl')),
      key_dir: z.string().default(resolve(homedir(), '.policyguard', 'keys')),
      hash_salt: z.string().min(1).optional()
    })
    .default({}),
  policies: z
    .object({
      directory: z.string().default(resolve(homedir(), '.policyguard', 'policies'))
    })
    .default({}),
  moderation: z
    .object({
      fail_closed: z.boolean().default(false)
    })
    .default({})
});

export type PolicyGuardConfig = z.infer<typeof configSchema>;
export type GenerationBackendConfig = z.infer<typeof generationBackendSchema>;

export const DEFAULT_CONFIG_PATHS = [
  resolve(process.cwd(), 'policyguard.yaml'),
  resolve(homedir(), '.policyguard', 'config.yaml'),
  resolve(homedir(), '.config', 'policyguard', 'config.yaml')
];

export function parseConfig(raw: unknown, origin = 'configuration'): PolicyGuardConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || '(root)';
    throw new ConfigError(`Invalid ${origin}: ${field}: ${issue?.message ?? 'unknown issue'}`, { cause: parsed.error });
  }

  const config = parsed.data;
  if (!config.audit.hash_salt && process.env.POLICYGUARD_HASH_SALT) {
    config.audit.hash_salt = process.env.POLICYGUARD_HASH_SALT;
  }
  return config;
}

export function loadConfig(searchPaths: string[] = DEFAULT_CONFIG_PATHS): { config: PolicyGuardConfig; path?: string } {
  for (const path of searchPaths) {
    if (existsSync(path)) {
      let raw: unknown;
      try {
        raw = parseYaml(readFileSync(path, 'utf-8'));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Could not parse ${path}: ${message}`, { cause: error });
      }
      return { config: parseConfig(raw, path), path };
    }
  }

  // Default configuration
  return { config: parseConfig({}) };
}
