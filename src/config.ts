import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import type { AIConfig, AIProviderName, AgentConfig, BrowserConfig, EngineConfig, Profile } from './types/index.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { createProfile } from './services/profile.js';

dotenv.config();

export const DEFAULT_CONFIG_PATH = 'config.json';

const PLACEHOLDER_API_KEY = 'YOUR_API_KEY';

export const DEFAULT_MODELS: Record<AIProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-sonnet-4-20250514',
  gemini: 'gemini-2.0-flash',
  ollama: 'llama3.1',
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxRetries: 3,
  retryDelayMs: 5000,
  backoffFactor: 2,
  maxRetryDelayMs: 30000,
  confidenceThreshold: 0.5,
  saveScreenshots: false,
};

export const DEFAULT_BROWSER_CONFIG: BrowserConfig = {
  headless: false, // Visible by default so the run can be watched
  implicitWait: 10,
  pageLoadTimeout: 60,
  slowMo: 50,
};

// Human-like behavior settings
export const HUMAN_CONFIG = {
  // Delay ranges in milliseconds
  minActionDelay: 300,
  maxActionDelay: 900,

  // Typing speed (ms between keystrokes)
  minTypeDelay: 50,
  maxTypeDelay: 150,

  // Mouse movement
  mouseMovementSteps: 25,

  // Pause between sequential applications
  breakBetweenApplicationsMin: 5000,
  breakBetweenApplicationsMax: 15000,
};

// Per-domain strategy confidence adjustments
export const LEARNING_CONFIG = {
  successBoost: 0.1,
  failurePenalty: 0.15,
  maxBoost: 0.3,
  minBoost: -0.5,
};

const configFileSchema = z.object({
  user_profile: z.record(z.unknown()),
  ai_config: z.object({
    provider: z.enum(['openai', 'anthropic', 'gemini', 'ollama']),
    api_key: z.string().optional(),
    model: z.string().min(1).optional(),
    base_url: z.string().url().optional(),
    timeout_ms: z.number().int().positive().optional(),
  }),
  browser_config: z
    .object({
      headless: z.boolean(),
      implicit_wait: z.number().positive(),
      page_load_timeout: z.number().positive(),
      slow_mo: z.number().int().nonnegative(),
      executable_path: z.string().min(1),
    })
    .partial()
    .default({}),
  agent_config: z
    .object({
      max_retries: z.number().int().nonnegative(),
      retry_delay_ms: z.number().int().nonnegative(),
      backoff_factor: z.number().min(1),
      max_retry_delay_ms: z.number().int().nonnegative(),
      confidence_threshold: z.number().min(0).max(1),
      debug_mode: z.boolean(),
      save_screenshots: z.boolean(),
      save_logs: z.boolean(),
      memory_file: z.string().min(1),
      log_dir: z.string().min(1),
      artifacts_dir: z.string().min(1),
    })
    .partial()
    .default({}),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

type Env = Record<string, string | undefined>;

/**
 * Picks the provider API key from the config file, falling back to
 * `<PROVIDER>_API_KEY` in the environment. Ollama runs without a key.
 */
export function resolveApiKey(provider: AIProviderName, apiKey: string | undefined, env: Env = process.env): string | undefined {
  if (apiKey && apiKey !== PLACEHOLDER_API_KEY) {
    return apiKey;
  }
  if (provider === 'ollama') {
    return undefined;
  }
  const envName = `${provider.toUpperCase()}_API_KEY`;
  const fromEnv = env[envName];
  if (!fromEnv) {
    throw new ConfigError(`Set ai_config.api_key in the config file or ${envName} in your .env file.`);
  }
  return fromEnv;
}

export function createAgentConfig(options: {
  profile: Profile;
  ai: Partial<AIConfig> & { provider: AIProviderName };
  browser?: Partial<BrowserConfig>;
  engine?: Partial<EngineConfig>;
  debug?: boolean;
  saveLogs?: boolean;
  memoryFile?: string;
  logDir?: string;
  artifactsDir?: string;
}): AgentConfig {
  const browser = options.browser ?? {};
  const engine = options.engine ?? {};
  return {
    profile: options.profile,
    ai: {
      provider: options.ai.provider,
      apiKey: options.ai.apiKey,
      model: options.ai.model ?? DEFAULT_MODELS[options.ai.provider],
      baseUrl: options.ai.baseUrl,
      timeoutMs: options.ai.timeoutMs ?? 30000,
    },
    browser: {
      headless: browser.headless ?? DEFAULT_BROWSER_CONFIG.headless,
      implicitWait: browser.implicitWait ?? DEFAULT_BROWSER_CONFIG.implicitWait,
      pageLoadTimeout: browser.pageLoadTimeout ?? DEFAULT_BROWSER_CONFIG.pageLoadTimeout,
      slowMo: browser.slowMo ?? DEFAULT_BROWSER_CONFIG.slowMo,
      executablePath: browser.executablePath,
    },
    engine: {
      maxRetries: engine.maxRetries ?? DEFAULT_ENGINE_CONFIG.maxRetries,
      retryDelayMs: engine.retryDelayMs ?? DEFAULT_ENGINE_CONFIG.retryDelayMs,
      backoffFactor: engine.backoffFactor ?? DEFAULT_ENGINE_CONFIG.backoffFactor,
      maxRetryDelayMs: engine.maxRetryDelayMs ?? DEFAULT_ENGINE_CONFIG.maxRetryDelayMs,
      confidenceThreshold: engine.confidenceThreshold ?? DEFAULT_ENGINE_CONFIG.confidenceThreshold,
      saveScreenshots: engine.saveScreenshots ?? DEFAULT_ENGINE_CONFIG.saveScreenshots,
    },
    debug: options.debug ?? false,
    saveLogs: options.saveLogs ?? false,
    memoryFile: options.memoryFile ?? 'agent_memory.json',
    logDir: options.logDir ?? 'agent_logs',
    artifactsDir: options.artifactsDir ?? 'artifacts',
  };
}

export function parseConfigFile(raw: unknown, env: Env = process.env): AgentConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const { user_profile, ai_config, browser_config, agent_config } = parsed.data;

  return createAgentConfig({
    profile: createProfile(user_profile),
    ai: {
      provider: ai_config.provider,
      apiKey: resolveApiKey(ai_config.provider, ai_config.api_key, env),
      model: ai_config.model,
      baseUrl: ai_config.base_url,
      timeoutMs: ai_config.timeout_ms,
    },
    browser: {
      headless: browser_config.headless,
      implicitWait: browser_config.implicit_wait,
      pageLoadTimeout: browser_config.page_load_timeout,
      slowMo: browser_config.slow_mo,
      executablePath: browser_config.executable_path ?? (env.CHROME_PATH || undefined),
    },
    engine: {
      maxRetries: agent_config.max_retries,
      retryDelayMs: agent_config.retry_delay_ms,
      backoffFactor: agent_config.backoff_factor,
      maxRetryDelayMs: agent_config.max_retry_delay_ms,
      confidenceThreshold: agent_config.confidence_threshold,
      saveScreenshots: agent_config.save_screenshots,
    },
    debug: agent_config.debug_mode,
    saveLogs: agent_config.save_logs,
    memoryFile: agent_config.memory_file,
    logDir: agent_config.log_dir,
    artifactsDir: agent_config.artifacts_dir,
  });
}

export function loadAgentConfig(configPath = DEFAULT_CONFIG_PATH, env: Env = process.env): AgentConfig {
  const absolutePath = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseConfigFile(raw, env);
}
