import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { GoogleGenAI } from '@google/genai';
import { z } from 'zod';
import type { AIConfig, AIProviderName } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_MODELS } from '../config.js';
import type { CompletionProvider } from './ai.js';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
const MAX_OUTPUT_TOKENS = 1024;

function requireApiKey(provider: AIProviderName, apiKey: string | undefined): string {
  if (!apiKey?.trim()) {
    throw new ConfigError(`${provider} API key is missing.`);
  }
  return apiKey;
}

function trimTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

class AnthropicProvider implements CompletionProvider {
  readonly name = 'anthropic' as const;
  private readonly client: Anthropic;

  constructor(private readonly config: AIConfig) {
    this.client = new Anthropic({
      apiKey: requireApiKey(this.name, config.apiKey),
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const message = await this.client.messages.create(
      {
        model: this.config.model ?? DEFAULT_MODELS.anthropic,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: 0,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );

    return message.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
  }
}

class OpenAIProvider implements CompletionProvider {
  readonly name = 'openai' as const;
  private readonly client: OpenAI;

  constructor(private readonly config: AIConfig) {
    this.client = new OpenAI({
      apiKey: requireApiKey(this.name, config.apiKey),
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model ?? DEFAULT_MODELS.openai,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? '';
  }
}

class GeminiProvider implements CompletionProvider {
  readonly name = 'gemini' as const;
  private readonly client: GoogleGenAI;

  constructor(private readonly config: AIConfig) {
    this.client = new GoogleGenAI({ apiKey: requireApiKey(this.name, config.apiKey) });
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.config.model ?? DEFAULT_MODELS.gemini,
      contents: prompt,
      config: {
        temperature: 0,
        responseMimeType: 'application/json',
        abortSignal: signal,
      },
    });
    return response.text ?? '';
  }
}

const ollamaGenerateSchema = z.object({ response: z.string() });

class OllamaProvider implements CompletionProvider {
  readonly name = 'ollama' as const;
  private readonly baseUrl: string;

  constructor(private readonly config: AIConfig) {
    this.baseUrl = trimTrailingSlash(config.baseUrl ?? DEFAULT_OLLAMA_BASE_URL);
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.config.model ?? DEFAULT_MODELS.ollama,
        prompt,
        stream: false,
        format: 'json',
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Ollama request failed (${response.status}): ${await response.text()}`);
    }

    const parsed = ollamaGenerateSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Ollama response missing "response" text');
    }
    return parsed.data.response;
  }
}

/** Chooses the backend once; callers only ever see `CompletionProvider`. */
export function createCompletionProvider(config: AIConfig): CompletionProvider {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'openai':
      return new OpenAIProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
    case 'ollama':
      return new OllamaProvider(config);
  }
}

export async function checkOllamaAvailable(baseUrl = DEFAULT_OLLAMA_BASE_URL): Promise<void> {
  const url = `${trimTrailingSlash(baseUrl)}/api/tags`;
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(5000) });
  } catch (error) {
    throw new ConfigError(`Cannot connect to Ollama at ${baseUrl} (${errorMessage(error)}). Start it with: ollama serve`);
  }
  if (!response.ok) {
    throw new ConfigError(`Ollama service is not responding at ${baseUrl} (status ${response.status}).`);
  }
}
