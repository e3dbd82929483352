import { z } from 'zod';
import type { AIProviderName } from '../types/index.js';
import { AIProviderError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Describes the JSON answer expected from the model. */
export interface AnswerShape<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  example: string;
}

export interface AICapability {
  ask<T>(context: string, question: string, shape: AnswerShape<T>): Promise<T>;
}

export interface CompletionProvider {
  readonly name: AIProviderName;
  complete(prompt: string, signal: AbortSignal): Promise<string>;
}

const confidence = z.number().min(0).max(1);

export const fieldMatchShape: AnswerShape<{ attribute: string | null; confidence: number }> = {
  name: 'field_match',
  schema: z.object({ attribute: z.string().nullable(), confidence }),
  example: '{ "attribute": "<one of the listed attribute names, or null>", "confidence": <number 0-1> }',
};

export const pageClassificationShape: AnswerShape<{
  pageType: 'login' | 'signup' | 'application_form' | 'confirmation' | 'other';
  confidence: number;
}> = {
  name: 'page_classification',
  schema: z.object({
    pageType: z.enum(['login', 'signup', 'application_form', 'confirmation', 'other']),
    confidence,
  }),
  example: '{ "pageType": "login" | "signup" | "application_form" | "confirmation" | "other", "confidence": <number 0-1> }',
};

export const submissionCheckShape: AnswerShape<{ submitted: boolean; confidence: number; reason?: string }> = {
  name: 'submission_check',
  schema: z.object({ submitted: z.boolean(), confidence, reason: z.string().optional() }),
  example: '{ "submitted": true | false, "confidence": <number 0-1>, "reason": "<short explanation>" }',
};

/**
 * Pulls the JSON object out of a model reply, tolerating prose or
 * markdown fences around it.
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    const jsonMatch = trimmed.match(/\{[\s\S]*\}/);
    if (!jsonMatch) return undefined;
    try {
      return JSON.parse(jsonMatch[0]);
    } catch {
      return undefined;
    }
  }
}

export function buildPrompt(context: string, question: string, example: string): string {
  return `You assist an automated agent that fills in job application forms on websites.

## Context
${context}

## Question
${question}

Respond in this exact JSON format:
${example}

Respond with ONLY the JSON, no other text.`;
}

/**
 * Provider-agnostic `ask`: every call is bounded by `timeoutMs` and every
 * reply is validated against the expected shape.
 */
export class ProviderAICapability implements AICapability {
  constructor(
    private readonly provider: CompletionProvider,
    private readonly timeoutMs: number
  ) {}

  async ask<T>(context: string, question: string, shape: AnswerShape<T>): Promise<T> {
    const prompt = buildPrompt(context, question, shape.example);
    logger.debug(`>>> ${this.provider.name} ${shape.name}`);

    const text = await this.completeWithTimeout(prompt);

    const json = extractJson(text);
    if (json === undefined) {
      throw new AIProviderError(`${this.provider.name} returned no JSON for ${shape.name}`);
    }
    const parsed = shape.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new AIProviderError(
        `${this.provider.name} returned a malformed ${shape.name}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`
      );
    }

    logger.debug(`<<< ${this.provider.name} ${shape.name} ${JSON.stringify(parsed.data)}`);
    return parsed.data;
  }

  private async completeWithTimeout(prompt: string): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first so the race settles on the timeout, not on the abort it causes
        reject(new AIProviderError(`${this.provider.name} request timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.provider.complete(prompt, controller.signal), timeout]);
    } catch (error) {
      if (error instanceof AIProviderError) throw error;
      throw new AIProviderError(`${this.provider.name} request failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
