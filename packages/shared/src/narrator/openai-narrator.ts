/**
 * OpenAI Narrator
 *
 * Explains a ranking through the OpenAI chat completions API. Failures are
 * thrown; falling back is the caller's decision (see explainRanking).
 */

import OpenAI from 'openai';
import { config } from '../config';
import { logger } from '../logger';
import { narratorRequestDurationHistogram } from '../metrics';
import { NARRATOR_SYSTEM_PROMPT, NARRATOR_USER_PROMPT_TEMPLATE, renderTemplate } from './prompts';
import type { NarrationRequest, Narrator } from './types';

export interface ChatCompletionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
}

export interface ChatCompletionResult {
  id?: string;
  content: string | null;
  totalTokens?: number;
}

/** One chat completion round trip. */
export type ChatCompleter = (request: ChatCompletionRequest) => Promise<ChatCompletionResult>;

export interface OpenAiNarratorOptions {
  model: string;
  temperature: number;
  maxTokens: number;
}

export function openAiCompleter(client: OpenAI): ChatCompleter {
  return async (request) => {
    const response = await client.chat.completions.create({
      model: request.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });

    return {
      id: response.id,
      content: response.choices[0]?.message?.content ?? null,
      totalTokens: response.usage?.total_tokens,
    };
  };
}

/**
 * Collapse runs of blank lines left by the model.
 */
export function tidyNarration(text: string): string {
  return text.trim().replace(/\n{3,}/g, '\n\n');
}

export function buildNarrationPrompt(request: NarrationRequest): string {
  const { profile } = request;
  return renderTemplate(NARRATOR_USER_PROMPT_TEMPLATE, {
    region: profile.region,
    family_size: String(profile.family_size),
    ages: profile.ages && profile.ages.length > 0 ? profile.ages.join(', ') : 'not provided',
    income_level: profile.income_level,
    question: request.question.trim() || 'Which plan is best for this family?',
    plans: JSON.stringify(request.table, null, 2),
  });
}

export class OpenAiNarrator implements Narrator {
  readonly name = 'openai';
  private readonly options: OpenAiNarratorOptions;

  constructor(
    private readonly complete: ChatCompleter,
    options: Partial<OpenAiNarratorOptions> = {}
  ) {
    this.options = {
      model: config.narratorModel,
      temperature: config.narratorTemperature,
      maxTokens: config.narratorMaxTokens,
      ...options,
    };
  }

  /**
   * Narrator backed by the configured API key, or null when there is none.
   */
  static fromConfig(): OpenAiNarrator | null {
    if (!config.openaiApiKey) {
      logger.info('OPENAI_API_KEY not set, explanations use the local summary');
      return null;
    }

    const client = new OpenAI({
      apiKey: config.openaiApiKey,
      timeout: config.narratorTimeoutMs,
    });
    return new OpenAiNarrator(openAiCompleter(client));
  }

  async narrate(request: NarrationRequest): Promise<string> {
    const { model } = this.options;
    const startTime = Date.now();

    logger.info('Requesting narration', {
      model,
      plan_count: request.table.length,
    });

    try {
      const result = await this.complete({
        model,
        systemPrompt: NARRATOR_SYSTEM_PROMPT,
        userPrompt: buildNarrationPrompt(request),
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      });

      if (!result.content || !result.content.trim()) {
        throw new Error('Empty response from OpenAI');
      }

      logger.info('Narration complete', {
        model,
        request_id: result.id,
        tokens_used: result.totalTokens,
      });

      return tidyNarration(result.content);
    } finally {
      narratorRequestDurationHistogram.observe({ model }, (Date.now() - startTime) / 1000);
    }
  }
}
