/**
 * LLM Service
 * Script and summary generation over OpenAI-compatible chat completion APIs
 * (OpenRouter, Polza, OpenAI).
 */

import OpenAI from 'openai';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { DEFAULT_AI_WRITER_PROMPT, DEFAULT_PROMPTS, LLM_PROVIDERS, getProviderModels } from '@/config/providers.js';
import type { User } from '@/db/schema/users.js';
import { LLMProviderError, MissingAPIKeyError } from '@/shared/errors.js';
import { decryptSecret } from '@/shared/security.js';
import {
  ScriptParseError,
  buildGenerationContext,
  parseScriptResponse,
  type CharacterWithVoice,
  type ContextEpisode,
  type ContextProject,
  type PreviousEpisode,
} from '@/shared/script.js';
import type { Script } from '@/types/pipeline.js';

const REQUEST_TIMEOUT_MS = 120000;
const MAX_TOKENS = 8000;
const FALLBACK_MODEL = 'gpt-4o-mini';

export type ChatCompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

export type ChatCompletionCall = (body: ChatCompletionRequest) => Promise<OpenAI.Chat.ChatCompletion>;

export interface LLMClientConfig {
  apiKey: string;
  baseURL: string;
  defaultHeaders: Record<string, string>;
  timeout: number;
}

export type LLMClientFactory = (config: LLMClientConfig) => ChatCompletionCall;

const openAIClientFactory: LLMClientFactory = (config) => {
  const client = new OpenAI(config);
  return (body) => client.chat.completions.create(body);
};

export type LLMUser = Pick<User, 'llmProvider' | 'llmApiKey' | 'llmModel' | 'aiWriterPrompt'>;

export class LLMService {
  readonly provider: User['llmProvider'];
  private readonly clientFactory: LLMClientFactory;
  private complete: ChatCompletionCall | null = null;

  constructor(
    private readonly user: LLMUser,
    clientFactory: LLMClientFactory = openAIClientFactory,
  ) {
    this.provider = user.llmProvider;
    this.clientFactory = clientFactory;
  }

  get model(): string {
    return this.user.llmModel || getProviderModels(this.provider)[0] || FALLBACK_MODEL;
  }

  async generateScript(
    project: ContextProject,
    episode: ContextEpisode,
    characters: CharacterWithVoice[],
    previousEpisodes: PreviousEpisode[] = [],
    customPrompt?: string | null,
    temperature = 0.7,
  ): Promise<Script> {
    const context = buildGenerationContext(project, episode, characters, previousEpisodes);
    const systemPrompt = customPrompt || this.user.aiWriterPrompt || DEFAULT_AI_WRITER_PROMPT;

    logger.info('Generating script', {
      provider: this.provider,
      model: this.model,
      episodeNumber: episode.episodeNumber,
      previousEpisodes: previousEpisodes.length,
    });

    const content = await this.chatCompletion(systemPrompt, context, temperature, true);

    try {
      return parseScriptResponse(content);
    } catch (error) {
      if (error instanceof ScriptParseError) {
        logger.error('Failed to parse script response', {
          provider: this.provider,
          reason: error.reason,
          response: content.slice(0, 500),
        });
        throw new LLMProviderError(this.provider, error.message, error.kind === 'json' ? error.reason : null);
      }
      throw error;
    }
  }

  /**
   * 3-5 sentence recap used as context for later episodes
   */
  async generateSummary(scriptText: string | null | undefined): Promise<string> {
    if (!scriptText) {
      return '';
    }
    const content = await this.chatCompletion(
      DEFAULT_PROMPTS.summary_system_prompt,
      `Summarize this episode:\n\n${scriptText}`,
      0.5,
      false,
    );
    return content.trim();
  }

  private apiKey(): string {
    if (this.user.llmApiKey) {
      return decryptSecret(this.user.llmApiKey);
    }
    const fallback = getEnvironment().DEFAULT_OPENROUTER_API_KEY;
    if (this.provider === 'openrouter' && fallback) {
      return fallback;
    }
    throw new MissingAPIKeyError(`LLM (${this.provider})`);
  }

  private client(): ChatCompletionCall {
    if (!this.complete) {
      const env = getEnvironment();
      const defaultHeaders: Record<string, string> =
        this.provider === 'openrouter' ? { 'HTTP-Referer': env.APP_URL, 'X-Title': env.APP_NAME } : {};
      this.complete = this.clientFactory({
        apiKey: this.apiKey(),
        baseURL: LLM_PROVIDERS[this.provider].base_url,
        defaultHeaders,
        timeout: REQUEST_TIMEOUT_MS,
      });
    }
    return this.complete;
  }

  private async chatCompletion(
    systemPrompt: string,
    userMessage: string,
    temperature: number,
    jsonMode: boolean,
  ): Promise<string> {
    const model = this.model;
    const body: ChatCompletionRequest = {
      model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userMessage },
      ],
      temperature,
      max_tokens: MAX_TOKENS,
    };

    const lowerModel = model.toLowerCase();
    if (jsonMode && (lowerModel.includes('gpt') || lowerModel.includes('claude'))) {
      body.response_format = { type: 'json_object' };
    }

    const complete = this.client();
    try {
      const response = await complete(body);
      return response.choices[0]?.message.content ?? '';
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        logger.error('LLM API error', { provider: this.provider, status: error.status, error: error.message });
        throw new LLMProviderError(this.provider, `API returned ${error.status ?? 'an error'}`, error.message);
      }
      logger.error('LLM request error', {
        provider: this.provider,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new LLMProviderError(this.provider, error instanceof Error ? error.message : String(error));
    }
  }
}
