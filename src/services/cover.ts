/**
 * Cover Service
 * kie.ai image generation: task creation, polling, multi-variant covers and prompt building
 */

import { z } from 'zod';
import coverStylesData from '@/config/data/cover-styles.json';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import {
  DEFAULT_PROMPTS,
  KIEAI_BASE_URL,
  KIEAI_ENDPOINTS,
  KIEAI_MODEL,
  MAX_COVER_VARIANTS,
  REQUEST_TIMEOUTS_MS,
} from '@/config/providers.js';
import type { User } from '@/db/schema/users.js';
import { KieAIError, MissingAPIKeyError } from '@/shared/errors.js';
import { decryptSecret } from '@/shared/security.js';
import { requestFailureMessage } from '@/utils/errorHandling.js';
import { STORAGE_URL_PREFIX, type FetchLike } from './storage.js';

export interface CoverStylePreset {
  key: string;
  name: string;
  instructions: string;
  mood: string;
}

export const AUTO_STYLE = 'auto';
const SINGLE_VARIANT_DEFAULT_STYLE = 'dark_atmospheric';

export const DEFAULT_COVER_STYLES: CoverStylePreset[] = coverStylesData.styles.map(
  ({ key, name, instructions, mood }) => ({ key, name, instructions, mood }),
);

const DIVERSE_STYLE_SETS: Record<string, string[][]> = coverStylesData.diverse_sets;

export type TaskState = 'pending' | 'processing' | 'success' | 'failed' | 'error' | string;

export interface CoverTaskStatus {
  taskId: string;
  status: TaskState;
  url: string | null;
  error?: string;
}

export interface CreateTaskOptions {
  referenceImages?: string[];
  aspectRatio?: string;
}

export interface CoverServiceOptions {
  fetchImpl?: FetchLike;
  /** Style catalogue; the bundled presets when omitted */
  styles?: CoverStylePreset[];
  pollIntervalMs?: number;
  timeoutMs?: number;
  /** Limit for each HTTP request, separate from the overall polling timeout */
  requestTimeoutMs?: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const createTaskResponseSchema = z
  .object({
    taskId: z.string().optional(),
    task_id: z.string().optional(),
    data: z
      .object({ taskId: z.string().optional(), task_id: z.string().optional() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const recordSchema = z.record(z.unknown());

function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value ? value : null;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  const parsed = recordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Pull the image URL out of a finished kie.ai record.
 * resultJson may arrive as an object or as a JSON string.
 */
export function extractResultUrl(record: Record<string, unknown>): string | null {
  let resultJson: Record<string, unknown> = {};
  const raw = record.resultJson;
  if (typeof raw === 'string') {
    try {
      resultJson = asRecord(JSON.parse(raw)) ?? {};
    } catch (error) {
      logger.warn('kie.ai resultJson is not valid JSON', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  } else {
    resultJson = asRecord(raw) ?? {};
  }

  const resultUrls = resultJson.resultUrls;
  if (Array.isArray(resultUrls) && typeof resultUrls[0] === 'string') {
    return resultUrls[0];
  }

  const direct = stringField(resultJson, 'url') ?? stringField(resultJson, 'image_url');
  if (direct) {
    return direct;
  }

  const output = resultJson.output;
  if (Array.isArray(output)) {
    const first = asRecord(output[0]);
    const outputUrl = first ? stringField(first, 'url') : null;
    if (outputUrl) {
      return outputUrl;
    }
  }

  return stringField(record, 'resultUrl') ?? stringField(record, 'url');
}

export class CoverService {
  private readonly fetchImpl: FetchLike;
  private readonly styles: CoverStylePreset[];
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly user: Pick<User, 'kieaiApiKey'>,
    options: CoverServiceOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.styles = options.styles && options.styles.length > 0 ? options.styles : DEFAULT_COVER_STYLES;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
    this.timeoutMs = options.timeoutMs ?? 180000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUTS_MS.kieai;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async createTask(prompt: string, options: CreateTaskOptions = {}): Promise<string> {
    const input: Record<string, unknown> = {
      prompt,
      aspect_ratio: options.aspectRatio ?? '1:1',
      resolution: '2K',
      output_format: 'png',
    };

    if (options.referenceImages && options.referenceImages.length > 0) {
      const appUrl = getEnvironment().APP_URL.replace(/\/$/, '');
      input.image_input = options.referenceImages.map((url) =>
        url.startsWith(STORAGE_URL_PREFIX) ? `${appUrl}${url}` : url,
      );
    }

    const data = createTaskResponseSchema.parse(
      await this.request(`${KIEAI_BASE_URL}${KIEAI_ENDPOINTS.createTask}`, 'Task creation', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: KIEAI_MODEL, input }),
      }),
    );

    const taskId = data.taskId ?? data.task_id ?? data.data?.taskId ?? data.data?.task_id;
    if (!taskId) {
      throw new KieAIError('No task ID returned');
    }

    logger.info('kie.ai task created', { taskId });
    return taskId;
  }

  async getTaskStatus(taskId: string): Promise<CoverTaskStatus> {
    const query = new URLSearchParams({ taskId });
    const data = recordSchema.parse(
      await this.request(`${KIEAI_BASE_URL}${KIEAI_ENDPOINTS.recordInfo}?${query.toString()}`, 'Status check', {
        method: 'GET',
      }),
    );

    const record = asRecord(data.data) ?? data;
    const state = (stringField(record, 'state') ?? '').toLowerCase();
    const result: CoverTaskStatus = { taskId, status: state, url: null };

    if (state === 'success') {
      result.url = extractResultUrl(record);
    } else if (state === 'failed' || state === 'error') {
      result.error =
        stringField(record, 'failMsg') ??
        stringField(record, 'error') ??
        stringField(record, 'message') ??
        'Generation failed';
    }

    return result;
  }

  /**
   * Poll a task until it finishes; resolves with the image URL
   */
  async waitForResult(taskId: string): Promise<string> {
    let elapsed = 0;
    while (elapsed < this.timeoutMs) {
      await this.sleep(this.pollIntervalMs);
      elapsed += this.pollIntervalMs;

      const status = await this.getTaskStatus(taskId);
      if (status.status === 'success') {
        if (status.url) {
          return status.url;
        }
        throw new KieAIError('Generation succeeded but no URL returned');
      }
      if (status.status === 'failed' || status.status === 'error') {
        throw new KieAIError(`Generation failed: ${status.error ?? 'Unknown error'}`);
      }

      logger.debug('Cover generation in progress', { taskId, status: status.status });
    }

    throw new KieAIError(`Generation timed out after ${Math.round(this.timeoutMs / 1000)} seconds`);
  }

  async generateCover(prompt: string, options: CreateTaskOptions = {}): Promise<string> {
    const taskId = await this.createTask(prompt, options);
    return this.waitForResult(taskId);
  }

  /**
   * Generate `count` variants in parallel, one style each.
   * Individual failures are tolerated as long as one variant succeeds.
   */
  async generateMultipleCovers(
    buildPrompt: (styleKey: string) => string,
    count: number,
    options: CreateTaskOptions & { preferredStyle?: string | null } = {},
  ): Promise<Array<{ url: string; style: string }>> {
    const variants = Math.max(1, Math.min(MAX_COVER_VARIANTS, Math.floor(count)));
    const styles = this.getStylesForVariants(variants, options.preferredStyle);

    const results = await Promise.allSettled(
      styles.map(async (style) => ({ url: await this.generateCover(buildPrompt(style), options), style })),
    );

    const covers: Array<{ url: string; style: string }> = [];
    for (const [index, result] of results.entries()) {
      if (result.status === 'fulfilled') {
        covers.push(result.value);
      } else {
        logger.warn('Cover generation failed', {
          style: styles[index],
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    }

    if (covers.length === 0) {
      throw new KieAIError('All cover generations failed');
    }
    return covers;
  }

  getStylesForVariants(count: number, preferredStyle?: string | null): string[] {
    const preferred = preferredStyle || AUTO_STYLE;
    if (count <= 1) {
      return [preferred !== AUTO_STYLE ? preferred : SINGLE_VARIANT_DEFAULT_STYLE];
    }

    if (preferred !== AUTO_STYLE) {
      const others = this.styles.map((s) => s.key).filter((key) => key !== AUTO_STYLE && key !== preferred);
      return [preferred, ...this.shuffle(others).slice(0, count - 1)];
    }

    const sets = DIVERSE_STYLE_SETS[String(count)] ?? DIVERSE_STYLE_SETS[String(MAX_COVER_VARIANTS)] ?? [];
    const chosen = sets[Math.floor(this.random() * sets.length)];
    if (chosen) {
      return chosen.slice(0, count);
    }
    return this.styles
      .map((s) => s.key)
      .filter((key) => key !== AUTO_STYLE)
      .slice(0, count);
  }

  findStyle(key: string | null | undefined): CoverStylePreset | undefined {
    return this.styles.find((style) => style.key === key);
  }

  private shuffle<T>(items: T[]): T[] {
    const copy = [...items];
    for (let i = copy.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      const a = copy[i];
      const b = copy[j];
      if (a !== undefined && b !== undefined) {
        copy[i] = b;
        copy[j] = a;
      }
    }
    return copy;
  }

  private apiKey(): string {
    if (this.user.kieaiApiKey) {
      return decryptSecret(this.user.kieaiApiKey);
    }
    const fallback = getEnvironment().DEFAULT_KIEAI_API_KEY;
    if (fallback) {
      return fallback;
    }
    throw new MissingAPIKeyError('kie.ai');
  }

  private async request(url: string, label: string, init: RequestInit): Promise<unknown> {
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${this.apiKey()}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        headers,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      const message = requestFailureMessage(error, this.requestTimeoutMs);
      logger.error('kie.ai request error', { label, error: message });
      throw new KieAIError(message);
    }

    if (!response.ok) {
      const details = await response.text();
      logger.error('kie.ai API error', { label, status: response.status });
      throw new KieAIError(`${label} failed: ${response.status}`, details);
    }
    return response.json();
  }
}

// -----------------------------------------------------------------------------
// Prompt building
// -----------------------------------------------------------------------------

const COVER_PLACEHOLDERS = [
  'series_info',
  'title',
  'genre_tone',
  'synopsis',
  'style_section',
  'series_name',
  'episode_num',
  'episode_title',
  'extra',
] as const;

type CoverPlaceholder = (typeof COVER_PLACEHOLDERS)[number];

function isCoverPlaceholder(name: string): name is CoverPlaceholder {
  return COVER_PLACEHOLDERS.some((placeholder) => placeholder === name);
}

/**
 * Substitute `{name}` placeholders; `{{` and `}}` are literal braces.
 * Returns null when the template names a placeholder that does not exist.
 */
export function fillCoverTemplate(template: string, values: Record<CoverPlaceholder, string>): string | null {
  let unknownPlaceholder = false;
  const filled = template.replace(/\{\{|\}\}|\{([^{}]*)\}/g, (match: string, name: string | undefined) => {
    if (match === '{{') {
      return '{';
    }
    if (match === '}}') {
      return '}';
    }
    if (name !== undefined && isCoverPlaceholder(name)) {
      return values[name];
    }
    unknownPlaceholder = true;
    return match;
  });
  return unknownPlaceholder ? null : filled;
}

export interface CoverPromptInput {
  title: string;
  genreTone: string;
  description: string;
  summary?: string | null;
  template?: string | null;
  seriesName?: string | null;
  episodeNumber?: number | null;
  extraInstructions?: string | null;
  style?: CoverStylePreset | null;
}

export function buildCoverPrompt(input: CoverPromptInput): string {
  const style = input.style;

  let seriesInfo = '';
  if (input.seriesName) {
    seriesInfo = `Series: ${input.seriesName}\n`;
  }
  if (input.episodeNumber) {
    seriesInfo += `Episode: #${input.episodeNumber}\n`;
  }

  const styleSection =
    style && style.key !== AUTO_STYLE && style.instructions
      ? `\nVISUAL STYLE: ${style.name}\n${style.instructions}\nMood: ${style.mood || 'dramatic, cinematic'}`
      : DEFAULT_PROMPTS.cover_default_style_section;

  const separator = ' — ';
  const separatorIndex = input.title.indexOf(separator);
  const episodeTitle = separatorIndex === -1 ? input.title : input.title.slice(separatorIndex + separator.length);

  const values: Record<CoverPlaceholder, string> = {
    series_info: seriesInfo,
    title: input.title,
    genre_tone: input.genreTone,
    synopsis: (input.summary || input.description).slice(0, 500),
    style_section: styleSection,
    series_name: input.seriesName ?? '',
    episode_num: input.episodeNumber ? String(input.episodeNumber) : '',
    episode_title: episodeTitle,
    extra: input.extraInstructions ? `\n\nADDITIONAL REQUIREMENTS:\n${input.extraInstructions}` : '',
  };

  const template = input.template?.trim() ? input.template : null;
  const custom = template ? fillCoverTemplate(template, values) : null;
  if (custom !== null) {
    return custom;
  }

  return fillCoverTemplate(DEFAULT_PROMPTS.cover_builtin_template, values) ?? DEFAULT_PROMPTS.cover_builtin_template;
}
