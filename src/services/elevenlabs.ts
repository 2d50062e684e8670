/**
 * ElevenLabs Service
 * Dialogue text-to-speech, sound effects and music composition
 */

import { z } from 'zod';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import {
  AUDIO_SETTINGS,
  ELEVENLABS_BASE_URL,
  ELEVENLABS_DIALOGUE_MODEL,
  ELEVENLABS_ENDPOINTS,
  ELEVENLABS_OUTPUT_FORMAT,
  REQUEST_TIMEOUTS_MS,
  type ElevenLabsTimeouts,
} from '@/config/providers.js';
import type { User } from '@/db/schema/users.js';
import { ElevenLabsError, MissingAPIKeyError } from '@/shared/errors.js';
import { decryptSecret } from '@/shared/security.js';
import type { DialogueTimestamps, MusicCompositionPlan } from '@/types/pipeline.js';
import { requestFailureMessage } from '@/utils/errorHandling.js';
import type { FetchLike } from './storage.js';

export interface DialogueInput {
  text: string;
  voice_id: string;
}

export interface DialogueResult {
  audio: Buffer;
  timestamps: DialogueTimestamps;
}

const dialogueResponseSchema = z.object({
  audio_base64: z.string().optional(),
  voice_segments: z.array(z.unknown()).optional(),
  alignment: z.unknown().optional(),
});

const voiceSchema = z
  .object({
    voice_id: z.string(),
    name: z.string(),
    category: z.string().optional(),
    description: z.string().nullable().optional(),
    preview_url: z.string().nullable().optional(),
    labels: z.record(z.string()).nullable().optional(),
  })
  .passthrough();

const voicesResponseSchema = z.object({ voices: z.array(voiceSchema).default([]) });

export type ElevenLabsVoice = z.infer<typeof voiceSchema>;

const musicPlanSchema = z.record(z.unknown());

/**
 * Group lines into at most `maxParts` requests without splitting a line.
 * Scripts under the per-request limit stay in one part.
 */
export function splitTextIntoParts<T extends { text: string }>(
  lines: T[],
  maxParts: number = AUDIO_SETTINGS.maxParts,
): T[][] {
  const totalChars = lines.reduce((sum, line) => sum + line.text.length, 0);
  if (totalChars <= AUDIO_SETTINGS.maxCharsPerRequest) {
    return [lines];
  }

  const target = totalChars / maxParts;
  const parts: T[][] = [];
  let current: T[] = [];
  let currentLength = 0;

  for (const line of lines) {
    if (currentLength >= target && parts.length < maxParts - 1 && current.length > 0) {
      parts.push(current);
      current = [];
      currentLength = 0;
    }
    current.push(line);
    currentLength += line.text.length;
  }

  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

export function clampMusicLength(durationMs: number): number {
  return Math.min(Math.max(Math.round(durationMs), AUDIO_SETTINGS.musicMinMs), AUDIO_SETTINGS.musicMaxMs);
}

export class ElevenLabsService {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly user: Pick<User, 'elevenlabsApiKey'>,
    fetchImpl?: FetchLike,
    private readonly timeouts: ElevenLabsTimeouts = REQUEST_TIMEOUTS_MS,
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async generateDialogue(lines: DialogueInput[]): Promise<DialogueResult> {
    const data = dialogueResponseSchema.parse(
      await this.requestJson('POST', ELEVENLABS_ENDPOINTS.textToDialogue, this.timeouts.dialogue, {
        inputs: lines.map((line) => ({ text: line.text, voice_id: line.voice_id })),
        model_id: ELEVENLABS_DIALOGUE_MODEL,
        output_format: ELEVENLABS_OUTPUT_FORMAT,
      }),
    );

    return {
      audio: data.audio_base64 ? Buffer.from(data.audio_base64, 'base64') : Buffer.alloc(0),
      timestamps: {
        voice_segments: data.voice_segments ?? [],
        alignment: data.alignment ?? {},
      },
    };
  }

  /**
   * Long scripts go out as up to three sequential requests
   */
  async generateDialogueInParts(lines: DialogueInput[]): Promise<DialogueResult[]> {
    const parts = splitTextIntoParts(lines);
    logger.info('Generating dialogue', { lines: lines.length, parts: parts.length });

    const results: DialogueResult[] = [];
    for (const [index, part] of parts.entries()) {
      logger.debug('Generating dialogue part', { part: index + 1, of: parts.length, lines: part.length });
      results.push(await this.generateDialogue(part));
    }
    return results;
  }

  generateSoundEffect(
    text: string,
    durationSeconds: number = AUDIO_SETTINGS.defaultSoundDurationSeconds,
    promptInfluence = 0.3,
  ): Promise<Buffer> {
    return this.requestBinary(ELEVENLABS_ENDPOINTS.soundGeneration, this.timeouts.soundEffect, {
      text,
      duration_seconds: durationSeconds,
      prompt_influence: promptInfluence,
    });
  }

  async createMusicPlan(prompt: string, durationMs: number): Promise<MusicCompositionPlan> {
    return musicPlanSchema.parse(
      await this.requestJson('POST', ELEVENLABS_ENDPOINTS.musicPlan, this.timeouts.musicPlan, {
        prompt,
        music_length_ms: clampMusicLength(durationMs),
      }),
    );
  }

  generateMusic(compositionPlan: MusicCompositionPlan, forceInstrumental = true): Promise<Buffer> {
    return this.requestBinary(ELEVENLABS_ENDPOINTS.music, this.timeouts.music, {
      composition_plan: compositionPlan,
      force_instrumental: forceInstrumental,
    });
  }

  async getVoices(): Promise<ElevenLabsVoice[]> {
    const body = await this.requestJson('GET', ELEVENLABS_ENDPOINTS.voices, this.timeouts.voices);
    return voicesResponseSchema.parse(body).voices;
  }

  async testVoice(voiceId: string, text = 'Hello, this is a voice test.'): Promise<Buffer> {
    const { audio } = await this.generateDialogue([{ text, voice_id: voiceId }]);
    return audio;
  }

  private apiKey(): string {
    if (this.user.elevenlabsApiKey) {
      return decryptSecret(this.user.elevenlabsApiKey);
    }
    const fallback = getEnvironment().DEFAULT_ELEVENLABS_API_KEY;
    if (fallback) {
      return fallback;
    }
    throw new MissingAPIKeyError('ElevenLabs');
  }

  private async send(method: 'GET' | 'POST', endpoint: string, timeoutMs: number, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = { 'xi-api-key': this.apiKey() };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${ELEVENLABS_BASE_URL}${endpoint}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const message = requestFailureMessage(error, timeoutMs);
      logger.error('ElevenLabs request error', { endpoint, error: message });
      throw new ElevenLabsError(message);
    }

    if (!response.ok) {
      const details = await response.text();
      logger.error('ElevenLabs API error', { endpoint, status: response.status, details: details.slice(0, 500) });
      throw new ElevenLabsError(`API returned ${response.status}`, details);
    }
    return response;
  }

  private async requestJson(method: 'GET' | 'POST', endpoint: string, timeoutMs: number, body?: unknown): Promise<unknown> {
    const response = await this.send(method, endpoint, timeoutMs, body);
    return response.json();
  }

  private async requestBinary(endpoint: string, timeoutMs: number, body: unknown): Promise<Buffer> {
    const response = await this.send('POST', endpoint, timeoutMs, body);
    return Buffer.from(await response.arrayBuffer());
  }
}
