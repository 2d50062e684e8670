import { describe, it, expect, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import {
  CoverService,
  buildCoverPrompt,
  extractResultUrl,
  fillCoverTemplate,
  type CoverStylePreset,
} from '@/services/cover.js';
import type { FetchLike } from '@/services/storage.js';
import { KieAIError } from '@/shared/errors.js';
import { encryptSecret } from '@/shared/security.js';
import { unansweredFetch } from './fixtures.js';

const user = { kieaiApiKey: encryptSecret('test-secret') };
const noSleep = (): Promise<void> => Promise.resolve();

const values = {
  series_info: '',
  title: 'T',
  genre_tone: 'noir',
  synopsis: 'S',
  style_section: '',
  series_name: '',
  episode_num: '',
  episode_title: 'T',
  extra: '',
};

describe('extractResultUrl', () => {
  it('reads resultUrls from a JSON string', () => {
    expect(extractResultUrl({ resultJson: '{"resultUrls":["https://img.test/1.png"]}' })).toBe(
      'https://img.test/1.png',
    );
  });

  it('reads the first output entry of an object', () => {
    expect(extractResultUrl({ resultJson: { output: [{ url: 'https://img.test/2.png' }] } })).toBe(
      'https://img.test/2.png',
    );
  });

  it('falls back to the record URL when resultJson is unusable', () => {
    expect(extractResultUrl({ resultJson: 'not json', resultUrl: 'https://img.test/3.png' })).toBe(
      'https://img.test/3.png',
    );
    expect(extractResultUrl({})).toBeNull();
  });
});

describe('fillCoverTemplate', () => {
  it('substitutes placeholders and unescapes doubled braces', () => {
    expect(fillCoverTemplate('Title: {title} {{literal}}', values)).toBe('Title: T {literal}');
  });

  it('rejects unknown placeholders', () => {
    expect(fillCoverTemplate('{title} by {author}', values)).toBeNull();
  });
});

describe('buildCoverPrompt', () => {
  const base = { title: 'Saga — The Storm', genreTone: 'thriller', description: 'A storm hits the coast' };

  it('fills series details and extra instructions into a custom template', () => {
    const prompt = buildCoverPrompt({
      ...base,
      template: '{series_info}{episode_title}|{episode_num}|{extra}',
      seriesName: 'Saga',
      episodeNumber: 2,
      extraInstructions: 'No faces',
    });

    expect(prompt).toBe('Series: Saga\nEpisode: #2\nThe Storm|2|\n\nADDITIONAL REQUIREMENTS:\nNo faces');
  });

  it('prefers the summary and truncates the synopsis', () => {
    expect(buildCoverPrompt({ ...base, template: '{synopsis}', description: 'd'.repeat(600) })).toBe(
      'd'.repeat(500),
    );
    expect(buildCoverPrompt({ ...base, template: '{synopsis}', summary: 'Short summary' })).toBe('Short summary');
  });

  it('describes the chosen visual style', () => {
    const style: CoverStylePreset = { key: 'ink', name: 'Ink', instructions: 'Bold lines', mood: '' };
    expect(buildCoverPrompt({ ...base, template: '{style_section}', style })).toBe(
      '\nVISUAL STYLE: Ink\nBold lines\nMood: dramatic, cinematic',
    );
  });

  it('uses the built-in template when the custom one is broken', () => {
    const prompt = buildCoverPrompt({ ...base, template: 'Cover for {unknown}' });

    expect(prompt.startsWith('Create a professional audiobook cover image.')).toBe(true);
    expect(prompt).toContain('Title: Saga — The Storm\nGenre: thriller\nSynopsis: A storm hits the coast\n');
    expect(prompt).toContain('CENTER: "The Storm"');
  });
});

describe('CoverService', () => {
  describe('getStylesForVariants', () => {
    const styles: CoverStylePreset[] = [
      { key: 'auto', name: 'Auto', instructions: '', mood: '' },
      { key: 'a', name: 'A', instructions: 'a', mood: '' },
      { key: 'b', name: 'B', instructions: 'b', mood: '' },
      { key: 'c', name: 'C', instructions: 'c', mood: '' },
    ];

    it('uses a single default or preferred style for one variant', () => {
      const service = new CoverService(user, { styles });
      expect(service.getStylesForVariants(1)).toEqual(['dark_atmospheric']);
      expect(service.getStylesForVariants(1, 'b')).toEqual(['b']);
    });

    it('puts the preferred style first and fills the rest from others', () => {
      const service = new CoverService(user, { styles, random: () => 0 });
      expect(service.getStylesForVariants(3, 'b')).toEqual(['b', 'c', 'a']);
    });

    it('picks a diverse set when the style is automatic', () => {
      const service = new CoverService(user, { random: () => 0 });
      expect(service.getStylesForVariants(2, 'auto')).toEqual(['cyberpunk_neon', 'tech_noir']);
    });
  });

  it('creates a task and polls until the image is ready', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockResolvedValueOnce(Response.json({ data: { taskId: 'task-1' } }))
      .mockResolvedValueOnce(Response.json({ data: { state: 'processing' } }))
      .mockResolvedValueOnce(
        Response.json({ data: { state: 'success', resultJson: '{"resultUrls":["https://img.test/cover.png"]}' } }),
      );
    const sleep = jest.fn((_ms: number) => Promise.resolve());
    const service = new CoverService(user, { fetchImpl, sleep, pollIntervalMs: 10 });

    const url = await service.generateCover('a lighthouse', {
      referenceImages: ['/storage/references/ref.png', 'https://img.test/ref.png'],
    });

    expect(url).toBe('https://img.test/cover.png');
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);

    const create = fetchImpl.mock.calls[0];
    expect(create?.[0]).toBe('https://kieai.erweima.ai/api/v1/jobs/createTask');
    expect(new Headers(create?.[1]?.headers).get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(create?.[1]?.body))).toEqual({
      model: 'nano-banana-pro',
      input: {
        prompt: 'a lighthouse',
        aspect_ratio: '1:1',
        resolution: '2K',
        output_format: 'png',
        image_input: ['http://localhost:8000/storage/references/ref.png', 'https://img.test/ref.png'],
      },
    });
    expect(fetchImpl.mock.calls[1]?.[0]).toBe('https://kieai.erweima.ai/api/v1/jobs/recordInfo?taskId=task-1');
  });

  it('reports failed tasks with the vendor message', async () => {
    const fetchImpl = jest.fn<FetchLike>().mockResolvedValue(Response.json({ data: { state: 'fail' } }));
    fetchImpl.mockResolvedValueOnce(Response.json({ data: { state: 'failed', failMsg: 'content rejected' } }));
    const service = new CoverService(user, { fetchImpl, sleep: noSleep });

    const error = await service.waitForResult('task-2').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(KieAIError);
    expect(error).toMatchObject({ message: 'kie.ai API error: Generation failed: content rejected' });
  });

  it('times out when the task never finishes', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockImplementation(() => Promise.resolve(Response.json({ data: { state: 'processing' } })));
    const service = new CoverService(user, { fetchImpl, sleep: noSleep, pollIntervalMs: 10000, timeoutMs: 30000 });

    await expect(service.waitForResult('task-3')).rejects.toThrow(
      'kie.ai API error: Generation timed out after 30 seconds',
    );
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('aborts a request that does not answer in time', async () => {
    const service = new CoverService(user, { fetchImpl: unansweredFetch, sleep: noSleep, requestTimeoutMs: 20 });

    const error = await service.generateCover('a lighthouse').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(KieAIError);
    expect(error).toMatchObject({ message: 'kie.ai API error: Request timed out after 0.02 seconds' });
  });

  it('fails when no variant could be generated', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockImplementation(() => Promise.resolve(new Response('boom', { status: 500 })));
    const service = new CoverService(user, { fetchImpl, sleep: noSleep, random: () => 0 });

    await expect(service.generateMultipleCovers((style) => `cover in ${style}`, 2)).rejects.toThrow(
      'kie.ai API error: All cover generations failed',
    );
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });
});
