import { describeError } from './errors.js';
import { GenerationProgress, isPipelineStep, type PipelineStepName } from './progress.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface PipelineClientOptions {
  baseUrl?: string;
  /** Bearer token; without one the access_token cookie is relied on */
  token?: string | null;
  fetch?: FetchLike;
  progress?: GenerationProgress;
  lang?: string;
  stepDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_STEPS: PipelineStepName[] = ['script', 'voiceover', 'sounds', 'music', 'merge'];

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

async function errorMessage(response: Response): Promise<string | null> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null) {
      const message: unknown = Reflect.get(body, 'message');
      return typeof message === 'string' && message ? message : null;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Drives the generation endpoints one step at a time from the browser
 */
export class PipelineClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly progress: GenerationProgress;
  private readonly lang: string;
  private readonly stepDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: PipelineClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? '').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.lang = options.lang ?? 'en';
    this.progress = options.progress ?? new GenerationProgress(undefined, this.lang);
    this.stepDelayMs = options.stepDelayMs ?? 500;
    this.sleep = options.sleep ?? defaultSleep;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  async runStep(episodeId: string, step: string): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}/api/generation/${step}/${episodeId}`, {
      method: 'POST',
      headers: this.headers(),
      credentials: 'include',
    });
    if (!response.ok) {
      throw new Error((await errorMessage(response)) || `Failed at step: ${step}`);
    }
    return response.json();
  }

  /**
   * POST each step in order with a pause between them; the first failure stops the run.
   * Returns each step's response body.
   */
  async run(episodeId: string, steps: string[] = DEFAULT_STEPS): Promise<unknown[]> {
    const results: unknown[] = [];
    this.progress.start();
    try {
      for (const [index, step] of steps.entries()) {
        if (index > 0) {
          await this.sleep(this.stepDelayMs);
        }
        if (isPipelineStep(step)) {
          this.progress.setStep(step);
        }
        results.push(await this.runStep(episodeId, step));
      }
    } catch (error) {
      const { message } = describeError(error, this.lang, 'Generation');
      this.progress.error(message);
      throw error;
    }
    this.progress.complete();
    return results;
  }
}
