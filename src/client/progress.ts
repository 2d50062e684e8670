import { t } from './i18n.js';

export type PipelineStepName = 'script' | 'voiceover' | 'sounds' | 'music' | 'merge' | 'cover';

export interface ProgressState {
  percent: number;
  status: string;
  details: string;
  step: PipelineStepName | null;
  failed: boolean;
}

export type ProgressListener = (state: ProgressState) => void;

interface StepInfo {
  label: string;
  percent: number;
  icon: string;
}

// Order matters: a step's starting percentage is the sum of the ones before it
export const PIPELINE_STEPS: Record<PipelineStepName, StepInfo> = {
  script: { label: 'progress.script', percent: 15, icon: '📝' },
  voiceover: { label: 'progress.voice', percent: 40, icon: '🎙️' },
  sounds: { label: 'progress.sounds', percent: 20, icon: '🔊' },
  music: { label: 'progress.music', percent: 15, icon: '🎵' },
  merge: { label: 'progress.merge', percent: 10, icon: '🔄' },
  cover: { label: 'progress.cover', percent: 0, icon: '🎨' },
};

const STEP_ORDER: PipelineStepName[] = ['script', 'voiceover', 'sounds', 'music', 'merge', 'cover'];

export function isPipelineStep(value: string): value is PipelineStepName {
  return value in PIPELINE_STEPS;
}

/**
 * Weighted progress across the generation steps, pushed to a single listener
 */
export class GenerationProgress {
  private state: ProgressState = { percent: 0, status: '', details: '', step: null, failed: false };

  constructor(
    private readonly listener: ProgressListener = () => undefined,
    private readonly lang = 'en',
  ) {}

  get current(): ProgressState {
    return { ...this.state };
  }

  start(): void {
    this.state = { percent: 0, status: '', details: '', step: null, failed: false };
    this.setProgress(0, t('progress.starting', this.lang));
  }

  setProgress(percent: number, status: string, details = ''): void {
    this.state = { ...this.state, percent: Math.min(100, percent), status, details };
    this.listener(this.current);
  }

  setStep(step: PipelineStepName): void {
    let accumulated = 0;
    for (const name of STEP_ORDER) {
      if (name === step) {
        break;
      }
      accumulated += PIPELINE_STEPS[name].percent;
    }
    this.state = { ...this.state, step };
    this.setProgress(accumulated, t(PIPELINE_STEPS[step].label, this.lang));
  }

  setVoiceoverProgress(currentLine: number, totalLines: number): void {
    const base = PIPELINE_STEPS.script.percent;
    const share = totalLines > 0 ? (currentLine / totalLines) * PIPELINE_STEPS.voiceover.percent : 0;
    const details = t('progress.voice_line', this.lang, undefined, { current: currentLine, total: totalLines });
    this.state = { ...this.state, step: 'voiceover' };
    this.setProgress(base + share, t('progress.voice', this.lang), details);
  }

  complete(): void {
    this.setProgress(100, t('progress.complete', this.lang));
  }

  /** Keeps the current percentage */
  error(message: string): void {
    this.state = { ...this.state, failed: true };
    this.setProgress(this.state.percent, t('progress.error', this.lang), message);
  }
}
