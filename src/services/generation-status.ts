/**
 * Generation Status
 * Derives pipeline progress from an episode's persisted status
 */

import type { Episode } from '@/db/schema/episodes.js';
import type { EpisodeStatus } from '@/db/schema/enums.js';

export type PipelineStep = 'script' | 'voiceover' | 'sounds' | 'music' | 'merge' | 'cover';

const ALL_STEPS: PipelineStep[] = ['script', 'voiceover', 'sounds', 'music', 'merge', 'cover'];

const STATUS_STEP_INDEX: Record<EpisodeStatus, number> = {
  draft: 0,
  script_generating: 0,
  script_done: 1,
  voiceover_generating: 1,
  voiceover_done: 2,
  sounds_generating: 2,
  sounds_done: 3,
  music_generating: 3,
  music_done: 4,
  merging: 4,
  audio_done: 5,
  cover_generating: 5,
  done: 6,
  error: -1,
};

export interface GenerationStatus {
  episode_id: string;
  status: EpisodeStatus;
  current_step: PipelineStep | 'done' | 'error';
  steps_completed: PipelineStep[];
  steps_remaining: PipelineStep[];
  error_message: string | null;
  script_ready: boolean;
  voiceover_ready: boolean;
  sounds_ready: boolean;
  music_ready: boolean;
  audio_ready: boolean;
  cover_ready: boolean;
}

type StatusEpisode = Pick<
  Episode,
  | 'id'
  | 'status'
  | 'errorMessage'
  | 'includeSoundEffects'
  | 'includeBackgroundMusic'
  | 'scriptJson'
  | 'voiceAudioUrl'
  | 'soundsJson'
  | 'musicUrl'
  | 'finalAudioUrl'
  | 'coverUrl'
>;

export function pipelineSteps(episode: Pick<Episode, 'includeSoundEffects' | 'includeBackgroundMusic'>): PipelineStep[] {
  const steps: PipelineStep[] = ['script', 'voiceover'];
  if (episode.includeSoundEffects) {
    steps.push('sounds');
  }
  if (episode.includeBackgroundMusic) {
    steps.push('music');
  }
  steps.push('merge', 'cover');
  return steps;
}

export function stepIndexForStatus(status: EpisodeStatus): number {
  return STATUS_STEP_INDEX[status];
}

export function getGenerationStatus(episode: StatusEpisode): GenerationStatus {
  const steps = pipelineSteps(episode);
  const index = stepIndexForStatus(episode.status);

  let currentStep: GenerationStatus['current_step'];
  let completed: PipelineStep[];
  let remaining: PipelineStep[];

  if (index < 0) {
    currentStep = 'error';
    completed = [];
    remaining = steps;
  } else {
    // Positions refer to the full step list; optional steps may be absent
    completed = steps.filter((step) => ALL_STEPS.indexOf(step) < index);
    remaining = steps.filter((step) => ALL_STEPS.indexOf(step) >= index);
    currentStep = remaining[0] ?? 'done';
  }

  return {
    episode_id: episode.id,
    status: episode.status,
    current_step: currentStep,
    steps_completed: completed,
    steps_remaining: remaining,
    error_message: episode.errorMessage,
    script_ready: Boolean(episode.scriptJson),
    voiceover_ready: Boolean(episode.voiceAudioUrl),
    // Arrays count as ready even when empty (no cues in the script)
    sounds_ready: episode.includeSoundEffects ? episode.soundsJson != null : true,
    music_ready: episode.includeBackgroundMusic ? Boolean(episode.musicUrl) : true,
    audio_ready: Boolean(episode.finalAudioUrl),
    cover_ready: Boolean(episode.coverUrl),
  };
}
