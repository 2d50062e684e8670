/**
 * Generation Service
 * Runs the audiobook pipeline steps against the vendor services and
 * records each step's progress on the episode row.
 */

import { logger } from '@/config/logger.js';
import { AUDIO_SETTINGS } from '@/config/providers.js';
import type { EpisodeStatus } from '@/db/schema/enums.js';
import type { Episode } from '@/db/schema/episodes.js';
import type { User } from '@/db/schema/users.js';
import { BusinessLogicError, getErrorMessage } from '@/shared/errors.js';
import { buildPlainScriptText } from '@/shared/script.js';
import type { CoverVariant, ScriptLine, SoundEffectEntry } from '@/types/pipeline.js';
import { AudioService } from './audio.js';
import { CoverService, buildCoverPrompt, type CoverStylePreset } from './cover.js';
import { CoverStyleService } from './cover-styles.js';
import { ElevenLabsService } from './elevenlabs.js';
import { EpisodeService, type EpisodePatch } from './episodes.js';
import { LLMService } from './llm.js';
import { ProjectService } from './projects.js';
import type { StorageService } from './storage.js';
import { getStorageService } from './storage-singleton.js';
import { VoiceService } from './voices.js';

export type StepState = 'pending' | 'in_progress' | 'done' | 'skipped';

export interface ScriptStepOptions {
  customPrompt?: string | null | undefined;
  temperature?: number | undefined;
}

export interface SoundsStepOptions {
  durationSeconds?: number | undefined;
  promptInfluence?: number | undefined;
}

export interface MergeStepOptions {
  voiceVolume?: number | undefined;
  soundsVolume?: number | undefined;
  musicVolume?: number | undefined;
}

export interface CoverStepOptions {
  variantsCount?: number | undefined;
  referenceImages?: string[] | undefined;
  customPrompt?: string | null | undefined;
  aspectRatio?: string | undefined;
  style?: string | null | undefined;
}

export interface FullPipelineOptions extends MergeStepOptions {
  generateCover?: boolean | undefined;
  coverVariantsCount?: number | undefined;
  coverReferenceImageUrl?: string | null | undefined;
  coverStyle?: string | null | undefined;
}

export interface ScriptStepResult {
  episode_id: string;
  status: EpisodeStatus;
  story_title: string | null;
  lines_count: number;
  estimated_duration_minutes: number;
}

export interface VoiceoverStepResult {
  episode_id: string;
  status: EpisodeStatus;
  audio_url: string;
  duration_seconds: number;
  parts_count: number;
}

export interface SoundsStepResult {
  episode_id: string;
  status: EpisodeStatus;
  sounds_count: number;
  sounds: SoundEffectEntry[];
}

export interface MusicStepResult {
  episode_id: string;
  status: EpisodeStatus;
  music_url: string;
  duration_seconds: number;
}

export interface MergeStepResult {
  episode_id: string;
  status: EpisodeStatus;
  final_audio_url: string;
  duration_seconds: number;
}

export interface CoverStepResult {
  episode_id: string;
  status: EpisodeStatus;
  cover_url: string | null;
  variants: CoverVariant[];
}

export interface FullPipelineResult {
  episode_id: string;
  status: 'processing' | 'done' | 'error';
  script_status: StepState;
  voiceover_status: StepState;
  sounds_status: StepState;
  music_status: StepState;
  merge_status: StepState;
  cover_status: StepState;
  final_audio_url: string | null;
  final_audio_duration_seconds: number | null;
  cover_url: string | null;
}

export interface MusicMergeResult {
  episode_id: string;
  merged_url: string;
  music_volume_db: number;
}

type LLMClient = Pick<LLMService, 'generateScript' | 'generateSummary'>;
type ElevenLabsClient = Pick<
  ElevenLabsService,
  'generateDialogueInParts' | 'generateSoundEffect' | 'createMusicPlan' | 'generateMusic'
>;
type CoverClient = Pick<CoverService, 'generateMultipleCovers' | 'findStyle'>;

export interface GenerationDependencies {
  episodes: Pick<EpisodeService, 'getOwned' | 'getProject' | 'listPrevious' | 'patch'>;
  projects: Pick<ProjectService, 'listCharacters' | 'setCover'>;
  voices: Pick<VoiceService, 'resolveElevenLabsIds'>;
  coverStyles: Pick<CoverStyleService, 'getPresets'>;
  storage: Pick<StorageService, 'saveFile' | 'saveFromUrl' | 'deleteFile'>;
  audio: Pick<AudioService, 'getAudioDuration' | 'mergeAudioParts' | 'fullMerge' | 'mixVoiceWithMusic'>;
  llm: (user: User) => LLMClient;
  elevenlabs: (user: User) => ElevenLabsClient;
  cover: (user: User, styles: CoverStylePreset[]) => CoverClient;
}

const DEFAULT_MUSIC_SECONDS = 300;

/**
 * Place each sound cue at the end of its line on an estimated voice timeline
 */
export function planSoundEffects(lines: ScriptLine[]): Array<{ prompt: string; startTime: number; lineIndex: number }> {
  const cues: Array<{ prompt: string; startTime: number; lineIndex: number }> = [];
  let currentTime = 0;
  for (const [lineIndex, line] of lines.entries()) {
    const lineDuration = line.text.length / AUDIO_SETTINGS.charsPerSecond;
    if (line.sound_effect) {
      cues.push({ prompt: line.sound_effect, startTime: currentTime + lineDuration, lineIndex });
    }
    currentTime += lineDuration;
  }
  return cues;
}

export function buildMusicPrompt(project: { musicalAtmosphere: string | null; genreTone: string }): string {
  const atmosphere = project.musicalAtmosphere || project.genreTone;
  return `${atmosphere}, instrumental background music for audiobook, ambient, atmospheric`;
}

function defaultDependencies(): GenerationDependencies {
  const storage: StorageService = getStorageService();
  return {
    episodes: new EpisodeService(storage),
    projects: new ProjectService(),
    voices: new VoiceService(),
    coverStyles: new CoverStyleService(),
    storage,
    audio: new AudioService(storage),
    llm: (user) => new LLMService(user),
    elevenlabs: (user) => new ElevenLabsService(user),
    cover: (user, styles) => new CoverService(user, { styles }),
  };
}

export class GenerationService {
  private deps: GenerationDependencies;

  constructor(deps: GenerationDependencies = defaultDependencies()) {
    this.deps = deps;
  }

  async generateScript(user: User, episodeId: string, options: ScriptStepOptions = {}): Promise<ScriptStepResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    const project = await this.deps.episodes.getProject(episode);
    const characters = await this.deps.projects.listCharacters(project.id);
    const previous = episode.episodeNumber > 1 ? await this.deps.episodes.listPrevious(episode) : [];

    return this.runStep(episode, 'script_generating', async () => {
      const script = await this.deps
        .llm(user)
        .generateScript(project, episode, characters, previous, options.customPrompt, options.temperature);

      const values: EpisodePatch = {
        scriptJson: script,
        scriptText: buildPlainScriptText(script.lines),
        status: 'script_done',
      };
      if (episode.titleAutoGenerated && script.story_title) {
        values.title = script.story_title;
      }
      const updated = await this.deps.episodes.patch(episode.id, values);

      return {
        episode_id: updated.id,
        status: updated.status,
        story_title: script.story_title || null,
        lines_count: script.lines.length,
        estimated_duration_minutes: script.approx_duration_minutes,
      };
    });
  }

  async generateVoiceover(user: User, episodeId: string): Promise<VoiceoverStepResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    const script = episode.scriptJson;
    if (!script) {
      throw new BusinessLogicError('Episode must have a script before generating voiceover');
    }

    await this.deps.storage.deleteFile(episode.voiceAudioUrl);

    return this.runStep(episode, 'voiceover_generating', async () => {
      if (script.lines.length === 0) {
        throw new BusinessLogicError('Script has no lines');
      }

      // Lines may name a library voice (uuid) or an ElevenLabs voice directly
      const voiceIds = await this.deps.voices.resolveElevenLabsIds(user.id);
      const lines = script.lines.map((line) => ({
        text: line.text,
        voice_id: voiceIds.get(line.voice_id) ?? line.voice_id,
      }));

      const parts = await this.deps.elevenlabs(user).generateDialogueInParts(lines);
      const first = parts[0];
      if (!first) {
        throw new BusinessLogicError('Script has no lines');
      }

      const audioUrl =
        parts.length > 1
          ? await this.deps.audio.mergeAudioParts(parts.map((part) => part.audio))
          : await this.deps.storage.saveFile(first.audio, 'audio', undefined, 'mp3');
      const duration = await this.deps.audio.getAudioDuration(audioUrl);

      const updated = await this.deps.episodes.patch(episode.id, {
        voiceAudioUrl: audioUrl,
        voiceAudioDurationSeconds: duration,
        voiceTimestampsJson: { parts: parts.map((part) => part.timestamps), total_parts: parts.length },
        status: 'voiceover_done',
      });

      logger.info('Voiceover generated', { episodeId: episode.id, parts: parts.length, duration });
      return {
        episode_id: updated.id,
        status: updated.status,
        audio_url: audioUrl,
        duration_seconds: duration,
        parts_count: parts.length,
      };
    });
  }

  async generateSounds(user: User, episodeId: string, options: SoundsStepOptions = {}): Promise<SoundsStepResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    if (!episode.voiceAudioUrl) {
      throw new BusinessLogicError('Episode must have voiceover before generating sounds');
    }
    if (!episode.includeSoundEffects) {
      throw new BusinessLogicError('Sound effects are disabled for this episode');
    }

    const duration = options.durationSeconds ?? AUDIO_SETTINGS.defaultSoundDurationSeconds;

    return this.runStep(episode, 'sounds_generating', async () => {
      const cues = planSoundEffects(episode.scriptJson?.lines ?? []);
      const sounds: SoundEffectEntry[] = [];

      if (cues.length > 0) {
        const elevenlabs = this.deps.elevenlabs(user);
        for (const cue of cues) {
          const audio = await elevenlabs.generateSoundEffect(cue.prompt, duration, options.promptInfluence);
          const url = await this.deps.storage.saveFile(audio, 'audio', undefined, 'mp3');
          sounds.push({ prompt: cue.prompt, url, local_path: url, start_time: cue.startTime, duration });
        }
      }

      const updated = await this.deps.episodes.patch(episode.id, { soundsJson: sounds, status: 'sounds_done' });
      for (const previous of episode.soundsJson ?? []) {
        await this.deps.storage.deleteFile(previous.url);
      }
      logger.info('Sound effects generated', { episodeId: episode.id, sounds: sounds.length });
      return { episode_id: updated.id, status: updated.status, sounds_count: sounds.length, sounds };
    });
  }

  async generateMusic(user: User, episodeId: string, forceInstrumental = true): Promise<MusicStepResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    if (!episode.voiceAudioUrl) {
      throw new BusinessLogicError('Episode must have voiceover before generating music');
    }
    if (!episode.includeBackgroundMusic) {
      throw new BusinessLogicError('Background music is disabled for this episode');
    }

    return this.runStep(episode, 'music_generating', async () => {
      const project = await this.deps.episodes.getProject(episode);
      const durationMs = Math.floor((episode.voiceAudioDurationSeconds || DEFAULT_MUSIC_SECONDS) * 1000);

      const elevenlabs = this.deps.elevenlabs(user);
      const plan = await elevenlabs.createMusicPlan(buildMusicPrompt(project), durationMs);
      const music = await elevenlabs.generateMusic(plan, forceInstrumental);
      const musicUrl = await this.deps.storage.saveFile(music, 'audio', undefined, 'mp3');

      const updated = await this.deps.episodes.patch(episode.id, {
        musicUrl,
        musicCompositionPlan: plan,
        status: 'music_done',
      });
      await this.deps.storage.deleteFile(episode.musicUrl);
      return { episode_id: updated.id, status: updated.status, music_url: musicUrl, duration_seconds: durationMs / 1000 };
    });
  }

  async mergeAudio(user: User, episodeId: string, options: MergeStepOptions = {}): Promise<MergeStepResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    const voicePath = episode.voiceAudioUrl;
    if (!voicePath) {
      throw new BusinessLogicError('Episode must have voiceover before merging');
    }

    return this.runStep(episode, 'merging', async () => {
      const finalUrl = await this.deps.audio.fullMerge({
        voicePath,
        sounds: episode.includeSoundEffects ? episode.soundsJson : null,
        musicPath: episode.includeBackgroundMusic ? episode.musicUrl : null,
        voiceVolume: options.voiceVolume,
        soundsVolume: options.soundsVolume,
        musicVolume: options.musicVolume,
      });
      const duration = await this.deps.audio.getAudioDuration(finalUrl);

      if (episode.finalAudioUrl && episode.finalAudioUrl !== finalUrl) {
        await this.deps.storage.deleteFile(episode.finalAudioUrl);
      }

      const updated = await this.deps.episodes.patch(episode.id, {
        finalAudioUrl: finalUrl,
        finalAudioDurationSeconds: duration,
        status: 'audio_done',
      });
      return { episode_id: updated.id, status: updated.status, final_audio_url: finalUrl, duration_seconds: duration };
    });
  }

  async generateCover(user: User, episodeId: string, options: CoverStepOptions = {}): Promise<CoverStepResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);

    const oldFiles = [episode.coverUrl, ...(episode.coverVariantsJson ?? []).map((variant) => variant.url)];
    for (const file of new Set(oldFiles)) {
      await this.deps.storage.deleteFile(file);
    }
    await this.deps.episodes.patch(episode.id, { coverUrl: null, coverVariantsJson: null });

    return this.runStep(episode, 'cover_generating', async () => {
      const project = await this.deps.episodes.getProject(episode);
      const cover = this.deps.cover(user, await this.deps.coverStyles.getPresets());

      const referenceImages = options.referenceImages?.filter(Boolean) ?? [];
      const generated = await cover.generateMultipleCovers(
        (styleKey) =>
          buildCoverPrompt({
            title: episode.title || project.title,
            genreTone: project.genreTone,
            description: episode.description,
            summary: episode.summary,
            template: user.coverPromptTemplate,
            seriesName: project.title,
            episodeNumber: episode.episodeNumber,
            extraInstructions: options.customPrompt,
            style: cover.findStyle(styleKey) ?? null,
          }),
        options.variantsCount ?? 1,
        {
          preferredStyle: options.style,
          referenceImages,
          aspectRatio: options.aspectRatio,
        },
      );

      const variants: CoverVariant[] = [];
      for (const [index, result] of generated.entries()) {
        const url = await this.deps.storage.saveFromUrl(result.url, 'covers');
        variants.push({ url, selected: index === 0, style: result.style });
      }

      const coverUrl = variants[0]?.url ?? null;
      const updated = await this.deps.episodes.patch(episode.id, {
        coverUrl,
        coverVariantsJson: variants,
        coverReferenceImageUrl: referenceImages[0] ?? episode.coverReferenceImageUrl,
        status: 'done',
      });

      if (coverUrl && !project.coverUrl) {
        await this.deps.projects.setCover(project.id, coverUrl);
      }

      logger.info('Cover generated', { episodeId: episode.id, variants: variants.length });
      return { episode_id: updated.id, status: updated.status, cover_url: coverUrl, variants };
    });
  }

  async selectCover(user: User, episodeId: string, variantIndex: number): Promise<{ message: string; cover_url: string }> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    const variants = episode.coverVariantsJson ?? [];
    if (variants.length === 0) {
      throw new BusinessLogicError('No cover variants available');
    }

    const chosen = variants[variantIndex];
    if (!chosen) {
      throw new BusinessLogicError(`Invalid variant index: ${variantIndex}`);
    }

    await this.deps.episodes.patch(episode.id, {
      coverUrl: chosen.url,
      coverVariantsJson: variants.map((variant, index) => ({ ...variant, selected: index === variantIndex })),
    });
    return { message: 'Cover selected', cover_url: chosen.url };
  }

  /**
   * Every step in order, then the recap used by continuations
   */
  async runFull(user: User, episodeId: string, options: FullPipelineOptions = {}): Promise<FullPipelineResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    const generateCover = options.generateCover ?? true;

    const result: FullPipelineResult = {
      episode_id: episode.id,
      status: 'processing',
      script_status: 'pending',
      voiceover_status: 'pending',
      sounds_status: episode.includeSoundEffects ? 'pending' : 'skipped',
      music_status: episode.includeBackgroundMusic ? 'pending' : 'skipped',
      merge_status: 'pending',
      cover_status: generateCover ? 'pending' : 'skipped',
      final_audio_url: null,
      final_audio_duration_seconds: null,
      cover_url: null,
    };

    logger.info('Starting full generation', { episodeId: episode.id, generateCover });

    try {
      result.script_status = 'in_progress';
      await this.generateScript(user, episode.id);
      result.script_status = 'done';

      result.voiceover_status = 'in_progress';
      await this.generateVoiceover(user, episode.id);
      result.voiceover_status = 'done';

      if (episode.includeSoundEffects) {
        result.sounds_status = 'in_progress';
        await this.generateSounds(user, episode.id);
        result.sounds_status = 'done';
      }

      if (episode.includeBackgroundMusic) {
        result.music_status = 'in_progress';
        await this.generateMusic(user, episode.id);
        result.music_status = 'done';
      }

      result.merge_status = 'in_progress';
      const merged = await this.mergeAudio(user, episode.id, options);
      result.merge_status = 'done';
      result.final_audio_url = merged.final_audio_url;
      result.final_audio_duration_seconds = merged.duration_seconds;

      if (generateCover) {
        result.cover_status = 'in_progress';
        const cover = await this.generateCover(user, episode.id, {
          variantsCount: options.coverVariantsCount,
          referenceImages: options.coverReferenceImageUrl ? [options.coverReferenceImageUrl] : undefined,
          style: options.coverStyle,
        });
        result.cover_status = 'done';
        result.cover_url = cover.cover_url;
      }

      await this.finish(user, episode.id);
      result.status = 'done';
      return result;
    } catch (error) {
      result.status = 'error';
      logger.error('Full generation failed', {
        episodeId: episode.id,
        error: getErrorMessage(error),
        steps: result,
      });
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Standalone music operations
  // ---------------------------------------------------------------------------

  async mergeWithMusic(user: User, episodeId: string, musicVolumeDb = -12): Promise<MusicMergeResult> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    if (!episode.voiceAudioUrl) {
      throw new BusinessLogicError('Voice audio not found');
    }
    if (!episode.musicUrl) {
      throw new BusinessLogicError('Music not generated yet');
    }

    const mergedUrl = await this.deps.audio.mixVoiceWithMusic(episode.voiceAudioUrl, episode.musicUrl, musicVolumeDb);
    const duration = await this.deps.audio.getAudioDuration(mergedUrl);

    if (episode.finalAudioUrl && episode.finalAudioUrl !== mergedUrl) {
      await this.deps.storage.deleteFile(episode.finalAudioUrl);
    }
    await this.deps.episodes.patch(episode.id, { finalAudioUrl: mergedUrl, finalAudioDurationSeconds: duration });

    logger.info('Voice mixed with music', { episodeId: episode.id, musicVolumeDb });
    return { episode_id: episode.id, merged_url: mergedUrl, music_volume_db: musicVolumeDb };
  }

  async deleteMusic(user: User, episodeId: string): Promise<{ message: string }> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    if (episode.musicUrl) {
      await this.deps.storage.deleteFile(episode.musicUrl);
      await this.deps.episodes.patch(episode.id, { musicUrl: null, musicCompositionPlan: null });
    }
    return { message: 'Music deleted' };
  }

  async deleteMergedAudio(user: User, episodeId: string): Promise<{ message: string }> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    if (episode.finalAudioUrl) {
      await this.deps.storage.deleteFile(episode.finalAudioUrl);
      await this.deps.episodes.patch(episode.id, { finalAudioUrl: null, finalAudioDurationSeconds: null });
    }
    return { message: 'Merged audio deleted' };
  }

  /**
   * Summary for later continuations; a failed summary does not fail the episode
   */
  private async finish(user: User, episodeId: string): Promise<Episode> {
    const episode = await this.deps.episodes.getOwned(user.id, episodeId);
    let summary = episode.summary;
    try {
      summary = (await this.deps.llm(user).generateSummary(episode.scriptText)) || summary;
    } catch (error) {
      logger.warn('Failed to generate episode summary', { episodeId, error: getErrorMessage(error) });
    }
    return this.deps.episodes.patch(episodeId, { summary, status: 'done' });
  }

  private async runStep<T>(episode: Episode, running: EpisodeStatus, work: () => Promise<T>): Promise<T> {
    await this.deps.episodes.patch(episode.id, { status: running, errorMessage: null });
    try {
      return await work();
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('Generation step failed', { episodeId: episode.id, step: running, error: message });
      try {
        await this.deps.episodes.patch(episode.id, { status: 'error', errorMessage: message });
      } catch (patchError) {
        logger.error('Failed to record generation error', {
          episodeId: episode.id,
          error: getErrorMessage(patchError),
        });
      }
      throw error;
    }
  }
}
