/**
 * Episode Service
 * Episode records, numbering rules, manual script edits and attached media cleanup
 */

import { and, asc, eq, lt, max } from 'drizzle-orm';
import { logger } from '@/config/logger.js';
import { getDatabase } from '@/db/connection.js';
import { episodes, type Episode, type NewEpisode } from '@/db/schema/episodes.js';
import { projects, type Project } from '@/db/schema/projects.js';
import { BusinessLogicError, EpisodeDeletionError, NotFoundError } from '@/shared/errors.js';
import { buildPlainScriptText } from '@/shared/script.js';
import type { Script } from '@/types/pipeline.js';
import type { StorageService } from './storage.js';
import { getStorageService } from './storage-singleton.js';

export interface EpisodeInput {
  title?: string | null | undefined;
  titleAutoGenerated?: boolean | undefined;
  showEpisodeNumber?: boolean | undefined;
  description: string;
  targetDurationMinutes?: number | undefined;
  includeSoundEffects?: boolean | undefined;
  includeBackgroundMusic?: boolean | undefined;
}

export type EpisodeUpdate = Partial<
  Pick<
    Episode,
    | 'title'
    | 'titleAutoGenerated'
    | 'showEpisodeNumber'
    | 'description'
    | 'targetDurationMinutes'
    | 'includeSoundEffects'
    | 'includeBackgroundMusic'
  >
>;

export type EpisodePatch = Partial<Omit<NewEpisode, 'id' | 'projectId' | 'episodeNumber' | 'createdAt'>>;

/** "Part N: title" when the number is shown */
export function displayTitle(episode: Pick<Episode, 'episodeNumber' | 'title' | 'showEpisodeNumber'>): string {
  return episode.showEpisodeNumber ? `Part ${episode.episodeNumber}: ${episode.title}` : episode.title;
}

/** Every stored media URL an episode points at */
export function episodeFiles(episode: Episode): string[] {
  const files = [
    episode.voiceAudioUrl,
    episode.finalAudioUrl,
    episode.musicUrl,
    episode.coverUrl,
    ...(episode.coverVariantsJson ?? []).map((variant) => variant.url),
    ...(episode.soundsJson ?? []).map((sound) => sound.url),
  ];
  return [...new Set(files.filter((file): file is string => Boolean(file)))];
}

export class EpisodeService {
  private db = getDatabase();
  private storage: StorageService;

  constructor(storage?: StorageService) {
    this.storage = storage ?? getStorageService();
  }

  async getOwned(userId: string, episodeId: string): Promise<Episode> {
    const [row] = await this.db
      .select({ episode: episodes })
      .from(episodes)
      .innerJoin(projects, eq(episodes.projectId, projects.id))
      .where(and(eq(episodes.id, episodeId), eq(projects.userId, userId)))
      .limit(1);
    if (!row) {
      throw new NotFoundError('Episode', episodeId);
    }
    return row.episode;
  }

  async getProject(episode: Episode): Promise<Project> {
    const [project] = await this.db.select().from(projects).where(eq(projects.id, episode.projectId)).limit(1);
    if (!project) {
      throw new NotFoundError('Project', episode.projectId);
    }
    return project;
  }

  listForProject(projectId: string): Promise<Episode[]> {
    return this.db
      .select()
      .from(episodes)
      .where(eq(episodes.projectId, projectId))
      .orderBy(asc(episodes.episodeNumber));
  }

  /** Earlier episodes of the same project, oldest first */
  listPrevious(episode: Pick<Episode, 'projectId' | 'episodeNumber'>): Promise<Episode[]> {
    return this.db
      .select()
      .from(episodes)
      .where(and(eq(episodes.projectId, episode.projectId), lt(episodes.episodeNumber, episode.episodeNumber)))
      .orderBy(asc(episodes.episodeNumber));
  }

  /**
   * Append episode max+1. Flags the caller leaves out come from the project;
   * with `orFlags` a false flag is still switched on when the project has it on.
   */
  async createNext(project: Project, input: EpisodeInput, orFlags = true): Promise<Episode> {
    const [row] = await this.db
      .select({ value: max(episodes.episodeNumber) })
      .from(episodes)
      .where(eq(episodes.projectId, project.id));
    const episodeNumber = (row?.value ?? 0) + 1;

    const resolveFlag = (requested: boolean | undefined, projectFlag: boolean): boolean =>
      requested === undefined ? projectFlag : orFlags ? requested || projectFlag : requested;

    const [episode] = await this.db
      .insert(episodes)
      .values({
        projectId: project.id,
        episodeNumber,
        title: input.title || `Episode ${episodeNumber}`,
        titleAutoGenerated: input.titleAutoGenerated ?? true,
        showEpisodeNumber: input.showEpisodeNumber ?? true,
        description: input.description,
        targetDurationMinutes: input.targetDurationMinutes ?? 10,
        includeSoundEffects: resolveFlag(input.includeSoundEffects, project.includeSoundEffects),
        includeBackgroundMusic: resolveFlag(input.includeBackgroundMusic, project.includeBackgroundMusic),
        status: 'draft',
      })
      .returning();
    if (!episode) {
      throw new Error('Episode insert returned no row');
    }

    await this.db.update(projects).set({ updatedAt: new Date() }).where(eq(projects.id, project.id));
    logger.info('Episode created', { projectId: project.id, episodeId: episode.id, episodeNumber });
    return episode;
  }

  async update(userId: string, episodeId: string, changes: EpisodeUpdate): Promise<Episode> {
    await this.getOwned(userId, episodeId);
    const values: EpisodePatch = { ...changes };
    if (changes.title != null) {
      values.titleAutoGenerated = changes.titleAutoGenerated ?? false;
    }
    return this.patch(episodeId, values);
  }

  /**
   * Persist pipeline results; always bumps updated_at
   */
  async patch(episodeId: string, values: EpisodePatch): Promise<Episode> {
    const [episode] = await this.db
      .update(episodes)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(episodes.id, episodeId))
      .returning();
    if (!episode) {
      throw new NotFoundError('Episode', episodeId);
    }
    return episode;
  }

  /**
   * Only the highest-numbered episode of a project may be deleted
   */
  async delete(userId: string, episodeId: string): Promise<void> {
    const episode = await this.getOwned(userId, episodeId);

    const [row] = await this.db
      .select({ value: max(episodes.episodeNumber) })
      .from(episodes)
      .where(eq(episodes.projectId, episode.projectId));
    if (episode.episodeNumber !== (row?.value ?? 0)) {
      throw new EpisodeDeletionError('Only the last episode can be deleted');
    }

    await this.removeFiles(episodeFiles(episode));
    await this.db.delete(episodes).where(eq(episodes.id, episode.id));
    logger.info('Episode deleted', { episodeId, projectId: episode.projectId });
  }

  async updateScript(userId: string, episodeId: string, script: Script, scriptText?: string | null): Promise<Episode> {
    const episode = await this.getOwned(userId, episodeId);

    const values: EpisodePatch = {
      scriptJson: script,
      scriptText: scriptText || buildPlainScriptText(script.lines),
    };
    if (episode.titleAutoGenerated && script.story_title) {
      values.title = script.story_title;
    }
    if (episode.status !== 'draft' && episode.status !== 'script_generating') {
      values.status = 'script_done';
    }
    return this.patch(episode.id, values);
  }

  async createContinuation(userId: string, episodeId: string, input: EpisodeInput): Promise<Episode> {
    const parent = await this.getOwned(userId, episodeId);
    if (parent.status !== 'done') {
      throw new BusinessLogicError('Parent episode must be completed before creating a continuation');
    }
    const project = await this.getProject(parent);
    return this.createNext(project, input, false);
  }

  /**
   * Drop one cover variant; the first remaining one becomes selected if needed
   */
  async deleteCoverVariant(userId: string, episodeId: string, variantIndex: number): Promise<number> {
    const episode = await this.getOwned(userId, episodeId);
    const variants = [...(episode.coverVariantsJson ?? [])];
    if (variants.length === 0) {
      throw new BusinessLogicError('No cover variants available');
    }

    const removed = variants[variantIndex];
    if (!removed) {
      throw new BusinessLogicError(`Invalid variant index: ${variantIndex}`);
    }

    await this.storage.deleteFile(removed.url);
    variants.splice(variantIndex, 1);

    let coverUrl = episode.coverUrl;
    const first = variants[0];
    if (!first) {
      coverUrl = null;
    } else if (removed.selected) {
      variants[0] = { ...first, selected: true };
      coverUrl = first.url;
    }

    await this.patch(episode.id, { coverVariantsJson: variants.length > 0 ? variants : null, coverUrl });
    return variants.length;
  }

  /**
   * Remove voice and final audio; the episode goes back to script_done
   */
  async deleteAudio(userId: string, episodeId: string): Promise<string[]> {
    const episode = await this.getOwned(userId, episodeId);
    const deleted: string[] = [];

    for (const url of [episode.voiceAudioUrl, episode.finalAudioUrl]) {
      if (url && (await this.storage.deleteFile(url))) {
        deleted.push(url);
      }
    }

    await this.patch(episode.id, {
      voiceAudioUrl: null,
      voiceAudioDurationSeconds: null,
      finalAudioUrl: null,
      finalAudioDurationSeconds: null,
      status: 'script_done',
    });
    return deleted;
  }

  /**
   * Remove every generated audio artifact (voice, sounds, music, final mix).
   * Returns the kinds that were present; the status is left as is.
   */
  async deleteAudioFiles(userId: string, episodeId: string): Promise<string[]> {
    const episode = await this.getOwned(userId, episodeId);
    const deleted: string[] = [];
    const values: EpisodePatch = {};

    if (episode.voiceAudioUrl) {
      await this.storage.deleteFile(episode.voiceAudioUrl);
      deleted.push('voice_audio');
      values.voiceAudioUrl = null;
      values.voiceAudioDurationSeconds = null;
      values.voiceTimestampsJson = null;
    }
    if (episode.soundsJson) {
      for (const sound of episode.soundsJson) {
        await this.storage.deleteFile(sound.url);
      }
      deleted.push('sounds');
      values.soundsJson = null;
    }
    if (episode.musicUrl) {
      await this.storage.deleteFile(episode.musicUrl);
      deleted.push('music');
      values.musicUrl = null;
      values.musicCompositionPlan = null;
    }
    if (episode.finalAudioUrl) {
      await this.storage.deleteFile(episode.finalAudioUrl);
      deleted.push('final_audio');
      values.finalAudioUrl = null;
      values.finalAudioDurationSeconds = null;
    }

    if (deleted.length > 0) {
      await this.patch(episode.id, values);
    }
    return deleted;
  }

  async removeFiles(files: string[]): Promise<number> {
    const results = await Promise.all(files.map((file) => this.storage.deleteFile(file)));
    return results.filter(Boolean).length;
  }
}
