/**
 * Project Service
 * Projects, their cast of characters and episode numbering
 */

import { and, asc, count, desc, eq, max } from 'drizzle-orm';
import { logger } from '@/config/logger.js';
import { MAX_CHARACTERS_PER_PROJECT } from '@/config/providers.js';
import { getDatabase } from '@/db/connection.js';
import { episodes, type Episode } from '@/db/schema/episodes.js';
import { projectCharacters, projects, type NewProject, type Project } from '@/db/schema/projects.js';
import { voices, type Voice } from '@/db/schema/voices.js';
import { MaxCharactersExceededError, NotFoundError } from '@/shared/errors.js';
import type { CharacterWithVoice } from '@/shared/script.js';

export type ProjectInput = Pick<
  NewProject,
  'title' | 'description' | 'genreTone' | 'musicalAtmosphere' | 'includeSoundEffects' | 'includeBackgroundMusic'
>;

export interface CharacterInput {
  voiceId: string;
  role: string;
  characterName: string;
  sortOrder?: number | undefined;
}

export interface ProjectWithCounts extends Project {
  episodesCount: number;
  charactersCount: number;
}

export interface ProjectDetail extends ProjectWithCounts {
  characters: CharacterWithVoice[];
  latestEpisodeNumber: number;
  latestEpisodeStatus: Episode['status'] | null;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}

export class ProjectService {
  private db = getDatabase();

  /**
   * Most recently updated first
   */
  async list(userId: string, page: number, pageSize: number): Promise<Page<ProjectWithCounts>> {
    const [totalRow] = await this.db.select({ value: count() }).from(projects).where(eq(projects.userId, userId));

    const rows = await this.db
      .select()
      .from(projects)
      .where(eq(projects.userId, userId))
      .orderBy(desc(projects.updatedAt))
      .offset((page - 1) * pageSize)
      .limit(pageSize);

    const items = await Promise.all(rows.map((project) => this.withCounts(project)));
    return { items, total: totalRow?.value ?? 0, page, pageSize };
  }

  async getOwned(userId: string, projectId: string): Promise<Project> {
    const [project] = await this.db
      .select()
      .from(projects)
      .where(and(eq(projects.id, projectId), eq(projects.userId, userId)))
      .limit(1);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }
    return project;
  }

  async getDetail(userId: string, projectId: string): Promise<ProjectDetail> {
    const project = await this.getOwned(userId, projectId);
    const characters = await this.listCharacters(project.id);

    const [latest] = await this.db
      .select({ episodeNumber: episodes.episodeNumber, status: episodes.status })
      .from(episodes)
      .where(eq(episodes.projectId, project.id))
      .orderBy(desc(episodes.episodeNumber))
      .limit(1);

    return {
      ...(await this.withCounts(project)),
      charactersCount: characters.length,
      characters,
      latestEpisodeNumber: latest?.episodeNumber ?? 0,
      latestEpisodeStatus: latest?.status ?? null,
    };
  }

  async create(userId: string, input: ProjectInput): Promise<ProjectWithCounts> {
    const [project] = await this.db
      .insert(projects)
      .values({ ...input, userId })
      .returning();
    if (!project) {
      throw new Error('Project insert returned no row');
    }
    logger.info('Project created', { userId, projectId: project.id });
    return { ...project, episodesCount: 0, charactersCount: 0 };
  }

  async update(userId: string, projectId: string, changes: Partial<ProjectInput>): Promise<ProjectWithCounts> {
    await this.getOwned(userId, projectId);
    const [project] = await this.db
      .update(projects)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(projects.id, projectId))
      .returning();
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }
    return this.withCounts(project);
  }

  async setCover(projectId: string, coverUrl: string | null): Promise<void> {
    await this.db.update(projects).set({ coverUrl, updatedAt: new Date() }).where(eq(projects.id, projectId));
  }

  /**
   * Episodes and characters go with the project (cascade)
   */
  async delete(userId: string, projectId: string): Promise<Episode[]> {
    await this.getOwned(userId, projectId);
    const removedEpisodes = await this.db.select().from(episodes).where(eq(episodes.projectId, projectId));
    await this.db.delete(projects).where(eq(projects.id, projectId));
    logger.info('Project deleted', { userId, projectId, episodes: removedEpisodes.length });
    return removedEpisodes;
  }

  touch(projectId: string): Promise<unknown> {
    return this.db.update(projects).set({ updatedAt: new Date() }).where(eq(projects.id, projectId));
  }

  // ---------------------------------------------------------------------------
  // Characters
  // ---------------------------------------------------------------------------

  listCharacters(projectId: string): Promise<CharacterWithVoice[]> {
    return this.db.query.projectCharacters.findMany({
      where: eq(projectCharacters.projectId, projectId),
      orderBy: [asc(projectCharacters.sortOrder)],
      with: { voice: true },
    });
  }

  async addCharacter(userId: string, projectId: string, input: CharacterInput): Promise<CharacterWithVoice> {
    const project = await this.getOwned(userId, projectId);

    const [existing] = await this.db
      .select({ value: count() })
      .from(projectCharacters)
      .where(eq(projectCharacters.projectId, project.id));
    if ((existing?.value ?? 0) >= MAX_CHARACTERS_PER_PROJECT) {
      throw new MaxCharactersExceededError(MAX_CHARACTERS_PER_PROJECT);
    }

    const voice = await this.findUserVoice(userId, input.voiceId);
    const [character] = await this.db
      .insert(projectCharacters)
      .values({
        projectId: project.id,
        voiceId: voice.id,
        role: input.role,
        characterName: input.characterName,
        sortOrder: input.sortOrder ?? 0,
      })
      .returning();
    if (!character) {
      throw new Error('Character insert returned no row');
    }

    await this.touch(project.id);
    return { ...character, voice };
  }

  async updateCharacter(
    userId: string,
    projectId: string,
    characterId: string,
    changes: Partial<CharacterInput>,
  ): Promise<CharacterWithVoice> {
    const project = await this.getOwned(userId, projectId);
    const current = await this.findCharacter(project.id, characterId);

    const voice = changes.voiceId ? await this.findUserVoice(userId, changes.voiceId) : current.voice;
    const [character] = await this.db
      .update(projectCharacters)
      .set({
        voiceId: voice?.id ?? current.voiceId,
        role: changes.role ?? current.role,
        characterName: changes.characterName ?? current.characterName,
        sortOrder: changes.sortOrder ?? current.sortOrder,
      })
      .where(eq(projectCharacters.id, characterId))
      .returning();
    if (!character) {
      throw new NotFoundError('Character', characterId);
    }

    await this.touch(project.id);
    return { ...character, voice };
  }

  async removeCharacter(userId: string, projectId: string, characterId: string): Promise<void> {
    const project = await this.getOwned(userId, projectId);
    await this.findCharacter(project.id, characterId);
    await this.db.delete(projectCharacters).where(eq(projectCharacters.id, characterId));
    await this.touch(project.id);
  }

  async nextEpisodeNumber(projectId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: max(episodes.episodeNumber) })
      .from(episodes)
      .where(eq(episodes.projectId, projectId));
    return (row?.value ?? 0) + 1;
  }

  private async findCharacter(projectId: string, characterId: string): Promise<CharacterWithVoice> {
    const character = await this.db.query.projectCharacters.findFirst({
      where: and(eq(projectCharacters.id, characterId), eq(projectCharacters.projectId, projectId)),
      with: { voice: true },
    });
    if (!character) {
      throw new NotFoundError('Character', characterId);
    }
    return character;
  }

  private async findUserVoice(userId: string, voiceId: string): Promise<Voice> {
    const [voice] = await this.db
      .select()
      .from(voices)
      .where(and(eq(voices.id, voiceId), eq(voices.userId, userId)))
      .limit(1);
    if (!voice) {
      throw new NotFoundError('Voice', voiceId);
    }
    return voice;
  }

  private async withCounts(project: Project): Promise<ProjectWithCounts> {
    const [episodeCount] = await this.db
      .select({ value: count() })
      .from(episodes)
      .where(eq(episodes.projectId, project.id));
    const [characterCount] = await this.db
      .select({ value: count() })
      .from(projectCharacters)
      .where(eq(projectCharacters.projectId, project.id));
    return {
      ...project,
      episodesCount: episodeCount?.value ?? 0,
      charactersCount: characterCount?.value ?? 0,
    };
  }
}
