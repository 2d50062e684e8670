/**
 * Voice Service
 * The user's voice library: named references to ElevenLabs voices
 */

import { and, asc, desc, eq, ilike, or, type SQL } from 'drizzle-orm';
import { logger } from '@/config/logger.js';
import { getDatabase } from '@/db/connection.js';
import { projectCharacters } from '@/db/schema/projects.js';
import { voices, type NewVoice, type Voice } from '@/db/schema/voices.js';
import { BusinessLogicError, NotFoundError } from '@/shared/errors.js';

export interface VoiceListFilters {
  search?: string | undefined;
  favoritesOnly?: boolean | undefined;
}

export type VoiceInput = Omit<NewVoice, 'id' | 'userId' | 'createdAt' | 'updatedAt'>;

export class VoiceService {
  private db = getDatabase();

  /**
   * Favorites first, then alphabetical
   */
  list(userId: string, filters: VoiceListFilters = {}): Promise<Voice[]> {
    const conditions: SQL[] = [eq(voices.userId, userId)];
    if (filters.favoritesOnly) {
      conditions.push(eq(voices.isFavorite, true));
    }
    if (filters.search) {
      const pattern = `%${filters.search}%`;
      const match = or(ilike(voices.name, pattern), ilike(voices.elevenlabsName, pattern));
      if (match) {
        conditions.push(match);
      }
    }

    return this.db
      .select()
      .from(voices)
      .where(and(...conditions))
      .orderBy(desc(voices.isFavorite), asc(voices.name));
  }

  async getOwned(userId: string, voiceId: string): Promise<Voice> {
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

  async create(userId: string, input: VoiceInput): Promise<Voice> {
    const [voice] = await this.db
      .insert(voices)
      .values({ ...input, userId })
      .returning();
    if (!voice) {
      throw new Error('Voice insert returned no row');
    }
    logger.info('Voice added', { userId, voiceId: voice.id, elevenlabsVoiceId: voice.elevenlabsVoiceId });
    return voice;
  }

  async update(userId: string, voiceId: string, changes: Partial<VoiceInput>): Promise<Voice> {
    await this.getOwned(userId, voiceId);
    const [voice] = await this.db
      .update(voices)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(voices.id, voiceId))
      .returning();
    if (!voice) {
      throw new NotFoundError('Voice', voiceId);
    }
    return voice;
  }

  async delete(userId: string, voiceId: string): Promise<void> {
    await this.getOwned(userId, voiceId);

    const [inUse] = await this.db
      .select({ id: projectCharacters.id })
      .from(projectCharacters)
      .where(eq(projectCharacters.voiceId, voiceId))
      .limit(1);
    if (inUse) {
      throw new BusinessLogicError('Voice is assigned to a project character');
    }

    await this.db.delete(voices).where(eq(voices.id, voiceId));
    logger.info('Voice deleted', { userId, voiceId });
  }

  /**
   * Translate script voice ids (library uuids or raw ElevenLabs ids) to ElevenLabs ids
   */
  async resolveElevenLabsIds(userId: string): Promise<Map<string, string>> {
    const rows = await this.db
      .select({ id: voices.id, elevenlabsVoiceId: voices.elevenlabsVoiceId })
      .from(voices)
      .where(eq(voices.userId, userId));
    return new Map(rows.map((row) => [row.id, row.elevenlabsVoiceId]));
  }
}
