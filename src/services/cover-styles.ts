/**
 * Cover Style Service
 * Editable cover style presets stored in the database
 */

import { asc, eq } from 'drizzle-orm';
import coverStylesData from '@/config/data/cover-styles.json';
import { logger } from '@/config/logger.js';
import { getDatabase } from '@/db/connection.js';
import { coverStyles, type CoverStyle, type NewCoverStyle } from '@/db/schema/cover-styles.js';
import { BusinessLogicError, NotFoundError } from '@/shared/errors.js';
import { AUTO_STYLE, DEFAULT_COVER_STYLES, type CoverStylePreset } from './cover.js';

export type CoverStyleInput = Pick<NewCoverStyle, 'key' | 'name' | 'emoji' | 'instructions' | 'mood' | 'sortOrder'>;

export type CoverStyleUpdate = Partial<Omit<CoverStyleInput, 'key'> & { isActive: boolean }>;

export class CoverStyleService {
  private db = getDatabase();

  list(activeOnly = false): Promise<CoverStyle[]> {
    return this.db
      .select()
      .from(coverStyles)
      .where(activeOnly ? eq(coverStyles.isActive, true) : undefined)
      .orderBy(asc(coverStyles.sortOrder));
  }

  async create(input: CoverStyleInput): Promise<CoverStyle> {
    const [existing] = await this.db
      .select({ id: coverStyles.id })
      .from(coverStyles)
      .where(eq(coverStyles.key, input.key))
      .limit(1);
    if (existing) {
      throw new BusinessLogicError('Style key already exists');
    }

    const [style] = await this.db.insert(coverStyles).values(input).returning();
    if (!style) {
      throw new Error('Cover style insert returned no row');
    }
    return style;
  }

  async update(styleId: string, changes: CoverStyleUpdate): Promise<CoverStyle> {
    const [style] = await this.db
      .update(coverStyles)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(coverStyles.id, styleId))
      .returning();
    if (!style) {
      throw new NotFoundError('Style');
    }
    return style;
  }

  async delete(styleId: string): Promise<void> {
    const [style] = await this.db.select().from(coverStyles).where(eq(coverStyles.id, styleId)).limit(1);
    if (!style) {
      throw new NotFoundError('Style');
    }
    if (style.key === AUTO_STYLE) {
      throw new BusinessLogicError("Cannot delete 'auto' style");
    }
    await this.db.delete(coverStyles).where(eq(coverStyles.id, styleId));
  }

  /**
   * Active presets for prompt building; the bundled set when the table is empty or unreachable
   */
  async getPresets(): Promise<CoverStylePreset[]> {
    try {
      const rows = await this.list(true);
      if (rows.length > 0) {
        return rows.map(({ key, name, instructions, mood }) => ({ key, name, instructions, mood }));
      }
    } catch (error) {
      logger.warn('Failed to load cover styles, using bundled presets', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return DEFAULT_COVER_STYLES;
  }

  /**
   * Insert bundled presets whose key is not in the table yet
   */
  async seedDefaults(): Promise<number> {
    const inserted = await this.db
      .insert(coverStyles)
      .values(
        coverStylesData.styles.map((style) => ({
          key: style.key,
          name: style.name,
          instructions: style.instructions,
          mood: style.mood,
          sortOrder: style.sort_order,
        })),
      )
      .onConflictDoNothing({ target: coverStyles.key })
      .returning({ id: coverStyles.id });

    logger.info('Cover styles seeded', { inserted: inserted.length });
    return inserted.length;
  }
}
