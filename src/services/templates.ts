/**
 * Template Service
 * Saved project presets: genre, atmosphere, flags and a cast outline
 */

import { and, asc, eq } from 'drizzle-orm';
import { getDatabase } from '@/db/connection.js';
import { projectTemplates, type NewProjectTemplate, type ProjectTemplate } from '@/db/schema/projects.js';
import { NotFoundError } from '@/shared/errors.js';

export type TemplateInput = Omit<NewProjectTemplate, 'id' | 'userId' | 'createdAt'>;

export class TemplateService {
  private db = getDatabase();

  list(userId: string): Promise<ProjectTemplate[]> {
    return this.db
      .select()
      .from(projectTemplates)
      .where(eq(projectTemplates.userId, userId))
      .orderBy(asc(projectTemplates.createdAt));
  }

  async create(userId: string, input: TemplateInput): Promise<ProjectTemplate> {
    const [template] = await this.db
      .insert(projectTemplates)
      .values({ ...input, userId })
      .returning();
    if (!template) {
      throw new Error('Template insert returned no row');
    }
    return template;
  }

  async delete(userId: string, templateId: string): Promise<void> {
    const removed = await this.db
      .delete(projectTemplates)
      .where(and(eq(projectTemplates.id, templateId), eq(projectTemplates.userId, userId)))
      .returning({ id: projectTemplates.id });
    if (removed.length === 0) {
      throw new NotFoundError('Template');
    }
  }
}
