import { pgTable, uuid, varchar, timestamp, text, boolean, integer, index, json } from "drizzle-orm/pg-core";
import type { TemplateCharacter } from '../../types/pipeline';
import { users } from './users';
import { voices } from './voices';

// -----------------------------------------------------------------------------
// Projects domain
// -----------------------------------------------------------------------------

export const projects = pgTable("projects", {
  id: uuid("id").primaryKey().defaultRandom(),
  userId: uuid("user_id").notNull().references(() => users.id, { onDelete: 'cascade' }),
  title: varchar("title", { length: 200 }).notNull(),
  description: text("description").notNull(),
  genreTone: varchar("genre_tone", { length: 200 }).notNull(),
  musicalAtmosphere: varchar("musical_atmosphere", { length: 500 }),
  includeSoundEffects: boolean("include_sound_effects").default(false).notNull(),
  includeBackgroundMusic: boolean("include_background_music").default(false).notNull(),
  coverUrl: varchar("cover_url", { length: 500 }),
  coverPrompt: text("cover_prompt"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  userIdIdx: index("projects_user_id_idx").on(table.userId),
  updatedAtIdx: index("projects_updated_at_idx").on(table.updatedAt),
}));

// Characters cast in a project, each bound to a library voice
export const projectCharacters = pgTable("project_characters", {
  id: uuid("id").primaryKey().defaultRandom(),
  projectId: uuid("project_id").notNull().references(() => projects.id, { onDelete: 'cascade' }),
  voiceId: uuid("voice_id").notNull().references(() => voices.id, { onDelete: 'restrict' }),
  role: varchar("role", { length: 100 }).notNull(),
  characterName: varchar("character_name", { length: 100 }).notNull(),
  sortOrder: integer("sort_order").default(0).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  projectIdIdx: index("project_characters_project_id_idx").on(table.projectId),
}));

export const projectTemplates = pgTable("project_templates", {
  id: uuid("id").primaryKey().defaultRandom(),
  userId: uuid("user_id").notNull().references(() => users.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 255 }).notNull(),
  genreTone: varchar("genre_tone", { length: 200 }),
  musicalAtmosphere: varchar("musical_atmosphere", { length: 500 }),
  includeSoundEffects: boolean("include_sound_effects").default(true).notNull(),
  includeBackgroundMusic: boolean("include_background_music").default(true).notNull(),
  targetDurationMinutes: integer("target_duration_minutes").default(10).notNull(),
  coverStyle: varchar("cover_style", { length: 50 }),
  charactersJson: json("characters_json").$type<TemplateCharacter[]>(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  userIdIdx: index("project_templates_user_id_idx").on(table.userId),
}));

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------
export type Project = typeof projects.$inferSelect;
export type NewProject = typeof projects.$inferInsert;

export type ProjectCharacter = typeof projectCharacters.$inferSelect;
export type NewProjectCharacter = typeof projectCharacters.$inferInsert;

export type ProjectTemplate = typeof projectTemplates.$inferSelect;
export type NewProjectTemplate = typeof projectTemplates.$inferInsert;
