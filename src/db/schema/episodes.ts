import { pgTable, uuid, varchar, timestamp, text, boolean, integer, index, json, doublePrecision, uniqueIndex } from "drizzle-orm/pg-core";
import type {
  CoverVariant,
  MusicCompositionPlan,
  Script,
  SoundEffectEntry,
  VoiceTimestamps,
} from '../../types/pipeline';
import { episodeStatusEnum } from './enums';
import { projects } from './projects';

// -----------------------------------------------------------------------------
// Episodes: one row per generated audiobook part, mutated step by step
// -----------------------------------------------------------------------------

export const episodes = pgTable("episodes", {
  id: uuid("id").primaryKey().defaultRandom(),
  projectId: uuid("project_id").notNull().references(() => projects.id, { onDelete: 'cascade' }),
  episodeNumber: integer("episode_number").notNull(),
  title: varchar("title", { length: 200 }).notNull(),
  titleAutoGenerated: boolean("title_auto_generated").default(true).notNull(),
  showEpisodeNumber: boolean("show_episode_number").default(true).notNull(),
  description: text("description").notNull(),
  targetDurationMinutes: integer("target_duration_minutes").default(10).notNull(),

  // Script
  scriptJson: json("script_json").$type<Script>(),
  scriptText: text("script_text"),
  summary: text("summary"),

  includeSoundEffects: boolean("include_sound_effects").default(false).notNull(),
  includeBackgroundMusic: boolean("include_background_music").default(false).notNull(),

  // Audio
  voiceAudioUrl: varchar("voice_audio_url", { length: 500 }),
  voiceAudioDurationSeconds: doublePrecision("voice_audio_duration_seconds"),
  voiceTimestampsJson: json("voice_timestamps_json").$type<VoiceTimestamps>(),
  soundsJson: json("sounds_json").$type<SoundEffectEntry[]>(),
  musicUrl: varchar("music_url", { length: 500 }),
  musicCompositionPlan: json("music_composition_plan").$type<MusicCompositionPlan>(),
  finalAudioUrl: varchar("final_audio_url", { length: 500 }),
  finalAudioDurationSeconds: doublePrecision("final_audio_duration_seconds"),

  // Cover
  coverUrl: varchar("cover_url", { length: 500 }),
  coverReferenceImageUrl: varchar("cover_reference_image_url", { length: 500 }),
  coverVariantsJson: json("cover_variants_json").$type<CoverVariant[]>(),

  status: episodeStatusEnum("status").default('draft').notNull(),
  errorMessage: text("error_message"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  projectIdIdx: index("episodes_project_id_idx").on(table.projectId),
  projectNumberIdx: uniqueIndex("episodes_project_number_idx").on(table.projectId, table.episodeNumber),
  statusIdx: index("episodes_status_idx").on(table.status),
}));

export type Episode = typeof episodes.$inferSelect;
export type NewEpisode = typeof episodes.$inferInsert;
