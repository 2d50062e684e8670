import { pgEnum } from "drizzle-orm/pg-core";

// -----------------------------------------------------------------------------
// Enumerated types
// -----------------------------------------------------------------------------

export const EPISODE_STATUSES = [
  'draft',
  'script_generating',
  'script_done',
  'voiceover_generating',
  'voiceover_done',
  'sounds_generating',
  'sounds_done',
  'music_generating',
  'music_done',
  'merging',
  'audio_done',
  'cover_generating',
  'done',
  'error',
] as const;

export type EpisodeStatus = (typeof EPISODE_STATUSES)[number];

export const episodeStatusEnum = pgEnum("episode_status", EPISODE_STATUSES);
export const llmProviderEnum = pgEnum("llm_provider", ['openrouter', 'polza', 'openai']);
export const storageTypeEnum = pgEnum("storage_type", ['local', 'google_drive']);
export const languageEnum = pgEnum("language", ['ru', 'en', 'de']);
