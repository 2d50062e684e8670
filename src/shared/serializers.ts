/**
 * Response shapes: database rows to snake_case API payloads.
 * Vendor secrets never leave the server, only their presence.
 */

import { DEFAULT_AI_WRITER_PROMPT, DEFAULT_COVER_PROMPT_TEMPLATE } from '@/config/providers.js';
import type { CoverStyle } from '@/db/schema/cover-styles.js';
import type { Episode } from '@/db/schema/episodes.js';
import type { ProjectTemplate } from '@/db/schema/projects.js';
import type { ApiKey, User } from '@/db/schema/users.js';
import type { Voice } from '@/db/schema/voices.js';
import { displayTitle } from '@/services/episodes.js';
import type { ProjectDetail, ProjectWithCounts } from '@/services/projects.js';
import type { CharacterWithVoice } from '@/shared/script.js';

export function serializeUser(user: User) {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    language: user.language,
    is_active: user.isActive,
    created_at: user.createdAt,
    updated_at: user.updatedAt,
    has_llm_api_key: Boolean(user.llmApiKey),
    has_elevenlabs_api_key: Boolean(user.elevenlabsApiKey),
    has_kieai_api_key: Boolean(user.kieaiApiKey),
    llm_provider: user.llmProvider,
    llm_model: user.llmModel,
    storage_type: user.storageType,
  };
}

export function serializeSettings(user: User) {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    language: user.language,
    llm_provider: user.llmProvider,
    llm_model: user.llmModel,
    has_llm_api_key: Boolean(user.llmApiKey),
    has_elevenlabs_api_key: Boolean(user.elevenlabsApiKey),
    has_kieai_api_key: Boolean(user.kieaiApiKey),
    storage_type: user.storageType,
    has_google_drive_credentials: Boolean(user.googleDriveCredentials),
    ai_writer_prompt: user.aiWriterPrompt ?? DEFAULT_AI_WRITER_PROMPT,
    cover_prompt_template: user.coverPromptTemplate ?? DEFAULT_COVER_PROMPT_TEMPLATE,
    telegram_chat_id: user.telegramChatId,
  };
}

export function serializeApiKey(apiKey: ApiKey) {
  return {
    id: apiKey.id,
    name: apiKey.name,
    expires_at: apiKey.expiresAt,
    last_used_at: apiKey.lastUsedAt,
    is_active: apiKey.isActive,
    created_at: apiKey.createdAt,
  };
}

export function serializeVoice(voice: Voice) {
  return {
    id: voice.id,
    user_id: voice.userId,
    name: voice.name,
    elevenlabs_name: voice.elevenlabsName,
    elevenlabs_voice_id: voice.elevenlabsVoiceId,
    description: voice.description,
    is_favorite: voice.isFavorite,
    created_at: voice.createdAt,
    updated_at: voice.updatedAt,
  };
}

export function serializeCharacter(character: CharacterWithVoice) {
  return {
    id: character.id,
    project_id: character.projectId,
    voice_id: character.voiceId,
    role: character.role,
    character_name: character.characterName,
    sort_order: character.sortOrder,
    created_at: character.createdAt,
    voice_name: character.voice?.name ?? null,
    elevenlabs_name: character.voice?.elevenlabsName ?? null,
    elevenlabs_voice_id: character.voice?.elevenlabsVoiceId ?? null,
  };
}

export function serializeProject(project: ProjectWithCounts) {
  return {
    id: project.id,
    user_id: project.userId,
    title: project.title,
    description: project.description,
    genre_tone: project.genreTone,
    musical_atmosphere: project.musicalAtmosphere,
    include_sound_effects: project.includeSoundEffects,
    include_background_music: project.includeBackgroundMusic,
    cover_url: project.coverUrl,
    cover_prompt: project.coverPrompt,
    created_at: project.createdAt,
    updated_at: project.updatedAt,
    episodes_count: project.episodesCount,
    characters_count: project.charactersCount,
  };
}

export function serializeProjectDetail(project: ProjectDetail) {
  return {
    ...serializeProject(project),
    characters: project.characters.map(serializeCharacter),
    latest_episode_number: project.latestEpisodeNumber,
    latest_episode_status: project.latestEpisodeStatus,
  };
}

export function serializeEpisode(episode: Episode) {
  return {
    id: episode.id,
    project_id: episode.projectId,
    episode_number: episode.episodeNumber,
    title: episode.title,
    display_title: displayTitle(episode),
    title_auto_generated: episode.titleAutoGenerated,
    show_episode_number: episode.showEpisodeNumber,
    description: episode.description,
    target_duration_minutes: episode.targetDurationMinutes,
    include_sound_effects: episode.includeSoundEffects,
    include_background_music: episode.includeBackgroundMusic,
    status: episode.status,
    error_message: episode.errorMessage,
    has_script: Boolean(episode.scriptJson),
    script_text: episode.scriptText,
    voice_audio_url: episode.voiceAudioUrl,
    voice_audio_duration_seconds: episode.voiceAudioDurationSeconds,
    final_audio_url: episode.finalAudioUrl,
    final_audio_duration_seconds: episode.finalAudioDurationSeconds,
    music_url: episode.musicUrl,
    cover_url: episode.coverUrl,
    cover_variants_count: episode.coverVariantsJson?.length ?? 0,
    summary: episode.summary,
    created_at: episode.createdAt,
    updated_at: episode.updatedAt,
  };
}

export function serializeEpisodeDetail(episode: Episode) {
  return {
    ...serializeEpisode(episode),
    script_json: episode.scriptJson,
    voice_timestamps_json: episode.voiceTimestampsJson,
    sounds_json: episode.soundsJson,
    music_composition_plan: episode.musicCompositionPlan,
    cover_reference_image_url: episode.coverReferenceImageUrl,
    cover_variants_json: episode.coverVariantsJson,
  };
}

export function serializeCoverStyle(style: CoverStyle) {
  return {
    id: style.id,
    key: style.key,
    name: style.name,
    emoji: style.emoji,
    instructions: style.instructions,
    mood: style.mood,
    is_active: style.isActive,
    sort_order: style.sortOrder,
  };
}

export function serializeTemplate(template: ProjectTemplate) {
  return {
    id: template.id,
    name: template.name,
    genre_tone: template.genreTone,
    musical_atmosphere: template.musicalAtmosphere,
    include_sound_effects: template.includeSoundEffects,
    include_background_music: template.includeBackgroundMusic,
    target_duration_minutes: template.targetDurationMinutes,
    cover_style: template.coverStyle,
    characters: template.charactersJson ?? [],
    created_at: template.createdAt,
  };
}
