/**
 * JSON payloads persisted on episodes and templates
 */

export interface ScriptLine {
  speaker: string;
  voice_id: string;
  text: string;
  sound_effect: string | null;
}

export interface Script {
  story_title: string;
  genre_tone: string;
  approx_duration_minutes: number;
  lines: ScriptLine[];
}

export interface DialogueTimestamps {
  voice_segments: unknown[];
  alignment: unknown;
}

export interface VoiceTimestamps {
  parts: DialogueTimestamps[];
  total_parts: number;
}

export interface SoundEffectEntry {
  prompt: string;
  url: string;
  local_path: string;
  start_time: number;
  duration: number;
}

export interface CoverVariant {
  url: string;
  selected: boolean;
  style?: string;
}

export type MusicCompositionPlan = Record<string, unknown>;

export interface TemplateCharacter {
  role: string;
  character_name: string;
  voice_id?: string;
}
