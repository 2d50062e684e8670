/**
 * Static vendor configuration: LLM providers, ElevenLabs and kie.ai endpoints,
 * audio limits and the default prompts shipped with the service.
 */
import llmProviders from './data/llm-providers.json';
import defaultPrompts from './data/default-prompts.json';

export const LLM_PROVIDER_IDS = ['openrouter', 'polza', 'openai'] as const;

export type LLMProviderId = (typeof LLM_PROVIDER_IDS)[number];

export interface LLMProviderConfig {
  base_url: string;
  models: string[];
}

export const LLM_PROVIDERS: Record<LLMProviderId, LLMProviderConfig> = llmProviders;

export function isLLMProvider(value: string | null | undefined): value is LLMProviderId {
  return LLM_PROVIDER_IDS.some((id) => id === value);
}

export function getProviderModels(provider: string | null | undefined): string[] {
  return isLLMProvider(provider) ? LLM_PROVIDERS[provider].models : [];
}

export const ELEVENLABS_BASE_URL = 'https://api.elevenlabs.io';

export const ELEVENLABS_ENDPOINTS = {
  textToDialogue: '/v1/text-to-dialogue/with-timestamps',
  soundGeneration: '/v1/sound-generation',
  musicPlan: '/v1/music/plan',
  music: '/v1/music',
  voices: '/v1/voices',
} as const;

export const ELEVENLABS_DIALOGUE_MODEL = 'eleven_multilingual_v2';
export const ELEVENLABS_OUTPUT_FORMAT = 'mp3_44100_128';

export const KIEAI_BASE_URL = 'https://kieai.erweima.ai';

export const KIEAI_ENDPOINTS = {
  createTask: '/api/v1/jobs/createTask',
  recordInfo: '/api/v1/jobs/recordInfo',
} as const;

export const KIEAI_MODEL = 'nano-banana-pro';

export const AUDIO_SETTINGS = {
  maxCharsPerRequest: 4800,
  charsPerMinute: 850,
  maxParts: 3,
  // Rough speaking rate used to place sound effects on the voice timeline
  charsPerSecond: 14,
  defaultSoundDurationSeconds: 3,
  musicMinMs: 3000,
  musicMaxMs: 300000,
} as const;

// Upper bounds for outbound vendor requests, in milliseconds
export const REQUEST_TIMEOUTS_MS = {
  dialogue: 300000,
  soundEffect: 120000,
  musicPlan: 60000,
  music: 300000,
  voices: 30000,
  kieai: 30000,
  download: 60000,
} as const;

export type ElevenLabsTimeouts = Record<'dialogue' | 'soundEffect' | 'musicPlan' | 'music' | 'voices', number>;

export const MAX_CHARACTERS_PER_PROJECT = 5;
export const MAX_COVER_VARIANTS = 4;
export const STORAGE_TYPES = ['local', 'google_drive'] as const;
export const APP_VERSION = '1.0.0';

export const DEFAULT_PROMPTS = defaultPrompts;
export const DEFAULT_AI_WRITER_PROMPT = defaultPrompts.ai_writer_prompt;
export const DEFAULT_COVER_PROMPT_TEMPLATE = defaultPrompts.cover_prompt_template;
