// Row builders shared by the service and route tests
import type { Episode } from '@/db/schema/episodes.js';
import type { Project } from '@/db/schema/projects.js';
import type { User } from '@/db/schema/users.js';
import type { Voice } from '@/db/schema/voices.js';
import type { FetchLike } from '@/services/storage.js';

const CREATED_AT = new Date('2026-01-15T10:00:00.000Z');

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 'user-1',
    email: 'writer@example.com',
    username: 'writer',
    passwordHash: 'hash',
    llmProvider: 'openrouter',
    llmApiKey: null,
    llmModel: null,
    elevenlabsApiKey: null,
    kieaiApiKey: null,
    storageType: 'local',
    googleDriveCredentials: null,
    telegramChatId: null,
    aiWriterPrompt: null,
    coverPromptTemplate: null,
    language: 'en',
    isActive: true,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

export function makeProject(overrides: Partial<Project> = {}): Project {
  return {
    id: 'project-1',
    userId: 'user-1',
    title: 'Harbor Lights',
    description: 'A lighthouse keeper and the storm',
    genreTone: 'thriller',
    musicalAtmosphere: null,
    includeSoundEffects: false,
    includeBackgroundMusic: false,
    coverUrl: null,
    coverPrompt: null,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

export function makeEpisode(overrides: Partial<Episode> = {}): Episode {
  return {
    id: 'episode-1',
    projectId: 'project-1',
    episodeNumber: 1,
    title: 'Episode 1',
    titleAutoGenerated: true,
    showEpisodeNumber: true,
    description: 'The storm arrives',
    targetDurationMinutes: 10,
    scriptJson: null,
    scriptText: null,
    summary: null,
    includeSoundEffects: false,
    includeBackgroundMusic: false,
    voiceAudioUrl: null,
    voiceAudioDurationSeconds: null,
    voiceTimestampsJson: null,
    soundsJson: null,
    musicUrl: null,
    musicCompositionPlan: null,
    finalAudioUrl: null,
    finalAudioDurationSeconds: null,
    coverUrl: null,
    coverReferenceImageUrl: null,
    coverVariantsJson: null,
    status: 'draft',
    errorMessage: null,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

export function makeVoice(overrides: Partial<Voice> = {}): Voice {
  return {
    id: 'voice-1',
    userId: 'user-1',
    name: 'Narrator',
    elevenlabsName: 'Adam',
    elevenlabsVoiceId: 'el-adam',
    description: null,
    isFavorite: false,
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

/** A fetch that never answers and rejects only once its abort signal fires */
export const unansweredFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (signal) {
      signal.addEventListener('abort', () => reject(signal.reason));
    }
  });
