import { describe, it, expect, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

jest.mock('fluent-ffmpeg', () => ({
  __esModule: true,
  default: Object.assign(jest.fn(), { setFfmpegPath: jest.fn(), setFfprobePath: jest.fn(), ffprobe: jest.fn() }),
}));

jest.mock('@ffmpeg-installer/ffmpeg', () => ({
  __esModule: true,
  default: { path: '/usr/bin/ffmpeg' },
}));

import type { Episode } from '@/db/schema/episodes.js';
import type { Project } from '@/db/schema/projects.js';
import type { AudioService } from '@/services/audio.js';
import type { CoverService } from '@/services/cover.js';
import type { ElevenLabsService } from '@/services/elevenlabs.js';
import type { EpisodePatch } from '@/services/episodes.js';
import {
  GenerationService,
  buildMusicPrompt,
  planSoundEffects,
  type GenerationDependencies,
} from '@/services/generation.js';
import type { LLMService } from '@/services/llm.js';
import type { ProjectService } from '@/services/projects.js';
import type { StorageService } from '@/services/storage.js';
import { ElevenLabsError } from '@/shared/errors.js';
import type { Script } from '@/types/pipeline.js';
import { makeEpisode, makeProject, makeUser } from './fixtures.js';

const user = makeUser({ coverPromptTemplate: '{series_name} #{episode_num}: {episode_title}' });

const script: Script = {
  story_title: 'The Storm',
  genre_tone: 'thriller',
  approx_duration_minutes: 3,
  lines: [
    { speaker: 'Narrator', voice_id: 'voice-1', text: 'a'.repeat(28), sound_effect: 'door' },
    { speaker: 'Keeper', voice_id: 'el-direct', text: 'b'.repeat(14), sound_effect: null },
    { speaker: 'Narrator', voice_id: 'voice-1', text: 'c'.repeat(14), sound_effect: 'thunder' },
  ],
};

const emptyTimestamps = { voice_segments: [], alignment: {} };

function harness(initial: Episode, project: Project = makeProject()) {
  let episode = initial;
  const patches: EpisodePatch[] = [];
  let saved = 0;

  const llm = {
    generateScript: jest.fn<LLMService['generateScript']>().mockResolvedValue(script),
    generateSummary: jest.fn<LLMService['generateSummary']>().mockResolvedValue('A recap.'),
  };
  const elevenlabs = {
    generateDialogueInParts: jest
      .fn<ElevenLabsService['generateDialogueInParts']>()
      .mockResolvedValue([{ audio: Buffer.from('voice'), timestamps: emptyTimestamps }]),
    generateSoundEffect: jest.fn<ElevenLabsService['generateSoundEffect']>().mockResolvedValue(Buffer.from('sfx')),
    createMusicPlan: jest.fn<ElevenLabsService['createMusicPlan']>().mockResolvedValue({ sections: [] }),
    generateMusic: jest.fn<ElevenLabsService['generateMusic']>().mockResolvedValue(Buffer.from('music')),
  };
  const cover = {
    generateMultipleCovers: jest.fn<CoverService['generateMultipleCovers']>().mockResolvedValue([
      { url: 'https://img.test/a.png', style: 'tech_noir' },
      { url: 'https://img.test/b.png', style: 'cyberpunk_neon' },
    ]),
    findStyle: jest.fn<CoverService['findStyle']>().mockReturnValue(undefined),
  };
  const storage = {
    saveFile: jest
      .fn<StorageService['saveFile']>()
      .mockImplementation((_data, folder) => Promise.resolve(`/storage/${folder}/file-${++saved}.mp3`)),
    saveFromUrl: jest
      .fn<StorageService['saveFromUrl']>()
      .mockImplementation((url, folder) => Promise.resolve(`/storage/${folder}/${url.split('/').pop() ?? ''}`)),
    deleteFile: jest.fn<StorageService['deleteFile']>().mockResolvedValue(true),
  };
  const audio = {
    getAudioDuration: jest.fn<AudioService['getAudioDuration']>().mockResolvedValue(42.5),
    mergeAudioParts: jest.fn<AudioService['mergeAudioParts']>().mockResolvedValue('/storage/audio/merged.mp3'),
    fullMerge: jest.fn<AudioService['fullMerge']>().mockResolvedValue('/storage/audio/final.mp3'),
    mixVoiceWithMusic: jest.fn<AudioService['mixVoiceWithMusic']>().mockResolvedValue('/storage/audio/mixed.mp3'),
  };
  const setCover = jest.fn<ProjectService['setCover']>().mockResolvedValue(undefined);

  const deps: GenerationDependencies = {
    episodes: {
      getOwned: () => Promise.resolve(episode),
      getProject: () => Promise.resolve(project),
      listPrevious: () => Promise.resolve([]),
      patch: (_episodeId, values) => {
        patches.push(values);
        episode = { ...episode, ...values };
        return Promise.resolve(episode);
      },
    },
    projects: { listCharacters: () => Promise.resolve([]), setCover },
    voices: { resolveElevenLabsIds: () => Promise.resolve(new Map([['voice-1', 'el-adam']])) },
    coverStyles: { getPresets: () => Promise.resolve([]) },
    storage,
    audio,
    llm: () => llm,
    elevenlabs: () => elevenlabs,
    cover: () => cover,
  };

  return {
    service: new GenerationService(deps),
    patches,
    current: () => episode,
    llm,
    elevenlabs,
    cover,
    storage,
    audio,
    setCover,
  };
}

describe('planSoundEffects', () => {
  it('places each cue at the end of its line', () => {
    expect(planSoundEffects(script.lines)).toEqual([
      { prompt: 'door', startTime: 2, lineIndex: 0 },
      { prompt: 'thunder', startTime: 4, lineIndex: 2 },
    ]);
  });
});

describe('buildMusicPrompt', () => {
  it('uses the musical atmosphere, else the genre', () => {
    expect(buildMusicPrompt({ musicalAtmosphere: 'slow strings', genreTone: 'noir' })).toBe(
      'slow strings, instrumental background music for audiobook, ambient, atmospheric',
    );
    expect(buildMusicPrompt({ musicalAtmosphere: null, genreTone: 'noir' })).toBe(
      'noir, instrumental background music for audiobook, ambient, atmospheric',
    );
  });
});

describe('GenerationService', () => {
  describe('generateScript', () => {
    it('stores the script and adopts its title', async () => {
      const h = harness(makeEpisode());

      const result = await h.service.generateScript(user, 'episode-1', { temperature: 0.9 });

      expect(result).toEqual({
        episode_id: 'episode-1',
        status: 'script_done',
        story_title: 'The Storm',
        lines_count: 3,
        estimated_duration_minutes: 3,
      });
      expect(h.patches[0]).toEqual({ status: 'script_generating', errorMessage: null });
      expect(h.current().title).toBe('The Storm');
      expect(h.current().scriptText).toBe(`Narrator: ${'a'.repeat(28)}\nKeeper: ${'b'.repeat(14)}\nNarrator: ${'c'.repeat(14)}`);
      expect(h.llm.generateScript).toHaveBeenCalledWith(
        expect.objectContaining({ title: 'Harbor Lights' }),
        expect.objectContaining({ id: 'episode-1' }),
        [],
        [],
        undefined,
        0.9,
      );
    });

    it('keeps a title the user set', async () => {
      const h = harness(makeEpisode({ title: 'My Title', titleAutoGenerated: false }));

      await h.service.generateScript(user, 'episode-1');

      expect(h.current().title).toBe('My Title');
    });
  });

  describe('generateVoiceover', () => {
    it('requires a script', async () => {
      const h = harness(makeEpisode());

      await expect(h.service.generateVoiceover(user, 'episode-1')).rejects.toThrow(
        'Episode must have a script before generating voiceover',
      );
    });

    it('maps library voices and stores a single part directly', async () => {
      const h = harness(makeEpisode({ scriptJson: script, voiceAudioUrl: '/storage/audio/old.mp3' }));

      const result = await h.service.generateVoiceover(user, 'episode-1');

      expect(result).toEqual({
        episode_id: 'episode-1',
        status: 'voiceover_done',
        audio_url: '/storage/audio/file-1.mp3',
        duration_seconds: 42.5,
        parts_count: 1,
      });
      expect(h.storage.deleteFile).toHaveBeenCalledWith('/storage/audio/old.mp3');
      expect(h.elevenlabs.generateDialogueInParts).toHaveBeenCalledWith([
        { text: 'a'.repeat(28), voice_id: 'el-adam' },
        { text: 'b'.repeat(14), voice_id: 'el-direct' },
        { text: 'c'.repeat(14), voice_id: 'el-adam' },
      ]);
      expect(h.current().voiceTimestampsJson).toEqual({ parts: [emptyTimestamps], total_parts: 1 });
      expect(h.audio.mergeAudioParts).not.toHaveBeenCalled();
    });

    it('concatenates multiple parts', async () => {
      const h = harness(makeEpisode({ scriptJson: script }));
      h.elevenlabs.generateDialogueInParts.mockResolvedValue([
        { audio: Buffer.from('one'), timestamps: emptyTimestamps },
        { audio: Buffer.from('two'), timestamps: emptyTimestamps },
      ]);

      const result = await h.service.generateVoiceover(user, 'episode-1');

      expect(result.audio_url).toBe('/storage/audio/merged.mp3');
      expect(result.parts_count).toBe(2);
      expect(h.audio.mergeAudioParts).toHaveBeenCalledWith([Buffer.from('one'), Buffer.from('two')]);
      expect(h.storage.saveFile).not.toHaveBeenCalled();
    });

    it('records vendor failures on the episode', async () => {
      const h = harness(makeEpisode({ scriptJson: script }));
      h.elevenlabs.generateDialogueInParts.mockRejectedValue(new ElevenLabsError('quota exceeded'));

      await expect(h.service.generateVoiceover(user, 'episode-1')).rejects.toThrow(ElevenLabsError);

      expect(h.patches[h.patches.length - 1]).toEqual({
        status: 'error',
        errorMessage: 'ElevenLabs API error: quota exceeded',
      });
      expect(h.current().status).toBe('error');
    });
  });

  describe('generateSounds', () => {
    it('generates one effect per cue', async () => {
      const h = harness(
        makeEpisode({ scriptJson: script, voiceAudioUrl: '/storage/audio/voice.mp3', includeSoundEffects: true }),
      );

      const result = await h.service.generateSounds(user, 'episode-1');

      expect(result.sounds).toEqual([
        { prompt: 'door', url: '/storage/audio/file-1.mp3', local_path: '/storage/audio/file-1.mp3', start_time: 2, duration: 3 },
        { prompt: 'thunder', url: '/storage/audio/file-2.mp3', local_path: '/storage/audio/file-2.mp3', start_time: 4, duration: 3 },
      ]);
      expect(result.status).toBe('sounds_done');
      expect(h.elevenlabs.generateSoundEffect).toHaveBeenCalledWith('door', 3, undefined);
    });

    it('removes the effects of the previous run once the new ones are stored', async () => {
      const h = harness(
        makeEpisode({
          scriptJson: script,
          voiceAudioUrl: '/storage/audio/voice.mp3',
          includeSoundEffects: true,
          soundsJson: [
            { prompt: 'door', url: '/storage/audio/old-door.mp3', local_path: '/storage/audio/old-door.mp3', start_time: 2, duration: 3 },
          ],
        }),
      );

      await h.service.generateSounds(user, 'episode-1');

      expect(h.storage.deleteFile).toHaveBeenCalledTimes(1);
      expect(h.storage.deleteFile).toHaveBeenCalledWith('/storage/audio/old-door.mp3');
      expect(h.current().soundsJson?.map((sound) => sound.url)).toEqual([
        '/storage/audio/file-1.mp3',
        '/storage/audio/file-2.mp3',
      ]);
    });

    it('refuses when sound effects are disabled', async () => {
      const h = harness(makeEpisode({ scriptJson: script, voiceAudioUrl: '/storage/audio/voice.mp3' }));

      await expect(h.service.generateSounds(user, 'episode-1')).rejects.toThrow(
        'Sound effects are disabled for this episode',
      );
      expect(h.patches).toEqual([]);
    });
  });

  it('composes music as long as the voiceover', async () => {
    const h = harness(
      makeEpisode({
        voiceAudioUrl: '/storage/audio/voice.mp3',
        voiceAudioDurationSeconds: 42.5,
        includeBackgroundMusic: true,
      }),
      makeProject({ musicalAtmosphere: 'slow strings' }),
    );

    const result = await h.service.generateMusic(user, 'episode-1');

    expect(h.elevenlabs.createMusicPlan).toHaveBeenCalledWith(
      'slow strings, instrumental background music for audiobook, ambient, atmospheric',
      42500,
    );
    expect(h.elevenlabs.generateMusic).toHaveBeenCalledWith({ sections: [] }, true);
    expect(result).toEqual({
      episode_id: 'episode-1',
      status: 'music_done',
      music_url: '/storage/audio/file-1.mp3',
      duration_seconds: 42.5,
    });
    expect(h.storage.deleteFile).toHaveBeenCalledWith(null);
  });

  it('replaces the previous music file', async () => {
    const h = harness(
      makeEpisode({
        voiceAudioUrl: '/storage/audio/voice.mp3',
        includeBackgroundMusic: true,
        musicUrl: '/storage/audio/old-music.mp3',
      }),
    );

    await h.service.generateMusic(user, 'episode-1');

    expect(h.storage.deleteFile).toHaveBeenCalledTimes(1);
    expect(h.storage.deleteFile).toHaveBeenCalledWith('/storage/audio/old-music.mp3');
    expect(h.current().musicUrl).toBe('/storage/audio/file-1.mp3');
  });

  it('merges only the enabled layers and replaces the old mix', async () => {
    const h = harness(
      makeEpisode({
        voiceAudioUrl: '/storage/audio/voice.mp3',
        soundsJson: [],
        includeBackgroundMusic: true,
        musicUrl: '/storage/audio/music.mp3',
        finalAudioUrl: '/storage/audio/old-final.mp3',
      }),
    );

    const result = await h.service.mergeAudio(user, 'episode-1', { musicVolume: 0.2 });

    expect(h.audio.fullMerge).toHaveBeenCalledWith({
      voicePath: '/storage/audio/voice.mp3',
      sounds: null,
      musicPath: '/storage/audio/music.mp3',
      voiceVolume: undefined,
      soundsVolume: undefined,
      musicVolume: 0.2,
    });
    expect(h.storage.deleteFile).toHaveBeenCalledWith('/storage/audio/old-final.mp3');
    expect(result).toEqual({
      episode_id: 'episode-1',
      status: 'audio_done',
      final_audio_url: '/storage/audio/final.mp3',
      duration_seconds: 42.5,
    });
  });

  describe('generateCover', () => {
    it('stores every variant and selects the first', async () => {
      const h = harness(
        makeEpisode({
          title: 'The Storm',
          coverUrl: '/storage/covers/old.png',
          coverVariantsJson: [{ url: '/storage/covers/old.png', selected: true }],
        }),
      );

      const result = await h.service.generateCover(user, 'episode-1', {
        variantsCount: 2,
        style: 'tech_noir',
        referenceImages: ['/storage/references/ref.png'],
      });

      expect(h.storage.deleteFile).toHaveBeenCalledTimes(1);
      expect(h.storage.deleteFile).toHaveBeenCalledWith('/storage/covers/old.png');
      expect(result).toEqual({
        episode_id: 'episode-1',
        status: 'done',
        cover_url: '/storage/covers/a.png',
        variants: [
          { url: '/storage/covers/a.png', selected: true, style: 'tech_noir' },
          { url: '/storage/covers/b.png', selected: false, style: 'cyberpunk_neon' },
        ],
      });
      expect(h.current().coverReferenceImageUrl).toBe('/storage/references/ref.png');
      expect(h.setCover).toHaveBeenCalledWith('project-1', '/storage/covers/a.png');

      const call = h.cover.generateMultipleCovers.mock.calls[0];
      expect(call?.[1]).toBe(2);
      expect(call?.[2]).toEqual({
        preferredStyle: 'tech_noir',
        referenceImages: ['/storage/references/ref.png'],
        aspectRatio: undefined,
      });
      expect(call?.[0]('tech_noir')).toBe('Harbor Lights #1: The Storm');
    });

    it('leaves an existing project cover alone', async () => {
      const h = harness(makeEpisode(), makeProject({ coverUrl: '/storage/covers/project.png' }));

      await h.service.generateCover(user, 'episode-1');

      expect(h.setCover).not.toHaveBeenCalled();
    });
  });

  describe('selectCover', () => {
    const variants = [
      { url: '/storage/covers/a.png', selected: true },
      { url: '/storage/covers/b.png', selected: false },
    ];

    it('switches the selected variant', async () => {
      const h = harness(makeEpisode({ coverUrl: '/storage/covers/a.png', coverVariantsJson: variants }));

      await expect(h.service.selectCover(user, 'episode-1', 1)).resolves.toEqual({
        message: 'Cover selected',
        cover_url: '/storage/covers/b.png',
      });
      expect(h.current().coverVariantsJson).toEqual([
        { url: '/storage/covers/a.png', selected: false },
        { url: '/storage/covers/b.png', selected: true },
      ]);
    });

    it('rejects unknown variants', async () => {
      const h = harness(makeEpisode({ coverVariantsJson: variants }));
      await expect(h.service.selectCover(user, 'episode-1', 5)).rejects.toThrow('Invalid variant index: 5');

      const empty = harness(makeEpisode());
      await expect(empty.service.selectCover(user, 'episode-1', 0)).rejects.toThrow('No cover variants available');
    });
  });

  describe('runFull', () => {
    it('runs the enabled steps and finishes even when the summary fails', async () => {
      const h = harness(makeEpisode());
      h.llm.generateSummary.mockRejectedValue(new Error('summary model unavailable'));

      const result = await h.service.runFull(user, 'episode-1', { generateCover: false });

      expect(result).toEqual({
        episode_id: 'episode-1',
        status: 'done',
        script_status: 'done',
        voiceover_status: 'done',
        sounds_status: 'skipped',
        music_status: 'skipped',
        merge_status: 'done',
        cover_status: 'skipped',
        final_audio_url: '/storage/audio/final.mp3',
        final_audio_duration_seconds: 42.5,
        cover_url: null,
      });
      expect(h.patches[h.patches.length - 1]).toEqual({ summary: null, status: 'done' });
      expect(h.elevenlabs.generateSoundEffect).not.toHaveBeenCalled();
      expect(h.cover.generateMultipleCovers).not.toHaveBeenCalled();
    });

    it('stores the recap for later continuations', async () => {
      const h = harness(makeEpisode());

      await h.service.runFull(user, 'episode-1', { generateCover: false });

      expect(h.current().summary).toBe('A recap.');
      expect(h.current().status).toBe('done');
    });
  });

  describe('music operations', () => {
    it('mixes voice and music at the requested level', async () => {
      const h = harness(
        makeEpisode({ voiceAudioUrl: '/storage/audio/voice.mp3', musicUrl: '/storage/audio/music.mp3' }),
      );

      await expect(h.service.mergeWithMusic(user, 'episode-1', -6)).resolves.toEqual({
        episode_id: 'episode-1',
        merged_url: '/storage/audio/mixed.mp3',
        music_volume_db: -6,
      });
      expect(h.audio.mixVoiceWithMusic).toHaveBeenCalledWith('/storage/audio/voice.mp3', '/storage/audio/music.mp3', -6);
      expect(h.patches).toEqual([{ finalAudioUrl: '/storage/audio/mixed.mp3', finalAudioDurationSeconds: 42.5 }]);
    });

    it('needs generated music to mix', async () => {
      const h = harness(makeEpisode({ voiceAudioUrl: '/storage/audio/voice.mp3' }));
      await expect(h.service.mergeWithMusic(user, 'episode-1')).rejects.toThrow('Music not generated yet');
    });

    it('deletes music and its plan', async () => {
      const h = harness(makeEpisode({ musicUrl: '/storage/audio/music.mp3', musicCompositionPlan: { sections: [] } }));

      await expect(h.service.deleteMusic(user, 'episode-1')).resolves.toEqual({ message: 'Music deleted' });
      expect(h.storage.deleteFile).toHaveBeenCalledWith('/storage/audio/music.mp3');
      expect(h.patches).toEqual([{ musicUrl: null, musicCompositionPlan: null }]);
    });
  });
});
