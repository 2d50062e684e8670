/**
 * Audio Service
 * Concatenation, mixing and probing of episode audio with FFmpeg
 */

import ffmpeg from 'fluent-ffmpeg';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { AudioProcessingError } from '@/shared/errors.js';
import type { SoundEffectEntry } from '@/types/pipeline.js';
import { STORAGE_URL_PREFIX, StorageService } from './storage.js';
import { getStorageService } from './storage-singleton.js';

// Set ffmpeg path from installer
ffmpeg.setFfmpegPath(ffmpegInstaller.path);

const ffprobePath = getEnvironment().FFPROBE_PATH;
if (ffprobePath) {
  ffmpeg.setFfprobePath(ffprobePath);
}

export interface MergeFilterOptions {
  soundStartTimes: number[];
  hasMusic: boolean;
  voiceVolume: number;
  soundsVolume: number;
  musicVolume: number;
}

export interface MergeFilterGraph {
  /** Filter chains joined with ';', or null when the voice passes through untouched */
  filter: string | null;
  /** Output label to map, without brackets */
  outputLabel: string | null;
}

/**
 * Build the filter graph for voice + positioned sound effects + background music.
 * Input 0 is the voice, inputs 1..n the sounds in order, input n+1 the music.
 */
export function buildMergeFilterGraph(options: MergeFilterOptions): MergeFilterGraph {
  const { soundStartTimes, hasMusic, voiceVolume, soundsVolume, musicVolume } = options;
  const parts: string[] = [];
  let current = '[0]';

  if (voiceVolume !== 1) {
    parts.push(`[0]volume=${voiceVolume}[v]`);
    current = '[v]';
  }

  if (soundStartTimes.length > 0) {
    soundStartTimes.forEach((startTime, i) => {
      const delayMs = Math.floor(startTime * 1000);
      parts.push(`[${i + 1}]volume=${soundsVolume},adelay=${delayMs}|${delayMs}[s${i}]`);
    });
    const soundLabels = soundStartTimes.map((_, i) => `[s${i}]`).join('');
    parts.push(`${current}${soundLabels}amix=inputs=${soundStartTimes.length + 1}:duration=first[vs]`);
    current = '[vs]';
  }

  if (hasMusic) {
    const musicIndex = soundStartTimes.length + 1;
    parts.push(`[${musicIndex}]volume=${musicVolume}[m]`);
    parts.push(`${current}[m]amix=inputs=2:duration=first[out]`);
    current = '[out]';
  }

  if (parts.length === 0) {
    return { filter: null, outputLabel: null };
  }

  return { filter: parts.join(';'), outputLabel: current.slice(1, -1) };
}

export function buildMusicMixFilter(musicVolumeDb: number): string {
  return `[1:a]volume=${musicVolumeDb}dB[music];[0:a][music]amix=inputs=2:duration=first:dropout_transition=2[out]`;
}

export interface FullMergeOptions {
  voicePath: string;
  sounds?: SoundEffectEntry[] | null;
  musicPath?: string | null;
  voiceVolume?: number;
  soundsVolume?: number;
  musicVolume?: number;
}

export class AudioService {
  private storage: StorageService;

  constructor(storage?: StorageService) {
    this.storage = storage ?? getStorageService();
  }

  /**
   * Duration in seconds as reported by ffprobe
   */
  getAudioDuration(filePath: string): Promise<number> {
    const absolute = this.resolveInput(filePath);
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(absolute, (err, metadata) => {
        if (err) {
          logger.error('Failed to read audio duration', { filePath, error: err.message });
          reject(new AudioProcessingError(`Failed to get duration: ${err.message}`));
          return;
        }
        const duration = metadata.format?.duration;
        resolve(typeof duration === 'number' && duration > 0 ? duration : 0);
      });
    });
  }

  /**
   * Join MP3 parts with the concat demuxer (no re-encoding) and store the result
   */
  async mergeAudioParts(parts: Buffer[]): Promise<string> {
    if (parts.length === 0) {
      throw new AudioProcessingError('No audio parts to merge');
    }

    const [first] = parts;
    if (parts.length === 1 && first) {
      return this.storage.saveFile(first, 'audio', undefined, 'mp3');
    }

    logger.info('Starting audio concatenation', {
      partCount: parts.length,
      totalInputSize: parts.reduce((sum, b) => sum + b.length, 0),
    });

    const tempDir = join(tmpdir(), `heinercast-concat-${randomUUID()}`);
    const listFilePath = join(tempDir, 'concat-list.txt');
    const outputFilePath = join(tempDir, 'output.mp3');

    try {
      await fs.mkdir(tempDir, { recursive: true });

      const partFiles: string[] = [];
      for (const [i, part] of parts.entries()) {
        const partPath = join(tempDir, `part_${String(i).padStart(4, '0')}.mp3`);
        await fs.writeFile(partPath, part);
        partFiles.push(partPath);
      }

      const listContent = partFiles.map((filePath) => `file '${filePath.replace(/\\/g, '/')}'`).join('\n');
      await fs.writeFile(listFilePath, listContent);

      await runFFmpeg('concat', (command) =>
        command
          .input(listFilePath)
          .inputOptions(['-f concat', '-safe 0'])
          .outputOptions(['-c copy'])
          .output(outputFilePath),
      );

      const url = await this.storage.saveFile(await fs.readFile(outputFilePath), 'audio', undefined, 'mp3');
      logger.info('Audio concatenation complete', { partCount: parts.length, url });
      return url;
    } finally {
      await removeTempDir(tempDir);
    }
  }

  /**
   * Mix voice, positioned sound effects and background music into the final episode audio
   */
  async fullMerge(options: FullMergeOptions): Promise<string> {
    const sounds = options.sounds ?? [];
    const graph = buildMergeFilterGraph({
      soundStartTimes: sounds.map((sound) => sound.start_time),
      hasMusic: Boolean(options.musicPath),
      voiceVolume: options.voiceVolume ?? 1.0,
      soundsVolume: options.soundsVolume ?? 0.8,
      musicVolume: options.musicVolume ?? 0.3,
    });

    const inputs = [
      this.resolveInput(options.voicePath),
      ...sounds.map((sound) => this.resolveInput(sound.local_path || sound.url)),
    ];
    if (options.musicPath) {
      inputs.push(this.resolveInput(options.musicPath));
    }

    const outputUrl = `${STORAGE_URL_PREFIX}/audio/${randomUUID()}.mp3`;
    const outputPath = this.storage.getAbsolutePath(outputUrl);
    await this.storage.initialize();

    logger.info('Starting full audio merge', {
      inputs: inputs.length,
      sounds: sounds.length,
      hasMusic: Boolean(options.musicPath),
    });

    await runFFmpeg('merge', (command) => {
      for (const input of inputs) {
        command.input(input);
      }
      if (graph.filter && graph.outputLabel) {
        command.complexFilter(graph.filter, graph.outputLabel);
      }
      return command.audioCodec('libmp3lame').audioBitrate('192k').output(outputPath);
    });

    logger.info('Full audio merge complete', { outputUrl });
    return outputUrl;
  }

  /**
   * Lay background music under the voice at a fixed dB offset
   */
  async mixVoiceWithMusic(voicePath: string, musicPath: string, musicVolumeDb = -12): Promise<string> {
    const outputUrl = `${STORAGE_URL_PREFIX}/audio/${randomUUID()}.mp3`;
    const outputPath = this.storage.getAbsolutePath(outputUrl);
    await this.storage.initialize();

    await runFFmpeg('music mix', (command) =>
      command
        .input(this.resolveInput(voicePath))
        .input(this.resolveInput(musicPath))
        .complexFilter(buildMusicMixFilter(musicVolumeDb), 'out')
        .audioCodec('libmp3lame')
        .audioBitrate('192k')
        .output(outputPath),
    );

    return outputUrl;
  }

  private resolveInput(filePath: string): string {
    return filePath.startsWith(`${STORAGE_URL_PREFIX}/`) ? this.storage.getAbsolutePath(filePath) : filePath;
  }
}

/**
 * Run an FFmpeg command built by `configure`, rejecting with AudioProcessingError
 */
function runFFmpeg(
  label: string,
  configure: (command: ffmpeg.FfmpegCommand) => ffmpeg.FfmpegCommand,
): Promise<void> {
  return new Promise((resolve, reject) => {
    configure(ffmpeg())
      .on('start', (commandLine: string) => {
        logger.debug(`FFmpeg ${label} started`, { commandLine });
      })
      .on('error', (err: Error, _stdout?: string | null, stderr?: string | null) => {
        logger.error(`FFmpeg ${label} error`, { error: err.message, stderr });
        reject(new AudioProcessingError(`FFmpeg ${label} failed: ${err.message}`, stderr ?? null));
      })
      .on('end', () => {
        logger.debug(`FFmpeg ${label} finished`);
        resolve();
      })
      .run();
  });
}

async function removeTempDir(tempDir: string): Promise<void> {
  try {
    await fs.rm(tempDir, { recursive: true, force: true });
  } catch (error) {
    logger.warn('Failed to remove temp directory', {
      tempDir,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
