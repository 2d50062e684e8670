import path from 'path';
import express from 'express';
import { z } from 'zod';
import { logger } from '@/config/logger.js';
import { currentUser } from '@/middleware/auth.js';
import { EpisodeService } from '@/services/episodes.js';
import { ProjectService } from '@/services/projects.js';
import { getStorageService } from '@/services/storage-singleton.js';
import { STORAGE_URL_PREFIX } from '@/services/storage.js';
import { NotFoundError, ValidationError } from '@/shared/errors.js';
import { sanitizeFilename } from '@/shared/security.js';

const router = express.Router();
const episodeService = new EpisodeService();
const projectService = new ProjectService();
const storageService = getStorageService();

export const MAX_REFERENCE_BYTES = 10 * 1024 * 1024;

const REFERENCE_TYPES: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/webp': 'webp',
};

const IMAGE_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

const AudioQuerySchema = z.object({
  format: z.enum(['final', 'voice', 'music']).default('final'),
});

const CoverQuerySchema = z.object({
  variant: z.coerce.number().int().optional(),
});

const ReferenceUploadSchema = z.object({
  data_url: z.string().min(10),
  filename: z.string().max(255).optional(),
});

/**
 * Decode a base64 `data:` URL into its MIME type and bytes
 */
export function decodeDataUrl(dataUrl: string): { mimeType: string; data: Buffer } {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(dataUrl.trim());
  if (!match?.[1] || match[2] === undefined) {
    throw new ValidationError('Invalid data URL; expected data:<type>;base64,...');
  }
  return { mimeType: match[1].toLowerCase(), data: Buffer.from(match[2], 'base64') };
}

/**
 * Resolve a stored /storage URL to a file on disk, or 404 with the given label
 */
async function storedFile(url: string | null | undefined, label: string): Promise<string> {
  if (!url || !url.startsWith(`${STORAGE_URL_PREFIX}/`) || !(await storageService.fileExists(url))) {
    throw new NotFoundError(label);
  }
  return storageService.getAbsolutePath(url);
}

function imageType(filePath: string): string {
  return IMAGE_TYPES[path.extname(filePath).toLowerCase()] ?? 'image/png';
}

router.get('/audio/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const { format } = AudioQuerySchema.parse(req.query);
    const episode = await episodeService.getOwned(currentUser(req).id, req.params.episodeId);
    const url = {
      final: episode.finalAudioUrl || episode.voiceAudioUrl,
      voice: episode.voiceAudioUrl,
      music: episode.musicUrl,
    }[format];

    const filePath = await storedFile(url, 'Audio file');
    res.download(filePath, `episode_${episode.episodeNumber}_${format}.mp3`, (err) => {
      if (err && !res.headersSent) {
        next(err);
      }
    });
  } catch (error) {
    next(error);
  }
});

/**
 * GET /api/files/stream/:episodeId
 * Final mix, else the voice track. Range requests are answered with 206.
 */
router.get('/stream/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const episode = await episodeService.getOwned(currentUser(req).id, req.params.episodeId);
    const filePath = await storedFile(episode.finalAudioUrl || episode.voiceAudioUrl, 'Audio file');
    res.sendFile(filePath, { acceptRanges: true, headers: { 'Content-Type': 'audio/mpeg' } }, (err) => {
      if (err && !res.headersSent) {
        next(err);
      }
    });
  } catch (error) {
    next(error);
  }
});

router.get('/cover/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const { variant } = CoverQuerySchema.parse(req.query);
    const episode = await episodeService.getOwned(currentUser(req).id, req.params.episodeId);

    let url = episode.coverUrl;
    const variants = episode.coverVariantsJson ?? [];
    if (variant !== undefined && variant >= 0 && variant < variants.length) {
      url = variants[variant]?.url ?? url;
    }

    const filePath = await storedFile(url, 'Cover image');
    const ext = path.extname(filePath).toLowerCase();
    res.type(imageType(filePath));
    res.attachment(`cover_episode_${episode.episodeNumber}${ext}`);
    res.sendFile(filePath, (err) => {
      if (err && !res.headersSent) {
        next(err);
      }
    });
  } catch (error) {
    next(error);
  }
});

router.get('/project/:projectId/cover', async (req, res, next): Promise<void> => {
  try {
    const project = await projectService.getOwned(currentUser(req).id, req.params.projectId);
    const filePath = await storedFile(project.coverUrl, 'Cover image');
    res.type(imageType(filePath));
    res.sendFile(filePath, (err) => {
      if (err && !res.headersSent) {
        next(err);
      }
    });
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/files/upload/reference
 * Reference image for cover generation, sent as a base64 data URL.
 * Body: { data_url: string, filename?: string }
 */
router.post('/upload/reference', async (req, res, next): Promise<void> => {
  try {
    const body = ReferenceUploadSchema.parse(req.body);
    const { mimeType, data } = decodeDataUrl(body.data_url);

    const extension = REFERENCE_TYPES[mimeType];
    if (!extension) {
      throw new ValidationError(`Invalid file type. Allowed: ${Object.keys(REFERENCE_TYPES).join(', ')}`);
    }
    if (data.length > MAX_REFERENCE_BYTES) {
      throw new ValidationError('File too large. Maximum size is 10MB');
    }

    const url = await storageService.saveFile(data, 'references', undefined, extension);
    logger.info('Reference image uploaded', { userId: currentUser(req).id, url, size: data.length });
    res.json({
      url,
      filename: body.filename ? sanitizeFilename(body.filename) : path.basename(url),
      size: data.length,
    });
  } catch (error) {
    next(error);
  }
});

router.delete('/audio/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const deleted = await episodeService.deleteAudioFiles(currentUser(req).id, req.params.episodeId);
    res.json({ message: 'Audio files deleted', deleted });
  } catch (error) {
    next(error);
  }
});

export { router as filesRouter };
