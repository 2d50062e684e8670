import express from 'express';
import { z } from 'zod';
import { MAX_COVER_VARIANTS } from '@/config/providers.js';
import { currentUser } from '@/middleware/auth.js';
import { EpisodeService } from '@/services/episodes.js';
import { GenerationService } from '@/services/generation.js';
import { getGenerationStatus } from '@/services/generation-status.js';

const router = express.Router();
const generationService = new GenerationService();
const episodeService = new EpisodeService();

const ScriptRequestSchema = z.object({
  custom_prompt: z.string().nullable().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
});

const SoundsRequestSchema = z.object({
  prompt_influence: z.number().min(0).max(1).default(0.3),
  default_duration_seconds: z.number().min(1).max(10).default(3),
});

const MusicRequestSchema = z.object({
  force_instrumental: z.boolean().default(true),
});

const volumes = {
  voice_volume: z.number().min(0).max(2).default(1.0),
  sounds_volume: z.number().min(0).max(2).default(0.8),
  music_volume: z.number().min(0).max(1).default(0.3),
};

const MergeRequestSchema = z.object(volumes);

const CoverRequestSchema = z.object({
  variants_count: z.number().int().min(1).max(MAX_COVER_VARIANTS).default(1),
  reference_image_url: z.string().nullable().optional(),
  reference_images: z.array(z.string()).optional(),
  custom_prompt: z.string().nullable().optional(),
  aspect_ratio: z.string().default('1:1'),
  style: z.string().nullable().optional(),
});

const SelectCoverSchema = z.object({
  variant_index: z
    .number()
    .int()
    .min(0)
    .max(MAX_COVER_VARIANTS - 1),
});

const FullRequestSchema = z.object({
  generate_cover: z.boolean().default(true),
  cover_variants_count: z.number().int().min(1).max(MAX_COVER_VARIANTS).default(1),
  cover_reference_image_url: z.string().nullable().optional(),
  cover_style: z.string().nullable().optional(),
  ...volumes,
});

const MusicMergeSchema = z.object({
  music_volume_db: z.number().min(-60).max(0).default(-12),
});

// Bodies are optional for every step; an absent body means the defaults
function body(req: express.Request): unknown {
  return req.body ?? {};
}

router.post('/script/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const params = ScriptRequestSchema.parse(body(req));
    const result = await generationService.generateScript(currentUser(req), req.params.episodeId, {
      customPrompt: params.custom_prompt,
      temperature: params.temperature,
    });
    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.post('/voiceover/:episodeId', async (req, res, next): Promise<void> => {
  try {
    res.json(await generationService.generateVoiceover(currentUser(req), req.params.episodeId));
  } catch (error) {
    next(error);
  }
});

router.post('/sounds/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const params = SoundsRequestSchema.parse(body(req));
    const result = await generationService.generateSounds(currentUser(req), req.params.episodeId, {
      durationSeconds: params.default_duration_seconds,
      promptInfluence: params.prompt_influence,
    });
    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.post('/music/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const params = MusicRequestSchema.parse(body(req));
    res.json(await generationService.generateMusic(currentUser(req), req.params.episodeId, params.force_instrumental));
  } catch (error) {
    next(error);
  }
});

router.post('/merge/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const params = MergeRequestSchema.parse(body(req));
    const result = await generationService.mergeAudio(currentUser(req), req.params.episodeId, {
      voiceVolume: params.voice_volume,
      soundsVolume: params.sounds_volume,
      musicVolume: params.music_volume,
    });
    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.post('/cover/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const params = CoverRequestSchema.parse(body(req));
    const references = [...(params.reference_images ?? [])];
    if (params.reference_image_url) {
      references.push(params.reference_image_url);
    }
    const result = await generationService.generateCover(currentUser(req), req.params.episodeId, {
      variantsCount: params.variants_count,
      referenceImages: references,
      customPrompt: params.custom_prompt,
      aspectRatio: params.aspect_ratio,
      style: params.style,
    });
    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.post('/cover/:episodeId/select', async (req, res, next): Promise<void> => {
  try {
    const params = SelectCoverSchema.parse(body(req));
    res.json(await generationService.selectCover(currentUser(req), req.params.episodeId, params.variant_index));
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/generation/full/:episodeId
 * Runs every step in one request; long-running
 */
router.post('/full/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const params = FullRequestSchema.parse(body(req));
    const result = await generationService.runFull(currentUser(req), req.params.episodeId, {
      generateCover: params.generate_cover,
      coverVariantsCount: params.cover_variants_count,
      coverReferenceImageUrl: params.cover_reference_image_url,
      coverStyle: params.cover_style,
      voiceVolume: params.voice_volume,
      soundsVolume: params.sounds_volume,
      musicVolume: params.music_volume,
    });
    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.get('/status/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const episode = await episodeService.getOwned(currentUser(req).id, req.params.episodeId);
    res.json(getGenerationStatus(episode));
  } catch (error) {
    next(error);
  }
});

router.post('/music/:episodeId/merge', async (req, res, next): Promise<void> => {
  try {
    const params = MusicMergeSchema.parse(body(req));
    res.json(await generationService.mergeWithMusic(currentUser(req), req.params.episodeId, params.music_volume_db));
  } catch (error) {
    next(error);
  }
});

router.delete('/music/:episodeId', async (req, res, next): Promise<void> => {
  try {
    res.json(await generationService.deleteMusic(currentUser(req), req.params.episodeId));
  } catch (error) {
    next(error);
  }
});

router.delete('/music/:episodeId/merged', async (req, res, next): Promise<void> => {
  try {
    res.json(await generationService.deleteMergedAudio(currentUser(req), req.params.episodeId));
  } catch (error) {
    next(error);
  }
});

export { router as generationRouter };
