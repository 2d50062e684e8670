import express from 'express';
import { z } from 'zod';
import { currentUser } from '@/middleware/auth.js';
import { EpisodeService } from '@/services/episodes.js';
import { buildScriptText, extractKeyEvents } from '@/shared/script.js';
import { serializeEpisode, serializeEpisodeDetail } from '@/shared/serializers.js';

const router = express.Router();
const episodeService = new EpisodeService();

const EpisodeUpdateSchema = z.object({
  title: z.string().max(200).nullable().optional(),
  title_auto_generated: z.boolean().optional(),
  show_episode_number: z.boolean().optional(),
  description: z.string().max(5000).optional(),
  target_duration_minutes: z.number().int().min(1).max(60).optional(),
  include_sound_effects: z.boolean().optional(),
  include_background_music: z.boolean().optional(),
});

const ScriptSchema = z.object({
  story_title: z.string().default(''),
  genre_tone: z.string().default(''),
  approx_duration_minutes: z.number().int().min(0).default(0),
  lines: z.array(
    z.object({
      speaker: z.string(),
      voice_id: z.string().default(''),
      text: z.string(),
      sound_effect: z
        .string()
        .nullable()
        .optional()
        .transform((value) => value || null),
    }),
  ),
});

const ScriptUpdateSchema = z.object({
  script_json: ScriptSchema,
  script_text: z.string().nullable().optional(),
});

const ContinuationSchema = z.object({
  description: z.string().max(5000),
  title: z.string().max(200).nullable().optional(),
  title_auto_generated: z.boolean().default(true),
  show_episode_number: z.boolean().default(true),
  target_duration_minutes: z.number().int().min(1).max(60).default(10),
  include_sound_effects: z.boolean().nullable().optional(),
  include_background_music: z.boolean().nullable().optional(),
});

router.get('/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const episode = await episodeService.getOwned(currentUser(req).id, req.params.episodeId);
    res.json(serializeEpisodeDetail(episode));
  } catch (error) {
    next(error);
  }
});

router.put('/:episodeId', async (req, res, next): Promise<void> => {
  try {
    const body = EpisodeUpdateSchema.parse(req.body);
    const episode = await episodeService.update(currentUser(req).id, req.params.episodeId, {
      title: body.title ?? undefined,
      titleAutoGenerated: body.title_auto_generated,
      showEpisodeNumber: body.show_episode_number,
      description: body.description,
      targetDurationMinutes: body.target_duration_minutes,
      includeSoundEffects: body.include_sound_effects,
      includeBackgroundMusic: body.include_background_music,
    });
    res.json(serializeEpisode(episode));
  } catch (error) {
    next(error);
  }
});

/**
 * DELETE /api/episodes/:episodeId
 * Only the last episode of a project; its stored media goes with it
 */
router.delete('/:episodeId', async (req, res, next): Promise<void> => {
  try {
    await episodeService.delete(currentUser(req).id, req.params.episodeId);
    res.json({ message: 'Episode deleted' });
  } catch (error) {
    next(error);
  }
});

/**
 * GET /api/episodes/:episodeId/script
 * Markdown rendering and key events for previews and exports
 */
router.get('/:episodeId/script', async (req, res, next): Promise<void> => {
  try {
    const episode = await episodeService.getOwned(currentUser(req).id, req.params.episodeId);
    res.json({
      episode_id: episode.id,
      script_json: episode.scriptJson,
      script_text: episode.scriptText,
      markdown: buildScriptText(episode.scriptJson),
      key_events: extractKeyEvents(episode.scriptJson),
    });
  } catch (error) {
    next(error);
  }
});

router.put('/:episodeId/script', async (req, res, next): Promise<void> => {
  try {
    const body = ScriptUpdateSchema.parse(req.body);
    const episode = await episodeService.updateScript(
      currentUser(req).id,
      req.params.episodeId,
      body.script_json,
      body.script_text,
    );
    res.json(serializeEpisode(episode));
  } catch (error) {
    next(error);
  }
});

router.post('/:episodeId/continuation', async (req, res, next): Promise<void> => {
  try {
    const body = ContinuationSchema.parse(req.body);
    const episode = await episodeService.createContinuation(currentUser(req).id, req.params.episodeId, {
      title: body.title,
      titleAutoGenerated: body.title_auto_generated,
      showEpisodeNumber: body.show_episode_number,
      description: body.description,
      targetDurationMinutes: body.target_duration_minutes,
      includeSoundEffects: body.include_sound_effects ?? undefined,
      includeBackgroundMusic: body.include_background_music ?? undefined,
    });
    res.status(201).json(serializeEpisode(episode));
  } catch (error) {
    next(error);
  }
});

router.delete('/:episodeId/cover/:variantIndex', async (req, res, next): Promise<void> => {
  try {
    const variantIndex = z.coerce.number().int().min(0).parse(req.params.variantIndex);
    const remaining = await episodeService.deleteCoverVariant(currentUser(req).id, req.params.episodeId, variantIndex);
    res.json({ message: 'Cover variant deleted', remaining_variants: remaining });
  } catch (error) {
    next(error);
  }
});

router.delete('/:episodeId/audio', async (req, res, next): Promise<void> => {
  try {
    const deleted = await episodeService.deleteAudio(currentUser(req).id, req.params.episodeId);
    res.json({ message: 'Audio deleted', deleted });
  } catch (error) {
    next(error);
  }
});

export { router as episodesRouter };
