import express from 'express';
import { z } from 'zod';
import { logger } from '@/config/logger.js';
import { currentUser } from '@/middleware/auth.js';
import { EpisodeService, episodeFiles } from '@/services/episodes.js';
import { ProjectService } from '@/services/projects.js';
import {
  serializeCharacter,
  serializeEpisode,
  serializeProject,
  serializeProjectDetail,
} from '@/shared/serializers.js';

const router = express.Router();
const projectService = new ProjectService();
const episodeService = new EpisodeService();

const ListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
});

const ProjectSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().max(5000),
  genre_tone: z.string().min(1).max(200),
  musical_atmosphere: z.string().max(500).nullable().optional(),
  include_sound_effects: z.boolean().default(false),
  include_background_music: z.boolean().default(false),
});

const ProjectUpdateSchema = ProjectSchema.partial();

const CharacterSchema = z.object({
  voice_id: z.string().uuid(),
  role: z.string().min(1).max(100),
  character_name: z.string().min(1).max(100),
  sort_order: z.number().int().default(0),
});

const CharacterUpdateSchema = CharacterSchema.partial();

const EpisodeCreateSchema = z.object({
  title: z.string().max(200).nullable().optional(),
  title_auto_generated: z.boolean().default(true),
  show_episode_number: z.boolean().default(true),
  description: z.string().max(5000),
  target_duration_minutes: z.number().int().min(1).max(60).default(10),
  include_sound_effects: z.boolean().optional(),
  include_background_music: z.boolean().optional(),
});

/**
 * GET /api/projects
 * Paginated, most recently updated first
 */
router.get('/', async (req, res, next): Promise<void> => {
  try {
    const query = ListQuerySchema.parse(req.query);
    const page = await projectService.list(currentUser(req).id, query.page, query.page_size);
    res.json({
      items: page.items.map(serializeProject),
      total: page.total,
      page: page.page,
      page_size: page.pageSize,
    });
  } catch (error) {
    next(error);
  }
});

router.post('/', async (req, res, next): Promise<void> => {
  try {
    const body = ProjectSchema.parse(req.body);
    const project = await projectService.create(currentUser(req).id, {
      title: body.title,
      description: body.description,
      genreTone: body.genre_tone,
      musicalAtmosphere: body.musical_atmosphere ?? null,
      includeSoundEffects: body.include_sound_effects,
      includeBackgroundMusic: body.include_background_music,
    });
    res.status(201).json(serializeProject(project));
  } catch (error) {
    next(error);
  }
});

router.get('/:projectId', async (req, res, next): Promise<void> => {
  try {
    const project = await projectService.getDetail(currentUser(req).id, req.params.projectId);
    res.json(serializeProjectDetail(project));
  } catch (error) {
    next(error);
  }
});

router.put('/:projectId', async (req, res, next): Promise<void> => {
  try {
    const body = ProjectUpdateSchema.parse(req.body);
    const project = await projectService.update(currentUser(req).id, req.params.projectId, {
      title: body.title,
      description: body.description,
      genreTone: body.genre_tone,
      musicalAtmosphere: body.musical_atmosphere,
      includeSoundEffects: body.include_sound_effects,
      includeBackgroundMusic: body.include_background_music,
    });
    res.json(serializeProject(project));
  } catch (error) {
    next(error);
  }
});

/**
 * DELETE /api/projects/:projectId
 * Cascades to characters and episodes; episode media is removed from storage
 */
router.delete('/:projectId', async (req, res, next): Promise<void> => {
  try {
    const removed = await projectService.delete(currentUser(req).id, req.params.projectId);
    const files = await episodeService.removeFiles(removed.flatMap(episodeFiles));
    logger.info('Project files removed', { projectId: req.params.projectId, files });
    res.json({ message: 'Project deleted' });
  } catch (error) {
    next(error);
  }
});

// ---------------------------------------------------------------------------
// Characters
// ---------------------------------------------------------------------------

router.get('/:projectId/characters', async (req, res, next): Promise<void> => {
  try {
    const project = await projectService.getOwned(currentUser(req).id, req.params.projectId);
    const characters = await projectService.listCharacters(project.id);
    res.json(characters.map(serializeCharacter));
  } catch (error) {
    next(error);
  }
});

router.post('/:projectId/characters', async (req, res, next): Promise<void> => {
  try {
    const body = CharacterSchema.parse(req.body);
    const character = await projectService.addCharacter(currentUser(req).id, req.params.projectId, {
      voiceId: body.voice_id,
      role: body.role,
      characterName: body.character_name,
      sortOrder: body.sort_order,
    });
    res.status(201).json(serializeCharacter(character));
  } catch (error) {
    next(error);
  }
});

router.put('/:projectId/characters/:characterId', async (req, res, next): Promise<void> => {
  try {
    const body = CharacterUpdateSchema.parse(req.body);
    const character = await projectService.updateCharacter(
      currentUser(req).id,
      req.params.projectId,
      req.params.characterId,
      {
        voiceId: body.voice_id,
        role: body.role,
        characterName: body.character_name,
        sortOrder: body.sort_order,
      },
    );
    res.json(serializeCharacter(character));
  } catch (error) {
    next(error);
  }
});

router.delete('/:projectId/characters/:characterId', async (req, res, next): Promise<void> => {
  try {
    await projectService.removeCharacter(currentUser(req).id, req.params.projectId, req.params.characterId);
    res.json({ message: 'Character removed' });
  } catch (error) {
    next(error);
  }
});

// ---------------------------------------------------------------------------
// Episodes
// ---------------------------------------------------------------------------

router.get('/:projectId/episodes', async (req, res, next): Promise<void> => {
  try {
    const project = await projectService.getOwned(currentUser(req).id, req.params.projectId);
    const episodes = await episodeService.listForProject(project.id);
    res.json({ items: episodes.map(serializeEpisode), total: episodes.length });
  } catch (error) {
    next(error);
  }
});

router.post('/:projectId/episodes', async (req, res, next): Promise<void> => {
  try {
    const body = EpisodeCreateSchema.parse(req.body);
    const project = await projectService.getOwned(currentUser(req).id, req.params.projectId);
    const episode = await episodeService.createNext(project, {
      title: body.title,
      titleAutoGenerated: body.title_auto_generated,
      showEpisodeNumber: body.show_episode_number,
      description: body.description,
      targetDurationMinutes: body.target_duration_minutes,
      includeSoundEffects: body.include_sound_effects,
      includeBackgroundMusic: body.include_background_music,
    });
    res.status(201).json(serializeEpisode(episode));
  } catch (error) {
    next(error);
  }
});

export { router as projectsRouter };
