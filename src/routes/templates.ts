import express from 'express';
import { z } from 'zod';
import { currentUser } from '@/middleware/auth.js';
import { TemplateService } from '@/services/templates.js';
import { serializeTemplate } from '@/shared/serializers.js';

const router = express.Router();
const templateService = new TemplateService();

const TemplateSchema = z.object({
  name: z.string().min(1).max(255),
  genre_tone: z.string().max(200).nullable().optional(),
  musical_atmosphere: z.string().max(500).nullable().optional(),
  include_sound_effects: z.boolean().default(true),
  include_background_music: z.boolean().default(true),
  target_duration_minutes: z.number().int().min(1).max(60).default(10),
  cover_style: z.string().max(50).nullable().optional(),
  characters: z
    .array(
      z.object({
        role: z.string().max(100),
        character_name: z.string().max(100),
        voice_id: z.string().optional(),
      }),
    )
    .nullable()
    .optional(),
});

router.get('/', async (req, res, next): Promise<void> => {
  try {
    const templates = await templateService.list(currentUser(req).id);
    res.json(templates.map(serializeTemplate));
  } catch (error) {
    next(error);
  }
});

router.post('/', async (req, res, next): Promise<void> => {
  try {
    const body = TemplateSchema.parse(req.body);
    const template = await templateService.create(currentUser(req).id, {
      name: body.name,
      genreTone: body.genre_tone ?? null,
      musicalAtmosphere: body.musical_atmosphere ?? null,
      includeSoundEffects: body.include_sound_effects,
      includeBackgroundMusic: body.include_background_music,
      targetDurationMinutes: body.target_duration_minutes,
      coverStyle: body.cover_style ?? null,
      charactersJson: body.characters ?? null,
    });
    res.status(201).json(serializeTemplate(template));
  } catch (error) {
    next(error);
  }
});

router.delete('/:templateId', async (req, res, next): Promise<void> => {
  try {
    await templateService.delete(currentUser(req).id, req.params.templateId);
    res.json({ message: 'Template deleted' });
  } catch (error) {
    next(error);
  }
});

export { router as templatesRouter };
