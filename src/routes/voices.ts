import express from 'express';
import { z } from 'zod';
import { currentUser } from '@/middleware/auth.js';
import { AudioService } from '@/services/audio.js';
import { ElevenLabsService } from '@/services/elevenlabs.js';
import { getStorageService } from '@/services/storage-singleton.js';
import { VoiceService } from '@/services/voices.js';
import { NotFoundError } from '@/shared/errors.js';
import { serializeVoice } from '@/shared/serializers.js';

const router = express.Router();
const voiceService = new VoiceService();
const audioService = new AudioService();
const storageService = getStorageService();

const ListQuerySchema = z.object({
  search: z.string().max(100).optional(),
  favorites_only: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

const VoiceSchema = z.object({
  name: z.string().min(1).max(100),
  elevenlabs_name: z.string().min(1).max(100),
  elevenlabs_voice_id: z
    .string()
    .min(1)
    .max(50)
    .regex(/^[a-zA-Z0-9]+$/),
  description: z.string().max(1000).nullable().optional(),
  is_favorite: z.boolean().default(false),
});

const VoiceUpdateSchema = VoiceSchema.partial();

const VoiceTestSchema = z.object({
  voice_id: z.string().min(1),
  text: z.string().min(1).max(500).default('Hello, this is a voice test.'),
});

const ImportQuerySchema = z.object({
  voice_id: z.string().min(1),
  name: z.string().min(1).max(100).optional(),
});

router.get('/', async (req, res, next): Promise<void> => {
  try {
    const query = ListQuerySchema.parse(req.query);
    const voices = await voiceService.list(currentUser(req).id, {
      search: query.search,
      favoritesOnly: query.favorites_only,
    });
    res.json({ items: voices.map(serializeVoice), total: voices.length });
  } catch (error) {
    next(error);
  }
});

router.post('/', async (req, res, next): Promise<void> => {
  try {
    const body = VoiceSchema.parse(req.body);
    const voice = await voiceService.create(currentUser(req).id, {
      name: body.name,
      elevenlabsName: body.elevenlabs_name,
      elevenlabsVoiceId: body.elevenlabs_voice_id,
      description: body.description ?? null,
      isFavorite: body.is_favorite,
    });
    res.status(201).json(serializeVoice(voice));
  } catch (error) {
    next(error);
  }
});

/**
 * GET /api/voices/elevenlabs/available
 * Voices on the user's ElevenLabs account; declared before /:voiceId
 */
router.get('/elevenlabs/available', async (req, res, next): Promise<void> => {
  try {
    const voices = await new ElevenLabsService(currentUser(req)).getVoices();
    res.json(
      voices.map((voice) => ({
        voice_id: voice.voice_id,
        name: voice.name,
        category: voice.category ?? null,
        description: voice.description ?? null,
        preview_url: voice.preview_url ?? null,
        labels: voice.labels ?? {},
      })),
    );
  } catch (error) {
    next(error);
  }
});

router.post('/import-from-elevenlabs', async (req, res, next): Promise<void> => {
  try {
    const query = ImportQuerySchema.parse(req.query);
    const user = currentUser(req);
    const available = await new ElevenLabsService(user).getVoices();
    const match = available.find((voice) => voice.voice_id === query.voice_id);
    if (!match) {
      throw new NotFoundError('ElevenLabs voice', query.voice_id);
    }

    const voice = await voiceService.create(user.id, {
      name: query.name || match.name || 'Imported Voice',
      elevenlabsName: match.name,
      elevenlabsVoiceId: query.voice_id,
      description: match.description ?? null,
      isFavorite: false,
    });
    res.status(201).json(serializeVoice(voice));
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/voices/test
 * Short sample kept in temp storage until the next cleanup
 */
router.post('/test', async (req, res, next): Promise<void> => {
  try {
    const body = VoiceTestSchema.parse(req.body);
    const audio = await new ElevenLabsService(currentUser(req)).testVoice(body.voice_id, body.text);
    const audioUrl = await storageService.saveFile(audio, 'temp');
    const duration = await audioService.getAudioDuration(audioUrl);
    res.json({ audio_url: audioUrl, duration_seconds: duration });
  } catch (error) {
    next(error);
  }
});

router.get('/:voiceId', async (req, res, next): Promise<void> => {
  try {
    const voice = await voiceService.getOwned(currentUser(req).id, req.params.voiceId);
    res.json(serializeVoice(voice));
  } catch (error) {
    next(error);
  }
});

router.put('/:voiceId', async (req, res, next): Promise<void> => {
  try {
    const body = VoiceUpdateSchema.parse(req.body);
    const voice = await voiceService.update(currentUser(req).id, req.params.voiceId, {
      name: body.name,
      elevenlabsName: body.elevenlabs_name,
      elevenlabsVoiceId: body.elevenlabs_voice_id,
      description: body.description,
      isFavorite: body.is_favorite,
    });
    res.json(serializeVoice(voice));
  } catch (error) {
    next(error);
  }
});

router.delete('/:voiceId', async (req, res, next): Promise<void> => {
  try {
    await voiceService.delete(currentUser(req).id, req.params.voiceId);
    res.json({ message: 'Voice deleted' });
  } catch (error) {
    next(error);
  }
});

export { router as voicesRouter };
