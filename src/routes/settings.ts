import express from 'express';
import { z } from 'zod';
import { getEnvironment } from '@/config/environment.js';
import { LANGUAGE_NAMES, SUPPORTED_LANGUAGES } from '@/config/locales.js';
import {
  APP_VERSION,
  DEFAULT_AI_WRITER_PROMPT,
  DEFAULT_COVER_PROMPT_TEMPLATE,
  LLM_PROVIDERS,
  LLM_PROVIDER_IDS,
  MAX_CHARACTERS_PER_PROJECT,
  MAX_COVER_VARIANTS,
} from '@/config/providers.js';
import { requireAuth } from '@/middleware/auth.js';
import { getStorageService } from '@/services/storage-singleton.js';

const router = express.Router();
const storageService = getStorageService();

const CleanupQuerySchema = z.object({
  max_age_hours: z.coerce.number().int().min(1).default(24),
});

router.get('/providers', (_req, res): void => {
  res.json({
    providers: LLM_PROVIDER_IDS.map((id) => ({
      id,
      name: id.charAt(0).toUpperCase() + id.slice(1),
      base_url: LLM_PROVIDERS[id].base_url,
      models: LLM_PROVIDERS[id].models,
    })),
  });
});

router.get('/languages', (_req, res): void => {
  res.json({
    languages: SUPPORTED_LANGUAGES.map((code) => ({
      code,
      native_name: LANGUAGE_NAMES[code].native_name,
      english_name: LANGUAGE_NAMES[code].name,
    })),
  });
});

router.get('/app-info', (_req, res): void => {
  const env = getEnvironment();
  res.json({
    name: env.APP_NAME,
    version: APP_VERSION,
    environment: env.NODE_ENV,
    features: {
      llm_providers: LLM_PROVIDER_IDS,
      storage_types: ['local', 'google_drive'],
      max_characters_per_project: MAX_CHARACTERS_PER_PROJECT,
      max_cover_variants: MAX_COVER_VARIANTS,
      supported_languages: SUPPORTED_LANGUAGES,
    },
  });
});

router.get('/storage-stats', requireAuth, async (_req, res, next): Promise<void> => {
  try {
    res.json(await storageService.getStorageStats());
  } catch (error) {
    next(error);
  }
});

router.post('/cleanup-temp', requireAuth, async (req, res, next): Promise<void> => {
  try {
    const { max_age_hours } = CleanupQuerySchema.parse(req.query);
    const removed = await storageService.cleanupTemp(max_age_hours);
    res.json({ message: `Cleaned up temp files older than ${max_age_hours} hours`, removed });
  } catch (error) {
    next(error);
  }
});

router.get('/health', (_req, res): void => {
  res.json({ status: 'healthy', app_name: getEnvironment().APP_NAME, version: APP_VERSION });
});

router.get('/default-prompts', (_req, res): void => {
  res.json({
    ai_writer_prompt: DEFAULT_AI_WRITER_PROMPT,
    cover_prompt_template: DEFAULT_COVER_PROMPT_TEMPLATE,
  });
});

export { router as settingsRouter };
