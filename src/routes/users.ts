import express from 'express';
import { z } from 'zod';
import { SUPPORTED_LANGUAGES } from '@/config/locales.js';
import { LLM_PROVIDER_IDS, getProviderModels } from '@/config/providers.js';
import { currentUser } from '@/middleware/auth.js';
import { UserService } from '@/services/users.js';
import { serializeApiKey, serializeSettings, serializeUser } from '@/shared/serializers.js';

const router = express.Router();
const userService = new UserService();

const username = z
  .string()
  .min(3)
  .max(50)
  .regex(/^[a-zA-Z0-9_]+$/);

const ProfileSchema = z.object({
  email: z.string().email().optional(),
  username: username.optional(),
  language: z.enum(SUPPORTED_LANGUAGES).optional(),
  telegram_chat_id: z.string().max(50).nullable().optional(),
});

const LLMSettingsSchema = z.object({
  provider: z.enum(LLM_PROVIDER_IDS),
  api_key: z.string().nullable().optional(),
  model: z.string().max(100).nullable().optional(),
});

const StorageSettingsSchema = z.object({
  storage_type: z.enum(['local', 'google_drive']),
  google_drive_credentials: z.record(z.unknown()).nullable().optional(),
});

const PromptsSchema = z.object({
  ai_writer_prompt: z.string().nullable().optional(),
  cover_prompt_template: z.string().nullable().optional(),
});

const ApiKeyCreateSchema = z.object({
  name: z.string().min(1).max(100),
  expires_in_days: z.number().int().min(1).max(3650).nullable().default(365),
});

router.get('/settings', (req, res): void => {
  res.json(serializeSettings(currentUser(req)));
});

router.put('/settings', async (req, res, next): Promise<void> => {
  try {
    const body = ProfileSchema.parse(req.body);
    const user = await userService.updateProfile(currentUser(req), {
      email: body.email,
      username: body.username,
      language: body.language,
      telegramChatId: body.telegram_chat_id,
    });
    res.json(serializeUser(user));
  } catch (error) {
    next(error);
  }
});

router.put('/settings/llm', async (req, res, next): Promise<void> => {
  try {
    const body = LLMSettingsSchema.parse(req.body);
    const user = await userService.updateLLMSettings(currentUser(req), {
      provider: body.provider,
      apiKey: body.api_key,
      model: body.model,
    });
    res.json({
      message: 'LLM settings updated',
      provider: user.llmProvider,
      model: user.llmModel,
      has_api_key: Boolean(user.llmApiKey),
    });
  } catch (error) {
    next(error);
  }
});

router.put('/settings/elevenlabs', async (req, res, next): Promise<void> => {
  try {
    const body = z.object({ elevenlabs_api_key: z.string().min(1) }).parse(req.body);
    await userService.setElevenLabsKey(currentUser(req), body.elevenlabs_api_key);
    res.json({ message: 'ElevenLabs API key updated' });
  } catch (error) {
    next(error);
  }
});

router.put('/settings/kieai', async (req, res, next): Promise<void> => {
  try {
    const body = z.object({ kieai_api_key: z.string().min(1) }).parse(req.body);
    await userService.setKieAIKey(currentUser(req), body.kieai_api_key);
    res.json({ message: 'kie.ai API key updated' });
  } catch (error) {
    next(error);
  }
});

router.put('/settings/storage', async (req, res, next): Promise<void> => {
  try {
    const body = StorageSettingsSchema.parse(req.body);
    const user = await userService.updateStorage(currentUser(req), body.storage_type, body.google_drive_credentials);
    res.json({ message: 'Storage settings updated', storage_type: user.storageType });
  } catch (error) {
    next(error);
  }
});

router.put('/settings/prompts', async (req, res, next): Promise<void> => {
  try {
    const body = PromptsSchema.parse(req.body);
    await userService.updatePrompts(currentUser(req), {
      aiWriterPrompt: body.ai_writer_prompt,
      coverPromptTemplate: body.cover_prompt_template,
    });
    res.json({ message: 'Prompts updated' });
  } catch (error) {
    next(error);
  }
});

router.post('/settings/prompts/reset', async (req, res, next): Promise<void> => {
  try {
    await userService.resetPrompts(currentUser(req));
    res.json({ message: 'Prompts reset to defaults' });
  } catch (error) {
    next(error);
  }
});

// ---------------------------------------------------------------------------
// Personal API keys
// ---------------------------------------------------------------------------

router.get('/api-keys', async (req, res, next): Promise<void> => {
  try {
    const keys = await userService.listApiKeys(currentUser(req).id);
    res.json({ items: keys.map(serializeApiKey), total: keys.length });
  } catch (error) {
    next(error);
  }
});

router.post('/api-keys', async (req, res, next): Promise<void> => {
  try {
    const body = ApiKeyCreateSchema.parse(req.body);
    const { apiKey, plainKey } = await userService.createApiKey(currentUser(req).id, body.name, body.expires_in_days);
    // The plaintext key is only ever returned here
    res.status(201).json({ ...serializeApiKey(apiKey), api_key: plainKey });
  } catch (error) {
    next(error);
  }
});

router.delete('/api-keys/:keyId', async (req, res, next): Promise<void> => {
  try {
    await userService.revokeApiKey(currentUser(req).id, req.params.keyId);
    res.json({ message: 'API key revoked' });
  } catch (error) {
    next(error);
  }
});

router.get('/llm-models', (req, res): void => {
  const provider = typeof req.query.provider === 'string' ? req.query.provider : 'openrouter';
  res.json({ provider, models: getProviderModels(provider) });
});

export { router as usersRouter };
