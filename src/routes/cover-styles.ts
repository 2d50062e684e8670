import express from 'express';
import { z } from 'zod';
import { requireAuth } from '@/middleware/auth.js';
import { CoverStyleService } from '@/services/cover-styles.js';
import { serializeCoverStyle } from '@/shared/serializers.js';

const router = express.Router();
const coverStyleService = new CoverStyleService();

const CoverStyleSchema = z.object({
  key: z
    .string()
    .min(1)
    .max(50)
    .regex(/^[a-z0-9_]+$/),
  name: z.string().min(1).max(100),
  emoji: z.string().max(10).default('🎨'),
  instructions: z.string().min(1),
  mood: z.string().min(1).max(200),
  sort_order: z.number().int().default(0),
});

const CoverStyleUpdateSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  emoji: z.string().max(10).optional(),
  instructions: z.string().min(1).optional(),
  mood: z.string().min(1).max(200).optional(),
  is_active: z.boolean().optional(),
  sort_order: z.number().int().optional(),
});

/**
 * GET /api/cover-styles
 * Public; ordered by sort_order
 */
router.get('/', async (req, res, next): Promise<void> => {
  try {
    const activeOnly = req.query.active_only === 'true';
    const styles = await coverStyleService.list(activeOnly);
    res.json(styles.map(serializeCoverStyle));
  } catch (error) {
    next(error);
  }
});

router.post('/', requireAuth, async (req, res, next): Promise<void> => {
  try {
    const body = CoverStyleSchema.parse(req.body);
    const style = await coverStyleService.create({
      key: body.key,
      name: body.name,
      emoji: body.emoji,
      instructions: body.instructions,
      mood: body.mood,
      sortOrder: body.sort_order,
    });
    res.json(serializeCoverStyle(style));
  } catch (error) {
    next(error);
  }
});

type StyleParams = { styleId: string };

router.put('/:styleId', requireAuth, async (req: express.Request<StyleParams>, res, next): Promise<void> => {
  try {
    const body = CoverStyleUpdateSchema.parse(req.body);
    const style = await coverStyleService.update(req.params.styleId, {
      name: body.name,
      emoji: body.emoji,
      instructions: body.instructions,
      mood: body.mood,
      isActive: body.is_active,
      sortOrder: body.sort_order,
    });
    res.json(serializeCoverStyle(style));
  } catch (error) {
    next(error);
  }
});

router.delete('/:styleId', requireAuth, async (req: express.Request<StyleParams>, res, next): Promise<void> => {
  try {
    await coverStyleService.delete(req.params.styleId);
    res.json({ status: 'deleted' });
  } catch (error) {
    next(error);
  }
});

export { router as coverStylesRouter };
