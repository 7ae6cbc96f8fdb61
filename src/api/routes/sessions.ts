// API layer: Game session routes
// Create sessions, send commands, switch providers and manage saves

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { SessionRegistry } from '@/application/game/SessionRegistry.js';
import { sessionIdSchema, slotNameSchema } from '@/application/game/GameStateManager.js';

const CreateSessionSchema = z.object({
  sessionId: sessionIdSchema.optional(),
  provider: z.number().int().min(1).max(6).optional(),
  slotName: slotNameSchema.optional(),
});

const CommandSchema = z.object({
  command: z.string().max(500),
});

const ProviderSchema = z.object({
  provider: z.number().int(),
});

const SlotSchema = z.object({
  slotName: slotNameSchema.optional(),
});

export function createSessionRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId, provider, slotName } = CreateSessionSchema.parse(req.body ?? {});
      const session = await registry.open({ sessionId, provider, slotName });
      res.status(201).json({ success: true, session: session.summary() });
    })
  );

  router.get(
    '/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      const session = registry.get(req.params.sessionId);
      res.json({ success: true, session: session.summary() });
    })
  );

  router.delete(
    '/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      registry.delete(req.params.sessionId);
      res.json({ success: true });
    })
  );

  router.post(
    '/:sessionId/commands',
    asyncHandler(async (req: Request, res: Response) => {
      const { command } = CommandSchema.parse(req.body);
      const session = registry.get(req.params.sessionId);
      const result = await session.handleCommand(command);
      res.json({ success: true, result });
    })
  );

  router.get(
    '/:sessionId/providers',
    asyncHandler(async (req: Request, res: Response) => {
      const session = registry.get(req.params.sessionId);
      res.json({ success: true, providers: session.providers.listProviders() });
    })
  );

  router.post(
    '/:sessionId/provider',
    asyncHandler(async (req: Request, res: Response) => {
      const { provider } = ProviderSchema.parse(req.body);
      const session = registry.get(req.params.sessionId);
      const status = await session.switchProvider(provider);
      res.json({ success: true, provider: status });
    })
  );

  router.get(
    '/:sessionId/saves',
    asyncHandler(async (req: Request, res: Response) => {
      const session = registry.get(req.params.sessionId);
      res.json({ success: true, slots: await session.listSaves() });
    })
  );

  router.post(
    '/:sessionId/saves',
    asyncHandler(async (req: Request, res: Response) => {
      const { slotName } = SlotSchema.parse(req.body ?? {});
      const session = registry.get(req.params.sessionId);
      const save = await session.save(slotName);
      res.status(201).json({ success: true, save });
    })
  );

  router.post(
    '/:sessionId/load',
    asyncHandler(async (req: Request, res: Response) => {
      const { slotName } = SlotSchema.parse(req.body ?? {});
      const session = registry.get(req.params.sessionId);
      const loaded = await session.load(slotName);
      res.json({
        success: true,
        load: { slotName: loaded.slotName, savedAt: loaded.savedAt },
        session: session.summary(),
      });
    })
  );

  router.delete(
    '/:sessionId/saves/:slotName',
    asyncHandler(async (req: Request, res: Response) => {
      const session = registry.get(req.params.sessionId);
      await session.deleteSave(req.params.slotName);
      res.json({ success: true });
    })
  );

  return router;
}
