/**
 * Assistant Routes Module
 *
 * @module routes/assistant
 */

import { Router } from 'express';

import type { AssistantController } from '../controllers/assistant.controller.js';
import { authenticate } from '../middleware/authenticate.js';

export function createAssistantRouter(assistantController: AssistantController): Router {
  const router = Router();

  router.use(authenticate);

  router.post('/ask', (req, res, next) => {
    assistantController.ask(req, res).catch(next);
  });

  return router;
}
