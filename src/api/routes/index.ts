import { Router } from 'express';

import type { ConversationService } from '@services/conversation/conversation.service.js';
import type { LeaveService } from '@services/leave/leave.service.js';

import { createChatRoutes } from './chat.routes.js';
import healthRoutes from './health.routes.js';
import { createLeaveRoutes } from './leave.routes.js';

export interface ApiServices {
  leave: LeaveService;
  conversation: ConversationService;
}

/** `/v1` API; mounted under `/` by the app. */
export function createV1Router(services: ApiServices): Router {
  const v1Router = Router();
  v1Router.use(healthRoutes);
  v1Router.use(createChatRoutes(services.conversation));
  v1Router.use(createLeaveRoutes(services.leave));
  return v1Router;
}

export function createApiRouter(services: ApiServices): Router {
  const router = Router();
  router.use('/v1', createV1Router(services));
  return router;
}
