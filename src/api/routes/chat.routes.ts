import { Router } from 'express';

import type { ConversationService } from '@services/conversation/conversation.service.js';

import { chatHandler } from '../controllers/chat.controller.js';

export function createChatRoutes(conversation: ConversationService): Router {
  const router = Router();
  router.post('/chat', chatHandler(conversation));
  return router;
}
