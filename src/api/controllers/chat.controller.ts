import type { NextFunction, Request, Response } from 'express';

import type { ConversationService } from '@services/conversation/conversation.service.js';

import { ChatBodySchema, parseBody } from './request.validator.js';

export function chatHandler(conversation: ConversationService) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseBody(ChatBodySchema, req.body);
      const result = await conversation.classifyAndAdvance(body.sessionId, body.message, {
        employeeId: body.employeeId,
      });
      res.status(200).json(result);
    } catch (err) {
      next(err);
    }
  };
}
