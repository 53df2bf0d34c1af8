export * from './controllers/chat.controller.js';
export * from './controllers/health.controller.js';
export * from './controllers/leave.controller.js';
export * from './controllers/request.validator.js';
export { createApiRouter, createV1Router, type ApiServices } from './routes/index.js';
