/**
 * API Router for the classroom finder agent
 *
 * POST /chat is the only API route; health endpoints are mounted by the
 * HTTP transport from the observability module.
 */

import { Router } from 'express';
import express from 'express';
import { createChatHandler, type ChatHandlerOptions } from './chat-handler.js';

/**
 * Create and configure the API router
 */
export function createApiRouter(options: ChatHandlerOptions): Router {
  const router = Router();

  router.use(express.json({ limit: '1mb' }));

  /**
   * POST /chat
   * Body: { message, history? } or { messages }. Authorization header
   * required unless disabled in config; it is forwarded to the backend.
   */
  router.post('/chat', createChatHandler(options));

  return router;
}
