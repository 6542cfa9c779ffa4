/**
 * Chat API Handler
 *
 * POST /chat: runs the classroom finder agent over the caller's
 * conversation and returns the final answer with any classrooms found.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CoreMessage, LanguageModelV1 } from 'ai';
import { z } from 'zod';
import { runAgent, type AgentResult } from '../agent/agent.js';
import { createClassroomTools, type Classroom } from '../tools/classroom-tools.js';
import type { ClassroomApiClient } from '../tools/classroom-client.js';
import { rootLogger, serializeError, type StructuredLogger } from '../observability/logger.js';
import { AgentError, ApiError, ErrorCodes, UnauthorizedError, ValidationError } from './errors.js';

// =============================================================================
// Schemas
// =============================================================================

export const ChatMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/**
 * `{ messages: [...] }`: the full conversation, last entry from the user
 */
export const ConversationRequestSchema = z.object({
  messages: z
    .array(ChatMessageSchema)
    .min(1, 'messages must not be empty')
    .refine((messages) => {
      const last = messages[messages.length - 1];
      return last !== undefined && last.role === 'user' && last.content.trim().length > 0;
    }, 'the last message must be a non-empty user message'),
});

/**
 * `{ message, history? }`: the new user message plus prior turns
 */
export const MessageRequestSchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  history: z.array(ChatMessageSchema).default([]),
});

export const ChatRequestSchema = z.union([MessageRequestSchema, ConversationRequestSchema]);

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface ChatResponse {
  message: string;
  classrooms: Classroom[] | null;
  toolCalled: boolean;
}

// =============================================================================
// Types
// =============================================================================

/**
 * In-flight request bookkeeping, provided by the shutdown manager
 */
export interface RequestTracker {
  trackRequest(requestId: string): void;
  completeRequest(requestId: string): void;
  isShuttingDown(): boolean;
}

export interface ChatHandlerOptions {
  model: LanguageModelV1;
  classroomClient: ClassroomApiClient;
  /** Reject requests without an Authorization header. Default: true */
  requireAuthorization?: boolean;
  maxSteps?: number;
  systemPrompt?: string;
  tracker?: RequestTracker;
  logger?: StructuredLogger;
}

// =============================================================================
// Helpers
// =============================================================================

function toCoreMessage(message: ChatMessage): CoreMessage {
  return message.role === 'user'
    ? { role: 'user', content: message.content }
    : { role: 'assistant', content: message.content };
}

/**
 * Normalize either request shape into the conversation handed to the agent
 */
export function toConversation(request: ChatRequest): CoreMessage[] {
  if ('messages' in request) {
    return request.messages.map(toCoreMessage);
  }
  return [...request.history.map(toCoreMessage), { role: 'user', content: request.message }];
}

/**
 * Parse a request body, throwing ValidationError with the first issue
 */
export function parseChatRequest(body: unknown): ChatRequest {
  const result = ChatRequestSchema.safeParse(body);
  if (result.success) {
    return result.data;
  }

  // A union reports every branch; pick the branch the caller meant
  const meant =
    typeof body === 'object' && body !== null && 'messages' in body
      ? ConversationRequestSchema.safeParse(body)
      : MessageRequestSchema.safeParse(body);
  const issue = meant.success ? result.error.issues[0] : meant.error.issues[0];
  const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  throw new ValidationError(`Invalid chat request: ${path}${issue?.message ?? 'unknown error'}`);
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the POST /chat handler
 */
export function createChatHandler(options: ChatHandlerOptions): RequestHandler {
  const {
    model,
    classroomClient,
    requireAuthorization = true,
    maxSteps,
    systemPrompt,
    tracker,
    logger = rootLogger.child('chat'),
  } = options;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const requestId = randomUUID();
    const requestLogger = logger.forRequest(requestId);

    try {
      if (tracker?.isShuttingDown()) {
        throw new ApiError(503, ErrorCodes.SERVICE_UNAVAILABLE, 'Server is shutting down');
      }

      const authorization = req.get('Authorization') || undefined;
      if (requireAuthorization && !authorization) {
        throw new UnauthorizedError();
      }

      const request = parseChatRequest(req.body);
      const messages = toConversation(request);

      tracker?.trackRequest(requestId);
      requestLogger.info('Chat request', { messages: messages.length });

      const tools = createClassroomTools(classroomClient, {
        authorization,
        logger: requestLogger.child('tools'),
      });

      let result: AgentResult;
      try {
        result = await runAgent(messages, tools, model, {
          maxSteps,
          systemPrompt,
          logger: requestLogger.child('agent'),
        });
      } catch (error) {
        requestLogger.error('Agent run failed', { error: serializeError(error) });
        const reason = error instanceof Error ? error.message : String(error);
        throw new AgentError(`Agent failed to respond: ${reason}`, error);
      }

      const response: ChatResponse = {
        message: result.text,
        classrooms: result.classrooms ?? null,
        toolCalled: result.toolCalled,
      };

      requestLogger.info('Chat response', {
        toolCalled: response.toolCalled,
        classrooms: response.classrooms?.length ?? 0,
      });

      res.status(200).json(response);
    } catch (error) {
      next(error);
    } finally {
      tracker?.completeRequest(requestId);
    }
  };
}
