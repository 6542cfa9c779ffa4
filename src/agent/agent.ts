/**
 * Classroom finder agent
 *
 * The model/tool loop itself is the AI SDK's generateText with maxSteps:
 * it asks the model, runs any tool the model selects, appends the result
 * and asks again until the model answers in text. This module prepares the
 * conversation, then reads the loop's output back into steps, the
 * classroom records found and the final answer.
 */

import {
  generateText,
  InvalidToolArgumentsError,
  NoSuchToolError,
  type LanguageModelV1,
  type CoreMessage,
} from 'ai';
import { extractClassrooms, type Classroom, type ClassroomTools } from '../tools/classroom-tools.js';
import { rootLogger, type StructuredLogger } from '../observability/logger.js';
import { SYSTEM_PROMPT } from './prompt.js';

export interface AgentOptions {
  maxSteps?: number | undefined;
  systemPrompt?: string | undefined;
  logger?: StructuredLogger | undefined;
}

export interface AgentStep {
  type: 'text' | 'tool_call' | 'tool_result';
  content: string;
  toolName?: string | undefined;
  toolArgs?: unknown;
}

export interface AgentResult {
  text: string;
  steps: AgentStep[];
  /** True when the model requested at least one tool call */
  toolCalled: boolean;
  /** Records from the most recent tool result that held classrooms */
  classrooms: Classroom[] | undefined;
  /** Messages the loop appended: assistant turns and tool results, in order */
  responseMessages: CoreMessage[];
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  } | undefined;
}

export const DEFAULT_MAX_STEPS = 10;

/** Returned when the loop ends without any answer text */
export const FALLBACK_RESPONSE =
  "Sorry, I couldn't come up with an answer to that. Could you rephrase your request?";

/** Returned when the model asks for a tool that does not exist or sends unreadable arguments */
export const TOOL_REQUEST_FAILED_RESPONSE =
  "Sorry, I couldn't run that classroom search. Could you restate what you're looking for?";

/**
 * A tool request the SDK rejected before any tool ran
 */
function rejectedToolRequest(error: unknown): { toolName: string; reason: string } | undefined {
  if (NoSuchToolError.isInstance(error) || InvalidToolArgumentsError.isInstance(error)) {
    return { toolName: error.toolName, reason: error.message };
  }
  return undefined;
}

/**
 * Flatten the loop's response messages into agent steps
 */
export function collectSteps(messages: CoreMessage[]): AgentStep[] {
  const steps: AgentStep[] = [];

  for (const message of messages) {
    if (message.role === 'assistant') {
      if (typeof message.content === 'string') {
        if (message.content) {
          steps.push({ type: 'text', content: message.content });
        }
        continue;
      }
      for (const part of message.content) {
        if (part.type === 'text' && part.text) {
          steps.push({ type: 'text', content: part.text });
        } else if (part.type === 'tool-call') {
          steps.push({
            type: 'tool_call',
            content: `Calling ${part.toolName}`,
            toolName: part.toolName,
            toolArgs: part.args,
          });
        }
      }
    } else if (message.role === 'tool') {
      for (const part of message.content) {
        steps.push({
          type: 'tool_result',
          content: typeof part.result === 'string' ? part.result : JSON.stringify(part.result),
          toolName: part.toolName,
        });
      }
    }
  }

  return steps;
}

/**
 * Classroom records from the latest tool result that has any
 */
export function findClassrooms(steps: AgentStep[]): Classroom[] | undefined {
  for (let i = steps.length - 1; i >= 0; i--) {
    const step = steps[i];
    if (step?.type !== 'tool_result') {
      continue;
    }
    const classrooms = extractClassrooms(step.content);
    if (classrooms) {
      return classrooms;
    }
  }
  return undefined;
}

/**
 * Run the agent over a conversation
 *
 * @param messages - Conversation so far, ending with the user's message
 */
export async function runAgent(
  messages: CoreMessage[],
  tools: ClassroomTools,
  model: LanguageModelV1,
  options: AgentOptions = {}
): Promise<AgentResult> {
  const {
    maxSteps = DEFAULT_MAX_STEPS,
    systemPrompt = SYSTEM_PROMPT,
    logger = rootLogger.child('agent'),
  } = options;

  logger.debug('Agent run started', {
    messages: messages.length,
    tools: Object.keys(tools),
    maxSteps,
  });

  try {
    const result = await generateText({
      model,
      messages: [{ role: 'system', content: systemPrompt }, ...messages],
      tools,
      maxSteps,
      onStepFinish: (event) => {
        logger.debug('Agent step finished', {
          stepType: event.stepType,
          finishReason: event.finishReason,
          toolCalls: event.toolCalls.length,
        });
      },
    });

    const responseMessages: CoreMessage[] = [...result.response.messages];
    const steps = collectSteps(responseMessages);
    const toolCalled = steps.some((step) => step.type === 'tool_call');
    const text = result.text.trim() ? result.text : FALLBACK_RESPONSE;

    logger.info('Agent run finished', {
      steps: steps.length,
      toolCalled,
      finishReason: result.finishReason,
    });

    return {
      text,
      steps,
      toolCalled,
      classrooms: findClassrooms(steps),
      responseMessages,
      usage: result.usage ? {
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
        totalTokens: result.usage.totalTokens,
      } : undefined,
    };
  } catch (error) {
    const rejected = rejectedToolRequest(error);
    if (!rejected) {
      throw error;
    }
    logger.warning('Tool request rejected', rejected);
    return {
      text: TOOL_REQUEST_FAILED_RESPONSE,
      steps: [
        { type: 'tool_call', content: `Calling ${rejected.toolName}`, toolName: rejected.toolName },
        { type: 'text', content: TOOL_REQUEST_FAILED_RESPONSE },
      ],
      toolCalled: true,
      classrooms: undefined,
      responseMessages: [{ role: 'assistant', content: TOOL_REQUEST_FAILED_RESPONSE }],
    };
  }
}

/**
 * Agent class for stateful conversations (terminal chat)
 */
export class Agent {
  private readonly tools: ClassroomTools;
  private readonly model: LanguageModelV1;
  private readonly options: AgentOptions;
  private conversationHistory: CoreMessage[] = [];

  constructor(tools: ClassroomTools, model: LanguageModelV1, options: AgentOptions = {}) {
    this.tools = tools;
    this.model = model;
    this.options = options;
  }

  /**
   * Send a message and get a response.
   * History is only extended when the run succeeds.
   */
  async chat(message: string): Promise<AgentResult> {
    const pending: CoreMessage[] = [...this.conversationHistory, { role: 'user', content: message }];
    const result = await runAgent(pending, this.tools, this.model, this.options);
    this.conversationHistory = [...pending, ...result.responseMessages];
    return result;
  }

  /**
   * Clear conversation history
   */
  clearHistory(): void {
    this.conversationHistory = [];
  }

  /**
   * Get conversation history (system prompt excluded)
   */
  getHistory(): CoreMessage[] {
    return [...this.conversationHistory];
  }
}
