/**
 * Agent Unit Tests
 *
 * The AI SDK loop is mocked; these tests cover how the agent prepares the
 * conversation and reads the loop's output back.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { CoreMessage, LanguageModelV1 } from 'ai';
import {
  runAgent,
  collectSteps,
  findClassrooms,
  Agent,
  DEFAULT_MAX_STEPS,
  FALLBACK_RESPONSE,
  TOOL_REQUEST_FAILED_RESPONSE,
  type AgentStep,
} from '../../../src/agent/agent.js';
import { SYSTEM_PROMPT } from '../../../src/agent/prompt.js';
import type { ClassroomTools } from '../../../src/tools/classroom-tools.js';

// Mock the AI SDK's generateText
vi.mock('ai', async () => {
  const actual = await vi.importActual('ai');
  return {
    ...actual,
    generateText: vi.fn(),
  };
});

import { generateText, InvalidToolArgumentsError, NoSuchToolError } from 'ai';

// =============================================================================
// Test Helpers
// =============================================================================

const ROOMS = [{ id: 'r-7', name: 'Baker 7', capacity: 24 }];

function createMockModel(): LanguageModelV1 {
  return {
    specificationVersion: 'v1',
    provider: 'test',
    modelId: 'test-model',
    defaultObjectGenerationMode: 'json',
    doGenerate: vi.fn(),
    doStream: vi.fn(),
  } as unknown as LanguageModelV1;
}

function createMockTools(): ClassroomTools {
  return {
    find_classrooms: {
      description: 'Find classrooms',
      parameters: {},
      execute: vi.fn().mockResolvedValue(JSON.stringify(ROOMS)),
    },
  } as unknown as ClassroomTools;
}

function toolCallMessages(result: string): CoreMessage[] {
  return [
    {
      role: 'assistant',
      content: [
        {
          type: 'tool-call',
          toolCallId: 'call-1',
          toolName: 'find_classrooms',
          args: { style: 'seminar', size: 20 },
        },
      ],
    },
    {
      role: 'tool',
      content: [
        {
          type: 'tool-result',
          toolCallId: 'call-1',
          toolName: 'find_classrooms',
          result,
        },
      ],
    },
    { role: 'assistant', content: [{ type: 'text', text: 'Baker 7 seats 24.' }] },
  ];
}

function mockGenerate(text: string, messages: CoreMessage[] = []): void {
  (generateText as Mock).mockResolvedValue({
    text,
    finishReason: 'stop',
    usage: { promptTokens: 120, completionTokens: 30, totalTokens: 150 },
    response: { messages },
  });
}

// =============================================================================
// runAgent Tests
// =============================================================================

describe('runAgent', () => {
  let model: LanguageModelV1;
  let tools: ClassroomTools;

  beforeEach(() => {
    model = createMockModel();
    tools = createMockTools();
  });

  describe('basic execution', () => {
    it('should prepend the system prompt and pass tools and maxSteps', async () => {
      mockGenerate('Hello!');

      await runAgent([{ role: 'user', content: 'hi' }], tools, model);

      expect(generateText).toHaveBeenCalledWith(
        expect.objectContaining({
          model,
          tools,
          maxSteps: DEFAULT_MAX_STEPS,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: 'hi' },
          ],
        })
      );
    });

    it('should honor custom maxSteps and system prompt', async () => {
      mockGenerate('ok');

      await runAgent([{ role: 'user', content: 'hi' }], tools, model, {
        maxSteps: 3,
        systemPrompt: 'Be brief.',
      });

      expect(generateText).toHaveBeenCalledWith(
        expect.objectContaining({
          maxSteps: 3,
          messages: [
            { role: 'system', content: 'Be brief.' },
            { role: 'user', content: 'hi' },
          ],
        })
      );
    });

    it('should return text and usage for a direct answer', async () => {
      mockGenerate('Hello! Tell me your class style and size.', [
        { role: 'assistant', content: [{ type: 'text', text: 'Hello! Tell me your class style and size.' }] },
      ]);

      const result = await runAgent([{ role: 'user', content: 'hi' }], tools, model);

      expect(result.text).toBe('Hello! Tell me your class style and size.');
      expect(result.toolCalled).toBe(false);
      expect(result.classrooms).toBeUndefined();
      expect(result.usage).toEqual({ promptTokens: 120, completionTokens: 30, totalTokens: 150 });
    });

    it('should substitute the fallback response for empty text', async () => {
      mockGenerate('   ');

      const result = await runAgent([{ role: 'user', content: 'hi' }], tools, model);

      expect(result.text).toBe(FALLBACK_RESPONSE);
    });

    it('should propagate model errors', async () => {
      (generateText as Mock).mockRejectedValue(new Error('rate limited'));

      await expect(runAgent([{ role: 'user', content: 'hi' }], tools, model)).rejects.toThrow('rate limited');
    });
  });

  describe('tool use', () => {
    it('should report the tool call and the classrooms found', async () => {
      const messages = toolCallMessages(JSON.stringify(ROOMS));
      mockGenerate('Baker 7 seats 24.', messages);

      const result = await runAgent([{ role: 'user', content: 'seminar for 20' }], tools, model);

      expect(result.toolCalled).toBe(true);
      expect(result.classrooms).toEqual(ROOMS);
      expect(result.responseMessages).toEqual(messages);
      expect(result.steps.map((step) => step.type)).toEqual(['tool_call', 'tool_result', 'text']);
    });

    it('should answer gracefully when the model asks for an unknown tool', async () => {
      (generateText as Mock).mockRejectedValue(
        new NoSuchToolError({ toolName: 'book_room', availableTools: ['find_classrooms'] })
      );

      const result = await runAgent([{ role: 'user', content: 'book room 101' }], tools, model);

      expect(result.text).toBe(TOOL_REQUEST_FAILED_RESPONSE);
      expect(result.toolCalled).toBe(true);
      expect(result.classrooms).toBeUndefined();
      expect(result.steps[0]).toEqual({
        type: 'tool_call',
        content: 'Calling book_room',
        toolName: 'book_room',
      });
      expect(result.responseMessages).toEqual([
        { role: 'assistant', content: TOOL_REQUEST_FAILED_RESPONSE },
      ]);
    });

    it('should answer gracefully when tool arguments are unreadable', async () => {
      (generateText as Mock).mockRejectedValue(
        new InvalidToolArgumentsError({
          toolName: 'find_classrooms',
          toolArgs: '{"style":',
          cause: new SyntaxError('Unexpected end of JSON input'),
        })
      );

      const result = await runAgent([{ role: 'user', content: 'a lab' }], tools, model);

      expect(result.text).toBe(TOOL_REQUEST_FAILED_RESPONSE);
      expect(result.steps[0]?.toolName).toBe('find_classrooms');
    });

    it('should leave classrooms unset when the tool failed', async () => {
      mockGenerate(
        'The classroom service is down right now.',
        toolCallMessages('Error: Classroom service returned 500')
      );

      const result = await runAgent([{ role: 'user', content: 'seminar for 20' }], tools, model);

      expect(result.toolCalled).toBe(true);
      expect(result.classrooms).toBeUndefined();
      expect(result.text).toBe('The classroom service is down right now.');
    });
  });
});

// =============================================================================
// Step Helpers
// =============================================================================

describe('collectSteps', () => {
  it('should flatten tool calls, results and text', () => {
    const steps = collectSteps(toolCallMessages('[]'));

    expect(steps).toEqual([
      {
        type: 'tool_call',
        content: 'Calling find_classrooms',
        toolName: 'find_classrooms',
        toolArgs: { style: 'seminar', size: 20 },
      },
      { type: 'tool_result', content: '[]', toolName: 'find_classrooms' },
      { type: 'text', content: 'Baker 7 seats 24.' },
    ]);
  });

  it('should read plain string assistant content', () => {
    expect(collectSteps([{ role: 'assistant', content: 'Hi there' }])).toEqual([
      { type: 'text', content: 'Hi there' },
    ]);
  });

  it('should skip empty text and user messages', () => {
    expect(
      collectSteps([
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: '' },
        { role: 'assistant', content: [{ type: 'text', text: '' }] },
      ])
    ).toEqual([]);
  });

  it('should stringify structured tool results', () => {
    const steps = collectSteps([
      {
        role: 'tool',
        content: [{ type: 'tool-result', toolCallId: 'c', toolName: 'find_classrooms', result: { classrooms: [] } }],
      },
    ]);

    expect(steps).toEqual([
      { type: 'tool_result', content: '{"classrooms":[]}', toolName: 'find_classrooms' },
    ]);
  });
});

describe('findClassrooms', () => {
  it('should prefer the latest result that holds classrooms', () => {
    const steps: AgentStep[] = [
      { type: 'tool_result', content: JSON.stringify([{ id: 'old' }]) },
      { type: 'tool_result', content: JSON.stringify([{ id: 'new' }]) },
      { type: 'tool_result', content: 'Error: Classroom service returned 503' },
      { type: 'text', content: 'Here you go' },
    ];

    expect(findClassrooms(steps)).toEqual([{ id: 'new' }]);
  });

  it('should ignore text steps that look like JSON', () => {
    expect(findClassrooms([{ type: 'text', content: '[{"id":"x"}]' }])).toBeUndefined();
  });
});

// =============================================================================
// Agent Class Tests
// =============================================================================

describe('Agent', () => {
  let agent: Agent;

  beforeEach(() => {
    agent = new Agent(createMockTools(), createMockModel());
  });

  it('should start with empty history', () => {
    expect(agent.getHistory()).toEqual([]);
  });

  it('should extend history with the user turn and response messages', async () => {
    const reply: CoreMessage = { role: 'assistant', content: [{ type: 'text', text: 'Hi!' }] };
    mockGenerate('Hi!', [reply]);

    await agent.chat('hello');

    expect(agent.getHistory()).toEqual([{ role: 'user', content: 'hello' }, reply]);
  });

  it('should send prior turns on the next message', async () => {
    const reply: CoreMessage = { role: 'assistant', content: [{ type: 'text', text: 'Hi!' }] };
    mockGenerate('Hi!', [reply]);
    await agent.chat('hello');

    mockGenerate('Sure.');
    await agent.chat('a lab for 12');

    expect(generateText).toHaveBeenLastCalledWith(
      expect.objectContaining({
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: 'hello' },
          reply,
          { role: 'user', content: 'a lab for 12' },
        ],
      })
    );
  });

  it('should leave history untouched when a run fails', async () => {
    (generateText as Mock).mockRejectedValue(new Error('provider down'));

    await expect(agent.chat('hello')).rejects.toThrow('provider down');
    expect(agent.getHistory()).toEqual([]);
  });

  it('should clear history', async () => {
    mockGenerate('Hi!', [{ role: 'assistant', content: 'Hi!' }]);
    await agent.chat('hello');

    agent.clearHistory();

    expect(agent.getHistory()).toEqual([]);
  });
});
