/**
 * Classroom search tools
 *
 * The two tools the model may call. Each one builds a backend request from
 * the model's arguments and hands the raw body back. Failures come back as
 * an `Error: ...` string so the model can explain them to the user.
 */

import { jsonSchema, tool, zodSchema, type CoreTool, type Schema } from 'ai';
import { z } from 'zod';
import type { ClassroomApiClient } from './classroom-client.js';
import { rootLogger, serializeError, type StructuredLogger } from '../observability/logger.js';

// =============================================================================
// Constants
// =============================================================================

export const FIND_CLASSROOMS_TOOL = 'find_classrooms';
export const FIND_CLASSROOMS_WITH_AMENITIES_TOOL = 'find_classrooms_with_amenities';

export const CLASS_STYLES = ['lecture', 'seminar', 'lab', 'studio', 'discussion'] as const;

// =============================================================================
// Schemas
// =============================================================================

/**
 * Argument shapes only. Which styles, sizes and amenities are acceptable is
 * the backend's decision; the model is told the known styles in the
 * parameter description.
 */
export const ClassroomQuerySchema = z.object({
  style: z.string().describe(`Teaching style the room must support, one of: ${CLASS_STYLES.join(', ')}`),
  size: z.number().describe('Number of students the room must seat'),
});

export type ClassroomQuery = z.infer<typeof ClassroomQuerySchema>;

export const AmenityClassroomQuerySchema = ClassroomQuerySchema.extend({
  amenities: z
    .array(z.string())
    .describe('Required amenities, e.g. "projector", "whiteboard", "video conferencing"'),
});

export type AmenityClassroomQuery = z.infer<typeof AmenityClassroomQuerySchema>;

/**
 * A classroom record as returned by the backend. Fields beyond the object
 * shape are the backend's business.
 */
export type Classroom = Record<string, unknown>;

const ClassroomListSchema = z.array(z.record(z.unknown()));

const ClassroomEnvelopeSchema = z.object({
  classrooms: ClassroomListSchema,
});

// =============================================================================
// Types
// =============================================================================

/**
 * Per-request values the tools need
 */
export interface ClassroomToolContext {
  /** Caller's Authorization header, forwarded to the backend */
  authorization?: string | undefined;
  logger?: StructuredLogger;
}

export type ClassroomTools = Record<string, CoreTool>;

// =============================================================================
// Result Helpers
// =============================================================================

/**
 * Format a failure as the text the model receives
 */
export function formatToolError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Error: ${message || 'Unknown error'}`;
}

/**
 * One line per zod issue, prefixed with the argument path
 */
export function describeArgumentIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * The schema's JSON Schema, for the model only. The SDK does not validate
 * arguments against it; execute does.
 */
function describeParameters(schema: z.ZodTypeAny): Schema<unknown> {
  return jsonSchema<unknown>(zodSchema(schema).jsonSchema);
}

/**
 * Pull classroom records out of a tool result.
 *
 * Accepts a JSON array of objects or an object with a `classrooms` array.
 * Error strings and anything else yield undefined.
 */
export function extractClassrooms(result: string): Classroom[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(result);
  } catch {
    return undefined;
  }

  const list = ClassroomListSchema.safeParse(parsed);
  if (list.success) {
    return list.data;
  }

  const envelope = ClassroomEnvelopeSchema.safeParse(parsed);
  if (envelope.success) {
    return envelope.data.classrooms;
  }

  return undefined;
}

// =============================================================================
// Tool Factory
// =============================================================================

/**
 * Build the tool registry for one chat request
 */
export function createClassroomTools(
  client: ClassroomApiClient,
  context: ClassroomToolContext = {}
): ClassroomTools {
  const logger = context.logger ?? rootLogger.child('tools');
  const requestOptions = { authorization: context.authorization };

  const run = async <T>(
    name: string,
    schema: z.ZodType<T>,
    args: unknown,
    call: (query: T) => Promise<string>
  ): Promise<string> => {
    logger.info('Tool call', { tool: name, args });

    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      const reason = describeArgumentIssues(parsed.error);
      logger.warning('Tool arguments rejected', { tool: name, reason });
      return formatToolError(`Invalid arguments for ${name}: ${reason}`);
    }

    try {
      const body = await call(parsed.data);
      logger.debug('Tool result', { tool: name, length: body.length });
      return body;
    } catch (error) {
      logger.warning('Tool call failed', { tool: name, error: serializeError(error) });
      return formatToolError(error);
    }
  };

  return {
    [FIND_CLASSROOMS_TOOL]: tool({
      description:
        'Find available classrooms by class style and number of students. ' +
        'Use when the user has no specific equipment requirements.',
      parameters: describeParameters(ClassroomQuerySchema),
      execute: async (args) =>
        run(FIND_CLASSROOMS_TOOL, ClassroomQuerySchema, args, (query) =>
          client.findClassrooms(query, requestOptions)
        ),
    }),

    [FIND_CLASSROOMS_WITH_AMENITIES_TOOL]: tool({
      description:
        'Find available classrooms by class style, number of students and required amenities ' +
        '(projector, whiteboard, accessible seating, ...). ' +
        'Use when the user asks for specific equipment or features.',
      parameters: describeParameters(AmenityClassroomQuerySchema),
      execute: async (args) =>
        run(FIND_CLASSROOMS_WITH_AMENITIES_TOOL, AmenityClassroomQuerySchema, args, (query) =>
          client.findClassroomsWithAmenities(query, requestOptions)
        ),
    }),
  };
}
