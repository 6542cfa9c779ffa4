/**
 * NDJSON logging for the agent service
 *
 * One JSON object per line on stderr. Entries carry the component name, the
 * chat request they belong to and, when a span is active, its trace ids.
 */

import { trace, context } from '@opentelemetry/api';
import { LOG_LEVEL_PRIORITY, type LogLevel, parseLogLevel } from '../logging/levels.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Dotted component path, e.g. `classroom-agent.chat.tools` */
  logger?: string;
  /** Id of the chat request being served */
  requestId?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

export interface StructuredLoggerOptions {
  name?: string;
  /** Defaults to LOG_LEVEL, then 'info' */
  minLevel?: LogLevel;
  requestId?: string;
  /** Receives each serialized entry; defaults to a stderr line */
  output?: (json: string) => void;
}

const INVALID_TRACE_ID = '00000000000000000000000000000000';
const INVALID_SPAN_ID = '0000000000000000';

function activeSpanIds(): Pick<LogEntry, 'traceId' | 'spanId'> {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }
  const { traceId, spanId } = span.spanContext();
  if (traceId === INVALID_TRACE_ID || spanId === INVALID_SPAN_ID) {
    return {};
  }
  return { traceId, spanId };
}

function writeStderr(json: string): void {
  process.stderr.write(`${json}\n`);
}

/**
 * Reduce a thrown value to the `{ name, message }` pair logged under `error`
 */
export function serializeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * @example
 * ```typescript
 * const logger = new StructuredLogger({ name: 'classroom-agent' }).child('chat');
 * logger.forRequest(requestId).info('Chat request', { messages: 3 });
 * // {"timestamp":"...","level":"info","message":"Chat request","logger":"classroom-agent.chat","requestId":"...","data":{"messages":3}}
 * ```
 */
export class StructuredLogger {
  readonly name: string | undefined;
  readonly minLevel: LogLevel;
  readonly requestId: string | undefined;
  private readonly output: (json: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    this.name = options.name;
    this.minLevel = options.minLevel ?? parseLogLevel(process.env['LOG_LEVEL']) ?? 'info';
    this.requestId = options.requestId;
    this.output = options.output ?? writeStderr;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (this.name !== undefined) {
      entry.logger = this.name;
    }
    if (this.requestId !== undefined) {
      entry.requestId = this.requestId;
    }
    Object.assign(entry, activeSpanIds());
    if (data !== undefined) {
      entry.data = data;
    }

    this.output(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  notice(message: string, data?: unknown): void {
    this.log('notice', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  critical(message: string, data?: unknown): void {
    this.log('critical', message, data);
  }

  /**
   * Logger for a sub-component; names are joined with '.'
   */
  child(childName: string): StructuredLogger {
    return this.derive({ name: this.name ? `${this.name}.${childName}` : childName });
  }

  /**
   * Logger whose entries are tagged with the given chat request id
   */
  forRequest(requestId: string): StructuredLogger {
    return this.derive({ requestId });
  }

  private derive(overrides: Pick<StructuredLoggerOptions, 'name' | 'requestId'>): StructuredLogger {
    const options: StructuredLoggerOptions = {
      minLevel: this.minLevel,
      output: this.output,
    };
    const name = overrides.name ?? this.name;
    const requestId = overrides.requestId ?? this.requestId;
    if (name !== undefined) {
      options.name = name;
    }
    if (requestId !== undefined) {
      options.requestId = requestId;
    }
    return new StructuredLogger(options);
  }
}

export const rootLogger = new StructuredLogger({ name: 'classroom-agent' });
