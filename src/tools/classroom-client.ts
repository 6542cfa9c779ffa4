/**
 * Classroom backend client
 *
 * Thin fetch wrapper over the backend's classroom API. Returns the raw
 * response body; the backend owns the classroom schema.
 */

import { ClassroomApiError } from '../api/errors.js';
import { rootLogger, type StructuredLogger } from '../observability/logger.js';

// =============================================================================
// Constants
// =============================================================================

export const CLASSROOMS_PATH = '/api/classrooms';
export const CLASSROOM_SEARCH_PATH = '/api/classrooms/search';

/** Characters of an error body kept in the error message */
const ERROR_BODY_EXCERPT_LENGTH = 200;

// =============================================================================
// Types
// =============================================================================

export interface ClassroomApiClientOptions {
  /** Backend base URL, e.g. http://localhost:3001 */
  baseUrl: string;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  logger?: StructuredLogger;
}

export interface ClassroomSearchParams {
  style: string;
  size: number;
}

export interface AmenitySearchParams extends ClassroomSearchParams {
  amenities: string[];
}

export interface ClassroomRequestOptions {
  /** Caller's Authorization header, forwarded as-is */
  authorization?: string | undefined;
}

// =============================================================================
// ClassroomApiClient Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const client = new ClassroomApiClient({ baseUrl: 'http://localhost:3001' });
 * const body = await client.findClassrooms({ style: 'seminar', size: 20 });
 * ```
 */
export class ClassroomApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: StructuredLogger;

  constructor(options: ClassroomApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? rootLogger.child('classroom-api');
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * GET /api/classrooms?style=&size=
   */
  async findClassrooms(
    query: ClassroomSearchParams,
    options: ClassroomRequestOptions = {}
  ): Promise<string> {
    const params = new URLSearchParams({
      style: query.style,
      size: String(query.size),
    });
    return this.request(`${CLASSROOMS_PATH}?${params.toString()}`, { method: 'GET' }, options);
  }

  /**
   * POST /api/classrooms/search with amenities in the JSON body
   */
  async findClassroomsWithAmenities(
    query: AmenitySearchParams,
    options: ClassroomRequestOptions = {}
  ): Promise<string> {
    const body = JSON.stringify({
      style: query.style,
      size: query.size,
      amenities: query.amenities,
    });
    return this.request(
      CLASSROOM_SEARCH_PATH,
      { method: 'POST', body, headers: { 'Content-Type': 'application/json' } },
      options
    );
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async request(
    path: string,
    init: { method: 'GET' | 'POST'; body?: string; headers?: Record<string, string> },
    options: ClassroomRequestOptions
  ): Promise<string> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...init.headers,
    };
    if (options.authorization) {
      headers['Authorization'] = options.authorization;
    }

    this.logger.debug('Backend request', { method: init.method, url });

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method: init.method,
        headers,
        ...(init.body !== undefined ? { body: init.body } : {}),
      });
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ClassroomApiError(`Classroom service unreachable: ${reason}`, undefined, error);
    }

    if (!response.ok) {
      const excerpt = text.slice(0, ERROR_BODY_EXCERPT_LENGTH);
      throw new ClassroomApiError(
        `Classroom service returned ${response.status}${excerpt ? `: ${excerpt}` : ''}`,
        response.status
      );
    }

    this.logger.debug('Backend response', { method: init.method, url, status: response.status });
    return text;
  }
}
