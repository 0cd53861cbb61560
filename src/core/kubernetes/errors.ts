/**
 * Kubernetes Error Handling Utilities
 *
 * The 1.x client throws an ApiException carrying `code`; some responses
 * carry the status on `statusCode`, `response.statusCode` or `body.code`.
 */

import { isRecord } from '../../utils/type-guards.js';
import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @example
 * ```typescript
 * try {
 *   await api.read(header);
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // absent
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  // ApiException (1.x)
  if (typeof error.code === 'number') {
    return error.code;
  }

  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  if (isRecord(error.response) && typeof error.response.statusCode === 'number') {
    return error.response.statusCode;
  }

  const body = parseBody(error.body);
  if (body && typeof body.code === 'number') {
    return body.code;
  }

  logger.debug('Could not extract status code from error', {
    errorKeys: Object.keys(error),
  });
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * Trying to create a resource that already exists
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

/**
 * Format a Kubernetes API error, e.g.
 * "Kubernetes API error (403): Forbidden: pods is forbidden"
 */
export function formatKubernetesError(error: unknown): string {
  if (!isRecord(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const parts = [statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error'];
  const body = parseBody(error.body);

  if (body && typeof body.reason === 'string') {
    parts.push(body.reason);
  }
  if (body && typeof body.message === 'string') {
    parts.push(body.message);
  } else if (typeof error.message === 'string') {
    parts.push(error.message);
  }

  return parts.join(': ');
}

// ApiException bodies arrive as a JSON string
function parseBody(body: unknown): Record<string, unknown> | undefined {
  if (isRecord(body)) {
    return body;
  }
  if (typeof body === 'string') {
    try {
      const parsed: unknown = JSON.parse(body);
      return isRecord(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
}
