/**
 * @cubeload/sdk — Response Classification
 *
 * Cube documents 200, 400, 403 and 500 for `/load`. Anything else is
 * unexpected, except the async "Continue wait" body and 502s during scaling,
 * which are worth retrying.
 */
import {
  AuthorizationError,
  BadGatewayError,
  ContinueWaitError,
  CubeError,
  RequestError,
  ServerError,
  UnexpectedResponseError,
} from './errors.js';

export const CONTINUE_WAIT_MARKER = 'Continue wait';

/**
 * Map a raw response to the error it represents, or null for a success.
 * First match wins; the body marker is checked before 502 and 500.
 */
export function classifyResponse(status: number, body: string): CubeError | null {
  if (status === 403) return new AuthorizationError(body);
  if (status === 400) return new RequestError(body);
  if (body.includes(CONTINUE_WAIT_MARKER)) return new ContinueWaitError(status, body);
  if (status === 502) return new BadGatewayError(body);
  if (status === 500) return new ServerError(body);
  if (status !== 200) return new UnexpectedResponseError(status, body);
  return null;
}
