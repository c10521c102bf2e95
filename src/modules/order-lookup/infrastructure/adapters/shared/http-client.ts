import { UpstreamServiceError, type UpstreamSystem } from '../../../domain/errors';
import type { UpstreamResult } from '../../../application/ports/upstream-result';

export type UpstreamBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'empty' }
  | { kind: 'unparseable' };

export interface UpstreamResponse {
  status: number;
  ok: boolean;
  body: UpstreamBody;
}

/**
 * Sends one request and reads its body under a single timeout budget.
 * Transport failures surface as `UpstreamServiceError`; HTTP statuses are
 * returned as-is for the caller to classify.
 */
export async function sendUpstreamRequest(input: {
  system: UpstreamSystem;
  url: string;
  init: RequestInit;
  timeoutMs: number;
}): Promise<UpstreamResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), input.timeoutMs);

  try {
    const response = await fetch(input.url, {
      ...input.init,
      signal: controller.signal,
    });
    const text = await response.text();

    return {
      status: response.status,
      ok: response.ok,
      body: parseBody(text),
    };
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new UpstreamServiceError(`${input.system} request timeout`, input.system, 0, 'timeout');
    }

    throw new UpstreamServiceError(`${input.system} network error`, input.system, 0, 'network');
  } finally {
    clearTimeout(timeoutId);
  }
}

export function assertSuccessStatus(system: UpstreamSystem, response: UpstreamResponse): void {
  if (!response.ok) {
    throw new UpstreamServiceError(
      `${system} backend error ${response.status}`,
      system,
      response.status,
      'http',
    );
  }
}

/**
 * Converts an `UpstreamServiceError` into the failure branch of an
 * `UpstreamResult`. Any other error is a programming fault and is rethrown.
 */
export function toUpstreamFailure(error: unknown): Extract<UpstreamResult<never>, { status: 'error' }> {
  if (error instanceof UpstreamServiceError) {
    return { status: 'error', errorCode: error.errorCode, statusCode: error.statusCode };
  }

  throw error;
}

function parseBody(text: string): UpstreamBody {
  if (text.trim() === '') {
    return { kind: 'empty' };
  }

  try {
    return { kind: 'json', value: JSON.parse(text) as unknown };
  } catch {
    return { kind: 'unparseable' };
  }
}
