import { classifyError, errorFromHttpResponse } from '@batchscribe/domain';

export interface JsonRequest {
  method?: 'GET' | 'POST';
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs: number;
}

/**
 * Send a request and map every failure into the pipeline error taxonomy.
 * Non-2xx responses become errors carrying the status and a body excerpt.
 */
export async function sendRequest(url: string, request: JsonRequest, context: string): Promise<Response> {
  const headers: Record<string, string> = { ...request.headers };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: request.method ?? 'POST',
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    throw classifyError(error);
  }

  if (!response.ok) {
    throw errorFromHttpResponse(response.status, await readBody(response), context);
  }

  return response;
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `(unreadable body: ${error instanceof Error ? error.message : String(error)})`;
  }
}

export function bearer(token: string | undefined): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

/** Join a base URL and a path without doubling slashes */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
