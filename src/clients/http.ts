import { HttpStatusError, NetworkError } from '../errors.js';
import { decodeJson, type JotSchema } from '../jot.js';

export const USER_AGENT = 'svcstat-cli/0.1.0';

export interface JsonRequest {
  method?: 'GET' | 'POST';
  body?: unknown;
  label?: string;
}

/**
 * Fetches `url` and decodes the body with `schema`. Anything other than a 200
 * is an `HttpStatusError`; nothing is retried.
 */
export async function fetchJson<T>(url: string, schema: JotSchema<T>, request: JsonRequest = {}): Promise<T> {
  const method = request.method ?? 'GET';
  const headers: Record<string, string> = {
    'User-Agent': USER_AGENT,
    Accept: 'application/json',
  };
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers,
      ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
    });
  } catch (error) {
    throw new NetworkError(url, error);
  }

  if (response.status !== 200) {
    throw new HttpStatusError(url, response.status);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw new NetworkError(url, error);
  }

  return decodeJson(text, schema, request.label ?? 'response');
}
