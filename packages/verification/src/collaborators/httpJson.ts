import { z } from 'zod';
import { CollaboratorError } from '../errors/CollaboratorError';

export type HttpClientOptions = Readonly<{
  baseUrl: string;
  fetchImpl?: typeof fetch;
}>;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const parseJson = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const extractErrorMessage = (payload: unknown): string | null => {
  if (!isObject(payload)) return null;
  if (typeof payload.error === 'string') return payload.error;
  if (isObject(payload.error) && typeof payload.error.message === 'string') {
    return payload.error.message;
  }
  return typeof payload.message === 'string' ? payload.message : null;
};

export const buildUrl = (baseUrl: string, path: string): string => {
  if (!baseUrl.endsWith('/') && !path.startsWith('/')) {
    return `${baseUrl}/${path}`;
  }
  if (baseUrl.endsWith('/') && path.startsWith('/')) {
    return `${baseUrl}${path.slice(1)}`;
  }
  return `${baseUrl}${path}`;
};

/**
 * JSON request against a collaborator service. Every failure, whether the
 * network, a non-2xx status or an unexpected body, surfaces as a
 * `CollaboratorError`.
 */
export const requestJson = async <T>(
  options: HttpClientOptions,
  path: string,
  init: RequestInit,
  schema: z.ZodType<T>
): Promise<T> => {
  const fetchImpl = options.fetchImpl ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(buildUrl(options.baseUrl, path), {
      ...init,
      headers: {
        accept: 'application/json',
        ...(init.body === undefined
          ? {}
          : { 'content-type': 'application/json' }),
      },
    });
  } catch (err) {
    const message =
      err instanceof Error
        ? `Network error calling ${path}: ${err.message}`
        : `Network error calling ${path}`;
    throw new CollaboratorError(message, undefined, undefined, { cause: err });
  }

  const payload = await parseJson(response);
  if (!response.ok) {
    const reason =
      extractErrorMessage(payload) ?? `Request failed (${response.status})`;
    throw new CollaboratorError(reason, response.status, payload);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new CollaboratorError(
      `Unexpected response from ${path}`,
      response.status,
      payload,
      { cause: parsed.error }
    );
  }
  return parsed.data;
};
