import type { CompsRequest, CompsResponse, SearchCriteria, SearchResponse } from './types';

const API_BASE_URL = process.env.NEXT_PUBLIC_API_BASE_URL ?? 'http://localhost:4000';

export class ApiError extends Error {
  readonly status: number;
  readonly payload: unknown;

  constructor(message: string, status: number, payload: unknown) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.payload = payload;
  }
}

async function tryReadJson(res: Response): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    return undefined;
  }
}

function getErrorMessage(payload: unknown): string | undefined {
  if (!payload || typeof payload !== 'object') return undefined;
  const message = 'message' in payload ? payload.message : undefined;
  const error = 'error' in payload ? payload.error : undefined;
  if (typeof message === 'string' && message.trim()) return message;
  if (typeof error === 'string' && error.trim()) return error;
  return undefined;
}

async function postJson<T>(path: string, body: unknown): Promise<T> {
  const res = await fetch(`${API_BASE_URL}${path}`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json'
    },
    body: JSON.stringify(body)
  });

  if (!res.ok) {
    const payload = await tryReadJson(res);
    throw new ApiError(getErrorMessage(payload) ?? `Request failed (${res.status})`, res.status, payload);
  }

  const data: T = await res.json();
  return data;
}

export function runSearch(criteria: SearchCriteria): Promise<SearchResponse> {
  return postJson<SearchResponse>('/v1/search', criteria);
}

export function fetchComps(target: CompsRequest): Promise<CompsResponse> {
  return postJson<CompsResponse>('/v1/comps', target);
}
