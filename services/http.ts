import { z } from 'zod';
import { HttpError } from '../lib/errors';

export const USER_AGENT = 'AgriAssist-Terminal';

export async function fetchText(url: string, init?: RequestInit): Promise<string> {
  const response = await fetch(url, init);
  if (!response.ok) throw new HttpError(response.status, url);
  return response.text();
}

/** Fetches and validates a JSON payload; a shape mismatch throws a ZodError. */
export async function fetchJson<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  init?: RequestInit
): Promise<z.infer<T>> {
  const response = await fetch(url, init);
  if (!response.ok) throw new HttpError(response.status, url);
  const data: unknown = await response.json();
  return schema.parse(data);
}
