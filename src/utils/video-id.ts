/**
 * Video identifier extraction.
 *
 * The VideoId is the root cache namespace, so extraction must be a pure,
 * deterministic function of the URL.
 */

import { ValidationError } from '../api/errors.js';
import { hasDangerousContent } from './input-guard.js';

const MAX_URL_LENGTH = 300;
const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const VALID_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com', 'youtu.be']);

export function isValidVideoId(candidate: string): boolean {
  return VIDEO_ID_PATTERN.test(candidate);
}

/**
 * Extract the 11-character video id from a YouTube URL (or a bare id).
 *
 * Accepts `watch?v=`, `embed/`, `shorts/`, `live/` and `youtu.be/` forms.
 *
 * @throws {ValidationError} InvalidUrl for anything else
 */
export function extractVideoId(input: string): string {
  const url = input.trim();

  if (!url) {
    throw new ValidationError('InvalidUrl', 'URL is empty');
  }
  if (url.length > MAX_URL_LENGTH) {
    throw new ValidationError('InvalidUrl', 'URL is too long', { length: url.length });
  }
  if (hasDangerousContent(url)) {
    throw new ValidationError('InvalidUrl', 'URL contains unsafe content');
  }
  if (isValidVideoId(url)) {
    return url;
  }

  let parsed: URL;
  try {
    parsed = new URL(/^[a-z]+:\/\//i.test(url) ? url : `https://${url}`);
  } catch {
    throw new ValidationError('InvalidUrl', 'Invalid URL format', { url });
  }

  const host = parsed.hostname.toLowerCase();
  if (!VALID_HOSTS.has(host)) {
    throw new ValidationError('InvalidUrl', `Not a YouTube URL: ${host}`, { host });
  }

  let candidate: string | null = null;
  if (host === 'youtu.be') {
    candidate = parsed.pathname.split('/')[1] ?? null;
  } else if (parsed.pathname === '/watch') {
    candidate = parsed.searchParams.get('v');
  } else {
    const match = /^\/(?:embed|shorts|live)\/([^/?#]+)/.exec(parsed.pathname);
    candidate = match ? match[1] : null;
  }

  if (!candidate || !isValidVideoId(candidate)) {
    throw new ValidationError('InvalidUrl', 'Invalid YouTube video ID', { url });
  }

  return candidate;
}
