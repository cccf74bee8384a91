import path from 'path';

export const MISSING_ID = 'missing_id';
export const DEFAULT_MAX_KEY_LENGTH = 512;

/**
 * `{filename-stem}_{chunkIndex}`, e.g. `Price_Guide_2024_3`.
 */
export function fileRecordId(filePath: string, chunkIndex: number): string {
  const stem = path.parse(filePath).name;
  return `${stem}_${chunkIndex}`;
}

/**
 * `{host}{path}#{chunkIndex}`; an empty path is `/`.
 */
export function webRecordId(url: string, chunkIndex: number): string {
  const parsed = new URL(url);
  return `${parsed.host}${urlPath(parsed)}#${chunkIndex}`;
}

export function urlPath(url: URL): string {
  return url.pathname || '/';
}

/**
 * File name shown for a web page: its path, or `index.html` for the root.
 */
export function webDisplayName(url: string): string {
  const pathname = urlPath(new URL(url));
  return pathname === '/' ? 'index.html' : pathname;
}

/**
 * Make an id safe for the index key: only letters, digits, `_`, `-` and `=`
 * survive, everything else becomes `_`. Never returns an empty string.
 */
export function sanitizeId(raw: string, maxLength: number = DEFAULT_MAX_KEY_LENGTH): string {
  const safe = raw ? raw.replace(/[^A-Za-z0-9_\-=]/g, '_') : MISSING_ID;
  return safe.slice(0, maxLength);
}
