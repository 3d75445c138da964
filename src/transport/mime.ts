export const JSON_MIME_TYPE = 'application/json';

/**
 * Returns the media type of a `Content-Type` value, lower-cased and without
 * parameters (`application/json; charset=utf-8` -> `application/json`).
 */
export function mediaType(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const [type] = contentType.split(';');
  const normalized = type?.trim().toLowerCase();
  return normalized ? normalized : undefined;
}

export function isMimeType(contentType: string | undefined, expected: string): boolean {
  return mediaType(contentType) === expected;
}
