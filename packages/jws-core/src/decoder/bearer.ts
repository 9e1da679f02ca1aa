/**
 * Token of an `Authorization: Bearer <token>` header. The scheme is
 * case-insensitive; anything but exactly a scheme and a token gives `null`,
 * which `TokenDecoder.decodeBearer` reports as INVALID_TOKEN_FORMAT.
 */
export function extractBearerToken(authorizationHeader: string | undefined | null): string | null {
  if (!authorizationHeader) {
    return null;
  }

  const parts = authorizationHeader.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}
