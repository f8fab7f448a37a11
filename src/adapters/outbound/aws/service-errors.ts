/**
 * SDK v3 service exceptions carry the provider error code as their name.
 */
export function hasServiceErrorName(error: unknown, ...names: readonly string[]): boolean {
  return error instanceof Error && names.includes(error.name);
}

export function isNotFound(error: unknown): boolean {
  return hasServiceErrorName(error, 'NotFoundException');
}

export function isUnauthorized(error: unknown): boolean {
  return hasServiceErrorName(error, 'UnauthorizedException', 'AccessDeniedException');
}
