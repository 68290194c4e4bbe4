export const ADMIN_TOKEN_HEADER = "x-admin-token";

export function normalizeAdminToken(token: string | undefined | null): string | null {
  if (typeof token !== "string") return null;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** An unset expected token keeps the admin routes closed. */
export function isAdminAuthorized(
  providedHeader: unknown,
  expectedToken: string | undefined | null,
): boolean {
  const expected = normalizeAdminToken(expectedToken);
  if (!expected) return false;

  if (Array.isArray(providedHeader)) {
    return providedHeader.some((value) => value === expected);
  }
  return typeof providedHeader === "string" && providedHeader === expected;
}
