import { verifyToken } from '@clerk/backend';

export class ClerkTokenError extends Error {}

/** Verifies a Clerk session token and returns its subject (the Clerk user id). */
export async function verifyClerkSubject(
  token: string,
  secretKey: string,
): Promise<string> {
  const result = await verifyToken(token, { secretKey });
  if (result.errors) {
    throw new ClerkTokenError(
      result.errors[0]?.message ?? 'Unknown verification error',
    );
  }
  const sub = result.data?.sub;
  if (!sub) {
    throw new ClerkTokenError('Invalid token payload: no sub claim');
  }
  return sub;
}

/** Token from an `Authorization: Bearer <token>` header value. */
export function bearerToken(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || !value.startsWith('Bearer ')) return null;
  return value.slice(7).trim() || null;
}
