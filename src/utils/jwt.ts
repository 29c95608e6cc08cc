import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { safeWrap } from './wrap.js';

const claimsSchema = z.object({
  exp: z.number().optional(),
  iat: z.number().optional(),
});

/** Registered JWT time claims, in epoch seconds. */
export type JwtTimeClaims = z.infer<typeof claimsSchema>;

/**
 * Reads the `exp`/`iat` claims of a JWT without verifying its signature.
 * Returns `null` when the value is not a decodable JWT.
 */
export function decodeJwtTimeClaims(token: string): JwtTimeClaims | null {
  const [err, payload] = safeWrap(() => jwt.decode(token, { json: true }));
  if (err || payload === null) {
    return null;
  }

  const parsed = claimsSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}
