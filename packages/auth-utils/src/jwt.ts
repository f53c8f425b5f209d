import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '@metrica/config';
import { USER_ROLES } from '@metrica/shared-types';

const ACCESS_TOKEN_EXPIRY = '15m';
const TOKEN_ISSUER = 'metrica';

const jwtPayloadSchema = z.object({
  sub: z.string().min(1),
  organizationId: z.string().min(1),
  email: z.string().email(),
  role: z.enum(USER_ROLES),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

export function generateAccessToken(payload: JwtPayload): string {
  return jwt.sign(
    {
      sub: payload.sub,
      organizationId: payload.organizationId,
      email: payload.email,
      role: payload.role,
    },
    config.JWT_SECRET,
    { expiresIn: ACCESS_TOKEN_EXPIRY, issuer: TOKEN_ISSUER },
  );
}

/**
 * Verifies signature, expiry and issuer, then validates the claim shape.
 * Throws on any failure; callers map that to a 401.
 */
export function verifyAccessToken(token: string): JwtPayload {
  const decoded = jwt.verify(token, config.JWT_SECRET, { issuer: TOKEN_ISSUER });
  const parsed = jwtPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error('Malformed access token payload');
  }
  return parsed.data;
}
