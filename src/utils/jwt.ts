import jwt from 'jsonwebtoken';
import { z } from 'zod';

function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET;
  if (!secret) {
    throw new Error('JWT_SECRET environment variable is required. Generate a secure random string of at least 32 characters.');
  }
  if (secret.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters long for security.');
  }
  return secret;
}

const ACCESS_TOKEN_EXPIRES_IN = '15m';

// Tokens are issued by the operator login service; userId is the owner of credentials, jobs and history
const tokenPayloadSchema = z.object({
  userId: z.number().int().positive(),
  email: z.string(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function generateAccessToken(payload: TokenPayload): string {
  return jwt.sign(payload, getJwtSecret(), { expiresIn: ACCESS_TOKEN_EXPIRES_IN });
}

export function verifyToken(token: string): TokenPayload {
  const decoded = jwt.verify(token, getJwtSecret());
  const parsed = tokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error('Token payload is missing userId or email');
  }
  return { userId: parsed.data.userId, email: parsed.data.email };
}
