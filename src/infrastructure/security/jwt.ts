import { createHmac, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';

interface SignOptions {
  email: string;
  expiresInSeconds: number;
  /** Seconds since epoch; defaults to now. */
  issuedAt?: number;
}

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
  type: z.literal('access'),
  iat: z.number().int(),
  exp: z.number().int()
});

export type AccessTokenPayload = z.infer<typeof accessTokenPayloadSchema>;

function base64UrlEncodeObject(value: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function sign(secret: string, signingInput: string): string {
  return createHmac('sha256', secret).update(signingInput).digest('base64url');
}

export function signJwt(secret: string, options: SignOptions): string {
  const header = {
    alg: 'HS256',
    typ: 'JWT'
  } as const;

  const issuedAt = options.issuedAt ?? Math.floor(Date.now() / 1000);
  const payload: AccessTokenPayload = {
    sub: options.email,
    email: options.email,
    type: 'access',
    iat: issuedAt,
    exp: issuedAt + options.expiresInSeconds
  };

  const signingInput = `${base64UrlEncodeObject(header)}.${base64UrlEncodeObject(payload)}`;
  return `${signingInput}.${sign(secret, signingInput)}`;
}

export function verifyJwt(token: string, secret: string, now: Date = new Date()): AccessTokenPayload {
  const [header, payload, signature] = token.split('.');

  if (!header || !payload || !signature) {
    throw new Error('Invalid token format');
  }

  const expected = Buffer.from(sign(secret, `${header}.${payload}`));
  const received = Buffer.from(signature);
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    throw new Error('Invalid token signature');
  }

  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload, 'base64url').toString('utf-8'));
  } catch {
    throw new Error('Invalid token payload');
  }

  const parsed = accessTokenPayloadSchema.safeParse(claims);
  if (!parsed.success) {
    throw new Error('Invalid token claims');
  }

  if (parsed.data.exp <= Math.floor(now.getTime() / 1000)) {
    throw new Error('Token expired');
  }

  return parsed.data;
}
