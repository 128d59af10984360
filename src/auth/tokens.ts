import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { ROLES, type Principal } from '../types.js';

// Bearer tokens are issued by the identity service in front of this API. The shape is
// `pt1.<base64url(json claims)>.<hex hmac>`; only verification matters here, signing is
// kept for local tooling and tests.
const TOKEN_VERSION = 'pt1';
const DEV_SECRET = 'dev_principal_secret_change_me';

const claimsSchema = z.object({
  sub: z.string().min(1).max(128),
  role: z.enum(ROLES),
  exp: z.number().int().positive().optional(),
});

export type PrincipalClaims = z.infer<typeof claimsSchema>;

export function principalTokenSecret(): string {
  const secret = process.env.PRINCIPAL_TOKEN_SECRET ?? DEV_SECRET;
  if (process.env.NODE_ENV === 'production' && secret === DEV_SECRET) {
    throw new Error('PRINCIPAL_TOKEN_SECRET must be set in production');
  }
  return secret;
}

function sign(body: string, secret: string) {
  return createHmac('sha256', secret).update(`${TOKEN_VERSION}.${body}`).digest('hex');
}

export function signPrincipalToken(
  principal: Principal,
  secret: string,
  opts: { ttlSec?: number; nowMs?: number } = {}
): string {
  const claims: PrincipalClaims = { sub: principal.id, role: principal.role };
  if (opts.ttlSec !== undefined) claims.exp = Math.floor((opts.nowMs ?? Date.now()) / 1000) + opts.ttlSec;
  const body = Buffer.from(JSON.stringify(claims)).toString('base64url');
  return `${TOKEN_VERSION}.${body}.${sign(body, secret)}`;
}

/** Returns the principal for a valid, unexpired token and undefined for anything else. */
export function verifyPrincipalToken(token: string, secret: string, nowMs = Date.now()): Principal | undefined {
  const parts = token.split('.');
  if (parts.length !== 3 || parts[0] !== TOKEN_VERSION) return undefined;
  const [, body, sig] = parts;

  const a = Buffer.from(sig, 'hex');
  const b = Buffer.from(sign(body, secret), 'hex');
  if (a.length !== b.length) return undefined;
  if (!timingSafeEqual(a, b)) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(body, 'base64url').toString('utf8'));
  } catch {
    return undefined;
  }
  const parsed = claimsSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  if (parsed.data.exp !== undefined && parsed.data.exp * 1000 <= nowMs) return undefined;
  return { id: parsed.data.sub, role: parsed.data.role };
}

export function bearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const m = /^Bearer\s+(.+)$/i.exec(header.trim());
  return m ? m[1].trim() : undefined;
}
