import { SignJWT, errors as joseErrors, jwtVerify } from 'jose';
import { z } from 'zod';
import { ExpiredTokenError, InvalidTokenError } from './errors.js';
import type { ScopeId } from './scopes.js';

export type TokenKind = 'access' | 'refresh';

export type SigningAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface TokenProfile {
  secret: string;
  /** Default lifetime when `issue` is not given an override. */
  ttlMinutes: number;
}

export interface TokenCodecOptions {
  algorithm: SigningAlgorithm;
  access: TokenProfile;
  refresh: TokenProfile;
  /** Clock used for both `exp` stamping and expiry checks. */
  now?: () => Date;
}

export interface SessionClaims {
  subject: string;
  scopes: ScopeId[];
  expiresAt: Date;
}

export interface SessionTokenPair {
  access: string;
  refresh: string;
}

const TokenPayloadSchema = z.object({
  sub: z.string().min(1),
  scopes: z.array(z.string()),
  exp: z.number().int(),
});

export class TokenCodec {
  private readonly keys: Record<TokenKind, Uint8Array>;
  private readonly now: () => Date;

  constructor(private readonly options: TokenCodecOptions) {
    const encoder = new TextEncoder();
    this.keys = {
      access: encoder.encode(options.access.secret),
      refresh: encoder.encode(options.refresh.secret),
    };
    this.now = options.now ?? (() => new Date());
  }

  defaultTtlMinutes(kind: TokenKind): number {
    return this.options[kind].ttlMinutes;
  }

  async issue(
    subject: string,
    scopes: readonly ScopeId[],
    kind: TokenKind,
    ttlOverrideMinutes?: number,
  ): Promise<string> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);
    const ttlMinutes = ttlOverrideMinutes ?? this.defaultTtlMinutes(kind);

    return new SignJWT({ scopes: [...scopes] })
      .setProtectedHeader({ alg: this.options.algorithm, typ: 'JWT' })
      .setSubject(subject)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + ttlMinutes * 60)
      .sign(this.keys[kind]);
  }

  async issueSessionPair(subject: string, scopes: readonly ScopeId[]): Promise<SessionTokenPair> {
    const [access, refresh] = await Promise.all([
      this.issue(subject, scopes, 'access'),
      this.issue(subject, scopes, 'refresh'),
    ]);
    return { access, refresh };
  }

  async decode(token: string, kind: TokenKind): Promise<SessionClaims> {
    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, this.keys[kind], {
        algorithms: [this.options.algorithm],
        currentDate: this.now(),
        requiredClaims: ['sub', 'exp'],
      }));
    } catch (error) {
      // jose checks the signature before any claim, so an expired token here
      // was signed with this kind's key.
      if (error instanceof joseErrors.JWTExpired) {
        throw new ExpiredTokenError({ cause: error });
      }
      throw new InvalidTokenError({ cause: error });
    }

    const parsed = TokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidTokenError({ cause: parsed.error });
    }

    return {
      subject: parsed.data.sub,
      scopes: parsed.data.scopes,
      expiresAt: new Date(parsed.data.exp * 1000),
    };
  }
}
