import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { JwtPayload } from '../interfaces/jwt-payload.interface';

export type TokenFailureReason = 'missing' | 'malformed' | 'expired' | 'invalid_signature';

export class TokenVerificationError extends Error {
  constructor(
    readonly reason: TokenFailureReason,
    message: string,
  ) {
    super(message);
    this.name = 'TokenVerificationError';
  }
}

export interface TokenSubject {
  id: number;
  username: string;
}

function isJwtPayload(value: object): value is JwtPayload {
  return (
    'sub' in value &&
    typeof value.sub === 'string' &&
    'username' in value &&
    typeof value.username === 'string'
  );
}

/**
 * Issues and verifies signed access tokens. The secret and lifetime come
 * from the JwtModule registration; verification is stateless, so a token
 * stays valid until it expires or the secret changes.
 */
@Injectable()
export class TokenService {
  constructor(private readonly jwt: JwtService) {}

  issue(user: TokenSubject): Promise<string> {
    return this.jwt.signAsync({ sub: String(user.id), username: user.username });
  }

  async verify(token: string | undefined): Promise<JwtPayload> {
    if (!token) {
      throw new TokenVerificationError('missing', 'Missing Authorization Header');
    }

    let decoded: object;
    try {
      decoded = await this.jwt.verifyAsync<object>(token);
    } catch (error) {
      throw this.toVerificationError(error);
    }

    if (!isJwtPayload(decoded)) {
      throw new TokenVerificationError('malformed', 'Token payload is missing its subject');
    }
    return decoded;
  }

  private toVerificationError(error: unknown): TokenVerificationError {
    // jsonwebtoken errors, as rethrown by JwtService
    if (error instanceof Error && error.name === 'TokenExpiredError') {
      return new TokenVerificationError('expired', 'Token has expired');
    }
    if (error instanceof Error && error.message === 'invalid signature') {
      return new TokenVerificationError('invalid_signature', 'Signature verification failed');
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new TokenVerificationError('malformed', `Invalid token: ${detail}`);
  }
}
