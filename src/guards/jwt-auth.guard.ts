import { CanActivate, ExecutionContext, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request';
import { TokenFailureReason, TokenService, TokenVerificationError } from './token.service';

const ERROR_CODES: Record<TokenFailureReason, string> = {
  missing: 'missing_token',
  malformed: 'malformed_token',
  expired: 'token_expired',
  invalid_signature: 'invalid_signature',
};

// Every route requires `Authorization: Bearer <token>` unless the handler or
// its controller is marked @Public(). Rejection happens before the handler runs.
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly log = new Logger(JwtAuthGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly tokens: TokenService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    try {
      request.user = await this.tokens.verify(this.extractToken(request));
      return true;
    } catch (error) {
      if (error instanceof TokenVerificationError) {
        this.log.warn(`JWT rejected: ${error.reason}`);
        throw new UnauthorizedException({
          statusCode: 401,
          error: ERROR_CODES[error.reason],
          message: error.message,
        });
      }
      throw error;
    }
  }

  private extractToken(request: AuthenticatedRequest): string | undefined {
    const header = request.headers.authorization;
    if (header === undefined) return undefined;

    const [scheme, token, ...rest] = header.trim().split(/\s+/);
    if (scheme !== 'Bearer' || !token || rest.length > 0) {
      throw new TokenVerificationError('malformed', "Missing 'Bearer' type in 'Authorization' header");
    }
    return token;
  }
}
