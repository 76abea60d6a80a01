import type { Request } from 'express';
import type { JwtPayload } from './jwt-payload.interface';

export type AuthenticatedRequest = Request & {
  requestId?: string;
  user?: JwtPayload;
};
