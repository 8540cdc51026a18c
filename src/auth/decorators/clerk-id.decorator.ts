import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { AuthenticatedRequest } from '../guards/clerk-auth.guard';

/** Clerk user id set by `ClerkAuthGuard`. */
export const ClerkId = createParamDecorator(
  (_: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.clerkId) {
      throw new UnauthorizedException('Route is missing ClerkAuthGuard');
    }
    return request.clerkId;
  },
);
