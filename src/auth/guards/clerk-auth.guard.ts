import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { bearerToken, ClerkTokenError, verifyClerkSubject } from '../clerk-token';

export interface AuthenticatedRequest extends Request {
  clerkId?: string;
}

@Injectable()
export class ClerkAuthGuard implements CanActivate {
  private readonly logger = new Logger(ClerkAuthGuard.name);

  constructor(private readonly config: ConfigService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = bearerToken(request.headers.authorization);

    if (!token) {
      this.logger.warn('Request missing Authorization Bearer token');
      throw new UnauthorizedException(
        'Missing or invalid authorization header',
      );
    }

    const secretKey = this.config.get<string>('clerk.secretKey');
    if (!secretKey) {
      this.logger.error('CLERK_SECRET_KEY is not set in environment');
      throw new UnauthorizedException('Server auth configuration error');
    }

    try {
      const sub = await verifyClerkSubject(token, secretKey);
      this.logger.debug(`Authenticated clerkId=${sub}`);
      request.clerkId = sub;
      return true;
    } catch (err) {
      if (err instanceof ClerkTokenError) {
        this.logger.warn(`Token verification failed: ${err.message}`);
        throw new UnauthorizedException(
          `Token verification failed: ${err.message}`,
        );
      }
      this.logger.error(`Unexpected token verification error: ${String(err)}`);
      throw new UnauthorizedException('Token verification failed');
    }
  }
}
