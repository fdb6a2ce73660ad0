import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { Request } from 'express';

/**
 * Guards host-internal endpoints with the shared INTERNAL_API_TOKEN,
 * sent as `Authorization: Bearer <token>`.
 */
@Injectable()
export class InternalTokenGuard implements CanActivate {
  private readonly log = new Logger(InternalTokenGuard.name);

  constructor(private readonly cfg: ConfigService) {}

  canActivate(ctx: ExecutionContext): boolean {
    const expected = this.cfg.get<string>('INTERNAL_API_TOKEN');
    if (!expected) {
      this.log.warn('INTERNAL_API_TOKEN not configured, rejecting internal request');
      throw new UnauthorizedException('Internal API disabled');
    }

    const req = ctx.switchToHttp().getRequest<Request>();
    const token = this.extractToken(req);
    if (!token || !this.matches(token, expected)) {
      throw new UnauthorizedException('Invalid internal token');
    }
    return true;
  }

  private extractToken(req: Request): string | undefined {
    const auth = req.headers.authorization;
    if (auth?.startsWith('Bearer ')) {
      return auth.replace('Bearer ', '').trim();
    }
    return undefined;
  }

  private matches(token: string, expected: string): boolean {
    const a = Buffer.from(token);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
  }
}
