import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import type { FastifyRequest } from 'fastify';

import { AdminSessionService } from './admin-session.service';
import { AdminSessionError } from './types';

export type RequestWithAdminIdentity = FastifyRequest & {
  adminIdentity?: string;
};

@Injectable()
export class AdminAuthGuard implements CanActivate {
  constructor(private readonly adminSessionService: AdminSessionService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<RequestWithAdminIdentity>();
    const header = request.headers.authorization;
    const value = Array.isArray(header) ? header[0] : header;
    const token = this.extractBearer(value ?? '');

    if (!token) {
      throw new UnauthorizedException('Missing authentication token');
    }

    try {
      const session = this.adminSessionService.verify(token);
      request.adminIdentity = `admin:${session.subject}`;
      return true;
    } catch (error) {
      // Expired and forged tokens look the same to the caller.
      if (error instanceof AdminSessionError) {
        throw new UnauthorizedException('Invalid or expired admin token');
      }
      throw error;
    }
  }

  private extractBearer(value: string): string | null {
    const [scheme, token] = value.split(' ');
    if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
      return null;
    }

    return token;
  }
}
