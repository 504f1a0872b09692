import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

import { GATEWAY_CONFIG, GatewayConfig } from '../config/gateway-config';
import { safeEquals } from '../utils/hash';
import {
  AdminSessionError,
  AdminTokenPayload,
  IssuedAdminSession,
  VerifiedAdminSession,
} from './types';

const ALGORITHM = 'HS256';

/**
 * Stateless admin sessions: validity is the signature plus the exp claim.
 * There is no session store, so a token cannot be revoked before it expires.
 */
@Injectable()
export class AdminSessionService {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
  ) {}

  issue(username: string, password: string): IssuedAdminSession {
    const { admin } = this.config;
    // Evaluate both comparisons so timing does not reveal which one failed.
    const usernameMatches = safeEquals(username, admin.username);
    const passwordMatches = safeEquals(password, admin.password);
    if (admin.password.length === 0 || !usernameMatches || !passwordMatches) {
      throw new AdminSessionError('InvalidCredentials');
    }

    const issuedAtSeconds = Math.floor(Date.now() / 1000);
    const payload: AdminTokenPayload = { sub: admin.username, type: 'admin', iat: issuedAtSeconds };
    const accessToken = this.jwtService.sign(payload, {
      secret: admin.sessionSecret,
      algorithm: ALGORITHM,
      expiresIn: admin.sessionTtlSeconds,
    });

    return {
      accessToken,
      tokenType: 'bearer',
      expiresAt: new Date((issuedAtSeconds + admin.sessionTtlSeconds) * 1000).toISOString(),
    };
  }

  verify(token: string): VerifiedAdminSession {
    let payload: AdminTokenPayload;
    try {
      payload = this.jwtService.verify<AdminTokenPayload>(token, {
        secret: this.config.admin.sessionSecret,
        algorithms: [ALGORITHM],
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TokenExpiredError') {
        throw new AdminSessionError('Expired');
      }
      throw new AdminSessionError('InvalidSignature');
    }

    if (payload.type !== 'admin' || typeof payload.sub !== 'string' || !payload.exp) {
      throw new AdminSessionError('InvalidSignature');
    }

    return {
      subject: payload.sub,
      expiresAt: new Date(payload.exp * 1000).toISOString(),
    };
  }
}
