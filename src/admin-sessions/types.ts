export type AdminSessionErrorReason = 'InvalidCredentials' | 'Expired' | 'InvalidSignature';

export class AdminSessionError extends Error {
  constructor(readonly reason: AdminSessionErrorReason) {
    super(`Admin session rejected: ${reason}`);
    this.name = 'AdminSessionError';
  }
}

export type AdminTokenPayload = {
  sub: string;
  type: 'admin';
  iat?: number;
  exp?: number;
};

export type IssuedAdminSession = {
  accessToken: string;
  tokenType: 'bearer';
  expiresAt: string;
};

export type VerifiedAdminSession = {
  subject: string;
  expiresAt: string;
};

export type LoginAttemptResult = {
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfter: number;
};
