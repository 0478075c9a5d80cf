/**
 * JWT Service
 *
 * HS256 access tokens carrying the user id (`sub`), username and role.
 */

import jwt from 'jsonwebtoken';
import type { JWTClaims, UserRole } from '@shelfwise/shared-contracts';
import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

export interface JwtServiceOptions {
  secret: string;
  issuer: string;
  audience: string;
  expiresInSeconds: number;
}

export interface AccessTokenSubject {
  userId: number;
  username: string;
  role: UserRole;
}

function validateClaims(decoded: string | jwt.JwtPayload): JWTClaims {
  if (typeof decoded === 'string') {
    throw new DomainError('Invalid token payload: not an object', 401, undefined, DomainErrorCode.UNAUTHORIZED);
  }
  if (typeof decoded.sub !== 'string' || !/^\d+$/.test(decoded.sub)) {
    throw new DomainError('Invalid token payload: missing or invalid subject', 401, undefined, DomainErrorCode.UNAUTHORIZED);
  }

  return {
    sub: decoded.sub,
    username: typeof decoded.username === 'string' ? decoded.username : undefined,
    role: typeof decoded.role === 'string' ? decoded.role : undefined,
    iat: decoded.iat,
    exp: decoded.exp,
  };
}

export class StandardJWTService {
  constructor(private readonly options: JwtServiceOptions) {
    if (!options.secret) {
      throw new Error('JWT secret is required. Set the JWT_SECRET environment variable.');
    }
  }

  verify(token: string): JWTClaims {
    try {
      const decoded = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        issuer: this.options.issuer,
        audience: this.options.audience,
      });
      return validateClaims(decoded);
    } catch (error) {
      if (error instanceof DomainError) throw error;
      throw new DomainError(
        'Invalid or expired token',
        401,
        error instanceof Error ? error : undefined,
        DomainErrorCode.UNAUTHORIZED
      );
    }
  }

  sign(subject: AccessTokenSubject): string {
    return jwt.sign({ username: subject.username, role: subject.role }, this.options.secret, {
      algorithm: 'HS256',
      subject: String(subject.userId),
      issuer: this.options.issuer,
      audience: this.options.audience,
      expiresIn: this.options.expiresInSeconds,
    });
  }
}
