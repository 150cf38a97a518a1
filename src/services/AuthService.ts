import jwt from 'jsonwebtoken';
import bcrypt from 'bcrypt';
import { AuthConfig, getConfig } from '../config/index.js';

/**
 * `control` tokens authorize the HTTP device and mirroring routes;
 * `socket` tickets are short-lived and only open a WebSocket connection.
 */
export type TokenAudience = 'control' | 'socket';

export interface OperatorClaims {
  audience: TokenAudience;
  issuedAt: number;
  expiresAt: number;
}

export interface IssuedToken {
  token: string;
  audience: TokenAudience;
  expiresAt: string;
}

const OPERATOR_SUBJECT = 'operator';
const BCRYPT_ROUNDS = 10;

/** Guards a single-operator control service with one password */
export class AuthService {
  constructor(private readonly config: AuthConfig = getConfig().auth) {}

  isEnabled(): boolean {
    return this.config.enabled && this.config.passwordHash !== '';
  }

  /** A control token for the right password, null otherwise */
  async login(password: string): Promise<IssuedToken | null> {
    if (!this.isEnabled()) return this.issue('control');
    const matches = await bcrypt.compare(password, this.config.passwordHash);
    return matches ? this.issue('control') : null;
  }

  issue(audience: TokenAudience): IssuedToken {
    const ttl = audience === 'control' ? this.config.tokenExpiry : this.config.ticketExpiry;
    const issuedAt = Math.floor(Date.now() / 1000);
    const token = jwt.sign({ iat: issuedAt }, this.config.secret, {
      subject: OPERATOR_SUBJECT,
      audience,
      expiresIn: ttl,
    });
    return { token, audience, expiresAt: new Date((issuedAt + ttl) * 1000).toISOString() };
  }

  /** Throws when the token is malformed, expired, foreign or meant for another audience */
  verify(token: string, audience: TokenAudience): OperatorClaims {
    const decoded = jwt.verify(token, this.config.secret, { audience, subject: OPERATOR_SUBJECT });
    if (typeof decoded === 'string') {
      throw new Error('Token has no claims');
    }
    return {
      audience,
      issuedAt: decoded.iat ?? 0,
      expiresAt: decoded.exp ?? 0,
    };
  }

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, BCRYPT_ROUNDS);
  }
}

export const authService = new AuthService();
