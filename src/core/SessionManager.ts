import type winston from 'winston';
import { createLogger } from './Logger';
import { AuthError, TransportError } from './errors';
import { createPatternTokenExtractor, defaultTokenExtractor } from './extractors';
import { hashForLogging } from '../utils/hash';
import { isSuccessStatus } from '../utils/http';
import type { ConsoleTransport } from './RouterTransport';
import type { TargetConfig } from '../config/schemas/config.schema';
import type { TransportResponse } from '../types/http.types';
import type { Session, SessionState, TokenExtractor } from '../types/session.types';

/**
 * Token extraction for a target: its own pattern when configured, the
 * Tomato defaults otherwise
 */
export function tokenExtractorFor(target: TargetConfig): TokenExtractor {
  return target.tokenPattern
    ? createPatternTokenExtractor([new RegExp(target.tokenPattern)])
    : defaultTokenExtractor;
}

/**
 * SessionManager owns the authentication state against one router for the
 * duration of one scrape cycle.
 *
 * unauthenticated -> valid -> expired -> valid. A failed login is terminal:
 * later calls rethrow it without contacting the router again.
 */
export class SessionManager {
  private target: TargetConfig;
  private transport: ConsoleTransport;
  private extractToken: TokenExtractor;
  private state: SessionState = 'unauthenticated';
  private session: Session | null = null;
  private failure: AuthError | null = null;
  private attempts = 0;
  private logger: winston.Logger;

  constructor(target: TargetConfig, transport: ConsoleTransport, extractToken?: TokenExtractor) {
    this.target = target;
    this.transport = transport;
    this.extractToken = extractToken ?? tokenExtractorFor(target);
    this.logger = createLogger('SessionManager', target.name);
  }

  /**
   * Return a valid session, logging in if none is held or the held one expired
   */
  async ensureSession(signal?: AbortSignal): Promise<Session> {
    if (this.state === 'valid' && this.session) {
      return this.session;
    }
    if (this.failure) {
      throw this.failure;
    }

    try {
      this.session = await this.login(signal);
      this.state = 'valid';
      return this.session;
    } catch (error) {
      this.session = null;
      this.failure =
        error instanceof AuthError
          ? error
          : new AuthError('Transport', error instanceof Error ? error.message : 'Unknown error');
      this.logger.warn(`Authentication failed: ${this.failure.message}`);
      throw this.failure;
    }
  }

  /**
   * Record that the router rejected the held session
   */
  markExpired(): void {
    if (this.state === 'valid') {
      this.logger.debug('Session expired');
      this.state = 'expired';
    }
  }

  getState(): SessionState {
    return this.state;
  }

  isValid(session: Session): boolean {
    return this.state === 'valid' && this.session === session;
  }

  get authAttempts(): number {
    return this.attempts;
  }

  private async login(signal?: AbortSignal): Promise<Session> {
    this.attempts++;
    this.logger.debug(`Authenticating (attempt ${this.attempts})`);

    let response: TransportResponse;
    try {
      response = await this.transport.fetchConsole(this.target.timeouts.authSeconds * 1000, signal);
    } catch (error) {
      const message = error instanceof TransportError ? error.message : String(error);
      throw new AuthError('Transport', `Console unreachable: ${message}`);
    }

    if (!isSuccessStatus(response.status)) {
      throw new AuthError('AuthRejected', `Console login rejected with HTTP ${response.status}`);
    }

    const token = this.target.httpId ?? this.extractToken(response.body);
    if (!token) {
      throw new AuthError('MalformedAuthResponse', 'No session token found in console page');
    }

    this.logger.debug(`Session established (token ${hashForLogging(token)})`);
    return { token, issuedAt: new Date() };
  }
}
