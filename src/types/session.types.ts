/**
 * Session state held by the SessionManager for one scrape cycle
 */
export type SessionState = 'unauthenticated' | 'valid' | 'expired';

export interface Session {
  readonly token: string;
  readonly issuedAt: Date;
}

/**
 * Pulls the session token out of the console root page
 */
export type TokenExtractor = (body: string) => string | undefined;

/**
 * Isolates command stdout from the page the shell endpoint returns.
 * Returns undefined when its markers are not present.
 */
export type OutputExtractor = (body: string) => string | undefined;
