import type winston from 'winston';
import { createLogger } from './Logger';
import { ExecError, TransportError } from './errors';
import { DEFAULT_OUTPUT_EXTRACTORS, createMarkerExtractor, extractOutput } from './extractors';
import { isSuccessStatus } from '../utils/http';
import type { ConsoleTransport } from './RouterTransport';
import type { SessionManager } from './SessionManager';
import type { TargetConfig } from '../config/schemas/config.schema';
import type { CollectorDefinition, RawOutput } from '../types/collector.types';
import type { TransportResponse } from '../types/http.types';
import type { OutputExtractor, Session } from '../types/session.types';

// Statuses the console answers with once its session token is no longer accepted
const UNAUTHORIZED_STATUSES = [401, 403];

/**
 * Output extraction for a target: its own markers first when configured
 */
export function outputExtractorsFor(target: TargetConfig): OutputExtractor[] {
  return target.outputMarkers
    ? [
        createMarkerExtractor(target.outputMarkers.start, target.outputMarkers.end),
        ...DEFAULT_OUTPUT_EXTRACTORS,
      ]
    : DEFAULT_OUTPUT_EXTRACTORS;
}

/**
 * CommandExecutor runs one shell command through the console's shell endpoint
 * and hands back its stdout. It never retries; that is the orchestrator's call.
 */
export class CommandExecutor {
  private target: TargetConfig;
  private transport: ConsoleTransport;
  private sessions: SessionManager;
  private extractors: OutputExtractor[];
  private logger: winston.Logger;

  constructor(
    target: TargetConfig,
    transport: ConsoleTransport,
    sessions: SessionManager,
    extractors?: OutputExtractor[]
  ) {
    this.target = target;
    this.transport = transport;
    this.sessions = sessions;
    this.extractors = extractors ?? outputExtractorsFor(target);
    this.logger = createLogger('CommandExecutor', target.name);
  }

  async run(
    session: Session,
    collector: CollectorDefinition,
    signal?: AbortSignal
  ): Promise<RawOutput> {
    if (signal?.aborted) {
      throw new ExecError('Cancelled', `Scrape cancelled before ${collector.name}`);
    }
    if (!this.sessions.isValid(session)) {
      throw new ExecError('Unauthorized', 'Session is no longer valid');
    }

    let response: TransportResponse;
    try {
      response = await this.transport.postCommand(
        session.token,
        collector.command,
        this.target.timeouts.commandSeconds * 1000,
        signal
      );
    } catch (error) {
      if (error instanceof TransportError && error.cancelled) {
        throw new ExecError('Cancelled', `Scrape cancelled during ${collector.name}`);
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new ExecError('Transport', message);
    }

    if (UNAUTHORIZED_STATUSES.includes(response.status)) {
      this.sessions.markExpired();
      throw new ExecError('Unauthorized', `Command rejected with HTTP ${response.status}`);
    }
    if (!isSuccessStatus(response.status)) {
      throw new ExecError('Transport', `Shell endpoint answered HTTP ${response.status}`);
    }

    const text = extractOutput(response.body, this.extractors);
    if (text.trim().length === 0) {
      throw new ExecError('EmptyOutput', `${collector.name} produced no output`);
    }

    this.logger.debug(`${collector.name}: received ${text.length} characters`);
    return {
      collector: collector.name,
      command: collector.command,
      text,
      executedAt: new Date(),
    };
  }
}
