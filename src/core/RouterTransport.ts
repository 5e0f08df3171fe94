import type { AxiosInstance, AxiosResponse } from 'axios';
import { createHttpClient, formatHttpError, isCancelledRequest } from '../utils/http';
import { TransportError } from './errors';
import type { TargetConfig } from '../config/schemas/config.schema';
import type { TransportResponse } from '../types/http.types';

export const CONSOLE_PATH = '/';
export const SHELL_PATH = '/shell.cgi';

/**
 * Raw request/response exchange with a router's web console
 */
export interface ConsoleTransport {
  /**
   * Load the console root page with Basic Authentication
   */
  fetchConsole(timeoutMs: number, signal?: AbortSignal): Promise<TransportResponse>;

  /**
   * Submit a command to the shell endpoint the way the web UI's shell page does
   */
  postCommand(
    token: string,
    command: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<TransportResponse>;
}

export function targetBaseUrl(target: TargetConfig): string {
  const port = target.port !== undefined ? `:${target.port}` : '';
  return `${target.scheme}://${target.host}${port}`;
}

/**
 * Encode a shell command as the form body shell.cgi expects
 */
export function encodeCommand(token: string, command: string): string {
  return new URLSearchParams({
    _http_id: token,
    action: 'execute',
    nojs: '1',
    working_dir: '/www',
    command,
  }).toString();
}

export class RouterTransport implements ConsoleTransport {
  private client: AxiosInstance;

  constructor(target: TargetConfig) {
    this.client = createHttpClient({
      baseURL: targetBaseUrl(target),
      verifySsl: target.verifySsl,
      auth: { username: target.username, password: target.password },
    });
  }

  async fetchConsole(timeoutMs: number, signal?: AbortSignal): Promise<TransportResponse> {
    return this.exchange(() => this.client.get<string>(CONSOLE_PATH, { timeout: timeoutMs, signal }));
  }

  async postCommand(
    token: string,
    command: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<TransportResponse> {
    return this.exchange(() =>
      this.client.post<string>(SHELL_PATH, encodeCommand(token, command), {
        timeout: timeoutMs,
        signal,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      })
    );
  }

  private async exchange(request: () => Promise<AxiosResponse<string>>): Promise<TransportResponse> {
    try {
      const response = await request();
      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : '',
      };
    } catch (error) {
      if (isCancelledRequest(error)) {
        throw new TransportError('Request cancelled', true);
      }
      throw new TransportError(formatHttpError(error));
    }
  }
}
