import type { z } from 'zod';
import { TargetConfigSchema } from '../../src/config/schemas/config.schema';
import type { TargetConfig } from '../../src/config/schemas/config.schema';
import type { ConsoleTransport } from '../../src/core/RouterTransport';
import type { RawOutput } from '../../src/types/collector.types';
import type { TransportResponse } from '../../src/types/http.types';

export function rawOutput(collector: string, text: string, command = `collect ${collector}`): RawOutput {
  return { collector, command, text, executedAt: new Date('2024-01-01T00:00:00Z') };
}

export function targetConfig(overrides: Partial<z.input<typeof TargetConfigSchema>> = {}): TargetConfig {
  return TargetConfigSchema.parse({
    name: 'main-router',
    host: '192.168.1.1',
    username: 'admin',
    password: 'test-secret',
    ...overrides,
  });
}

/**
 * Console root page carrying a session token the way Tomato embeds it
 */
export function consolePage(token: string): TransportResponse {
  return {
    status: 200,
    body: `<html><script>nvram = { 'http_id': '${token}', 'lan_ipaddr': '192.168.1.1' };</script></html>`,
  };
}

/**
 * Shell endpoint answer with the command output in a <pre> block
 */
export function shellPage(output: string): TransportResponse {
  return { status: 200, body: `<html><body><pre>${output}</pre></body></html>` };
}

export type CommandHandler = (
  command: string,
  token: string,
  signal?: AbortSignal
) => TransportResponse | Promise<TransportResponse>;

/**
 * In-process router: logins hand out TID1, TID2, ... unless replies are queued
 */
export class FakeTransport implements ConsoleTransport {
  consoleResponses: Array<TransportResponse | Error> = [];
  consoleCalls = 0;
  readonly commands: Array<{ token: string; command: string; timeoutMs: number }> = [];
  private handler: CommandHandler;

  constructor(handler: CommandHandler = () => shellPage('ok')) {
    this.handler = handler;
  }

  async fetchConsole(): Promise<TransportResponse> {
    this.consoleCalls++;
    const next = this.consoleResponses.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? consolePage(`TID${this.consoleCalls}`);
  }

  async postCommand(
    token: string,
    command: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<TransportResponse> {
    this.commands.push({ token, command, timeoutMs });
    return this.handler(command, token, signal);
  }
}
