/**
 * OpenVPN management interface client.
 *
 * Sends one command over a fresh TCP connection and returns the response
 * text. The exchange is bounded by a single deadline covering connect,
 * optional password prompt, and the response.
 *
 * Protocol notes:
 * - A password-protected interface opens with `ENTER PASSWORD:` (no newline)
 *   and answers `SUCCESS: password is correct` or `ERROR: bad password`.
 * - The interface then greets with a `>INFO:` line. Lines starting with `>`
 *   are asynchronous notifications and are never part of a command response.
 * - Multi-line responses (`status`) end with `END`; single-line responses
 *   (`load-stats`, errors) are a `SUCCESS:` or `ERROR:` line.
 */

import { createConnection, type Socket } from 'node:net';
import type { ManagementConfig } from '../types/config.js';

const PASSWORD_PROMPT = 'ENTER PASSWORD:';

/**
 * Result of one management query.
 */
export interface ProbeResult {
  /** Command that was sent */
  command: string;
  /** Response lines joined with `\n`, notification lines removed, newline-terminated */
  text: string;
  /** Wall time of the exchange */
  duration_ms: number;
}

/**
 * Base class for management query failures.
 */
export class ProbeError extends Error {
  constructor(
    message: string,
    public readonly host: string,
    public readonly port: number,
    public readonly command: string
  ) {
    super(message);
    this.name = 'ProbeError';
  }
}

/**
 * The interface refused, reset or closed the connection, or rejected the password.
 */
export class ProbeConnectionError extends ProbeError {
  constructor(message: string, host: string, port: number, command: string) {
    super(message, host, port, command);
    this.name = 'ProbeConnectionError';
  }
}

/**
 * No complete response arrived before the deadline.
 */
export class ProbeTimeoutError extends ProbeError {
  constructor(message: string, host: string, port: number, command: string) {
    super(message, host, port, command);
    this.name = 'ProbeTimeoutError';
  }
}

/**
 * Where and how to connect.
 */
export type ManagementEndpoint = Pick<ManagementConfig, 'host' | 'port' | 'password'>;

function isTerminator(line: string): boolean {
  return line === 'END' || line.startsWith('SUCCESS:') || line.startsWith('ERROR:');
}

/**
 * Sends `command` to the management interface and collects its response.
 *
 * @throws {ProbeConnectionError} On connection failure, early close or rejected password
 * @throws {ProbeTimeoutError} When the deadline passes first
 *
 * @example
 * ```typescript
 * const result = await queryManagement({ host: '127.0.0.1', port: 38248 }, 'status', 15_000);
 * ```
 */
export function queryManagement(
  endpoint: ManagementEndpoint,
  command: string,
  timeoutMs: number
): Promise<ProbeResult> {
  const { host, port, password } = endpoint;
  const startTime = Date.now();

  return new Promise<ProbeResult>((resolve, reject) => {
    const response: string[] = [];
    let pending = '';
    let authenticating = false;
    let commandSent = false;
    let settled = false;
    let socket: Socket | null = null;

    const fail = (error: ProbeError) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket?.destroy();
      reject(error);
    };

    const succeed = () => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      const text = response.length > 0 ? `${response.join('\n')}\n` : '';
      resolve({ command, text, duration_ms: Date.now() - startTime });
      // Ask the server to drop the session, then close our side
      if (socket && !socket.destroyed) {
        const s = socket;
        s.end('quit\n', () => s.destroy());
      }
    };

    const timer = setTimeout(() => {
      fail(new ProbeTimeoutError(
        `No complete response to '${command}' from ${host}:${port} within ${timeoutMs}ms`,
        host,
        port,
        command
      ));
    }, timeoutMs);

    const sendCommand = (s: Socket) => {
      commandSent = true;
      s.write(`${command}\n`);
    };

    const handleLine = (s: Socket, line: string) => {
      if (authenticating) {
        if (line.startsWith('SUCCESS:')) {
          authenticating = false;
          return;
        }
        if (line.startsWith('ERROR:')) {
          fail(new ProbeConnectionError(
            `Management interface at ${host}:${port} rejected the password: ${line}`,
            host,
            port,
            command
          ));
          return;
        }
      }

      if (line.startsWith('>')) {
        // The greeting marks the interface as ready for commands
        if (!commandSent && line.startsWith('>INFO:')) {
          sendCommand(s);
        }
        return;
      }

      if (!commandSent) {
        return;
      }

      response.push(line);
      if (isTerminator(line)) {
        succeed();
      }
    };

    const handleData = (s: Socket, chunk: string) => {
      pending += chunk;

      if (!commandSent && !authenticating && pending.startsWith(PASSWORD_PROMPT)) {
        if (password === undefined) {
          fail(new ProbeConnectionError(
            `Management interface at ${host}:${port} requires a password but none is configured`,
            host,
            port,
            command
          ));
          return;
        }
        pending = pending.slice(PASSWORD_PROMPT.length);
        authenticating = true;
        s.write(`${password}\n`);
      }

      let newline = pending.indexOf('\n');
      while (newline !== -1 && !settled) {
        const line = pending.slice(0, newline).replace(/\r$/, '');
        pending = pending.slice(newline + 1);
        handleLine(s, line);
        newline = pending.indexOf('\n');
      }
    };

    try {
      socket = createConnection({ host, port });
    } catch (error) {
      fail(new ProbeConnectionError(
        `Cannot connect to ${host}:${port}: ${error instanceof Error ? error.message : String(error)}`,
        host,
        port,
        command
      ));
      return;
    }

    const s = socket;
    s.setEncoding('utf-8');
    s.on('data', (chunk: string) => handleData(s, chunk));
    s.on('error', (error: Error) => {
      fail(new ProbeConnectionError(
        `Cannot query ${host}:${port}: ${error.message}`,
        host,
        port,
        command
      ));
    });
    s.on('close', () => {
      if (settled) return;
      if (commandSent) {
        // Peer closed after answering: everything it sent is the response
        const tail = pending.replace(/\r?\n?$/, '');
        if (tail !== '' && !tail.startsWith('>')) {
          response.push(tail);
        }
        succeed();
        return;
      }
      fail(new ProbeConnectionError(
        `Management interface at ${host}:${port} closed the connection before '${command}' was sent`,
        host,
        port,
        command
      ));
    });
  });
}

/**
 * Runs the configured status command.
 */
export function probeStatus(management: ManagementConfig): Promise<ProbeResult> {
  return queryManagement(management, management.status_command, management.timeout_seconds * 1000);
}

/**
 * Runs the configured load statistics command.
 */
export function probeLoadStats(management: ManagementConfig): Promise<ProbeResult> {
  return queryManagement(management, management.load_stats_command, management.timeout_seconds * 1000);
}
