/**
 * Service manager commands.
 *
 * Runs `systemctl` (or the configured replacement) with argv arrays and no
 * shell, capturing output and exit code under a timeout.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { ServiceConfig } from '../types/config.js';

/** Exit code reported when a command is killed by its timeout */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit code reported when a command cannot be spawned */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Result of one command execution.
 */
export interface CommandResult {
  /** Command line as displayed in logs */
  command: string;
  /** Process exit code (124 on timeout, 127 when spawning failed) */
  exit_code: number;
  /** Captured stdout */
  stdout: string;
  /** Captured stderr */
  stderr: string;
  /** Execution time in milliseconds */
  duration_ms: number;
  /** Whether the command was killed by the timeout */
  timed_out: boolean;
}

/**
 * Formats argv for display.
 */
export function formatCommandLine(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].join(' ');
}

/**
 * Executes a command without a shell.
 *
 * Never rejects: spawn failures and timeouts are folded into the result so
 * callers can record them alongside regular failures.
 *
 * @param timeoutMs - Timeout in milliseconds (0 means no timeout)
 *
 * @example
 * ```typescript
 * const result = await runCommand('systemctl', ['restart', 'openvpn-server@hd'], 15_000);
 * ```
 */
export async function runCommand(
  cmd: string,
  args: readonly string[],
  timeoutMs: number
): Promise<CommandResult> {
  const startTime = Date.now();
  const command = formatCommandLine(cmd, args);
  let stdout = '';
  let stderr = '';

  return new Promise<CommandResult>((resolve) => {
    let timeoutId: NodeJS.Timeout | null = null;
    let child: ChildProcess | null = null;
    let settled = false;

    const finish = (exitCode: number, extraStderr: string, timedOut: boolean) => {
      if (settled) return;
      settled = true;
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      resolve({
        command,
        exit_code: exitCode,
        stdout,
        stderr: stderr + extraStderr,
        duration_ms: Date.now() - startTime,
        timed_out: timedOut,
      });
    };

    const handleTimeout = () => {
      if (child) {
        const running = child;
        running.kill('SIGTERM');
        // Give it a moment to terminate gracefully, then force kill
        setTimeout(() => {
          if (running.exitCode === null && running.signalCode === null) {
            running.kill('SIGKILL');
          }
        }, 1000).unref();
      }
      finish(TIMEOUT_EXIT_CODE, `\n[Command timed out after ${timeoutMs}ms]`, true);
    };

    if (timeoutMs > 0) {
      timeoutId = setTimeout(handleTimeout, timeoutMs);
    }

    try {
      child = spawn(cmd, [...args], {
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        // Killed by a signal without an exit code: follow the shell convention
        const exitCode = code ?? (signal ? 128 + signalNumber(signal) : 1);
        finish(exitCode, '', false);
      });

      child.on('error', (error: Error) => {
        finish(SPAWN_FAILURE_EXIT_CODE, `\n[Process error: ${error.message}]`, false);
      });
    } catch (error) {
      finish(
        SPAWN_FAILURE_EXIT_CODE,
        `\n[Failed to spawn process: ${error instanceof Error ? error.message : String(error)}]`,
        false
      );
    }
  });
}

const SIGNAL_NUMBERS: Readonly<Partial<Record<NodeJS.Signals, number>>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGKILL: 9,
  SIGTERM: 15,
};

function signalNumber(signal: NodeJS.Signals): number {
  return SIGNAL_NUMBERS[signal] ?? 0;
}

/**
 * `systemctl status <unit> --no-pager -l`
 */
export function getServiceStatus(service: ServiceConfig): Promise<CommandResult> {
  return runCommand(
    service.systemctl_command,
    ['status', service.name, '--no-pager', '-l'],
    service.command_timeout_seconds * 1000
  );
}

/**
 * `systemctl restart <unit>`
 */
export function restartService(service: ServiceConfig): Promise<CommandResult> {
  return runCommand(
    service.systemctl_command,
    ['restart', service.name],
    service.command_timeout_seconds * 1000
  );
}

/**
 * `systemctl --version`, used by doctor to check the service manager exists.
 */
export function getServiceManagerVersion(service: ServiceConfig): Promise<CommandResult> {
  return runCommand(service.systemctl_command, ['--version'], service.command_timeout_seconds * 1000);
}
