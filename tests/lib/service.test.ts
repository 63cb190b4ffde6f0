import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  formatCommandLine,
  getServiceManagerVersion,
  getServiceStatus,
  restartService,
  runCommand,
  SPAWN_FAILURE_EXIT_CODE,
  TIMEOUT_EXIT_CODE,
} from '@/lib/service.js';
import type { ServiceConfig } from '@/types/config.js';
import { createTestDir, removeTestDir } from '../helpers/mocks.js';

describe('formatCommandLine', () => {
  it('should join argv with spaces', () => {
    expect(formatCommandLine('systemctl', ['restart', 'openvpn-server@hd'])).toBe('systemctl restart openvpn-server@hd');
  });
});

describe('runCommand', () => {
  it('should capture stdout, stderr and the exit code', async () => {
    const result = await runCommand(
      process.execPath,
      ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
      5000
    );

    expect(result.exit_code).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(result.timed_out).toBe(false);
  });

  it('should kill a command that exceeds its timeout', async () => {
    const result = await runCommand(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], 200);

    expect(result.exit_code).toBe(TIMEOUT_EXIT_CODE);
    expect(result.timed_out).toBe(true);
    expect(result.stderr).toBe('\n[Command timed out after 200ms]');
  });

  it('should report a command that cannot be spawned', async () => {
    const result = await runCommand('/nonexistent/ovpn-watchdog-missing-binary', ['--version'], 5000);

    expect(result.exit_code).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(result.command).toBe('/nonexistent/ovpn-watchdog-missing-binary --version');
    expect(result.stderr).toMatch(/^\n\[Process error: .*ENOENT.*\]$/);
  });
});

describe('service manager commands', () => {
  let testDir: string;
  let service: ServiceConfig;

  beforeAll(async () => {
    testDir = await createTestDir();
    const stub = join(testDir, 'systemctl-stub');
    await writeFile(stub, '#!/bin/sh\necho "$@"\n', { mode: 0o755 });
    service = { name: 'openvpn-server@test', systemctl_command: stub, command_timeout_seconds: 5 };
  });

  afterAll(async () => {
    await removeTestDir(testDir);
  });

  it('should query the unit status without a pager', async () => {
    const result = await getServiceStatus(service);

    expect(result.exit_code).toBe(0);
    expect(result.stdout).toBe('status openvpn-server@test --no-pager -l\n');
    expect(result.command).toBe(`${service.systemctl_command} status openvpn-server@test --no-pager -l`);
  });

  it('should restart the unit', async () => {
    const result = await restartService(service);

    expect(result.stdout).toBe('restart openvpn-server@test\n');
  });

  it('should ask for the service manager version', async () => {
    const result = await getServiceManagerVersion(service);

    expect(result.stdout).toBe('--version\n');
  });
});
