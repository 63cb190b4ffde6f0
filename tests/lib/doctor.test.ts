import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  checkEmail,
  checkManagement,
  checkServiceManager,
  checkServiceUnit,
  checkWritableParent,
  hasFailures,
} from '@/lib/doctor.js';
import { probeLoadStats, ProbeConnectionError } from '@/lib/probe.js';
import type { EmailConfig, ServiceConfig } from '@/types/config.js';
import { createMockConfig, createProbeResult, createTestDir, removeTestDir } from '../helpers/mocks.js';

vi.mock('@/lib/probe.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('@/lib/probe.js')>();
  return {
    ...original,
    probeLoadStats: vi.fn(),
  };
});

async function writeStub(dir: string, name: string, script: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, `#!/bin/sh\n${script}\n`, { mode: 0o755 });
  return path;
}

describe('checkWritableParent', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  it('should accept an existing writable directory', async () => {
    expect(await checkWritableParent('state dir', join(testDir, 'last_status.json'))).toEqual({
      name: 'state dir',
      status: 'ok',
      detail: `${testDir} is writable`,
    });
  });

  it('should accept a directory that will be created under a writable ancestor', async () => {
    const check = await checkWritableParent('log dir', join(testDir, 'a', 'b', 'watchdog.log'));

    expect(check).toEqual({
      name: 'log dir',
      status: 'ok',
      detail: `${join(testDir, 'a', 'b')} will be created under ${testDir}`,
    });
  });

  it('should fail when the parent is a file', async () => {
    const file = join(testDir, 'plain');
    await writeFile(file, '', 'utf-8');

    const check = await checkWritableParent('state dir', join(file, 'last_status.json'));

    expect(check).toEqual({ name: 'state dir', status: 'fail', detail: `${file} is not a directory` });
  });
});

describe('service checks', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  function serviceWith(command: string): ServiceConfig {
    return { name: 'openvpn-server@test', systemctl_command: command, command_timeout_seconds: 5 };
  }

  it('should report the service manager version', async () => {
    const stub = await writeStub(testDir, 'systemctl', 'echo "systemd 255 (255.4-1)"');

    expect(await checkServiceManager(serviceWith(stub))).toEqual({
      name: 'service manager',
      status: 'ok',
      detail: 'systemd 255 (255.4-1)',
    });
  });

  it('should fail when the service manager cannot run', async () => {
    const check = await checkServiceManager(serviceWith(join(testDir, 'missing')));

    expect(check.status).toBe('fail');
    expect(check.detail).toMatch(/exited with 127: \[Process error: .*ENOENT/);
  });

  it.each([
    [0, 'ok', 'openvpn-server@test is active'],
    [3, 'warn', 'openvpn-server@test is not running'],
    [4, 'fail', 'openvpn-server@test is not a known unit'],
  ] as const)('should map unit status exit %i to %s', async (code, status, detail) => {
    const stub = await writeStub(testDir, `systemctl-${code}`, `exit ${code}`);

    expect(await checkServiceUnit(serviceWith(stub))).toEqual({ name: 'service unit', status, detail });
  });

  it('should show stderr for other unit status failures', async () => {
    const stub = await writeStub(testDir, 'systemctl-1', 'echo "Failed to connect to bus" >&2; exit 1');

    expect(await checkServiceUnit(serviceWith(stub))).toEqual({
      name: 'service unit',
      status: 'fail',
      detail: `'${stub} status openvpn-server@test --no-pager -l' exited with 1: Failed to connect to bus`,
    });
  });
});

describe('checkManagement', () => {
  const { management } = createMockConfig('/tmp/ovpn-watchdog-unused');

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should pass when load statistics answer', async () => {
    vi.mocked(probeLoadStats).mockResolvedValue(createProbeResult('SUCCESS: nclients=3\n', 'load-stats'));

    expect(await checkManagement(management)).toEqual({
      name: 'management',
      status: 'ok',
      detail: '127.0.0.1:38248 answered in 3ms: SUCCESS: nclients=3',
    });
  });

  it('should fail with the probe error', async () => {
    vi.mocked(probeLoadStats).mockRejectedValue(
      new ProbeConnectionError('Cannot query 127.0.0.1:38248: connect ECONNREFUSED', '127.0.0.1', 38248, 'load-stats')
    );

    expect(await checkManagement(management)).toEqual({
      name: 'management',
      status: 'fail',
      detail: 'Cannot query 127.0.0.1:38248: connect ECONNREFUSED',
    });
  });
});

describe('checkEmail', () => {
  const email: EmailConfig = {
    enabled: true,
    smtp_host: 'smtp.example.test',
    smtp_port: 587,
    security: 'starttls',
    from: 'watchdog@example.test',
    recipients: ['ops@example.test'],
  };

  it('should skip when alerts are disabled', async () => {
    const verifier = { verify: vi.fn() };

    expect(await checkEmail({ ...email, enabled: false }, verifier)).toEqual({
      name: 'email',
      status: 'skip',
      detail: 'alerts disabled',
    });
    expect(verifier.verify).not.toHaveBeenCalled();
  });

  it('should warn when there are no recipients', async () => {
    expect((await checkEmail({ ...email, recipients: [] })).status).toBe('warn');
  });

  it('should pass when the server accepts the connection', async () => {
    const verifier = { verify: vi.fn().mockResolvedValue(true) };

    expect(await checkEmail(email, verifier)).toEqual({
      name: 'email',
      status: 'ok',
      detail: 'smtp.example.test:587 accepted the connection',
    });
  });

  it('should fail with the verification error', async () => {
    const verifier = { verify: vi.fn().mockRejectedValue(new Error('Invalid login')) };

    expect(await checkEmail(email, verifier)).toEqual({
      name: 'email',
      status: 'fail',
      detail: 'smtp.example.test:587: Invalid login',
    });
  });
});

describe('hasFailures', () => {
  it('should ignore warnings and skips', () => {
    expect(
      hasFailures([
        { name: 'a', status: 'warn', detail: '' },
        { name: 'b', status: 'skip', detail: '' },
      ])
    ).toBe(false);
    expect(hasFailures([{ name: 'a', status: 'fail', detail: '' }])).toBe(true);
  });
});
