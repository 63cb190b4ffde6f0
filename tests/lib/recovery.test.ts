import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { collectDiagnostics, describeQuery, recoverService } from '@/lib/recovery.js';
import { getServiceStatus, restartService } from '@/lib/service.js';
import { probeLoadStats, ProbeConnectionError, ProbeTimeoutError } from '@/lib/probe.js';
import { createCommandResult, createMockConfig, createProbeResult } from '../helpers/mocks.js';

vi.mock('@/lib/service.js', () => ({
  getServiceStatus: vi.fn(),
  restartService: vi.fn(),
}));

vi.mock('@/lib/probe.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('@/lib/probe.js')>();
  return {
    ...original,
    probeLoadStats: vi.fn(),
  };
});

const config = createMockConfig('/tmp/ovpn-watchdog-unused');
const STATUS_TEXT = 'TITLE,OpenVPN\nEND\n';
const frozen = { kind: 'frozen' as const, probe: createProbeResult(STATUS_TEXT), fingerprint: 'a'.repeat(32) };

describe('describeQuery', () => {
  it('should show endpoint and command', () => {
    expect(describeQuery('127.0.0.1', 38248, 'load-stats')).toBe('management 127.0.0.1:38248 "load-stats"');
  });
});

describe('collectDiagnostics', () => {
  beforeEach(() => {
    vi.mocked(getServiceStatus).mockResolvedValue(
      createCommandResult({
        command: 'systemctl status openvpn-server@test --no-pager -l',
        stdout: 'Active: active (running)\n',
      })
    );
    vi.mocked(probeLoadStats).mockResolvedValue(createProbeResult('SUCCESS: nclients=2\n', 'load-stats'));
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should collect service status, load statistics and the status probe in order', async () => {
    const diagnostics = await collectDiagnostics(config, frozen);

    expect(diagnostics).toEqual([
      {
        label: 'service status',
        command: 'systemctl status openvpn-server@test --no-pager -l',
        exit_code: 0,
        stdout: 'Active: active (running)\n',
        stderr: '',
      },
      {
        label: 'load statistics',
        command: 'management 127.0.0.1:38248 "load-stats"',
        exit_code: 0,
        stdout: 'SUCCESS: nclients=2\n',
        stderr: '',
      },
      {
        label: 'status probe',
        command: 'management 127.0.0.1:38248 "status"',
        exit_code: 0,
        stdout: STATUS_TEXT,
        stderr: '',
      },
    ]);
  });

  it('should turn a failing load statistics query into an entry', async () => {
    vi.mocked(probeLoadStats).mockRejectedValue(
      new ProbeTimeoutError('No complete response', '127.0.0.1', 38248, 'load-stats')
    );

    const diagnostics = await collectDiagnostics(config, frozen);

    expect(diagnostics[1]).toEqual({
      label: 'load statistics',
      command: 'management 127.0.0.1:38248 "load-stats"',
      exit_code: 1,
      stdout: '',
      stderr: 'No complete response',
    });
  });

  it('should record the probe error when the interface was unreachable', async () => {
    const error = new ProbeConnectionError('connect ECONNREFUSED', '127.0.0.1', 38248, 'status');

    const diagnostics = await collectDiagnostics(config, { kind: 'unreachable', error });

    expect(diagnostics[2]).toEqual({
      label: 'status probe',
      command: 'management 127.0.0.1:38248 "status"',
      exit_code: 1,
      stdout: '',
      stderr: 'connect ECONNREFUSED',
    });
  });
});

describe('recoverService', () => {
  beforeEach(() => {
    vi.mocked(getServiceStatus).mockResolvedValue(createCommandResult({ command: 'systemctl status' }));
    vi.mocked(probeLoadStats).mockResolvedValue(createProbeResult('SUCCESS: nclients=0\n', 'load-stats'));
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  it('should restart exactly once after collecting diagnostics', async () => {
    vi.mocked(restartService).mockResolvedValue(createCommandResult());

    const outcome = await recoverService(config, frozen);

    expect(restartService).toHaveBeenCalledTimes(1);
    expect(restartService).toHaveBeenCalledWith(config.service);
    expect(outcome.diagnostics).toHaveLength(3);
    expect(outcome.restart).toEqual({
      command: 'systemctl restart openvpn-server@test',
      exit_code: 0,
      stdout: '',
      stderr: '',
    });
  });

  it('should report a failed restart without retrying', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.mocked(restartService).mockResolvedValue(
      createCommandResult({ exit_code: 5, stderr: 'Failed to restart openvpn-server@test.service: Unit not found.\n' })
    );

    const outcome = await recoverService(config, frozen);

    expect(restartService).toHaveBeenCalledTimes(1);
    expect(outcome.restart.exit_code).toBe(5);
    expect(error).toHaveBeenCalledWith('Restart of openvpn-server@test exited with 5');
  });
});
