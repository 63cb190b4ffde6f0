/**
 * Doctor checks for ovpn-watchdog configuration and environment.
 *
 * Each check reports instead of throwing, so `ovpn-watchdog doctor` can list
 * every problem in one run.
 */

import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as nodemailer from 'nodemailer';
import type { EmailConfig, ManagementConfig, ServiceConfig, WatchdogConfig } from '../types/config.js';
import { errnoCode } from './fs.js';
import { probeLoadStats } from './probe.js';
import { getServiceManagerVersion, getServiceStatus } from './service.js';
import { buildTransportOptions } from './notify.js';

export type DoctorStatus = 'ok' | 'warn' | 'fail' | 'skip';

/**
 * Result of one doctor check.
 */
export interface DoctorCheck {
  /** Short name shown in brackets, e.g. "state dir" */
  name: string;
  status: DoctorStatus;
  /** One-line explanation */
  detail: string;
}

/**
 * Anything that can verify an SMTP connection; nodemailer transporters qualify.
 */
export interface SmtpVerifier {
  verify(): Promise<unknown>;
}

/**
 * systemd exit codes for `systemctl status`:
 * 0 active, 3 not running, 4 no such unit.
 */
const UNIT_INACTIVE_EXIT_CODE = 3;
const UNIT_UNKNOWN_EXIT_CODE = 4;

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}

/**
 * Finds the directory that would hold `path`, walking up to the first one
 * that exists, and checks it is writable.
 */
export async function checkWritableParent(name: string, path: string): Promise<DoctorCheck> {
  let dir = dirname(path);
  for (;;) {
    try {
      const info = await stat(dir);
      if (!info.isDirectory()) {
        return { name, status: 'fail', detail: `${dir} is not a directory` };
      }
      break;
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        return { name, status: 'fail', detail: `Cannot inspect ${dir}: ${error instanceof Error ? error.message : String(error)}` };
      }
      const parent = dirname(dir);
      if (parent === dir) {
        return { name, status: 'fail', detail: `No existing ancestor of ${path}` };
      }
      dir = parent;
    }
  }

  try {
    await access(dir, constants.W_OK);
  } catch {
    return { name, status: 'fail', detail: `${dir} is not writable by this user` };
  }

  return dir === dirname(path)
    ? { name, status: 'ok', detail: `${dir} is writable` }
    : { name, status: 'ok', detail: `${dirname(path)} will be created under ${dir}` };
}

/**
 * Checks that the service manager executable runs.
 */
export async function checkServiceManager(service: ServiceConfig): Promise<DoctorCheck> {
  const result = await getServiceManagerVersion(service);
  if (result.exit_code !== 0) {
    return {
      name: 'service manager',
      status: 'fail',
      detail: `'${result.command}' exited with ${result.exit_code}: ${firstLine(result.stderr) || 'no output'}`,
    };
  }
  return { name: 'service manager', status: 'ok', detail: firstLine(result.stdout) || service.systemctl_command };
}

/**
 * Checks that the configured unit exists and whether it is running.
 */
export async function checkServiceUnit(service: ServiceConfig): Promise<DoctorCheck> {
  const result = await getServiceStatus(service);
  switch (result.exit_code) {
    case 0:
      return { name: 'service unit', status: 'ok', detail: `${service.name} is active` };
    case UNIT_INACTIVE_EXIT_CODE:
      return { name: 'service unit', status: 'warn', detail: `${service.name} is not running` };
    case UNIT_UNKNOWN_EXIT_CODE:
      return { name: 'service unit', status: 'fail', detail: `${service.name} is not a known unit` };
    default:
      return {
        name: 'service unit',
        status: 'fail',
        detail: `'${result.command}' exited with ${result.exit_code}: ${firstLine(result.stderr) || 'no output'}`,
      };
  }
}

/**
 * Checks that the management interface answers the load statistics command.
 */
export async function checkManagement(management: ManagementConfig): Promise<DoctorCheck> {
  try {
    const result = await probeLoadStats(management);
    return {
      name: 'management',
      status: 'ok',
      detail: `${management.host}:${management.port} answered in ${result.duration_ms}ms: ${firstLine(result.text)}`,
    };
  } catch (error) {
    return { name: 'management', status: 'fail', detail: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Checks the alert settings, and the SMTP connection when alerts are enabled.
 *
 * @param verifier - Defaults to a nodemailer transport built from `email`
 */
export async function checkEmail(email: EmailConfig, verifier?: SmtpVerifier): Promise<DoctorCheck> {
  if (!email.enabled) {
    return { name: 'email', status: 'skip', detail: 'alerts disabled' };
  }
  if (email.recipients.length === 0) {
    return { name: 'email', status: 'warn', detail: 'alerts enabled but no recipients configured' };
  }

  const smtp: SmtpVerifier = verifier ?? nodemailer.createTransport(buildTransportOptions(email));
  try {
    await smtp.verify();
    return { name: 'email', status: 'ok', detail: `${email.smtp_host}:${email.smtp_port} accepted the connection` };
  } catch (error) {
    return {
      name: 'email',
      status: 'fail',
      detail: `${email.smtp_host}:${email.smtp_port}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * Runs every check in order.
 */
export async function runDoctor(config: WatchdogConfig): Promise<DoctorCheck[]> {
  return [
    await checkWritableParent('state dir', config.state.path),
    await checkWritableParent('log dir', config.log.path),
    await checkServiceManager(config.service),
    await checkServiceUnit(config.service),
    await checkManagement(config.management),
    await checkEmail(config.email),
  ];
}

/**
 * Whether any check failed outright; warnings do not count.
 */
export function hasFailures(checks: readonly DoctorCheck[]): boolean {
  return checks.some((check) => check.status === 'fail');
}
