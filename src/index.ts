#!/usr/bin/env node

import { Command } from "commander";
import { loadConfig, ConfigError, type LoadedConfig } from "./lib/config.js";
import { REPORT_CODE_DESCRIPTIONS } from "./constants/report_codes.js";
import type { TickReport } from "./types/report.js";

interface GlobalOptions {
  config?: string;
}

interface JsonOption {
  json?: boolean;
}

const program = new Command();

program
  .name("ovpn-watchdog")
  .description("Detect a frozen OpenVPN server, restart it and alert administrators")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to configuration file");

async function loadGlobalConfig(): Promise<LoadedConfig> {
  const { config } = program.opts<GlobalOptions>();
  return loadConfig({ configPath: config });
}

function reportConfigError(error: ConfigError): void {
  console.error(`Configuration error: ${error.message}`);
  if (error.configPath) {
    console.error(`  file: ${error.configPath}`);
  }
  process.exitCode = 1;
}

function printTickSummary(report: TickReport): void {
  console.log(`Run ID: ${report.run_id}`);
  console.log(`Verdict: ${report.verdict}`);
  console.log(`Code: ${report.code} (${REPORT_CODE_DESCRIPTIONS[report.code]})`);
  if (report.fingerprint) {
    console.log(`Fingerprint: ${report.fingerprint}`);
  }
  if (report.probe_error) {
    console.log(`Probe error: ${report.probe_error}`);
  }
  if (report.restart) {
    console.log(`Restart: ${report.restart.command} -> ${report.restart.exit_code}`);
  }
  if (report.notification) {
    console.log(`Notification: ${report.notification.status}`);
  }
  console.log(`Duration: ${report.duration_ms}ms`);
}

program
  .command("check", { isDefault: true })
  .description("Run one watchdog tick: probe, compare, recover if frozen")
  .option("--json", "Output the tick report as JSON")
  .action(async (options: JsonOption) => {
    try {
      const { config } = await loadGlobalConfig();
      const { runTick } = await import("./runner/tick.js");
      const report = await runTick(config);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printTickSummary(report);
      }
      process.exitCode = report.exit_code;
    } catch (error) {
      if (error instanceof ConfigError) {
        reportConfigError(error);
        return;
      }
      console.error("Fatal error during tick execution:", error);
      process.exitCode = 1;
    }
  });

program
  .command("status")
  .description("Show the stored state record")
  .option("--json", "Output in JSON format")
  .action(async (options: JsonOption) => {
    try {
      const { config, source } = await loadGlobalConfig();
      const { readStateRecord } = await import("./lib/state.js");
      const record = await readStateRecord(config.state.path);

      if (options.json) {
        console.log(JSON.stringify({ state_path: config.state.path, config_source: source, record }, null, 2));
        return;
      }

      console.log(`ovpn-watchdog status (${config.service.name})`);
      console.log(`  config: ${source ?? "(defaults and environment)"}`);
      console.log(`  state: ${config.state.path}`);
      if (!record) {
        console.log("  No state recorded yet (next tick is a first run)");
        return;
      }
      console.log(`  fingerprint: ${record.algorithm}=${record.fingerprint}`);
      console.log(`  updated: ${record.updated_at}`);
      console.log(`  last verdict: ${record.last_verdict}`);
    } catch (error) {
      if (error instanceof ConfigError) {
        reportConfigError(error);
        return;
      }
      throw error;
    }
  });

program
  .command("doctor")
  .description("Diagnose ovpn-watchdog configuration and environment")
  .action(async () => {
    console.log("ovpn-watchdog doctor - checking configuration and environment\n");

    let loaded: LoadedConfig;
    try {
      loaded = await loadGlobalConfig();
    } catch (error) {
      if (error instanceof ConfigError) {
        console.log(`[FAIL] config: ${error.message}`);
        for (const detail of error.details) {
          console.log(`    - ${detail}`);
        }
        process.exitCode = 1;
        return;
      }
      throw error;
    }
    console.log(`[OK] config: ${loaded.source ?? "defaults and environment (no config file found)"}`);

    const { runDoctor, hasFailures } = await import("./lib/doctor.js");
    const checks = await runDoctor(loaded.config);
    for (const check of checks) {
      console.log(`[${check.status.toUpperCase()}] ${check.name}: ${check.detail}`);
    }

    console.log("\n--- Summary ---");
    if (hasFailures(checks)) {
      const failed = checks.filter((check) => check.status === "fail").length;
      console.log(`Found ${failed} failing check(s).`);
      process.exitCode = 1;
    } else {
      console.log("All checks passed. ovpn-watchdog is ready to run.");
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
