import { Command } from "commander";

import { createConfigIO } from "../config/io.js";
import {
  resolveServiceSettings,
  type ServiceSettings,
  type ServiceSettingsOverrides,
} from "../config/service.js";
import type { CollectorConfig } from "../config/types.js";
import { configureIdentity } from "../daemon/identity.js";
import { installService } from "../daemon/install.js";
import { formatServiceError, type ServiceError } from "../daemon/results.js";
import { restartService, type RestartReport } from "../daemon/restart.js";
import { createDefaultServiceDeps, type ServiceDeps } from "../daemon/service.js";
import { formatServiceRuntime } from "../daemon/service-runtime.js";
import { inspectService } from "../daemon/status.js";
import { uninstallService } from "../daemon/uninstall.js";
import {
  danger,
  isNonInteractive,
  isYes,
  setNonInteractive,
  setVerbose,
  setYes,
  success,
  warn,
} from "../globals.js";
import { formatUncaughtError } from "../infra/errors.js";
import { applyLoggingSection } from "../logging/config.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { defaultRuntime } from "../runtime.js";
import { formatLine, theme } from "../terminal/theme.js";
import { VERSION } from "../version.js";
import { createClackPrompter } from "../wizard/clack-prompter.js";
import { PromptCancelledError } from "../wizard/prompts.js";

export type GlobalOptions = {
  config?: string;
  name?: string;
  yes?: boolean;
  nonInteractive?: boolean;
  verbose?: boolean;
};

type InstallOptions = {
  executable?: string;
  args?: string[];
  workingDir?: string;
  start?: boolean;
  manual?: boolean;
};

type CommandContext = {
  config: CollectorConfig;
  settings: ServiceSettings;
  deps: ServiceDeps;
};

const log = createSubsystemLogger("cli");

function renderError(error: ServiceError) {
  for (const line of formatServiceError(error)) defaultRuntime.error(danger(line));
}

function renderRestartReport(report: RestartReport) {
  defaultRuntime.log(formatLine("Service", report.name));
  defaultRuntime.log(formatLine("Status", report.statusAfter));
  defaultRuntime.log(
    formatLine(
      "Worker processes",
      report.workerProcessesObserved.length
        ? report.workerProcessesObserved.map((proc) => String(proc.pid)).join(", ")
        : "none",
    ),
  );
  defaultRuntime.log(formatLine("Healthy", report.healthy ? success("yes") : danger("no")));
  for (const issue of report.issues) defaultRuntime.log(warn(`! ${issue}`));
  if (report.recentErrorLines.length > 0) {
    defaultRuntime.log(theme.heading("Recent stderr"));
    for (const line of report.recentErrorLines) defaultRuntime.log(theme.muted(line));
  }
}

function buildContext(
  command: Command,
  overrides: Omit<ServiceSettingsOverrides, "name"> = {},
): CommandContext {
  const opts = command.optsWithGlobals<GlobalOptions>();
  setVerbose(Boolean(opts.verbose));
  setYes(Boolean(opts.yes));
  setNonInteractive(Boolean(opts.nonInteractive));

  const config = createConfigIO({ configPath: opts.config }).loadConfig();
  applyLoggingSection(config);
  const settings = resolveServiceSettings(config, {
    overrides: { name: opts.name, ...overrides },
    version: VERSION,
  });
  const interactive = !isNonInteractive();
  const deps = createDefaultServiceDeps({
    nssmPath: settings.nssmPath,
    prompter: interactive ? createClackPrompter() : undefined,
    assumeYes: isYes(),
    interactive,
  });
  log.debug(`service ${settings.name} (config: ${opts.config ?? "default"})`);
  return { config, settings, deps };
}

/** Runs one command; false or a thrown error exits 1. Cancelled prompts exit 0. */
async function runCommand(label: string, fn: () => Promise<boolean>): Promise<void> {
  let ok = false;
  try {
    ok = await fn();
  } catch (err) {
    if (err instanceof PromptCancelledError) {
      defaultRuntime.log("Cancelled.");
      return;
    }
    log.error(`${label} failed: ${formatUncaughtError(err)}`);
    defaultRuntime.error(danger(formatUncaughtError(err)));
    defaultRuntime.exit(1);
  }
  if (!ok) defaultRuntime.exit(1);
}

export function registerServiceCommands(program: Command) {
  program
    .command("install")
    .description("Register the collector with the Windows service manager")
    .option("--executable <path>", "Worker executable (defaults to service.executable)")
    .option("--args <args...>", "Arguments passed to the worker")
    .option("--working-dir <dir>", "Working directory (defaults to service.working_dir or cwd)")
    .option("--start", "Start the service after installing")
    .option("--no-start", "Do not start the service after installing")
    .option("--manual", "Register with manual (on-demand) startup", false)
    .action(async (opts: InstallOptions, command: Command) => {
      await runCommand("install", async () => {
        const { settings, deps } = buildContext(command, {
          executable: opts.executable,
          arguments: opts.args,
          workingDir: opts.workingDir,
        });
        const res = await installService(
          { settings, start: opts.start, startup: opts.manual ? "manual" : "auto" },
          deps,
        );
        if (!res.ok) {
          renderError(res.error);
          return false;
        }
        if (res.outcome === "already-installed") {
          defaultRuntime.log(
            `${settings.name} is already installed (${formatServiceRuntime(res.runtime)}); nothing changed.`,
          );
          return true;
        }
        if (res.startError) renderError(res.startError);
        const suffix = res.started ? " and running" : "";
        defaultRuntime.log(success(`${settings.name} installed${suffix}.`));
        return true;
      });
    });

  program
    .command("uninstall")
    .description("Stop and remove the service")
    .action(async (_opts: unknown, command: Command) => {
      await runCommand("uninstall", async () => {
        const { settings, deps } = buildContext(command);
        const res = await uninstallService({ settings }, deps);
        if (!res.ok) {
          renderError(res.error);
          return false;
        }
        if (res.outcome === "not-installed") {
          defaultRuntime.log(`${settings.name} is not installed; nothing to remove.`);
        } else if (res.outcome === "cancelled") {
          defaultRuntime.log("Uninstall cancelled.");
        } else {
          for (const warning of res.warnings) defaultRuntime.log(warn(`! ${warning}`));
          defaultRuntime.log(success(`${settings.name} removed.`));
        }
        return true;
      });
    });

  program
    .command("restart")
    .description("Stop and start the service, then report its health")
    .action(async (_opts: unknown, command: Command) => {
      await runCommand("restart", async () => {
        const { settings, deps } = buildContext(command);
        const report = await restartService({ settings }, deps);
        renderRestartReport(report);
        return report.healthy;
      });
    });

  program
    .command("configure-identity")
    .description("Run the service under a dedicated account with the runtime search paths it needs")
    .action(async (_opts: unknown, command: Command) => {
      await runCommand("configure-identity", async () => {
        const { config, settings, deps } = buildContext(command);
        const res = await configureIdentity({ settings, config }, deps);
        if (!res.ok) {
          renderError(res.error);
          defaultRuntime.error(`Completed steps: ${res.completedSteps.join(", ") || "none"}`);
          return false;
        }
        if (res.outcome === "cancelled") {
          defaultRuntime.log("Identity change cancelled.");
          return true;
        }
        for (const issue of res.health.issues) defaultRuntime.log(warn(`! ${issue}`));
        defaultRuntime.log(success(`${settings.name} now runs as ${res.account}.`));
        return true;
      });
    });

  program
    .command("status")
    .description("Show the service state, registration and recent errors")
    .option("--json", "Output JSON", false)
    .action(async (opts: { json?: boolean }, command: Command) => {
      await runCommand("status", async () => {
        const { settings, deps } = buildContext(command);
        const report = await inspectService({ settings }, deps);
        if (opts.json) {
          defaultRuntime.log(JSON.stringify(report, null, 2));
          return report.backendAvailable;
        }
        defaultRuntime.log(formatLine("Service", report.name));
        defaultRuntime.log(formatLine("State", formatServiceRuntime(report.runtime)));
        for (const [key, value] of Object.entries(report.properties)) {
          defaultRuntime.log(formatLine(key, value));
        }
        defaultRuntime.log(formatLine("Worker processes", String(report.workerProcesses.length)));
        for (const issue of report.issues) defaultRuntime.log(warn(`! ${issue}`));
        for (const line of report.recentErrorLines) defaultRuntime.log(theme.muted(line));
        return report.backendAvailable;
      });
    });
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("collector-svc")
    .description("Install, reconfigure, restart and remove the data collector Windows service")
    .version(VERSION)
    .option("--config <path>", "Path to config.json (default: COLLECTOR_CONFIG_PATH, ./config.json)")
    .option("--name <service>", "Service name (default: service.name or DataCollector)")
    .option("-y, --yes", "Confirm destructive actions without prompting", false)
    .option("--non-interactive", "Never prompt; decline anything that needs confirmation", false)
    .option("--verbose", "Verbose console logging", false);
  registerServiceCommands(program);
  return program;
}
