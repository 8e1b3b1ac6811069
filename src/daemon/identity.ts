import type { ServiceSettings } from "../config/service.js";
import type { CollectorConfig } from "../config/types.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createPendingAction, executeConfirmed } from "./confirmation.js";
import {
  configCredentialSource,
  type CredentialSource,
  interactiveCredentialSource,
  normalizeAccountName,
  resolveCredential,
  type RunAsCredential,
} from "./credentials.js";
import type { NetworkProbeResult } from "./network-probe.js";
import { resolveImageName, type WorkerProcess } from "./processes.js";
import { privilegeHint, type ServiceError, serviceError } from "./results.js";
import {
  NSSM_MISSING_HINT,
  resolveSettleOptions,
  type ServiceDeps,
  writeServiceLine,
} from "./service.js";
import {
  buildServiceEnvironment,
  formatEnvironmentExtra,
  getRuntimeSearchPaths,
  parseEnvironmentExtra,
} from "./service-env.js";
import { describeSettleTimeout, waitForServiceState } from "./settle.js";
import { readServiceProperty } from "./status.js";

export type IdentityStep =
  | "credential-resolution"
  | "stop"
  | "set-identity"
  | "set-environment"
  | "verify"
  | "start"
  | "health-check";

export type IdentityParams = {
  settings: ServiceSettings;
  config: CollectorConfig;
  /** Defaults to config, then an interactive prompt. */
  sources?: CredentialSource[];
};

export type IdentityVerification = {
  objectName?: string;
  environment: Record<string, string>;
};

export type IdentityHealth = {
  status: "ok" | "warning" | "skipped";
  workerProcesses: WorkerProcess[];
  network: NetworkProbeResult;
  issues: string[];
};

export type IdentityResult =
  | {
      ok: true;
      outcome: "configured";
      account: string;
      credentialSource: string;
      completedSteps: IdentityStep[];
      verification: IdentityVerification;
      health: IdentityHealth;
    }
  | { ok: true; outcome: "cancelled"; completedSteps: IdentityStep[] }
  | { ok: false; error: ServiceError; completedSteps: IdentityStep[] };

type StepContext = {
  settings: ServiceSettings;
  deps: ServiceDeps;
  account: string;
  credential: RunAsCredential;
  completed: IdentityStep[];
};

function fail(ctx: StepContext, error: ServiceError): IdentityResult {
  ctx.deps.logger.warn(`identity change halted at ${error.step ?? "?"}: ${error.message}`);
  return { ok: false, error, completedSteps: [...ctx.completed] };
}

async function stopStep(ctx: StepContext): Promise<ServiceError | null> {
  const { backend } = ctx.deps;
  const { name } = ctx.settings;
  const runtime = await backend.status(name);
  if (runtime.state === "running") {
    const stop = await backend.stop(name);
    if (!stop.ok) ctx.deps.logger.warn(`stop ${name} failed: ${stop.output}`);
  }
  const stopped = await waitForServiceState(
    backend,
    name,
    ["stopped"],
    resolveSettleOptions(ctx.deps, ctx.settings.settleTimeoutMs),
  );
  if (!stopped.ok) {
    return serviceError("timeout", describeSettleTimeout(name, ["stopped"], stopped), {
      step: "stop",
    });
  }
  return null;
}

async function setIdentityStep(ctx: StepContext): Promise<ServiceError | null> {
  const { name } = ctx.settings;
  const res = await ctx.deps.backend.set(name, "ObjectName", ctx.account, ctx.credential.password);
  if (!res.ok) {
    return serviceError("identity-rejected", `The service manager rejected account ${ctx.account}`, {
      step: "set-identity",
      detail: res.output,
      hint:
        privilegeHint(res.output) ??
        "Check the account name and password. The account also needs the 'Log on as a service' right.",
    });
  }
  writeServiceLine(ctx.deps, "Run as", ctx.account);
  return null;
}

async function setEnvironmentStep(ctx: StepContext): Promise<ServiceError | null> {
  const { name } = ctx.settings;
  const application = await readServiceProperty(ctx.deps, name, "Application");
  if (!application) {
    return serviceError("partial-configuration", `Could not read the Application of ${name}`, {
      step: "set-environment",
      hint: `The account is already changed. Inspect with: nssm get ${name} Application`,
    });
  }
  const environment = buildServiceEnvironment(
    getRuntimeSearchPaths({ runtimePath: application, account: ctx.account }),
  );
  const res = await ctx.deps.backend.set(
    name,
    "AppEnvironmentExtra",
    ...formatEnvironmentExtra(environment),
  );
  if (!res.ok) {
    return serviceError("partial-configuration", `Setting AppEnvironmentExtra on ${name} failed`, {
      step: "set-environment",
      detail: res.output,
      hint:
        privilegeHint(res.output) ??
        `The account is already changed. Set the environment by hand with: nssm set ${name} AppEnvironmentExtra ...`,
    });
  }
  return null;
}

async function verifyStep(ctx: StepContext): Promise<IdentityVerification> {
  const { name } = ctx.settings;
  const objectName = await readServiceProperty(ctx.deps, name, "ObjectName");
  const environment = parseEnvironmentExtra(
    (await readServiceProperty(ctx.deps, name, "AppEnvironmentExtra")) ?? "",
  );
  writeServiceLine(ctx.deps, "ObjectName", objectName ?? "(unreadable)");
  for (const [key, value] of Object.entries(environment)) {
    writeServiceLine(ctx.deps, key, value);
  }
  return { ...(objectName ? { objectName } : {}), environment };
}

async function startStep(ctx: StepContext): Promise<ServiceError | null> {
  const { name } = ctx.settings;
  const res = await ctx.deps.backend.start(name);
  if (!res.ok) {
    return serviceError("partial-configuration", `${name} did not start under ${ctx.account}`, {
      step: "start",
      detail: res.output,
      hint:
        privilegeHint(res.output) ??
        `Check the stderr log and the account's rights, then run: nssm start ${name}`,
    });
  }
  const running = await waitForServiceState(
    ctx.deps.backend,
    name,
    ["running"],
    resolveSettleOptions(ctx.deps, ctx.settings.settleTimeoutMs),
  );
  if (!running.ok) {
    return serviceError("timeout", describeSettleTimeout(name, ["running"], running), {
      step: "start",
    });
  }
  writeServiceLine(ctx.deps, "Started service", name);
  return null;
}

async function healthCheckStep(ctx: StepContext): Promise<IdentityHealth> {
  const { name } = ctx.settings;
  const issues: string[] = [];
  let workerProcesses: WorkerProcess[] = [];
  const application =
    (await readServiceProperty(ctx.deps, name, "Application")) ?? ctx.settings.executable;
  if (application) {
    try {
      workerProcesses = await ctx.deps.processes.listByImageName(resolveImageName(application));
      if (workerProcesses.length === 0) issues.push("no worker process observed");
    } catch (err) {
      issues.push(`process probe failed: ${formatErrorMessage(err)}`);
    }
  }

  const network = await ctx.deps.probeNetwork(ctx.settings.networkResource, ctx.credential);
  if (network.status === "warning") {
    issues.push(`network resource ${network.path ?? ""} not reachable: ${network.detail ?? ""}`.trim());
  }

  const status: IdentityHealth["status"] =
    issues.length > 0
      ? "warning"
      : !application && network.status === "skipped"
        ? "skipped"
        : "ok";
  writeServiceLine(ctx.deps, "Health", status);
  for (const issue of issues) ctx.deps.logger.warn(issue);
  return { status, workerProcesses, network, issues };
}

async function applyIdentity(ctx: StepContext, credentialSource: string): Promise<IdentityResult> {
  const halt = async (
    step: IdentityStep,
    run: (ctx: StepContext) => Promise<ServiceError | null>,
  ): Promise<ServiceError | null> => {
    ctx.deps.logger.debug(`identity step ${step}`);
    const error = await run(ctx);
    if (!error) ctx.completed.push(step);
    return error;
  };

  const stopError = await halt("stop", stopStep);
  if (stopError) return fail(ctx, stopError);
  const identityError = await halt("set-identity", setIdentityStep);
  if (identityError) return fail(ctx, identityError);
  const environmentError = await halt("set-environment", setEnvironmentStep);
  if (environmentError) return fail(ctx, environmentError);

  const verification = await verifyStep(ctx);
  ctx.completed.push("verify");

  const startError = await halt("start", startStep);
  if (startError) return fail(ctx, startError);

  const health = await healthCheckStep(ctx);
  ctx.completed.push("health-check");

  return {
    ok: true,
    outcome: "configured",
    account: ctx.account,
    credentialSource,
    completedSteps: [...ctx.completed],
    verification,
    health,
  };
}

/**
 * Run the service under a different account and give that account the
 * runtime search paths it needs. Halts at the first failing step; nothing
 * already applied is undone.
 */
export async function configureIdentity(
  params: IdentityParams,
  deps: ServiceDeps,
): Promise<IdentityResult> {
  const { settings } = params;
  const { backend } = deps;
  const completed: IdentityStep[] = [];

  if (!(await backend.locate())) {
    return {
      ok: false,
      error: serviceError("backend-unavailable", "NSSM could not be found", {
        hint: NSSM_MISSING_HINT,
      }),
      completedSteps: completed,
    };
  }
  const runtime = await backend.status(settings.name);
  if (runtime.state === "absent") {
    return {
      ok: false,
      error: serviceError("service-missing", `${settings.name} is not installed`, {
        hint: "Install the service first.",
      }),
      completedSteps: completed,
    };
  }
  if (runtime.state === "unknown") {
    return {
      ok: false,
      error: serviceError("unknown", `Could not determine the state of ${settings.name}`, {
        detail: runtime.detail ?? runtime.raw,
      }),
      completedSteps: completed,
    };
  }

  const sources = params.sources ?? [
    configCredentialSource(params.config),
    interactiveCredentialSource(deps.prompter, { interactive: deps.interactive }),
  ];
  const resolved = await resolveCredential(sources);
  if (!resolved) {
    return {
      ok: false,
      error: serviceError("missing-credential", "No run-as account was provided", {
        step: "credential-resolution",
        hint: "Set service.run_as_user and service.run_as_password in config.json, or run interactively.",
      }),
      completedSteps: completed,
    };
  }
  completed.push("credential-resolution");
  const account = normalizeAccountName(resolved.credential.username);
  deps.logger.info(`run-as account ${account} (from ${resolved.source})`);

  const gated = await executeConfirmed(
    createPendingAction(
      {
        kind: "identity-change",
        serviceName: settings.name,
        summary: `Run ${settings.name} as ${account}?`,
        details: ["The service will be stopped, reconfigured and started again."],
      },
      async () =>
        await applyIdentity(
          { settings, deps, account, credential: resolved.credential, completed },
          resolved.source,
        ),
    ),
    deps.confirmer,
  );
  if (!gated.confirmed) return { ok: true, outcome: "cancelled", completedSteps: [...completed] };
  return gated.value;
}
