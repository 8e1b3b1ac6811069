import { fileURLToPath } from "node:url";

import { buildProgram } from "./cli/program.js";
import { runCli } from "./cli/run-main.js";
import { createConfigIO, loadConfig } from "./config/io.js";
import { resolveServiceSettings } from "./config/service.js";
import { createConfirmer, createStaticConfirmer } from "./daemon/confirmation.js";
import { configCredentialSource, interactiveCredentialSource } from "./daemon/credentials.js";
import { buildServiceDescriptor } from "./daemon/descriptor.js";
import { configureIdentity } from "./daemon/identity.js";
import { installService } from "./daemon/install.js";
import { createNetworkProbe } from "./daemon/network-probe.js";
import { createNssmBackend } from "./daemon/nssm.js";
import { createTasklistProbe } from "./daemon/processes.js";
import { restartService } from "./daemon/restart.js";
import { createDefaultServiceDeps } from "./daemon/service.js";
import { buildServiceEnvironment } from "./daemon/service-env.js";
import { inspectService } from "./daemon/status.js";
import { uninstallService } from "./daemon/uninstall.js";
import { formatUncaughtError } from "./infra/errors.js";
import { isMainModule } from "./infra/is-main.js";

export type { CollectorConfig } from "./config/types.js";
export type { ServiceSettings } from "./config/service.js";
export type { ServiceControlBackend } from "./daemon/backend.js";
export type { IdentityResult } from "./daemon/identity.js";
export type { InstallResult } from "./daemon/install.js";
export type { RestartReport } from "./daemon/restart.js";
export type { ServiceError } from "./daemon/results.js";
export type { ServiceDeps } from "./daemon/service.js";
export type { ServiceRuntime } from "./daemon/service-runtime.js";
export type { ServiceStatusReport } from "./daemon/status.js";
export type { UninstallResult } from "./daemon/uninstall.js";

export {
  buildProgram,
  buildServiceDescriptor,
  buildServiceEnvironment,
  configCredentialSource,
  configureIdentity,
  createConfigIO,
  createConfirmer,
  createDefaultServiceDeps,
  createNetworkProbe,
  createNssmBackend,
  createStaticConfirmer,
  createTasklistProbe,
  inspectService,
  installService,
  interactiveCredentialSource,
  loadConfig,
  resolveServiceSettings,
  restartService,
  uninstallService,
};

const isMain = isMainModule({ currentFile: fileURLToPath(import.meta.url) });

if (isMain) {
  runCli(process.argv).catch((err: unknown) => {
    console.error("[collector-svc] CLI failed:", formatUncaughtError(err));
    process.exit(1);
  });
}
