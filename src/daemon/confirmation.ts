import type { Prompter } from "../wizard/prompts.js";

export type PendingActionKind = "reinstall" | "uninstall" | "identity-change";

export type ConfirmationRequest = {
  kind: PendingActionKind;
  serviceName: string;
  summary: string;
  details?: string[];
};

/** Proof that the operator affirmed one specific pending action. */
export type ConfirmationToken = {
  readonly kind: PendingActionKind;
  readonly serviceName: string;
  readonly source: "interactive" | "override";
};

/**
 * A destructive or identity-changing mutation held as a value. `run` only
 * executes with a token issued for the same action and service.
 */
export type PendingAction<T> = ConfirmationRequest & {
  run: (token: ConfirmationToken) => Promise<T>;
};

export type Confirmer = {
  confirm: (request: ConfirmationRequest) => Promise<ConfirmationToken | null>;
  /** Plain yes/no question for non-destructive choices (e.g. start after install). */
  ask: (message: string, initialValue?: boolean) => Promise<boolean>;
};

export type GatedResult<T> = { confirmed: false } | { confirmed: true; value: T };

export function createPendingAction<T>(
  request: ConfirmationRequest,
  run: (token: ConfirmationToken) => Promise<T>,
): PendingAction<T> {
  return { ...request, run };
}

export function assertTokenFor(request: ConfirmationRequest, token: ConfirmationToken): void {
  if (token.kind !== request.kind || token.serviceName !== request.serviceName) {
    throw new Error(
      `confirmation token for ${token.kind}:${token.serviceName} cannot authorize ${request.kind}:${request.serviceName}`,
    );
  }
}

export async function executeConfirmed<T>(
  action: PendingAction<T>,
  confirmer: Confirmer,
): Promise<GatedResult<T>> {
  const { run, ...request } = action;
  const token = await confirmer.confirm(request);
  if (!token) return { confirmed: false };
  assertTokenFor(request, token);
  return { confirmed: true, value: await run(token) };
}

function issueToken(
  request: ConfirmationRequest,
  source: ConfirmationToken["source"],
): ConfirmationToken {
  return Object.freeze({ kind: request.kind, serviceName: request.serviceName, source });
}

export function formatConfirmationMessage(request: ConfirmationRequest): string {
  if (!request.details?.length) return request.summary;
  return [request.summary, ...request.details.map((line) => `  ${line}`)].join("\n");
}

export function createConfirmer(params: {
  prompter?: Prompter;
  assumeYes: boolean;
  interactive: boolean;
}): Confirmer {
  const { prompter, assumeYes, interactive } = params;
  return {
    confirm: async (request) => {
      if (assumeYes) return issueToken(request, "override");
      if (!interactive || !prompter) return null;
      const ok = await prompter.confirm({
        message: formatConfirmationMessage(request),
        initialValue: false,
      });
      return ok ? issueToken(request, "interactive") : null;
    },
    ask: async (message, initialValue = false) => {
      if (assumeYes) return true;
      if (!interactive || !prompter) return false;
      return await prompter.confirm({ message, initialValue });
    },
  };
}

/** Confirmer with a fixed answer, for scripting and tests. */
export function createStaticConfirmer(answer: boolean): Confirmer {
  return {
    confirm: async (request) => (answer ? issueToken(request, "override") : null),
    ask: async () => answer,
  };
}
