import type { CollectorConfig } from "../config/types.js";
import type { Prompter } from "../wizard/prompts.js";

export type RunAsCredential = {
  username: string;
  password: string;
};

/**
 * One place a run-as credential may come from. Sources are consulted in order
 * and the first non-null answer wins.
 */
export type CredentialSource = {
  id: string;
  resolve: () => Promise<RunAsCredential | null>;
};

export type ResolvedCredential = {
  credential: RunAsCredential;
  source: string;
};

export function configCredentialSource(config: CollectorConfig): CredentialSource {
  return {
    id: "config",
    resolve: async () => {
      const username = config.service?.run_as_user?.trim();
      if (!username) return null;
      return { username, password: config.service?.run_as_password ?? "" };
    },
  };
}

/** Asks for the account once per resolution; the password is only asked for a non-empty username. */
export function interactiveCredentialSource(
  prompter: Prompter | undefined,
  opts: { interactive: boolean },
): CredentialSource {
  return {
    id: "prompt",
    resolve: async () => {
      if (!opts.interactive || !prompter) return null;
      await prompter.note(
        "config.json has no service.run_as_user. The password goes to the service manager only and is not saved.",
        "Service account",
      );
      const username = (
        await prompter.text({
          message: "Run the service as which account?",
          placeholder: "DOMAIN\\user or .\\user",
        })
      ).trim();
      if (!username) return null;
      const password = await prompter.password({
        message: `Password for ${username}`,
      });
      return { username, password };
    },
  };
}

export async function resolveCredential(
  sources: readonly CredentialSource[],
): Promise<ResolvedCredential | null> {
  for (const source of sources) {
    const credential = await source.resolve();
    if (credential?.username.trim()) {
      return { credential, source: source.id };
    }
  }
  return null;
}

/** Bare local accounts need the `.\` prefix for the service manager. */
export function normalizeAccountName(username: string): string {
  const trimmed = username.trim();
  if (!trimmed) return trimmed;
  if (trimmed.includes("\\") || trimmed.includes("@")) return trimmed;
  return `.\\${trimmed}`;
}
