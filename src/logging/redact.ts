const REDACTED = "***";

// nssm set <service> ObjectName <account> <password>
const OBJECT_NAME_PROPERTY = "objectname";

const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /("?(?:run_as_password|password|pwd)"?\s*[:=]\s*"?)([^"\s,}]+)/gi,
  /(\/user:\S+\s+)(\S+)/gi,
];

export function redactSensitiveText(text: string): string {
  let out = text;
  for (const pattern of DEFAULT_REDACT_PATTERNS) {
    out = out.replace(pattern, (_match, prefix: string) => `${prefix}${REDACTED}`);
  }
  return out;
}

/**
 * Mask secrets in a command line before it is logged or echoed.
 *
 * Handles the two places a run-as password reaches argv: the trailing
 * password of `nssm set <name> ObjectName <account> <password>` and the
 * positional password that follows `/user:<account>` in `net use`.
 */
export function redactCommandArgs(argv: readonly string[]): string[] {
  const out = [...argv];
  const objectNameIndex = out.findIndex(
    (arg, idx) => idx > 0 && arg.toLowerCase() === OBJECT_NAME_PROPERTY,
  );
  const isSet = out.some((arg) => arg.toLowerCase() === "set");
  if (isSet && objectNameIndex >= 0 && out.length > objectNameIndex + 2) {
    for (let i = objectNameIndex + 2; i < out.length; i += 1) out[i] = REDACTED;
  }
  for (let i = 0; i < out.length - 1; i += 1) {
    if (!out[i].toLowerCase().startsWith("/user:")) continue;
    const next = out[i + 1];
    if (next.startsWith("/")) continue;
    out[i + 1] = REDACTED;
  }
  return out;
}

export function formatCommandForLog(argv: readonly string[]): string {
  return redactCommandArgs(argv)
    .map((arg) => (/[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg))
    .join(" ");
}
