export type ServiceErrorCode =
  | "backend-unavailable"
  | "executable-not-found"
  | "service-missing"
  | "partial-install"
  | "partial-configuration"
  | "identity-rejected"
  | "removal-failed"
  | "missing-credential"
  | "timeout"
  | "unknown";

export type ServiceError = {
  code: ServiceErrorCode;
  message: string;
  /** The step that failed: a descriptor property, or a lifecycle step name. */
  step?: string;
  /** Backend output, verbatim. */
  detail?: string;
  /** What the operator can do next. */
  hint?: string;
};

export function serviceError(
  code: ServiceErrorCode,
  message: string,
  extra: Omit<ServiceError, "code" | "message"> = {},
): ServiceError {
  const error: ServiceError = { code, message };
  if (extra.step) error.step = extra.step;
  if (extra.detail) error.detail = extra.detail;
  if (extra.hint) error.hint = extra.hint;
  return error;
}

export function privilegeHint(output: string): string | undefined {
  if (/access is denied|0x5\b|elevat/i.test(output)) {
    return "Run the command from an elevated (Administrator) prompt.";
  }
  return undefined;
}

export function formatServiceError(error: ServiceError): string[] {
  const head = error.step ? `${error.message} [step: ${error.step}]` : error.message;
  const lines = [head];
  if (error.detail) lines.push(...error.detail.split(/\r?\n/).map((line) => `  ${line}`));
  if (error.hint) lines.push(`Hint: ${error.hint}`);
  return lines;
}
