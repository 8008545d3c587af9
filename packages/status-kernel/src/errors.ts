// Status Kernel - fatal error kinds
//
// Two kinds terminate a run with the UNKNOWN verdict:
// - configuration errors (options that cannot be applied to this device)
// - data errors (transport failure, mandatory field absent or malformed)
// Abnormal device states are never errors; they are severity escalations.

export type ProbeConfigErrorCode =
  | "HOST_REQUIRED"
  | "INVALID_OPTION"
  | "SURPLUS_OPERAND"
  | "INVALID_THRESHOLD"
  | "THRESHOLD_COUNT_MISMATCH"
  | "UNSUPPORTED_ALARM_TOKEN";

export type ProbeDataErrorCode = "FIELD_MISSING" | "FIELD_INVALID" | "TRANSPORT_FAILURE";

export class ProbeConfigError extends Error {
  public readonly code: ProbeConfigErrorCode;

  constructor(code: ProbeConfigErrorCode, detail: string) {
    super(`${code}: ${detail}`);
    this.name = "ProbeConfigError";
    this.code = code;
  }
}

export class ProbeDataError extends Error {
  public readonly code: ProbeDataErrorCode;

  constructor(code: ProbeDataErrorCode, detail: string, options?: { cause?: unknown }) {
    super(`${code}: ${detail}`, options);
    this.name = "ProbeDataError";
    this.code = code;
  }
}

/**
 * True for the two fatal kinds a run converts into an UNKNOWN verdict.
 */
export function isProbeFatalError(err: unknown): err is ProbeConfigError | ProbeDataError {
  return err instanceof ProbeConfigError || err instanceof ProbeDataError;
}
