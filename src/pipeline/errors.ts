export type ResolutionErrorCode = "missing_required_attribute" | "unresolved_reference" | "invalid_list_expansion";

export abstract class ResolutionError extends Error {
  abstract readonly code: ResolutionErrorCode;

  constructor(
    message: string,
    readonly flag: string
  ) {
    super(message);
  }
}

/** Fatal: a required argument could not be bound from the sample. */
export class MissingRequiredAttributeError extends ResolutionError {
  readonly code = "missing_required_attribute";

  constructor(
    readonly sampleName: string | null,
    readonly missing: readonly string[],
    flag: string
  ) {
    super(
      `sample ${sampleName ?? "<unnamed>"} is missing required attribute${missing.length === 1 ? "" : "s"}: ${missing.join(", ")}`,
      flag
    );
    this.name = "MissingRequiredAttributeError";
  }
}

/** Non-fatal: a registry default was looked up and not found; the flag is omitted. */
export class UnresolvedReferenceError extends ResolutionError {
  readonly code = "unresolved_reference";

  constructor(
    flag: string,
    readonly genome: string | null,
    readonly asset: string,
    readonly seekKey: string
  ) {
    super(
      genome === null
        ? `${flag}: sample has no genome to look up ${asset}.${seekKey}`
        : `${flag}: no ${asset}.${seekKey} asset for genome ${genome}`,
      flag
    );
    this.name = "UnresolvedReferenceError";
  }
}

/** Non-fatal: one entry of a list expansion did not resolve and was skipped. */
export class InvalidListExpansionError extends ResolutionError {
  readonly code = "invalid_list_expansion";

  constructor(
    flag: string,
    readonly entry: string,
    readonly asset: string,
    readonly seekKey: string
  ) {
    super(`${flag}: skipped ${entry} (no ${asset}.${seekKey} asset)`, flag);
    this.name = "InvalidListExpansionError";
  }
}

export type ResolutionDiagnostic = UnresolvedReferenceError | InvalidListExpansionError;

export class PipelineInterfaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineInterfaceError";
  }
}
