export type PipelineErrorKind =
  | "config_load"
  | "network"
  | "parse"
  | "validation"
  | "extraction"
  | "disabled"
  | "no_candidates";

export interface PipelineError {
  kind: PipelineErrorKind;
  message: string;
  cause?: unknown;
}

export function pipelineError(
  kind: PipelineErrorKind,
  message: string,
  cause?: unknown
): PipelineError {
  return cause === undefined ? { kind, message } : { kind, message, cause };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Raised when a run is started without any target site. */
export class NoTargetsError extends Error {
  constructor() {
    super("No target sites supplied");
    this.name = "NoTargetsError";
  }
}
