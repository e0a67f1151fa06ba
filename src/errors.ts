// Audio Violence Analyzer - Error taxonomy
//
// Only input-shape violations and unknown-session lookups reach callers.
// Modality failures never throw past the feature extractor; they are recorded
// on the FeatureVector as ModalityFailure entries instead.

/** Malformed or empty waveform, bad PCM framing, or out-of-order chunk submission. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/** Lookup of a session id that never existed, is not finalized, or has expired. */
export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, detail = "unknown or expired") {
    super(`Session not found: ${sessionId} (${detail})`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

/** Invalid analysis configuration. Raised at startup, never at request time. */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid analysis configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
