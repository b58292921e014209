/**
 * Ingestion errors. HTTP-facing errors carry a `status`.
 */

/** Mode name outside the supported transport modes */
export class UnknownModeError extends Error {
  readonly status = 400;

  constructor(readonly mode: string) {
    super(`Unknown transport mode: ${mode}`);
    this.name = "UnknownModeError";
  }
}

/** Facility download or parsing failed */
export class FacilitySourceError extends Error {
  readonly status = 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FacilitySourceError";
  }
}
