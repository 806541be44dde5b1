// =============================================================================
// drumgrid - Errors
// =============================================================================

/**
 * Thrown when a cell address lies outside the current pattern length.
 * Callers are expected to check `pattern.totalSteps` first.
 */
export class OutOfRangeError extends Error {
  constructor(
    public readonly step: number,
    public readonly totalSteps: number,
    public readonly voice?: string
  ) {
    const cell = voice === undefined ? `step ${step}` : `step ${step} of '${voice}'`
    super(`Pattern: ${cell} is out of range [0, ${totalSteps})`)
    this.name = 'OutOfRangeError'
  }
}

/**
 * Thrown when an export is requested without a destination name.
 */
export class EmptyFilenameError extends Error {
  constructor() {
    super('Export: no filename given')
    this.name = 'EmptyFilenameError'
  }
}

/**
 * Thrown when the file sink fails to store an encoded file.
 * The sink's own error is kept as `cause`.
 */
export class WriteFailureError extends Error {
  constructor(
    public readonly filename: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Export: failed to write '${filename}': ${reason}`, { cause })
    this.name = 'WriteFailureError'
  }
}

/**
 * Thrown when an export is requested with no file sink to write to.
 */
export class MissingFileSinkError extends Error {
  constructor() {
    super('Export: no file sink configured')
    this.name = 'MissingFileSinkError'
  }
}

/**
 * Thrown when an option such as the tempo or the resolution is invalid.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly option: string,
    public readonly reason: string
  ) {
    super(`${option}: ${reason}`)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Thrown when a voice table is built from inconsistent entries.
 */
export class VoiceTableError extends Error {
  constructor(reason: string) {
    super(`VoiceTable: ${reason}`)
    this.name = 'VoiceTableError'
  }
}

/**
 * Thrown when a voice outside the table reaches a lookup.
 */
export class UnknownVoiceError extends Error {
  constructor(public readonly voice: string) {
    super(`VoiceTable: unknown voice '${voice}'`)
    this.name = 'UnknownVoiceError'
  }
}
