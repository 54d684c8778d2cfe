export class LabelNormalizerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConfigError extends LabelNormalizerError {}

export class EmptyCorpusError extends LabelNormalizerError {
  constructor() {
    super('Label corpus is empty')
  }
}

/** Base for failures of a single oracle call. Each one consumes an attempt. */
export class OracleError extends LabelNormalizerError {}

export class OracleTimeoutError extends OracleError {
  constructor(readonly timeoutMs: number) {
    super(`Decision oracle did not answer within ${timeoutMs}ms`)
  }
}

export class OracleMalformedResponseError extends OracleError {
  constructor(message: string, readonly raw?: string) {
    super(message)
  }
}

export class UniquenessConflictError extends LabelNormalizerError {
  constructor(readonly label: string, readonly count: number) {
    super(`Label "${label}" is already assigned ${count} time(s) in this document`)
  }
}

export class FieldResolutionFailedError extends LabelNormalizerError {
  constructor(
    readonly fieldIndex: number,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      `Field ${fieldIndex} unresolved after ${attempts} attempt(s): ${toErrorMessage(options?.cause)}`,
      options
    )
  }
}

export class CorpusWriteConflictError extends LabelNormalizerError {
  constructor(readonly path: string, readonly attempt: number, options?: { cause?: unknown }) {
    super(`Corpus write to ${path} failed on attempt ${attempt}: ${toErrorMessage(options?.cause)}`, options)
  }
}

export class CorpusStorageUnavailableError extends LabelNormalizerError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Corpus storage unavailable at ${path}`, options)
  }
}

export class FieldSourceError extends LabelNormalizerError {
  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options)
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  if (err === undefined) return 'unknown error'
  return String(err)
}
