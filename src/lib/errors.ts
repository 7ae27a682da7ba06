export type PipelineErrorKind = 'schema' | 'empty' | 'merge' | 'config'

/** Fatal pipeline failure. Never caught inside the core; the CLI exits non-zero. */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind

  constructor(kind: PipelineErrorKind, message: string) {
    super(message)
    this.name = 'PipelineError'
    this.kind = kind
  }
}
