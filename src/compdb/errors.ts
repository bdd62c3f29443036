/**
 * Error kinds raised by the compilation database generator
 */

export type CompdbErrorKind =
  | 'BuildDirMissing'
  | 'WalkFailed'
  | 'StreamUnreadable'
  | 'NotASourceCommand'
  | 'PathNotFound'
  | 'ParentMissing'
  | 'NoCaseMatch'
  | 'MalformedInclude'
  | 'WriteFailed';

export interface CompdbErrorOptions {
  /** File or directory the failure is about */
  path?: string;
  cause?: unknown;
}

export class CompdbError extends Error {
  readonly kind: CompdbErrorKind;
  readonly path?: string;

  constructor(kind: CompdbErrorKind, message: string, options: CompdbErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CompdbError';
    this.kind = kind;
    this.path = options.path;
  }
}

/**
 * Message of an unknown thrown value, for wrapping filesystem failures
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
