export type WheelErrorKind =
  | 'ConfigurationIncompatible'
  | 'SourceReadFailure'
  | 'BuildCommandFailed'
  | 'DuplicateArchivePath'
  | 'ArchiveWriteFailure';

/** JSON-RPC error codes reported for each failure kind. */
export const ERROR_CODES: Record<WheelErrorKind, number> = {
  ConfigurationIncompatible: -32010,
  SourceReadFailure: -32011,
  BuildCommandFailed: -32012,
  DuplicateArchivePath: -32013,
  ArchiveWriteFailure: -32014,
};

/** Fatal build failure. Every kind aborts the build; none is downgraded to a warning. */
export class WheelBuildError extends Error {
  readonly code: number;

  constructor(
    public readonly kind: WheelErrorKind,
    message: string,
    public readonly data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'WheelBuildError';
    this.code = ERROR_CODES[kind];
  }
}

export function isWheelBuildError(err: unknown, kind?: WheelErrorKind): err is WheelBuildError {
  return err instanceof WheelBuildError && (kind === undefined || err.kind === kind);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
