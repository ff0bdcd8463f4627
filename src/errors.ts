export const REPAIR_ERROR_CODES = {
  PATH_NOT_FOUND: 'PATH_NOT_FOUND',
  NOT_A_DIRECTORY: 'NOT_A_DIRECTORY',
  INVALID_CONFIG: 'INVALID_CONFIG'
} as const;

export type RepairErrorCode =
  (typeof REPAIR_ERROR_CODES)[keyof typeof REPAIR_ERROR_CODES];

/**
 * Error raised by the repair toolkit. Per-entry failures are caught by the
 * engines and logged; only path validation errors reach the CLI.
 */
export class RepairError extends Error {
  public readonly name = 'RepairError';

  constructor(
    public readonly code: RepairErrorCode,
    message: string,
    public readonly path?: string
  ) {
    super(message);
  }
}

export function isRepairError(error: unknown): error is RepairError {
  return error instanceof RepairError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
