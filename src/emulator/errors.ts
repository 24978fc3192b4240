/**
 * Error taxonomy for the host shell.
 *
 * Storage failures are not thrown: they arrive as `failed` results from the
 * StorageBridge. Everything here is thrown synchronously by the component
 * that detects it.
 */

export type EmulatorErrorCode =
  | 'STORAGE_CONTRACT'
  | 'ROM_ERROR'
  | 'STATE_ERROR'
  | 'CORE_STEP'
  | 'CORE_HALTED'
  | 'NO_ROM';

export class EmulatorError extends Error {
  readonly code: EmulatorErrorCode;

  constructor(code: EmulatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmulatorError';
    this.code = code;
  }
}

/** A caller broke the storage contract (duplicate request, unknown handle). */
export class StorageContractError extends EmulatorError {
  constructor(message: string) {
    super('STORAGE_CONTRACT', message);
    this.name = 'StorageContractError';
  }
}

export class RomError extends EmulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ROM_ERROR', message, options);
    this.name = 'RomError';
  }
}

export class StateError extends EmulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STATE_ERROR', message, options);
    this.name = 'StateError';
  }
}

/** The core threw while stepping. Fatal for the session. */
export class CoreStepError extends EmulatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CORE_STEP', message, options);
    this.name = 'CoreStepError';
  }
}

export class CoreHaltedError extends EmulatorError {
  constructor() {
    super('CORE_HALTED', 'Core halted after a failed step; load a ROM to start a new session');
    this.name = 'CoreHaltedError';
  }
}

export class NoRomError extends EmulatorError {
  constructor(operation: string) {
    super('NO_ROM', `Cannot ${operation}: no ROM loaded`);
    this.name = 'NoRomError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
