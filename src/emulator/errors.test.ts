import { describe, it, expect } from 'vitest';

import { CoreHaltedError, EmulatorError, NoRomError, RomError, StorageContractError, errorMessage } from './errors';

describe('errors', () => {
  it('should carry a code and a name per kind', () => {
    const error = new RomError('bad header', { cause: new Error('inner') });

    expect(error).toBeInstanceOf(EmulatorError);
    expect(error.code).toBe('ROM_ERROR');
    expect(error.name).toBe('RomError');
    expect(errorMessage(error.cause)).toBe('inner');
  });

  it('should describe the operation that needed a ROM', () => {
    expect(new NoRomError('save state').message).toBe('Cannot save state: no ROM loaded');
    expect(new StorageContractError('x').code).toBe('STORAGE_CONTRACT');
    expect(new CoreHaltedError().code).toBe('CORE_HALTED');
  });

  it('should stringify non-errors', () => {
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(404)).toBe('404');
  });
});
