import { describe, it, expect } from 'vitest';

import { parseArgs } from './cliArgs';

describe('parseArgs', () => {
  it('should return nothing for no arguments', () => {
    expect(parseArgs([])).toEqual({});
  });

  it('should parse flags', () => {
    expect(parseArgs(['--rom', 'game.nes', '--fps', '50', '--cap', '4', '--no-audio'])).toEqual({
      romPath: 'game.nes',
      fps: 50,
      catchUpCap: 4,
      audio: { enabled: false },
    });
  });

  it('should take a bare argument as the ROM path', () => {
    expect(parseArgs(['game.nes'])).toEqual({ romPath: 'game.nes' });
  });

  it('should reject a flag without a value', () => {
    expect(() => parseArgs(['--fps'])).toThrow('Missing value for --fps');
    expect(() => parseArgs(['--rom', '--no-audio'])).toThrow('Missing value for --rom');
  });

  it('should reject unknown flags and a second ROM path', () => {
    expect(() => parseArgs(['--turbo'])).toThrow('Unknown argument: --turbo');
    expect(() => parseArgs(['a.nes', 'b.nes'])).toThrow('Unknown argument: b.nes');
  });
});
