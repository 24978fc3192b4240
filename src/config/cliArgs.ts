/**
 * Command-line flags for the native build, shaped as HostConfig input.
 * A bare argument is taken as the ROM path.
 */

import type { HostConfigInput } from './hostConfig';

export function parseArgs(args: string[]): HostConfigInput {
  const cli: HostConfigInput = {};

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--rom':
        cli.romPath = valueOf(arg, args[++i]);
        break;
      case '--fps':
        cli.fps = Number(valueOf(arg, args[++i]));
        break;
      case '--cap':
        cli.catchUpCap = Number(valueOf(arg, args[++i]));
        break;
      case '--no-audio':
        cli.audio = { enabled: false };
        break;
      default:
        if (!arg.startsWith('--') && cli.romPath === undefined) {
          cli.romPath = arg;
        } else {
          throw new Error(`Unknown argument: ${arg}`);
        }
    }
  }
  return cli;
}
