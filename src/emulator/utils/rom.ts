/**
 * ROM Utilities
 *
 * NES ROM header validation, ROM description and SHA256 hashing.
 */

import type { RomInfo } from '../cores/EmulatorCore';

export interface INesHeader {
  prgBanks: number;     // Number of PRG-ROM banks (16KB each)
  chrBanks: number;     // Number of CHR-ROM banks (8KB each)
  mapper: number;       // Mapper number
  hasBattery: boolean;  // Battery-backed PRG RAM
  hasTrainer: boolean;  // 512-byte trainer at 0x7000-0x71FF
  isNES2_0: boolean;    // NES 2.0 format
}

const INES_MAGIC = [0x4e, 0x45, 0x53, 0x1a];

const MAPPER_NAMES: Record<number, string> = {
  0: 'NROM',
  1: 'MMC1',
  2: 'UNROM',
  3: 'CNROM',
  4: 'MMC3',
  7: 'AxROM',
  9: 'MMC2',
  10: 'MMC4',
  11: 'Color Dreams',
  66: 'GxROM',
};

/**
 * Parse iNES header from ROM bytes
 * @throws Error if the magic bytes are missing
 */
export function parseINesHeader(bytes: Uint8Array): INesHeader {
  if (bytes.length < 16) {
    throw new Error('ROM too small for iNES header (minimum 16 bytes required)');
  }

  const magic = Array.from(bytes.subarray(0, 4));
  if (magic.some((b, i) => b !== INES_MAGIC[i])) {
    const magicHex = magic.map(b => '0x' + b.toString(16).padStart(2, '0')).join(' ');
    throw new Error(`Invalid NES header magic bytes: ${magicHex} (expected: 0x4E 0x45 0x53 0x1A)`);
  }

  const flags6 = bytes[6];
  const flags7 = bytes[7];

  return {
    prgBanks: bytes[4],
    chrBanks: bytes[5],
    mapper: (flags6 >> 4) | (flags7 & 0xf0),
    hasBattery: (flags6 & 0x02) !== 0,
    hasTrainer: (flags6 & 0x04) !== 0,
    isNES2_0: (flags7 & 0x0c) === 0x08,
  };
}

export function mapperName(mapper: number): string {
  return MAPPER_NAMES[mapper] ?? `Unknown (${mapper})`;
}

/**
 * Validate NES ROM format and structure
 * @throws Error if ROM is invalid
 */
export function validateNESRom(bytes: Uint8Array): RomInfo {
  const header = parseINesHeader(bytes);

  if (header.prgBanks === 0) {
    throw new Error('Invalid ROM: PRG-ROM bank count cannot be zero');
  }

  let minSize = 16; // iNES header
  minSize += header.prgBanks * 16384;
  minSize += header.chrBanks * 8192;
  if (header.hasTrainer) {
    minSize += 512;
  }

  if (bytes.length < minSize) {
    throw new Error(
      `ROM too small for declared banks: expected at least ${minSize} bytes, got ${bytes.length} bytes`
    );
  }

  const info: RomInfo = {
    size: bytes.length,
    mapper: header.mapper,
    mapperName: mapperName(header.mapper),
    prgBanks: header.prgBanks,
    chrBanks: header.chrBanks,
    hasBattery: header.hasBattery,
    hasTrainer: header.hasTrainer,
  };

  console.log('[ROM] ROM validation passed:', { ...info, isNES2_0: header.isNES2_0 });

  if (header.mapper > 4 && header.mapper !== 7) {
    console.warn(`[ROM] Advanced mapper ${header.mapper} - may require specialized emulator support`);
  }

  return info;
}

/** Multi-line summary for the ROM info panel. */
export function describeRom(info: RomInfo, fileName?: string): string {
  const lines = [
    fileName ? `File name: ${fileName}` : null,
    `Mapper: ${info.mapper} (${info.mapperName})`,
    `File size: ${info.size} bytes`,
    `PRG-ROM banks: ${info.prgBanks}`,
    info.chrBanks === 0 ? 'CHR: RAM' : `CHR-ROM banks: ${info.chrBanks}`,
    info.hasBattery ? 'Battery-backed RAM' : null,
  ];
  return lines.filter((line): line is string => line !== null).join('\n');
}

/**
 * Compute SHA256 hash of ROM data
 * @returns hex-encoded SHA256 hash
 */
export async function sha256(bytes: Uint8Array): Promise<string> {
  const hashBuffer = await crypto.subtle.digest('SHA-256', bytes.slice());
  return Array.from(new Uint8Array(hashBuffer))
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}
