/**
 * Save-state envelope.
 *
 * Binary format:
 *   [4 bytes: magic "RHST" = 0x52, 0x48, 0x53, 0x54]
 *   [4 bytes: envelope version = 1, little-endian uint32]
 *   [2 bytes: core id length N, little-endian uint16]
 *   [N bytes: core id, UTF-8]
 *   [4 bytes: core state version, little-endian uint32]
 *   [rest:    core state bytes, opaque]
 */

import { StateError } from '../errors';

/** Magic bytes identifying a save state. */
const MAGIC = new Uint8Array([0x52, 0x48, 0x53, 0x54]); // "RHST"

/** Current envelope version. */
const ENVELOPE_VERSION = 1;

export interface SaveStateEnvelope {
  coreId: string;
  stateVersion: number;
  payload: Uint8Array;
}

export function encodeSaveState({ coreId, stateVersion, payload }: SaveStateEnvelope): Uint8Array {
  const idBytes = new TextEncoder().encode(coreId);
  const headerSize = 4 + 4 + 2 + idBytes.byteLength + 4;
  const blob = new Uint8Array(headerSize + payload.byteLength);
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);

  blob.set(MAGIC, 0);
  view.setUint32(4, ENVELOPE_VERSION, true);
  view.setUint16(8, idBytes.byteLength, true);
  blob.set(idBytes, 10);
  view.setUint32(10 + idBytes.byteLength, stateVersion, true);
  blob.set(payload, headerSize);

  return blob;
}

/**
 * @throws StateError when the blob is not a save state of this envelope version
 */
export function decodeSaveState(blob: Uint8Array): SaveStateEnvelope {
  if (blob.byteLength < 14) {
    throw new StateError('Invalid save state: too short');
  }

  for (let i = 0; i < MAGIC.length; i++) {
    if (blob[i] !== MAGIC[i]) {
      throw new StateError('Invalid save state: bad magic bytes');
    }
  }

  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  const version = view.getUint32(4, true);
  if (version !== ENVELOPE_VERSION) {
    throw new StateError(`Unsupported save state version: ${version}`);
  }

  const idLength = view.getUint16(8, true);
  const headerSize = 10 + idLength + 4;
  if (blob.byteLength < headerSize) {
    throw new StateError('Invalid save state: truncated header');
  }

  return {
    coreId: new TextDecoder().decode(blob.subarray(10, 10 + idLength)),
    stateVersion: view.getUint32(10 + idLength, true),
    payload: blob.slice(headerSize),
  };
}
