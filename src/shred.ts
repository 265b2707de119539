/**
 * Shred header parsing. Only the common header prefix is read; the payload
 * after it is opaque here.
 */

import {
  LEGACY_CODE_VARIANT,
  LEGACY_DATA_VARIANT,
  SHRED_FEC_SET_INDEX_OFFSET,
  SHRED_HEADER_LENGTH,
  SHRED_INDEX_OFFSET,
  SHRED_SLOT_OFFSET,
  SHRED_VARIANT_OFFSET,
  SHRED_VERSION_OFFSET,
} from './constants.js';
import { MalformedPacketError } from './errors.js';
import type { ShredHeader, ShredIdentity, ShredKind } from './types.js';

const MERKLE_CODE_NIBBLES = new Set([0x4, 0x6, 0x7]);
const MERKLE_DATA_NIBBLES = new Set([0x8, 0x9, 0xb]);

/** Maps the variant byte to a shred kind, or undefined for an unknown variant. */
export function shredKindOf(variant: number): ShredKind | undefined {
  if (variant === LEGACY_DATA_VARIANT) return 'data';
  if (variant === LEGACY_CODE_VARIANT) return 'code';
  const nibble = variant >> 4;
  if (MERKLE_DATA_NIBBLES.has(nibble)) return 'data';
  if (MERKLE_CODE_NIBBLES.has(nibble)) return 'code';
  return undefined;
}

/**
 * Parses the common shred header.
 * Throws MalformedPacketError when the packet is shorter than the header or the variant is unknown.
 */
export function parseShredHeader(bytes: Uint8Array): ShredHeader {
  if (bytes.byteLength < SHRED_HEADER_LENGTH) {
    throw new MalformedPacketError(
      `packet of ${bytes.byteLength} bytes is shorter than the ${SHRED_HEADER_LENGTH}-byte shred header`,
      bytes.byteLength
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, SHRED_HEADER_LENGTH);
  const variant = view.getUint8(SHRED_VARIANT_OFFSET);
  const kind = shredKindOf(variant);
  if (kind === undefined) {
    throw new MalformedPacketError(
      `unknown shred variant 0x${variant.toString(16).padStart(2, '0')}`,
      bytes.byteLength
    );
  }
  return {
    identity: {
      slot: view.getBigUint64(SHRED_SLOT_OFFSET, true),
      index: view.getUint32(SHRED_INDEX_OFFSET, true),
    },
    kind,
    version: view.getUint16(SHRED_VERSION_OFFSET, true),
    fecSetIndex: view.getUint32(SHRED_FEC_SET_INDEX_OFFSET, true),
  };
}

/**
 * Map key for a shred. Data and coding shreds share index ranges within a slot,
 * so the kind is part of the key.
 */
export function identityKey(identity: ShredIdentity, kind: ShredKind): string {
  return `${identity.slot}:${identity.index}:${kind}`;
}

export function formatIdentity(identity: ShredIdentity): string {
  return `slot=${identity.slot} index=${identity.index}`;
}

export interface ShredPacketOptions {
  slot: bigint;
  index: number;
  kind?: ShredKind;
  version?: number;
  fecSetIndex?: number;
  /** Opaque bytes appended after the header. */
  payloadLength?: number;
}

/** Builds a datagram with a legacy-variant common header (demo traffic and tests). */
export function buildShredPacket(options: ShredPacketOptions): Buffer {
  const packet = Buffer.alloc(SHRED_HEADER_LENGTH + (options.payloadLength ?? 0));
  packet.writeUInt8(
    options.kind === 'code' ? LEGACY_CODE_VARIANT : LEGACY_DATA_VARIANT,
    SHRED_VARIANT_OFFSET
  );
  packet.writeBigUInt64LE(options.slot, SHRED_SLOT_OFFSET);
  packet.writeUInt32LE(options.index, SHRED_INDEX_OFFSET);
  packet.writeUInt16LE(options.version ?? 0, SHRED_VERSION_OFFSET);
  packet.writeUInt32LE(options.fecSetIndex ?? 0, SHRED_FEC_SET_INDEX_OFFSET);
  return packet;
}
