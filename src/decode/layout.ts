/**
 * Little-endian field readers shared by the account decoders
 */

import { PublicKey } from '@solana/web3.js';

export function viewOf(data: Uint8Array): DataView {
    return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

export function readU128LE(view: DataView, offset: number): bigint {
    const lo = view.getBigUint64(offset, true);
    const hi = view.getBigUint64(offset + 8, true);
    return lo + (hi << 64n);
}

/** Two's complement i128 */
export function readI128LE(view: DataView, offset: number): bigint {
    const unsigned = readU128LE(view, offset);
    return unsigned >= 1n << 127n ? unsigned - (1n << 128n) : unsigned;
}

export function readPubkey(data: Uint8Array, offset: number): PublicKey {
    return new PublicKey(data.subarray(offset, offset + 32));
}

export function hasDiscriminator(data: Uint8Array, disc: Uint8Array): boolean {
    if (data.length < disc.length) return false;
    for (let i = 0; i < disc.length; i++) {
        if (data[i] !== disc[i]) return false;
    }
    return true;
}

export function fromHex(value: string): Uint8Array {
    return Uint8Array.from(Buffer.from(value, 'hex'));
}

export function writeU128LE(buf: Buffer, value: bigint, offset: number): void {
    buf.writeBigUInt64LE(value & 0xffffffffffffffffn, offset);
    buf.writeBigUInt64LE(value >> 64n, offset + 8);
}
