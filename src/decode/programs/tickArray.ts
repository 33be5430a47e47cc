/**
 * Raydium CLMM TickArray Decoder
 * Program: CAMMCzo5YL8w4VFF8KVHrK22GGUsp5VTaW7grrKgrWqK
 *
 * Discriminator: c09b55cd31f9812a
 * Size: 10124 bytes (header 44 + 60 ticks × 168 bytes)
 *
 * Layout:
 *   [0..8]    discriminator
 *   [8..40]   poolId (pubkey)
 *   [40..44]  startTickIndex (i32)
 *   [44..]    ticks array (60 × 168 bytes)
 *
 * Tick layout (168 bytes):
 *   [0..4]    tick (i32)
 *   [4..20]   liquidityNet (i128)
 *   [20..36]  liquidityGross (u128)
 *   [36..168] fee and reward growth (unused here)
 */

import { PublicKey } from '@solana/web3.js';
import { DecodeError } from '../../errors.js';
import { fromHex, hasDiscriminator, readI128LE, readPubkey, readU128LE, viewOf } from '../layout.js';

export const TICK_ARRAY_DISCRIMINATOR = fromHex('c09b55cd31f9812a');
export const TICK_ARRAY_SIZE = 10124;
export const TICKS_PER_ARRAY = 60;
export const TICK_SIZE = 168;
const TICKS_OFFSET = 44;

const TICK_ARRAY_SEED = Buffer.from('tick_array');

export interface Tick {
    tick: number;
    liquidityNet: bigint;
    liquidityGross: bigint;
}

export interface TickArray {
    poolId: PublicKey;
    startTickIndex: number;
    /** Initialized ticks only (liquidityGross > 0), ascending */
    ticks: Tick[];
}

export function isTickArray(data: Uint8Array): boolean {
    return data.length === TICK_ARRAY_SIZE && hasDiscriminator(data, TICK_ARRAY_DISCRIMINATOR);
}

/**
 * Decode TickArray account
 * @throws DecodeError on size/discriminator mismatch
 */
export function decodeTickArray(data: Uint8Array, address?: string): TickArray {
    if (!isTickArray(data)) {
        throw new DecodeError('tickArray', `expected ${TICK_ARRAY_SIZE}-byte tick array, got ${data.length} bytes`, address);
    }

    const view = viewOf(data);
    const ticks: Tick[] = [];

    for (let i = 0; i < TICKS_PER_ARRAY; i++) {
        const base = TICKS_OFFSET + i * TICK_SIZE;
        const liquidityGross = readU128LE(view, base + 20);
        if (liquidityGross === 0n) continue;
        ticks.push({
            tick: view.getInt32(base, true),
            liquidityNet: readI128LE(view, base + 4),
            liquidityGross,
        });
    }

    return {
        poolId: readPubkey(data, 8),
        startTickIndex: view.getInt32(40, true),
        ticks,
    };
}

export function getTicksPerArray(tickSpacing: number): number {
    return TICKS_PER_ARRAY * tickSpacing;
}

/**
 * Get the TickArray start index that contains a given tick
 */
export function getTickArrayStartIndex(tickIndex: number, tickSpacing: number): number {
    const ticksPerArray = getTicksPerArray(tickSpacing);
    return Math.floor(tickIndex / ticksPerArray) * ticksPerArray;
}

/**
 * Start indexes of the current array and `radius` arrays on each side, ascending
 */
export function tickArrayStartIndexes(tickCurrent: number, tickSpacing: number, radius: number): number[] {
    const ticksPerArray = getTicksPerArray(tickSpacing);
    const center = getTickArrayStartIndex(tickCurrent, tickSpacing);
    const out: number[] = [];
    for (let offset = -radius; offset <= radius; offset++) {
        out.push(center + offset * ticksPerArray);
    }
    return out;
}

/**
 * PDA: ["tick_array", pool, startTickIndex as i32 big-endian]
 */
export function deriveTickArrayAddress(programId: PublicKey, pool: PublicKey, startTickIndex: number): PublicKey {
    const index = Buffer.alloc(4);
    index.writeInt32BE(startTickIndex, 0);
    const [address] = PublicKey.findProgramAddressSync([TICK_ARRAY_SEED, pool.toBuffer(), index], programId);
    return address;
}
