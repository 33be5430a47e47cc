/**
 * Raydium CLMM Pool Decoder
 * Program: CAMMCzo5YL8w4VFF8KVHrK22GGUsp5VTaW7grrKgrWqK
 *
 * Anchor discriminator: f7ede3f5d7c3de46
 *
 * Layout (1544 bytes):
 *   [0..8]     discriminator
 *   [8]        bump
 *   [9..41]    ammConfig (pubkey)
 *   [73..105]  tokenMint0 (pubkey)
 *   [105..137] tokenMint1 (pubkey)
 *   [137..169] tokenVault0 (pubkey)
 *   [169..201] tokenVault1 (pubkey)
 *   [201..233] observationKey (pubkey)
 *   [233]      mintDecimals0 (u8)
 *   [234]      mintDecimals1 (u8)
 *   [235..237] tickSpacing (u16)
 *   [237..253] liquidity (u128)
 *   [253..269] sqrtPriceX64 (u128)
 *   [269..273] tickCurrent (i32)
 *   [389]      status (u8)
 *
 * AmmConfig:
 *   [8]        bump (u8)
 *   [9..11]    index (u16)
 *   [11..43]   owner (pubkey)
 *   [43..47]   protocolFeeRate (u32)
 *   [47..51]   tradeFeeRate (u32, 1e-6)
 *   [51..53]   tickSpacing (u16)
 */

import type { PublicKey } from '@solana/web3.js';
import { DecodeError } from '../../errors.js';
import { PoolVariant } from '../../types.js';
import { fromHex, hasDiscriminator, readPubkey, readU128LE, viewOf } from '../layout.js';

export const CLMM_POOL_DISCRIMINATOR = fromHex('f7ede3f5d7c3de46');

export const CLMM_POOL_SIZE = 1544;
const CONFIG_MIN_SIZE = 53;

export const CLMM_MINT_OFFSETS = { token0: 73, token1: 105 } as const;

/** Status bit 4 disables swaps */
const STATUS_SWAP_DISABLED = 1 << 4;

export interface ClmmLayout {
    ammConfig: PublicKey;
    tokenMint0: PublicKey;
    tokenMint1: PublicKey;
    tokenVault0: PublicKey;
    tokenVault1: PublicKey;
    observationKey: PublicKey;
    mintDecimals0: number;
    mintDecimals1: number;
    tickSpacing: number;
    liquidity: bigint;
    sqrtPriceX64: bigint;
    tickCurrent: number;
    status: number;
}

export interface ClmmAmmConfig {
    index: number;
    protocolFeeRate: number;
    /** Millionths */
    tradeFeeRate: number;
    tickSpacing: number;
}

export function isRaydiumClmmPool(data: Uint8Array): boolean {
    return data.length >= CLMM_POOL_SIZE && hasDiscriminator(data, CLMM_POOL_DISCRIMINATOR);
}

/**
 * Decode CLMM pool account
 * @throws DecodeError on size/discriminator mismatch, zero tick spacing or swaps disabled
 */
export function decodeRaydiumClmmPool(data: Uint8Array, address?: string): ClmmLayout {
    if (!hasDiscriminator(data, CLMM_POOL_DISCRIMINATOR)) {
        throw new DecodeError(PoolVariant.Concentrated, 'CLMM discriminator mismatch', address);
    }
    if (data.length < CLMM_POOL_SIZE) {
        throw new DecodeError(PoolVariant.Concentrated, `CLMM account must be >= ${CLMM_POOL_SIZE} bytes, got ${data.length}`, address);
    }

    const view = viewOf(data);
    const mintDecimals0 = view.getUint8(233);
    const mintDecimals1 = view.getUint8(234);
    const tickSpacing = view.getUint16(235, true);
    const status = view.getUint8(389);

    if (mintDecimals0 > 18 || mintDecimals1 > 18) {
        throw new DecodeError(PoolVariant.Concentrated, `decimals out of range (${mintDecimals0}/${mintDecimals1})`, address);
    }
    if (tickSpacing === 0) {
        throw new DecodeError(PoolVariant.Concentrated, 'tick spacing is zero', address);
    }
    if ((status & STATUS_SWAP_DISABLED) !== 0) {
        throw new DecodeError(PoolVariant.Concentrated, `swaps disabled (status ${status})`, address);
    }

    return {
        ammConfig: readPubkey(data, 9),
        tokenMint0: readPubkey(data, CLMM_MINT_OFFSETS.token0),
        tokenMint1: readPubkey(data, CLMM_MINT_OFFSETS.token1),
        tokenVault0: readPubkey(data, 137),
        tokenVault1: readPubkey(data, 169),
        observationKey: readPubkey(data, 201),
        mintDecimals0,
        mintDecimals1,
        tickSpacing,
        liquidity: readU128LE(view, 237),
        sqrtPriceX64: readU128LE(view, 253),
        tickCurrent: view.getInt32(269, true),
        status,
    };
}

export function decodeClmmAmmConfig(data: Uint8Array, address?: string): ClmmAmmConfig {
    if (data.length < CONFIG_MIN_SIZE) {
        throw new DecodeError('config', `CLMM AmmConfig must be >= ${CONFIG_MIN_SIZE} bytes, got ${data.length}`, address);
    }
    const view = viewOf(data);
    return {
        index: view.getUint16(9, true),
        protocolFeeRate: view.getUint32(43, true),
        tradeFeeRate: view.getUint32(47, true),
        tickSpacing: view.getUint16(51, true),
    };
}
