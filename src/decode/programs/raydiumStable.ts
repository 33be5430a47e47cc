/**
 * Raydium Stable Swap Pool Decoder
 * Program: 5quBtoiQqxF9Jv6KYKctB59NT3gtJD2Y65kdnB1Uev3h
 *
 * Borsh-serialized, no discriminator.
 *
 * Layout (>= 315 bytes):
 *   [0]        isInitialized (bool)
 *   [1]        isPaused (bool)
 *   [2]        nonce (u8)
 *   [3..11]    initialAmpFactor (u64)
 *   [11..19]   targetAmpFactor (u64)
 *   [19..27]   startRampTs (i64)
 *   [27..35]   stopRampTs (i64)
 *   [35..43]   futureAdminDeadline (i64)
 *   [43..75]   futureAdminAccount (pubkey)
 *   [75..107]  adminAccount (pubkey)
 *   [107..139] tokenMintA (pubkey)
 *   [139..171] tokenMintB (pubkey)
 *   [171..203] tokenAccountA (pubkey)
 *   [203..235] tokenAccountB (pubkey)
 *   [235..267] poolMint (pubkey)
 *   [267..299] adminFee accounts (unused here)
 *   [299..307] tradeFeeNumerator (u64)
 *   [307..315] tradeFeeDenominator (u64)
 */

import type { PublicKey } from '@solana/web3.js';
import { DecodeError } from '../../errors.js';
import { PoolVariant } from '../../types.js';
import { readPubkey, viewOf } from '../layout.js';

export const STABLE_MIN_SIZE = 315;

export const STABLE_MINT_OFFSETS = { tokenA: 107, tokenB: 139 } as const;

export interface StableLayout {
    nonce: number;
    initialAmp: bigint;
    targetAmp: bigint;
    /** Unix seconds */
    startRampTs: bigint;
    stopRampTs: bigint;
    tokenMintA: PublicKey;
    tokenMintB: PublicKey;
    tokenAccountA: PublicKey;
    tokenAccountB: PublicKey;
    poolMint: PublicKey;
    tradeFeeNumerator: bigint;
    tradeFeeDenominator: bigint;
}

/**
 * Decode stable pool account
 * @throws DecodeError when too short, not initialized, paused or fee denominator is zero
 */
export function decodeRaydiumStablePool(data: Uint8Array, address?: string): StableLayout {
    if (data.length < STABLE_MIN_SIZE) {
        throw new DecodeError(PoolVariant.Stabilized, `stable account must be >= ${STABLE_MIN_SIZE} bytes, got ${data.length}`, address);
    }

    const view = viewOf(data);
    if (view.getUint8(0) !== 1) {
        throw new DecodeError(PoolVariant.Stabilized, 'stable pool is not initialized', address);
    }
    if (view.getUint8(1) !== 0) {
        throw new DecodeError(PoolVariant.Stabilized, 'stable pool is paused', address);
    }

    const tradeFeeDenominator = view.getBigUint64(307, true);
    if (tradeFeeDenominator === 0n) {
        throw new DecodeError(PoolVariant.Stabilized, 'trade fee denominator is zero', address);
    }

    return {
        nonce: view.getUint8(2),
        initialAmp: view.getBigUint64(3, true),
        targetAmp: view.getBigUint64(11, true),
        startRampTs: view.getBigInt64(19, true),
        stopRampTs: view.getBigInt64(27, true),
        tokenMintA: readPubkey(data, STABLE_MINT_OFFSETS.tokenA),
        tokenMintB: readPubkey(data, STABLE_MINT_OFFSETS.tokenB),
        tokenAccountA: readPubkey(data, 171),
        tokenAccountB: readPubkey(data, 203),
        poolMint: readPubkey(data, 235),
        tradeFeeNumerator: view.getBigUint64(299, true),
        tradeFeeDenominator,
    };
}

/**
 * Amplification at `nowSecs`, linear between initial and target across the ramp
 */
export function currentAmp(layout: StableLayout, nowSecs: bigint): bigint {
    const { initialAmp, targetAmp, startRampTs, stopRampTs } = layout;
    if (nowSecs >= stopRampTs || stopRampTs <= startRampTs) return targetAmp;
    if (nowSecs <= startRampTs) return initialAmp;

    const elapsed = nowSecs - startRampTs;
    const duration = stopRampTs - startRampTs;
    if (targetAmp >= initialAmp) {
        return initialAmp + ((targetAmp - initialAmp) * elapsed) / duration;
    }
    return initialAmp - ((initialAmp - targetAmp) * elapsed) / duration;
}
