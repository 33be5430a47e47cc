/**
 * Raydium AMM V4 Pool Decoder
 * Program: 675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSUt1Mp8
 *
 * Native program (no Anchor discriminator).
 * Identified by: owner + exact size 752 bytes
 *
 * Layout (752 bytes):
 *   [0..8]     status (u64)
 *   [8..16]    nonce (u64)
 *   [32..40]   baseDecimal (u64)
 *   [40..48]   quoteDecimal (u64)
 *   [176..184] swapFeeNumerator (u64)
 *   [184..192] swapFeeDenominator (u64)
 *   [192..200] baseNeedTakePnl (u64)
 *   [200..208] quoteNeedTakePnl (u64)
 *   [336..368] baseVault (pubkey)
 *   [368..400] quoteVault (pubkey)
 *   [400..432] baseMint (pubkey)
 *   [432..464] quoteMint (pubkey)
 *   [464..496] lpMint (pubkey)
 *   [496..528] openOrders (pubkey)
 *   [528..560] market (pubkey)
 *   [592..624] targetOrders (pubkey)
 */

import type { PublicKey } from '@solana/web3.js';
import { DecodeError } from '../../errors.js';
import { PoolVariant } from '../../types.js';
import { readPubkey, viewOf } from '../layout.js';

export const AMM_V4_SIZE = 752;

export const AMM_V4_MINT_OFFSETS = { base: 400, quote: 432 } as const;

export interface AmmV4Layout {
    status: bigint;
    nonce: number;
    baseDecimal: number;
    quoteDecimal: number;
    swapFeeNumerator: bigint;
    swapFeeDenominator: bigint;
    baseNeedTakePnl: bigint;
    quoteNeedTakePnl: bigint;
    baseVault: PublicKey;
    quoteVault: PublicKey;
    baseMint: PublicKey;
    quoteMint: PublicKey;
    lpMint: PublicKey;
    openOrders: PublicKey;
    market: PublicKey;
    targetOrders: PublicKey;
}

export function isRaydiumV4Pool(data: Uint8Array): boolean {
    return data.length === AMM_V4_SIZE;
}

/**
 * Decode Raydium V4 pool account
 * @throws DecodeError on wrong size, uninitialized status or decimals > 18
 */
export function decodeRaydiumV4Pool(data: Uint8Array, address?: string): AmmV4Layout {
    if (!isRaydiumV4Pool(data)) {
        throw new DecodeError(PoolVariant.ConstantProduct, `AMM V4 account must be ${AMM_V4_SIZE} bytes, got ${data.length}`, address);
    }

    const view = viewOf(data);

    const status = view.getBigUint64(0, true);
    if (status === 0n) {
        throw new DecodeError(PoolVariant.ConstantProduct, 'AMM V4 pool is not initialized', address);
    }

    const baseDecimalU64 = view.getBigUint64(32, true);
    const quoteDecimalU64 = view.getBigUint64(40, true);
    if (baseDecimalU64 > 18n || quoteDecimalU64 > 18n) {
        throw new DecodeError(PoolVariant.ConstantProduct, `decimals out of range (${baseDecimalU64}/${quoteDecimalU64})`, address);
    }

    const swapFeeDenominator = view.getBigUint64(184, true);
    if (swapFeeDenominator === 0n) {
        throw new DecodeError(PoolVariant.ConstantProduct, 'swap fee denominator is zero', address);
    }

    return {
        status,
        nonce: Number(view.getBigUint64(8, true)),
        baseDecimal: Number(baseDecimalU64),
        quoteDecimal: Number(quoteDecimalU64),
        swapFeeNumerator: view.getBigUint64(176, true),
        swapFeeDenominator,
        baseNeedTakePnl: view.getBigUint64(192, true),
        quoteNeedTakePnl: view.getBigUint64(200, true),
        baseVault: readPubkey(data, 336),
        quoteVault: readPubkey(data, 368),
        baseMint: readPubkey(data, AMM_V4_MINT_OFFSETS.base),
        quoteMint: readPubkey(data, AMM_V4_MINT_OFFSETS.quote),
        lpMint: readPubkey(data, 464),
        openOrders: readPubkey(data, 496),
        market: readPubkey(data, 528),
        targetOrders: readPubkey(data, 592),
    };
}
