/**
 * Raydium CP-Swap Pool Decoder
 * Program: CPMDWBwJDtYax9qW7AyRuVC19Cc4L4Vcy4n2BHAbHkCW
 *
 * Anchor discriminator: f7ede3f5d7c3de46 (same as CLMM PoolState, owner decides)
 *
 * Layout (637 bytes):
 *   [0..8]     discriminator
 *   [8..40]    ammConfig (pubkey)
 *   [40..72]   poolCreator (pubkey)
 *   [72..104]  token0Vault (pubkey)
 *   [104..136] token1Vault (pubkey)
 *   [136..168] lpMint (pubkey)
 *   [168..200] token0Mint (pubkey)
 *   [200..232] token1Mint (pubkey)
 *   [232..264] token0Program (pubkey)
 *   [264..296] token1Program (pubkey)
 *   [296..328] observationKey (pubkey)
 *   [328]      authBump (u8)
 *   [329]      status (u8)
 *   [330]      lpMintDecimals (u8)
 *   [331]      mint0Decimals (u8)
 *   [332]      mint1Decimals (u8)
 *   [333..341] lpSupply (u64)
 *   [341..357] protocolFeesToken0/1 (u64 × 2)
 *   [357..373] fundFeesToken0/1 (u64 × 2)
 *   [373..381] openTime (u64)
 *
 * AmmConfig (discriminator daf42168cbcb2b6f):
 *   [8]        bump (u8)
 *   [9]        disableCreatePool (bool)
 *   [10..12]   index (u16)
 *   [12..20]   tradeFeeRate (u64, 1e-6)
 *   [20..28]   protocolFeeRate (u64)
 *   [28..36]   fundFeeRate (u64)
 */

import type { PublicKey } from '@solana/web3.js';
import { DecodeError } from '../../errors.js';
import { PoolVariant } from '../../types.js';
import { fromHex, hasDiscriminator, readPubkey, viewOf } from '../layout.js';

export const CP_SWAP_POOL_DISCRIMINATOR = fromHex('f7ede3f5d7c3de46');
export const CP_SWAP_CONFIG_DISCRIMINATOR = fromHex('daf42168cbcb2b6f');

export const CP_SWAP_POOL_SIZE = 637;
const CONFIG_MIN_SIZE = 36;

export const CP_SWAP_MINT_OFFSETS = { token0: 168, token1: 200 } as const;

/** Status bit 2 disables swaps */
const STATUS_SWAP_DISABLED = 1 << 2;

export interface CpSwapLayout {
    ammConfig: PublicKey;
    poolCreator: PublicKey;
    token0Vault: PublicKey;
    token1Vault: PublicKey;
    lpMint: PublicKey;
    token0Mint: PublicKey;
    token1Mint: PublicKey;
    token0Program: PublicKey;
    token1Program: PublicKey;
    observationKey: PublicKey;
    authBump: number;
    status: number;
    lpMintDecimals: number;
    mint0Decimals: number;
    mint1Decimals: number;
    lpSupply: bigint;
    protocolFeesToken0: bigint;
    protocolFeesToken1: bigint;
    fundFeesToken0: bigint;
    fundFeesToken1: bigint;
    openTime: bigint;
}

export interface CpSwapAmmConfig {
    index: number;
    /** Millionths */
    tradeFeeRate: bigint;
    protocolFeeRate: bigint;
    fundFeeRate: bigint;
}

export function isRaydiumCpSwapPool(data: Uint8Array): boolean {
    return data.length >= CP_SWAP_POOL_SIZE && hasDiscriminator(data, CP_SWAP_POOL_DISCRIMINATOR);
}

/**
 * Decode CP-Swap pool account
 * @throws DecodeError on size/discriminator mismatch, bad decimals or swaps disabled
 */
export function decodeRaydiumCpSwapPool(data: Uint8Array, address?: string): CpSwapLayout {
    if (!hasDiscriminator(data, CP_SWAP_POOL_DISCRIMINATOR)) {
        throw new DecodeError(PoolVariant.ConstantProduct, 'CP-Swap discriminator mismatch', address);
    }
    if (data.length < CP_SWAP_POOL_SIZE) {
        throw new DecodeError(PoolVariant.ConstantProduct, `CP-Swap account must be >= ${CP_SWAP_POOL_SIZE} bytes, got ${data.length}`, address);
    }

    const view = viewOf(data);
    const status = view.getUint8(329);
    const mint0Decimals = view.getUint8(331);
    const mint1Decimals = view.getUint8(332);

    if (mint0Decimals > 18 || mint1Decimals > 18) {
        throw new DecodeError(PoolVariant.ConstantProduct, `decimals out of range (${mint0Decimals}/${mint1Decimals})`, address);
    }
    if ((status & STATUS_SWAP_DISABLED) !== 0) {
        throw new DecodeError(PoolVariant.ConstantProduct, `swaps disabled (status ${status})`, address);
    }

    return {
        ammConfig: readPubkey(data, 8),
        poolCreator: readPubkey(data, 40),
        token0Vault: readPubkey(data, 72),
        token1Vault: readPubkey(data, 104),
        lpMint: readPubkey(data, 136),
        token0Mint: readPubkey(data, CP_SWAP_MINT_OFFSETS.token0),
        token1Mint: readPubkey(data, CP_SWAP_MINT_OFFSETS.token1),
        token0Program: readPubkey(data, 232),
        token1Program: readPubkey(data, 264),
        observationKey: readPubkey(data, 296),
        authBump: view.getUint8(328),
        status,
        lpMintDecimals: view.getUint8(330),
        mint0Decimals,
        mint1Decimals,
        lpSupply: view.getBigUint64(333, true),
        protocolFeesToken0: view.getBigUint64(341, true),
        protocolFeesToken1: view.getBigUint64(349, true),
        fundFeesToken0: view.getBigUint64(357, true),
        fundFeesToken1: view.getBigUint64(365, true),
        openTime: view.getBigUint64(373, true),
    };
}

export function decodeCpSwapAmmConfig(data: Uint8Array, address?: string): CpSwapAmmConfig {
    if (data.length < CONFIG_MIN_SIZE || !hasDiscriminator(data, CP_SWAP_CONFIG_DISCRIMINATOR)) {
        throw new DecodeError('config', 'not a CP-Swap AmmConfig account', address);
    }
    const view = viewOf(data);
    return {
        index: view.getUint16(10, true),
        tradeFeeRate: view.getBigUint64(12, true),
        protocolFeeRate: view.getBigUint64(20, true),
        fundFeeRate: view.getBigUint64(28, true),
    };
}

/**
 * Spendable reserves: vault balances minus fees owed to protocol and fund
 */
export function cpSwapReserves(layout: CpSwapLayout, vault0: bigint, vault1: bigint): [bigint, bigint] {
    const r0 = vault0 - layout.protocolFeesToken0 - layout.fundFeesToken0;
    const r1 = vault1 - layout.protocolFeesToken1 - layout.fundFeesToken1;
    return [r0 > 0n ? r0 : 0n, r1 > 0n ? r1 : 0n];
}
