/**
 * SPL Token account decoders (mint decimals and token-account balance)
 *
 * Mint (82 bytes, Token-2022 mints may be longer):
 *   [44]       decimals (u8)
 *   [45]       isInitialized (bool)
 *
 * Token account (165 bytes, Token-2022 may be longer):
 *   [0..32]    mint (pubkey)
 *   [32..64]   owner (pubkey)
 *   [64..72]   amount (u64)
 */

import { PublicKey } from '@solana/web3.js';
import { DecodeError } from '../../errors.js';
import { readPubkey, viewOf } from '../layout.js';

export const TOKEN_PROGRAM_ID = new PublicKey('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA');
export const TOKEN_2022_PROGRAM_ID = new PublicKey('TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb');

export const MINT_SIZE = 82;
export const TOKEN_ACCOUNT_SIZE = 165;

export const MAX_DECIMALS = 18;

export interface TokenAccountLayout {
    mint: PublicKey;
    owner: PublicKey;
    amount: bigint;
}

/**
 * @throws DecodeError when too short, uninitialized, or decimals > 18
 */
export function decodeMintDecimals(data: Uint8Array, address?: string): number {
    if (data.length < MINT_SIZE) {
        throw new DecodeError('token', `mint must be >= ${MINT_SIZE} bytes, got ${data.length}`, address);
    }
    const view = viewOf(data);
    if (view.getUint8(45) !== 1) {
        throw new DecodeError('token', 'mint is not initialized', address);
    }
    const decimals = view.getUint8(44);
    if (decimals > MAX_DECIMALS) {
        throw new DecodeError('token', `decimals ${decimals} exceed ${MAX_DECIMALS}`, address);
    }
    return decimals;
}

export function decodeTokenAccount(data: Uint8Array, address?: string): TokenAccountLayout {
    if (data.length < TOKEN_ACCOUNT_SIZE) {
        throw new DecodeError('token', `token account must be >= ${TOKEN_ACCOUNT_SIZE} bytes, got ${data.length}`, address);
    }
    return {
        mint: readPubkey(data, 0),
        owner: readPubkey(data, 32),
        amount: viewOf(data).getBigUint64(64, true),
    };
}

export function decodeTokenAmount(data: Uint8Array, address?: string): bigint {
    return decodeTokenAccount(data, address).amount;
}
