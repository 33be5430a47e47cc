/**
 * Swap instruction encoders, one per venue. Exact input only.
 *
 * AMM V4 and stable take a one-byte tag; CP-Swap and CLMM are Anchor
 * programs keyed by an 8-byte sighash.
 */

import { PublicKey, SYSVAR_CLOCK_PUBKEY, TransactionInstruction, type AccountMeta } from '@solana/web3.js';
import { TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID } from '../decode/programs/splToken.js';
import { getTickArrayStartIndex } from '../decode/programs/tickArray.js';
import {
    PoolSource,
    PoolVariant,
    type AmmV4Accounts,
    type ClmmAccounts,
    type CpSwapAccounts,
    type PoolState,
    type StableAccounts,
} from '../types.js';

// ============================================================================
// Constants
// ============================================================================

// AMM V4 SwapBaseInV2 (no OpenBook market accounts)
const AMM_V4_SWAP_BASE_IN_V2 = 16;
// Stable swap: SwapBaseIn
const STABLE_SWAP_BASE_IN = 1;

const CP_SWAP_BASE_INPUT_DISC = Buffer.from('8fbe5adac41e33de', 'hex');
const CLMM_SWAP_V2_DISC = Buffer.from('2b04ed0b1ac91e62', 'hex');

export const MEMO_PROGRAM_ID = new PublicKey('MemoSq4gqABAXKb96qnH8TysNcWxMyWCqXgDLGmfcHr');

export interface SwapIxParams {
    pool: PoolState;
    owner: PublicKey;
    aToB: boolean;
    /** User token account debited */
    userSource: PublicKey;
    /** User token account credited */
    userDestination: PublicKey;
    amountIn: bigint;
    minimumAmountOut: bigint;
}

function meta(pubkey: PublicKey, isWritable: boolean, isSigner = false): AccountMeta {
    return { pubkey, isSigner, isWritable };
}

/** tag(1) + amountIn(8) + minOut(8) */
function taggedData(tag: number, amountIn: bigint, minOut: bigint): Buffer {
    const data = Buffer.alloc(17);
    data[0] = tag;
    data.writeBigUInt64LE(amountIn, 1);
    data.writeBigUInt64LE(minOut, 9);
    return data;
}

// ============================================================================
// Venues
// ============================================================================

function ammV4SwapIx(p: SwapIxParams, accounts: AmmV4Accounts): TransactionInstruction {
    const keys = [
        meta(TOKEN_PROGRAM_ID, false),          // 0 tokenProgram
        meta(p.pool.address, true),             // 1 amm
        meta(accounts.authority, false),        // 2 ammAuthority
        meta(accounts.vaultA, true),            // 3 ammCoinVault
        meta(accounts.vaultB, true),            // 4 ammPcVault
        meta(p.userSource, true),               // 5 userSourceToken
        meta(p.userDestination, true),          // 6 userDestToken
        meta(p.owner, true, true),              // 7 userWallet
    ];
    return new TransactionInstruction({
        programId: p.pool.programId,
        keys,
        data: taggedData(AMM_V4_SWAP_BASE_IN_V2, p.amountIn, p.minimumAmountOut),
    });
}

function cpSwapIx(p: SwapIxParams, accounts: CpSwapAccounts): TransactionInstruction {
    const { tokenA, tokenB } = p.pool;
    const [inVault, outVault] = p.aToB ? [accounts.vaultA, accounts.vaultB] : [accounts.vaultB, accounts.vaultA];
    const [inProgram, outProgram] = p.aToB
        ? [accounts.tokenProgramA, accounts.tokenProgramB]
        : [accounts.tokenProgramB, accounts.tokenProgramA];
    const [inMint, outMint] = p.aToB ? [tokenA.mint, tokenB.mint] : [tokenB.mint, tokenA.mint];

    const data = Buffer.alloc(24);
    CP_SWAP_BASE_INPUT_DISC.copy(data, 0);
    data.writeBigUInt64LE(p.amountIn, 8);
    data.writeBigUInt64LE(p.minimumAmountOut, 16);

    const keys = [
        meta(p.owner, false, true),             // 0 payer
        meta(accounts.authority, false),        // 1 authority
        meta(accounts.ammConfig, false),        // 2 ammConfig
        meta(p.pool.address, true),             // 3 poolState
        meta(p.userSource, true),               // 4 inputTokenAccount
        meta(p.userDestination, true),          // 5 outputTokenAccount
        meta(inVault, true),                    // 6 inputVault
        meta(outVault, true),                   // 7 outputVault
        meta(inProgram, false),                 // 8 inputTokenProgram
        meta(outProgram, false),                // 9 outputTokenProgram
        meta(inMint, false),                    // 10 inputTokenMint
        meta(outMint, false),                   // 11 outputTokenMint
        meta(accounts.observation, true),       // 12 observationState
    ];
    return new TransactionInstruction({ programId: p.pool.programId, keys, data });
}

function stableSwapIx(p: SwapIxParams, accounts: StableAccounts): TransactionInstruction {
    const keys = [
        meta(p.owner, false, true),             // 0 user
        meta(p.pool.address, true),             // 1 pool
        meta(accounts.authority, false),        // 2 authority
        meta(p.userSource, true),               // 3 userSource
        meta(p.userDestination, true),          // 4 userDestination
        meta(accounts.vaultA, true),            // 5 vaultA
        meta(accounts.vaultB, true),            // 6 vaultB
        meta(TOKEN_PROGRAM_ID, false),          // 7 tokenProgram
        meta(SYSVAR_CLOCK_PUBKEY, false),       // 8 clock
    ];
    return new TransactionInstruction({
        programId: p.pool.programId,
        keys,
        data: taggedData(STABLE_SWAP_BASE_IN, p.amountIn, p.minimumAmountOut),
    });
}

/**
 * Loaded tick arrays from the one holding tickCurrent outward in the swap
 * direction: descending starts for a-to-b (price falls), ascending otherwise.
 */
export function tickArraysInTraversalOrder(
    accounts: ClmmAccounts,
    tickCurrent: number,
    tickSpacing: number,
    aToB: boolean,
): PublicKey[] {
    const current = getTickArrayStartIndex(tickCurrent, tickSpacing);
    return [...accounts.tickArrays.entries()]
        .filter(([start]) => (aToB ? start <= current : start >= current))
        .sort(([a], [b]) => (aToB ? b - a : a - b))
        .map(([, address]) => address);
}

function clmmSwapIx(p: SwapIxParams, accounts: ClmmAccounts, tickCurrent: number, tickSpacing: number): TransactionInstruction {
    const { tokenA, tokenB } = p.pool;
    const [inVault, outVault] = p.aToB ? [accounts.vaultA, accounts.vaultB] : [accounts.vaultB, accounts.vaultA];
    const [inMint, outMint] = p.aToB ? [tokenA.mint, tokenB.mint] : [tokenB.mint, tokenA.mint];

    // disc(8) + amount(8) + otherAmountThreshold(8) + sqrtPriceLimitX64(16) + isBaseInput(1)
    const data = Buffer.alloc(41);
    CLMM_SWAP_V2_DISC.copy(data, 0);
    data.writeBigUInt64LE(p.amountIn, 8);
    data.writeBigUInt64LE(p.minimumAmountOut, 16);
    // sqrt price limit 0: no limit
    data.writeUInt8(1, 40);

    const keys = [
        meta(p.owner, false, true),             // 0 payer
        meta(accounts.ammConfig, false),        // 1 ammConfig
        meta(p.pool.address, true),             // 2 poolState
        meta(p.userSource, true),               // 3 inputTokenAccount
        meta(p.userDestination, true),          // 4 outputTokenAccount
        meta(inVault, true),                    // 5 inputVault
        meta(outVault, true),                   // 6 outputVault
        meta(accounts.observation, true),       // 7 observationState
        meta(TOKEN_PROGRAM_ID, false),          // 8 tokenProgram
        meta(TOKEN_2022_PROGRAM_ID, false),     // 9 tokenProgram2022
        meta(MEMO_PROGRAM_ID, false),           // 10 memoProgram
        meta(inMint, false),                    // 11 inputVaultMint
        meta(outMint, false),                   // 12 outputVaultMint
        ...tickArraysInTraversalOrder(accounts, tickCurrent, tickSpacing, p.aToB).map(a => meta(a, true)),
    ];
    return new TransactionInstruction({ programId: p.pool.programId, keys, data });
}

/**
 * Build the swap instruction for the pool's venue
 */
export function buildSwapIx(params: SwapIxParams): TransactionInstruction {
    const { pool } = params;
    if (pool.variant === PoolVariant.Concentrated) {
        return clmmSwapIx(params, pool.accounts, pool.tickCurrent, pool.tickSpacing);
    }
    const accounts = pool.accounts;
    switch (accounts.source) {
        case PoolSource.RaydiumAmmV4:
            return ammV4SwapIx(params, accounts);
        case PoolSource.RaydiumCpSwap:
            return cpSwapIx(params, accounts);
        case PoolSource.RaydiumStable:
            return stableSwapIx(params, accounts);
    }
}

/** Token program owning each side's mint, a then b */
export function tokenProgramsOf(pool: PoolState): [PublicKey, PublicKey] {
    const accounts = pool.accounts;
    switch (accounts.source) {
        case PoolSource.RaydiumCpSwap:
        case PoolSource.RaydiumClmm:
            return [accounts.tokenProgramA, accounts.tokenProgramB];
        case PoolSource.RaydiumAmmV4:
        case PoolSource.RaydiumStable:
            return [TOKEN_PROGRAM_ID, TOKEN_PROGRAM_ID];
    }
}
