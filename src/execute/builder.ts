/**
 * Swap transaction builder
 *
 * Instruction order:
 *   compute budget (limit, optional price)
 *   create output ATA (idempotent)
 *   [input is SOL] create wSOL ATA, transfer, syncNative
 *   venue swap with minimumAmountOut
 *   [either side is SOL] close the wSOL ATA
 *
 * Wrapping moves lamports into the owner's wSOL account; unwrapping closes
 * that account back to the owner. Both use the same compute budget and
 * compile path as swaps.
 *
 * A legacy message is tried first. When it is over the packet size or the
 * account-lock limit, the message is recompiled as v0 against the configured
 * lookup tables.
 */

import {
    ComputeBudgetProgram,
    PACKET_DATA_SIZE,
    TransactionMessage,
    VersionedTransaction,
    type AddressLookupTableAccount,
    type PublicKey,
    type TransactionInstruction,
} from '@solana/web3.js';
import { InvalidRequestError, TransactionTooLargeError } from '../errors.js';
import { BPS_DENOMINATOR, NATIVE_MINT, type PoolState, type Route, type TxFormat } from '../types.js';
import { logger } from '../utils/logger.js';
import { buildSwapIx, tokenProgramsOf } from './instructions.js';
import { closeAccountIx, createAtaIdempotentIx, deriveAta, wrapSolIxs } from './tokens.js';

const log = logger.child('builder');

/** Accounts a transaction may lock */
export const MAX_TX_ACCOUNTS = 64;

export interface BuildOptions {
    computeUnitLimit: number;
    priorityFeeMicroLamports: number;
    lookupTables: readonly AddressLookupTableAccount[];
}

export interface BuiltSwap {
    transaction: VersionedTransaction;
    format: TxFormat;
    /** Serialized size with one signature */
    size: number;
    /** User token account the swap credits */
    destination: PublicKey;
    /** Output is native SOL; the destination is closed in the same transaction */
    unwrapsOutput: boolean;
    minimumAmountOut: bigint;
}

/** floor(out × (10000 − slippageBps) / 10000) */
export function minimumAmountOut(amountOut: bigint, slippageBps: number): bigint {
    return (amountOut * (BPS_DENOMINATOR - BigInt(slippageBps))) / BPS_DENOMINATOR;
}

export interface SwapAccounts {
    aToB: boolean;
    userSource: PublicKey;
    userDestination: PublicKey;
    inputNative: boolean;
    outputNative: boolean;
}

export function resolveSwapAccounts(route: Route, pool: PoolState, owner: PublicKey): SwapAccounts {
    const { inputToken, outputToken } = route.quote;
    if (!pool.address.equals(route.quote.pool)) {
        throw new InvalidRequestError(`route quotes ${route.quote.pool.toBase58()} but pool is ${pool.address.toBase58()}`);
    }
    const aToB = pool.tokenA.mint.equals(inputToken.mint);
    const [programA, programB] = tokenProgramsOf(pool);
    const [inProgram, outProgram] = aToB ? [programA, programB] : [programB, programA];
    return {
        aToB,
        userSource: deriveAta(owner, inputToken.mint, inProgram),
        userDestination: deriveAta(owner, outputToken.mint, outProgram),
        inputNative: inputToken.mint.equals(NATIVE_MINT),
        outputNative: outputToken.mint.equals(NATIVE_MINT),
    };
}

export function buildSwapInstructions(
    route: Route,
    pool: PoolState,
    owner: PublicKey,
    options: BuildOptions,
    accounts: SwapAccounts = resolveSwapAccounts(route, pool, owner)
): TransactionInstruction[] {
    const { quote } = route;
    const [programA, programB] = tokenProgramsOf(pool);
    const outProgram = accounts.aToB ? programB : programA;

    const instructions = budgetIxs(options);
    instructions.push(createAtaIdempotentIx(owner, owner, quote.outputToken.mint, outProgram));

    if (accounts.inputNative) {
        instructions.push(createAtaIdempotentIx(owner, owner, NATIVE_MINT));
        instructions.push(...wrapSolIxs(owner, accounts.userSource, quote.amountIn));
    }

    instructions.push(
        buildSwapIx({
            pool,
            owner,
            aToB: accounts.aToB,
            userSource: accounts.userSource,
            userDestination: accounts.userDestination,
            amountIn: quote.amountIn,
            minimumAmountOut: route.minimumAmountOut,
        })
    );

    if (accounts.inputNative) {
        instructions.push(closeAccountIx(accounts.userSource, owner, owner));
    } else if (accounts.outputNative) {
        instructions.push(closeAccountIx(accounts.userDestination, owner, owner));
    }
    return instructions;
}

function serializedSize(tx: VersionedTransaction): number {
    try {
        return tx.serialize().length;
    } catch (err) {
        // web3.js serializes into fixed-size buffers and overruns them
        if (err instanceof RangeError) return Number.POSITIVE_INFINITY;
        throw err;
    }
}

/**
 * @throws TransactionTooLargeError when neither format fits
 */
export function buildSwapTransaction(
    route: Route,
    pool: PoolState,
    owner: PublicKey,
    recentBlockhash: string,
    options: BuildOptions
): BuiltSwap {
    const accounts = resolveSwapAccounts(route, pool, owner);
    const instructions = buildSwapInstructions(route, pool, owner, options, accounts);
    return compile(owner, recentBlockhash, instructions, options, {
        destination: accounts.userDestination,
        unwrapsOutput: accounts.outputNative,
        minimumAmountOut: route.minimumAmountOut,
    });
}

/** Create the wSOL account if needed, move `lamports` in and sync */
export function buildWrapTransaction(
    owner: PublicKey,
    lamports: bigint,
    recentBlockhash: string,
    options: BuildOptions
): BuiltSwap {
    const wsol = deriveAta(owner, NATIVE_MINT);
    const instructions = [
        ...budgetIxs(options),
        createAtaIdempotentIx(owner, owner, NATIVE_MINT),
        ...wrapSolIxs(owner, wsol, lamports),
    ];
    return compile(owner, recentBlockhash, instructions, options, {
        destination: wsol,
        unwrapsOutput: false,
        minimumAmountOut: lamports,
    });
}

/** Close the wSOL account; its lamports return to the owner */
export function buildUnwrapTransaction(owner: PublicKey, recentBlockhash: string, options: BuildOptions): BuiltSwap {
    const wsol = deriveAta(owner, NATIVE_MINT);
    const instructions = [...budgetIxs(options), closeAccountIx(wsol, owner, owner)];
    return compile(owner, recentBlockhash, instructions, options, {
        destination: wsol,
        unwrapsOutput: true,
        minimumAmountOut: 0n,
    });
}

function budgetIxs(options: BuildOptions): TransactionInstruction[] {
    const instructions = [ComputeBudgetProgram.setComputeUnitLimit({ units: options.computeUnitLimit })];
    if (options.priorityFeeMicroLamports > 0) {
        instructions.push(ComputeBudgetProgram.setComputeUnitPrice({ microLamports: options.priorityFeeMicroLamports }));
    }
    return instructions;
}

/**
 * Legacy when it fits, otherwise v0 against the lookup tables
 * @throws TransactionTooLargeError when neither format fits
 */
function compile(
    owner: PublicKey,
    recentBlockhash: string,
    instructions: TransactionInstruction[],
    options: BuildOptions,
    base: Pick<BuiltSwap, 'destination' | 'unwrapsOutput' | 'minimumAmountOut'>
): BuiltSwap {
    const message = new TransactionMessage({ payerKey: owner, recentBlockhash, instructions });
    const legacyMessage = message.compileToLegacyMessage();
    const legacy = new VersionedTransaction(legacyMessage);
    const legacySize = serializedSize(legacy);
    const legacyAccounts = legacyMessage.accountKeys.length;
    if (legacySize <= PACKET_DATA_SIZE && legacyAccounts <= MAX_TX_ACCOUNTS) {
        return { transaction: legacy, format: 'legacy', size: legacySize, ...base };
    }

    if (options.lookupTables.length === 0) {
        throw legacyAccounts > MAX_TX_ACCOUNTS
            ? new TransactionTooLargeError(legacyAccounts, MAX_TX_ACCOUNTS, 'accounts')
            : new TransactionTooLargeError(legacySize, PACKET_DATA_SIZE);
    }

    const tables = [...options.lookupTables];
    const v0Message = message.compileToV0Message(tables);
    const v0 = new VersionedTransaction(v0Message);
    const v0Size = serializedSize(v0);
    const v0Accounts = v0Message.getAccountKeys({ addressLookupTableAccounts: tables }).length;
    if (v0Accounts > MAX_TX_ACCOUNTS) {
        throw new TransactionTooLargeError(v0Accounts, MAX_TX_ACCOUNTS, 'accounts');
    }
    if (v0Size > PACKET_DATA_SIZE) {
        throw new TransactionTooLargeError(v0Size, PACKET_DATA_SIZE);
    }
    log.debug(`legacy ${legacySize}B/${legacyAccounts} accounts too large; v0 ${v0Size}B with ${tables.length} table(s)`);
    return { transaction: v0, format: 'v0', size: v0Size, ...base };
}
