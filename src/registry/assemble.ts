/**
 * Pool assembly
 *
 * Turns a pool account into a PendingPool: the decoded layout plus the
 * dependency accounts (vaults, configs, tick arrays) it needs. Once the
 * registry has fetched those in one batch, `assemble` builds the frozen
 * PoolState.
 *
 * Reserves per venue:
 *   AMM V4   vault - needTakePnl
 *   CP-Swap  vault - protocol fees - fund fees
 *   Stable   vault
 *   CLMM     vault (liquidity filter only; quoting uses ticks)
 */

import { PublicKey } from '@solana/web3.js';
import { decodeClmmAmmConfig, decodeRaydiumClmmPool } from '../decode/programs/raydiumClmm.js';
import { cpSwapReserves, decodeCpSwapAmmConfig, decodeRaydiumCpSwapPool } from '../decode/programs/raydiumCpSwap.js';
import { currentAmp, decodeRaydiumStablePool } from '../decode/programs/raydiumStable.js';
import { decodeRaydiumV4Pool } from '../decode/programs/raydiumV4.js';
import { TOKEN_2022_PROGRAM_ID, TOKEN_PROGRAM_ID, decodeTokenAccount } from '../decode/programs/splToken.js';
import {
    decodeTickArray,
    deriveTickArrayAddress,
    getTicksPerArray,
    tickArrayStartIndexes,
} from '../decode/programs/tickArray.js';
import { DecodeError } from '../errors.js';
import { ppmToBps, ratioToBps } from '../sim/math/fees.js';
import {
    PoolSource,
    PoolVariant,
    PROGRAM_IDS,
    type ConcentratedPool,
    type ConstantProductPool,
    type PoolState,
    type StabilizedPool,
    type TokenRef,
} from '../types.js';

export const AMM_AUTHORITY_SEED = Buffer.from('amm authority');
export const CP_SWAP_AUTHORITY_SEED = Buffer.from('vault_and_lp_mint_auth_seed');

export interface DependencyAccount {
    owner: PublicKey;
    data: Uint8Array;
}

/** Dependency accounts fetched for a batch, keyed by base58 */
export class DependencySet {
    constructor(private readonly accounts: ReadonlyMap<string, DependencyAccount | null>) {}

    /** @throws DecodeError when the account was not found */
    require(address: PublicKey, variant: PoolVariant, what: string): Uint8Array {
        return this.account(address, variant, what).data;
    }

    /** null when the account does not exist */
    optional(address: PublicKey): Uint8Array | null {
        return this.accounts.get(address.toBase58())?.data ?? null;
    }

    /**
     * Token program that owns a mint
     * @throws DecodeError when the mint is missing or owned by another program
     */
    tokenProgram(mint: PublicKey, variant: PoolVariant): PublicKey {
        const { owner } = this.account(mint, variant, 'mint');
        if (!owner.equals(TOKEN_PROGRAM_ID) && !owner.equals(TOKEN_2022_PROGRAM_ID)) {
            throw new DecodeError(variant, `mint ${mint.toBase58()} is owned by ${owner.toBase58()}, not a token program`);
        }
        return owner;
    }

    private account(address: PublicKey, variant: PoolVariant, what: string): DependencyAccount {
        const account = this.accounts.get(address.toBase58());
        if (!account) {
            throw new DecodeError(variant, `${what} ${address.toBase58()} not found`);
        }
        return account;
    }

    /**
     * Vault balance, checking the vault holds the expected mint
     */
    vault(address: PublicKey, mint: PublicKey, variant: PoolVariant): bigint {
        const account = decodeTokenAccount(this.require(address, variant, 'vault'), address.toBase58());
        if (!account.mint.equals(mint)) {
            throw new DecodeError(variant, `vault ${address.toBase58()} holds ${account.mint.toBase58()}, expected ${mint.toBase58()}`);
        }
        return account.amount;
    }
}

export interface PendingPool {
    readonly address: PublicKey;
    readonly variant: PoolVariant;
    readonly source: PoolSource;
    /** Pool order: tokenA, tokenB */
    readonly mints: readonly [PublicKey, PublicKey];
    /** Decimals the pool account itself carries, per mint */
    readonly decimals?: readonly [number, number];
    readonly dependencies: readonly PublicKey[];
    assemble(deps: DependencySet, tokens: readonly [TokenRef, TokenRef], observedAt: number): PoolState;
}

export interface PrepareOptions {
    tickArrayRadius: number;
}

function clampedSub(value: bigint, less: bigint): bigint {
    return value > less ? value - less : 0n;
}

function requireFee(feeBps: number | null, variant: PoolVariant, address: string): number {
    if (feeBps === null) {
        throw new DecodeError(variant, 'fee is not a valid rate', address);
    }
    return feeBps;
}

function authorityFromNonce(seeds: Uint8Array[], nonce: number, programId: PublicKey, variant: PoolVariant, address: string): PublicKey {
    try {
        return PublicKey.createProgramAddressSync([...seeds, Uint8Array.of(nonce)], programId);
    } catch (err) {
        throw new DecodeError(variant, `nonce ${nonce} does not derive an authority: ${String(err)}`, address);
    }
}

// ============================================================================
// AMM V4
// ============================================================================

function prepareAmmV4(address: PublicKey, data: Uint8Array): PendingPool {
    const key = address.toBase58();
    const variant = PoolVariant.ConstantProduct;
    const programId = PROGRAM_IDS[PoolSource.RaydiumAmmV4];
    const layout = decodeRaydiumV4Pool(data, key);
    const feeBps = requireFee(ratioToBps(layout.swapFeeNumerator, layout.swapFeeDenominator), variant, key);
    const authority = authorityFromNonce([AMM_AUTHORITY_SEED], layout.nonce, programId, variant, key);

    return {
        address,
        variant,
        source: PoolSource.RaydiumAmmV4,
        mints: [layout.baseMint, layout.quoteMint],
        decimals: [layout.baseDecimal, layout.quoteDecimal],
        dependencies: [layout.baseVault, layout.quoteVault],
        assemble(deps, [tokenA, tokenB], observedAt): ConstantProductPool {
            const vaultA = deps.vault(layout.baseVault, layout.baseMint, variant);
            const vaultB = deps.vault(layout.quoteVault, layout.quoteMint, variant);
            return {
                variant,
                address,
                programId,
                tokenA,
                tokenB,
                feeBps,
                observedAt,
                reserveA: clampedSub(vaultA, layout.baseNeedTakePnl),
                reserveB: clampedSub(vaultB, layout.quoteNeedTakePnl),
                accounts: {
                    source: PoolSource.RaydiumAmmV4,
                    authority,
                    vaultA: layout.baseVault,
                    vaultB: layout.quoteVault,
                },
            };
        },
    };
}

// ============================================================================
// CP-SWAP
// ============================================================================

function prepareCpSwap(address: PublicKey, data: Uint8Array): PendingPool {
    const key = address.toBase58();
    const variant = PoolVariant.ConstantProduct;
    const programId = PROGRAM_IDS[PoolSource.RaydiumCpSwap];
    const layout = decodeRaydiumCpSwapPool(data, key);
    const [authority] = PublicKey.findProgramAddressSync([CP_SWAP_AUTHORITY_SEED], programId);

    return {
        address,
        variant,
        source: PoolSource.RaydiumCpSwap,
        mints: [layout.token0Mint, layout.token1Mint],
        decimals: [layout.mint0Decimals, layout.mint1Decimals],
        dependencies: [layout.ammConfig, layout.token0Vault, layout.token1Vault],
        assemble(deps, [tokenA, tokenB], observedAt): ConstantProductPool {
            const config = decodeCpSwapAmmConfig(deps.require(layout.ammConfig, variant, 'amm config'), layout.ammConfig.toBase58());
            const vault0 = deps.vault(layout.token0Vault, layout.token0Mint, variant);
            const vault1 = deps.vault(layout.token1Vault, layout.token1Mint, variant);
            const [reserveA, reserveB] = cpSwapReserves(layout, vault0, vault1);
            return {
                variant,
                address,
                programId,
                tokenA,
                tokenB,
                feeBps: requireFee(ppmToBps(config.tradeFeeRate), variant, key),
                observedAt,
                reserveA,
                reserveB,
                accounts: {
                    source: PoolSource.RaydiumCpSwap,
                    authority,
                    ammConfig: layout.ammConfig,
                    vaultA: layout.token0Vault,
                    vaultB: layout.token1Vault,
                    tokenProgramA: layout.token0Program,
                    tokenProgramB: layout.token1Program,
                    observation: layout.observationKey,
                },
            };
        },
    };
}

// ============================================================================
// STABLE
// ============================================================================

function prepareStable(address: PublicKey, data: Uint8Array): PendingPool {
    const key = address.toBase58();
    const variant = PoolVariant.Stabilized;
    const programId = PROGRAM_IDS[PoolSource.RaydiumStable];
    const layout = decodeRaydiumStablePool(data, key);
    const feeBps = requireFee(ratioToBps(layout.tradeFeeNumerator, layout.tradeFeeDenominator), variant, key);
    const authority = authorityFromNonce([address.toBytes()], layout.nonce, programId, variant, key);

    return {
        address,
        variant,
        source: PoolSource.RaydiumStable,
        mints: [layout.tokenMintA, layout.tokenMintB],
        dependencies: [layout.tokenAccountA, layout.tokenAccountB],
        assemble(deps, [tokenA, tokenB], observedAt): StabilizedPool {
            return {
                variant,
                address,
                programId,
                tokenA,
                tokenB,
                feeBps,
                observedAt,
                reserveA: deps.vault(layout.tokenAccountA, layout.tokenMintA, variant),
                reserveB: deps.vault(layout.tokenAccountB, layout.tokenMintB, variant),
                amp: currentAmp(layout, BigInt(Math.floor(observedAt / 1000))),
                accounts: {
                    source: PoolSource.RaydiumStable,
                    authority,
                    vaultA: layout.tokenAccountA,
                    vaultB: layout.tokenAccountB,
                },
            };
        },
    };
}

// ============================================================================
// CLMM
// ============================================================================

function prepareClmm(address: PublicKey, data: Uint8Array, options: PrepareOptions): PendingPool {
    const key = address.toBase58();
    const variant = PoolVariant.Concentrated;
    const programId = PROGRAM_IDS[PoolSource.RaydiumClmm];
    const layout = decodeRaydiumClmmPool(data, key);

    const starts = tickArrayStartIndexes(layout.tickCurrent, layout.tickSpacing, options.tickArrayRadius);
    const arrays = starts.map(start => ({ start, address: deriveTickArrayAddress(programId, address, start) }));

    return {
        address,
        variant,
        source: PoolSource.RaydiumClmm,
        mints: [layout.tokenMint0, layout.tokenMint1],
        decimals: [layout.mintDecimals0, layout.mintDecimals1],
        // Mints for their owner program: either side may be Token-2022
        dependencies: [
            layout.ammConfig,
            layout.tokenVault0,
            layout.tokenVault1,
            layout.tokenMint0,
            layout.tokenMint1,
            ...arrays.map(a => a.address),
        ],
        assemble(deps, [tokenA, tokenB], observedAt): ConcentratedPool {
            const config = decodeClmmAmmConfig(deps.require(layout.ammConfig, variant, 'amm config'), layout.ammConfig.toBase58());

            const ticks = new Map<number, bigint>();
            const tickArrays = new Map<number, PublicKey>();
            for (const array of arrays) {
                // Missing arrays are uninitialized: no liquidity changes inside them
                const raw = deps.optional(array.address);
                if (raw === null) continue;
                const decoded = decodeTickArray(raw, array.address.toBase58());
                if (!decoded.poolId.equals(address) || decoded.startTickIndex !== array.start) {
                    throw new DecodeError(variant, `tick array ${array.address.toBase58()} does not belong at ${array.start}`, key);
                }
                for (const tick of decoded.ticks) {
                    ticks.set(tick.tick, tick.liquidityNet);
                }
                tickArrays.set(array.start, array.address);
            }

            const first = starts[0] ?? 0;
            const last = starts[starts.length - 1] ?? first;
            return {
                variant,
                address,
                programId,
                tokenA,
                tokenB,
                feeBps: requireFee(ppmToBps(config.tradeFeeRate), variant, key),
                observedAt,
                reserveA: deps.vault(layout.tokenVault0, layout.tokenMint0, variant),
                reserveB: deps.vault(layout.tokenVault1, layout.tokenMint1, variant),
                sqrtPriceX64: layout.sqrtPriceX64,
                tickCurrent: layout.tickCurrent,
                tickSpacing: layout.tickSpacing,
                liquidity: layout.liquidity,
                ticks,
                tickRange: { lower: first, upper: last + getTicksPerArray(layout.tickSpacing) },
                accounts: {
                    source: PoolSource.RaydiumClmm,
                    ammConfig: layout.ammConfig,
                    vaultA: layout.tokenVault0,
                    vaultB: layout.tokenVault1,
                    observation: layout.observationKey,
                    tokenProgramA: deps.tokenProgram(layout.tokenMint0, variant),
                    tokenProgramB: deps.tokenProgram(layout.tokenMint1, variant),
                    tickArrays,
                },
            };
        },
    };
}

// ============================================================================
// DISPATCH
// ============================================================================

const SOURCE_BY_OWNER: ReadonlyMap<string, PoolSource> = new Map(
    Object.values(PoolSource).map(source => [PROGRAM_IDS[source].toBase58(), source])
);

export function sourceForOwner(owner: PublicKey): PoolSource | undefined {
    return SOURCE_BY_OWNER.get(owner.toBase58());
}

/**
 * Decode a pool account by its owning program
 * @throws DecodeError on a malformed account or an unsupported owner
 */
export function preparePool(address: PublicKey, owner: PublicKey, data: Uint8Array, options: PrepareOptions): PendingPool {
    const source = sourceForOwner(owner);
    switch (source) {
        case PoolSource.RaydiumAmmV4:
            return prepareAmmV4(address, data);
        case PoolSource.RaydiumCpSwap:
            return prepareCpSwap(address, data);
        case PoolSource.RaydiumStable:
            return prepareStable(address, data);
        case PoolSource.RaydiumClmm:
            return prepareClmm(address, data, options);
        case undefined:
            throw new DecodeError('account', `owner ${owner.toBase58()} is not a supported pool program`, address.toBase58());
    }
}
