/**
 * Test fixtures: account byte encoders matching the decoders' layouts, and
 * PoolState factories with overrides.
 */

import { PublicKey } from '@solana/web3.js';
import { writeU128LE } from '../decode/layout.js';
import { AMM_V4_SIZE } from '../decode/programs/raydiumV4.js';
import { CP_SWAP_CONFIG_DISCRIMINATOR, CP_SWAP_POOL_DISCRIMINATOR, CP_SWAP_POOL_SIZE } from '../decode/programs/raydiumCpSwap.js';
import { STABLE_MIN_SIZE } from '../decode/programs/raydiumStable.js';
import { CLMM_POOL_DISCRIMINATOR, CLMM_POOL_SIZE } from '../decode/programs/raydiumClmm.js';
import { TICK_ARRAY_DISCRIMINATOR, TICK_ARRAY_SIZE, TICK_SIZE, TICKS_PER_ARRAY } from '../decode/programs/tickArray.js';
import { MINT_SIZE, TOKEN_ACCOUNT_SIZE, TOKEN_PROGRAM_ID } from '../decode/programs/splToken.js';
import {
    PoolSource,
    PoolVariant,
    PROGRAM_IDS,
    type ConcentratedPool,
    type ConstantProductPool,
    type StabilizedPool,
    type SwapRequest,
    type TokenRef,
} from '../types.js';

/** Deterministic address: 32 bytes of `seed` */
export function key(seed: number): PublicKey {
    return new PublicKey(new Uint8Array(32).fill(seed));
}

export function token(seed: number, decimals: number, symbol?: string): TokenRef {
    return symbol === undefined ? { mint: key(seed), decimals } : { mint: key(seed), decimals, symbol };
}

function put(buf: Buffer, pk: PublicKey, offset: number): void {
    pk.toBuffer().copy(buf, offset);
}

// ============================================================================
// SPL
// ============================================================================

export function encodeMint(decimals: number): Uint8Array {
    const buf = Buffer.alloc(MINT_SIZE);
    buf.writeUInt8(decimals, 44);
    buf.writeUInt8(1, 45);
    return new Uint8Array(buf);
}

export function encodeTokenAccount(mint: PublicKey, owner: PublicKey, amount: bigint): Uint8Array {
    const buf = Buffer.alloc(TOKEN_ACCOUNT_SIZE);
    put(buf, mint, 0);
    put(buf, owner, 32);
    buf.writeBigUInt64LE(amount, 64);
    return new Uint8Array(buf);
}

// ============================================================================
// AMM V4
// ============================================================================

export interface AmmV4Fixture {
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
}

export function encodeAmmV4(overrides: Partial<AmmV4Fixture> = {}): Uint8Array {
    const f: AmmV4Fixture = {
        status: 6n,
        nonce: 254,
        baseDecimal: 9,
        quoteDecimal: 6,
        swapFeeNumerator: 25n,
        swapFeeDenominator: 10_000n,
        baseNeedTakePnl: 0n,
        quoteNeedTakePnl: 0n,
        baseVault: key(11),
        quoteVault: key(12),
        baseMint: key(1),
        quoteMint: key(2),
        ...overrides,
    };
    const buf = Buffer.alloc(AMM_V4_SIZE);
    buf.writeBigUInt64LE(f.status, 0);
    buf.writeBigUInt64LE(BigInt(f.nonce), 8);
    buf.writeBigUInt64LE(BigInt(f.baseDecimal), 32);
    buf.writeBigUInt64LE(BigInt(f.quoteDecimal), 40);
    buf.writeBigUInt64LE(f.swapFeeNumerator, 176);
    buf.writeBigUInt64LE(f.swapFeeDenominator, 184);
    buf.writeBigUInt64LE(f.baseNeedTakePnl, 192);
    buf.writeBigUInt64LE(f.quoteNeedTakePnl, 200);
    put(buf, f.baseVault, 336);
    put(buf, f.quoteVault, 368);
    put(buf, f.baseMint, 400);
    put(buf, f.quoteMint, 432);
    return new Uint8Array(buf);
}

// ============================================================================
// CP-SWAP
// ============================================================================

export interface CpSwapFixture {
    ammConfig: PublicKey;
    token0Vault: PublicKey;
    token1Vault: PublicKey;
    token0Mint: PublicKey;
    token1Mint: PublicKey;
    token0Program: PublicKey;
    token1Program: PublicKey;
    observationKey: PublicKey;
    status: number;
    mint0Decimals: number;
    mint1Decimals: number;
    protocolFees0: bigint;
    protocolFees1: bigint;
    fundFees0: bigint;
    fundFees1: bigint;
}

export function encodeCpSwapPool(overrides: Partial<CpSwapFixture> = {}): Uint8Array {
    const f: CpSwapFixture = {
        ammConfig: key(30),
        token0Vault: key(31),
        token1Vault: key(32),
        token0Mint: key(1),
        token1Mint: key(2),
        token0Program: TOKEN_PROGRAM_ID,
        token1Program: TOKEN_PROGRAM_ID,
        observationKey: key(33),
        status: 0,
        mint0Decimals: 9,
        mint1Decimals: 6,
        protocolFees0: 0n,
        protocolFees1: 0n,
        fundFees0: 0n,
        fundFees1: 0n,
        ...overrides,
    };
    const buf = Buffer.alloc(CP_SWAP_POOL_SIZE);
    Buffer.from(CP_SWAP_POOL_DISCRIMINATOR).copy(buf, 0);
    put(buf, f.ammConfig, 8);
    put(buf, f.token0Vault, 72);
    put(buf, f.token1Vault, 104);
    put(buf, f.token0Mint, 168);
    put(buf, f.token1Mint, 200);
    put(buf, f.token0Program, 232);
    put(buf, f.token1Program, 264);
    put(buf, f.observationKey, 296);
    buf.writeUInt8(f.status, 329);
    buf.writeUInt8(f.mint0Decimals, 331);
    buf.writeUInt8(f.mint1Decimals, 332);
    buf.writeBigUInt64LE(f.protocolFees0, 341);
    buf.writeBigUInt64LE(f.protocolFees1, 349);
    buf.writeBigUInt64LE(f.fundFees0, 357);
    buf.writeBigUInt64LE(f.fundFees1, 365);
    return new Uint8Array(buf);
}

/** tradeFeeRate in millionths */
export function encodeCpSwapConfig(tradeFeeRate: bigint): Uint8Array {
    const buf = Buffer.alloc(236);
    Buffer.from(CP_SWAP_CONFIG_DISCRIMINATOR).copy(buf, 0);
    buf.writeBigUInt64LE(tradeFeeRate, 12);
    return new Uint8Array(buf);
}

// ============================================================================
// STABLE
// ============================================================================

export interface StableFixture {
    initialized: boolean;
    paused: boolean;
    nonce: number;
    initialAmp: bigint;
    targetAmp: bigint;
    startRampTs: bigint;
    stopRampTs: bigint;
    tokenMintA: PublicKey;
    tokenMintB: PublicKey;
    tokenAccountA: PublicKey;
    tokenAccountB: PublicKey;
    tradeFeeNumerator: bigint;
    tradeFeeDenominator: bigint;
}

export function encodeStablePool(overrides: Partial<StableFixture> = {}): Uint8Array {
    const f: StableFixture = {
        initialized: true,
        paused: false,
        nonce: 255,
        initialAmp: 100n,
        targetAmp: 100n,
        startRampTs: 0n,
        stopRampTs: 0n,
        tokenMintA: key(3),
        tokenMintB: key(2),
        tokenAccountA: key(41),
        tokenAccountB: key(42),
        tradeFeeNumerator: 4n,
        tradeFeeDenominator: 10_000n,
        ...overrides,
    };
    const buf = Buffer.alloc(STABLE_MIN_SIZE + 9);
    buf.writeUInt8(f.initialized ? 1 : 0, 0);
    buf.writeUInt8(f.paused ? 1 : 0, 1);
    buf.writeUInt8(f.nonce, 2);
    buf.writeBigUInt64LE(f.initialAmp, 3);
    buf.writeBigUInt64LE(f.targetAmp, 11);
    buf.writeBigInt64LE(f.startRampTs, 19);
    buf.writeBigInt64LE(f.stopRampTs, 27);
    put(buf, f.tokenMintA, 107);
    put(buf, f.tokenMintB, 139);
    put(buf, f.tokenAccountA, 171);
    put(buf, f.tokenAccountB, 203);
    put(buf, key(43), 235);
    buf.writeBigUInt64LE(f.tradeFeeNumerator, 299);
    buf.writeBigUInt64LE(f.tradeFeeDenominator, 307);
    return new Uint8Array(buf);
}

// ============================================================================
// CLMM
// ============================================================================

export interface ClmmFixture {
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

export function encodeClmmPool(overrides: Partial<ClmmFixture> = {}): Uint8Array {
    const f: ClmmFixture = {
        ammConfig: key(50),
        tokenMint0: key(1),
        tokenMint1: key(2),
        tokenVault0: key(51),
        tokenVault1: key(52),
        observationKey: key(53),
        mintDecimals0: 6,
        mintDecimals1: 6,
        tickSpacing: 10,
        liquidity: 1_000_000_000n,
        sqrtPriceX64: 1n << 64n,
        tickCurrent: 0,
        status: 0,
        ...overrides,
    };
    const buf = Buffer.alloc(CLMM_POOL_SIZE);
    Buffer.from(CLMM_POOL_DISCRIMINATOR).copy(buf, 0);
    put(buf, f.ammConfig, 9);
    put(buf, f.tokenMint0, 73);
    put(buf, f.tokenMint1, 105);
    put(buf, f.tokenVault0, 137);
    put(buf, f.tokenVault1, 169);
    put(buf, f.observationKey, 201);
    buf.writeUInt8(f.mintDecimals0, 233);
    buf.writeUInt8(f.mintDecimals1, 234);
    buf.writeUInt16LE(f.tickSpacing, 235);
    writeU128LE(buf, f.liquidity, 237);
    writeU128LE(buf, f.sqrtPriceX64, 253);
    buf.writeInt32LE(f.tickCurrent, 269);
    buf.writeUInt8(f.status, 389);
    return new Uint8Array(buf);
}

/** tradeFeeRate in millionths */
export function encodeClmmConfig(tradeFeeRate: number, tickSpacing = 10): Uint8Array {
    const buf = Buffer.alloc(117);
    buf.writeUInt32LE(tradeFeeRate, 47);
    buf.writeUInt16LE(tickSpacing, 51);
    return new Uint8Array(buf);
}

export interface TickFixture {
    tick: number;
    liquidityNet: bigint;
    liquidityGross?: bigint;
}

/**
 * Ticks are placed at their slot `(tick - start) / spacing`
 */
export function encodeTickArray(pool: PublicKey, startTickIndex: number, tickSpacing: number, ticks: TickFixture[]): Uint8Array {
    const buf = Buffer.alloc(TICK_ARRAY_SIZE);
    Buffer.from(TICK_ARRAY_DISCRIMINATOR).copy(buf, 0);
    put(buf, pool, 8);
    buf.writeInt32LE(startTickIndex, 40);
    for (const t of ticks) {
        const slot = (t.tick - startTickIndex) / tickSpacing;
        if (!Number.isInteger(slot) || slot < 0 || slot >= TICKS_PER_ARRAY) {
            throw new RangeError(`tick ${t.tick} does not belong to array ${startTickIndex}`);
        }
        const base = 44 + slot * TICK_SIZE;
        buf.writeInt32LE(t.tick, base);
        const net = t.liquidityNet < 0n ? (1n << 128n) + t.liquidityNet : t.liquidityNet;
        writeU128LE(buf, net, base + 4);
        const gross = t.liquidityGross ?? (t.liquidityNet < 0n ? -t.liquidityNet : t.liquidityNet);
        writeU128LE(buf, gross, base + 20);
    }
    return new Uint8Array(buf);
}

// ============================================================================
// POOL STATE FACTORIES
// ============================================================================

export const TOKEN_A = token(1, 9, 'AAA');
export const TOKEN_B = token(2, 6, 'BBB');

export function makeCpPool(overrides: Partial<ConstantProductPool> = {}): ConstantProductPool {
    return {
        variant: PoolVariant.ConstantProduct,
        address: key(100),
        programId: PROGRAM_IDS[PoolSource.RaydiumCpSwap],
        tokenA: TOKEN_A,
        tokenB: TOKEN_B,
        feeBps: 30,
        observedAt: 0,
        reserveA: 1_000_000n,
        reserveB: 2_000_000n,
        accounts: {
            source: PoolSource.RaydiumCpSwap,
            authority: key(101),
            ammConfig: key(102),
            vaultA: key(103),
            vaultB: key(104),
            tokenProgramA: TOKEN_PROGRAM_ID,
            tokenProgramB: TOKEN_PROGRAM_ID,
            observation: key(105),
        },
        ...overrides,
    };
}

export function makeStablePool(overrides: Partial<StabilizedPool> = {}): StabilizedPool {
    return {
        variant: PoolVariant.Stabilized,
        address: key(110),
        programId: PROGRAM_IDS[PoolSource.RaydiumStable],
        tokenA: token(3, 6, 'USDX'),
        tokenB: token(2, 6, 'BBB'),
        feeBps: 4,
        observedAt: 0,
        reserveA: 1_000_000_000_000n,
        reserveB: 1_000_000_000_000n,
        amp: 100n,
        accounts: {
            source: PoolSource.RaydiumStable,
            authority: key(111),
            vaultA: key(112),
            vaultB: key(113),
        },
        ...overrides,
    };
}

export function makeClmmPool(overrides: Partial<ConcentratedPool> = {}): ConcentratedPool {
    return {
        variant: PoolVariant.Concentrated,
        address: key(120),
        programId: PROGRAM_IDS[PoolSource.RaydiumClmm],
        tokenA: token(1, 6, 'AAA'),
        tokenB: token(2, 6, 'BBB'),
        feeBps: 25,
        observedAt: 0,
        reserveA: 10_000_000_000n,
        reserveB: 10_000_000_000n,
        sqrtPriceX64: 1n << 64n,
        tickCurrent: 0,
        tickSpacing: 10,
        liquidity: 1_000_000_000_000n,
        ticks: new Map(),
        tickRange: { lower: -1800, upper: 1800 },
        accounts: {
            source: PoolSource.RaydiumClmm,
            ammConfig: key(121),
            vaultA: key(122),
            vaultB: key(123),
            observation: key(124),
            tokenProgramA: TOKEN_PROGRAM_ID,
            tokenProgramB: TOKEN_PROGRAM_ID,
            tickArrays: new Map(),
        },
        ...overrides,
    };
}

export function makeRequest(overrides: Partial<SwapRequest> = {}): SwapRequest {
    return {
        inputMint: key(1),
        outputMint: key(2),
        amountIn: 1_000n,
        slippageBps: 50,
        ...overrides,
    };
}

// ============================================================================
// AUTHORITY NONCES
// ============================================================================

/** Bump that derives the AMM V4 authority */
export function ammV4Nonce(): number {
    return PublicKey.findProgramAddressSync([Buffer.from('amm authority')], PROGRAM_IDS[PoolSource.RaydiumAmmV4])[1];
}

/** Bump that derives a stable pool's authority */
export function stableNonce(pool: PublicKey): number {
    return PublicKey.findProgramAddressSync([pool.toBuffer()], PROGRAM_IDS[PoolSource.RaydiumStable])[1];
}
