/**
 * Quote Engine
 *
 * Dispatches a request to the variant's math module and turns the raw
 * amounts into a QuoteResult. Pure: the same PoolState and SwapRequest
 * always give the same outcome.
 */

import {
    PoolVariant,
    QuoteErrorCode,
    type ConcentratedPool,
    type PoolState,
    type QuoteOutcome,
    type QuoteResult,
    type SwapRequest,
    type TokenRef,
} from '../types.js';
import { simulateClmm } from './math/clmm.js';
import { simulateConstantProduct } from './math/constantProduct.js';
import { Dec, priceImpactPct, sqrtPriceX64ToPrice, unitPrice, type Decimal } from './math/pricing.js';
import { simulateStableSwap, stableSpotPrice } from './math/stableSwap.js';
import type { MathResult } from './types.js';

/** Which side of the pool the request sells */
export interface SwapSide {
    /** true when selling tokenA (token0) for tokenB */
    aToB: boolean;
    inputToken: TokenRef;
    outputToken: TokenRef;
    reserveIn: bigint;
    reserveOut: bigint;
}

export function resolveSide(pool: PoolState, request: SwapRequest): SwapSide | null {
    const { tokenA, tokenB } = pool;
    if (tokenA.mint.equals(request.inputMint) && tokenB.mint.equals(request.outputMint)) {
        return { aToB: true, inputToken: tokenA, outputToken: tokenB, reserveIn: pool.reserveA, reserveOut: pool.reserveB };
    }
    if (tokenB.mint.equals(request.inputMint) && tokenA.mint.equals(request.outputMint)) {
        return { aToB: false, inputToken: tokenB, outputToken: tokenA, reserveIn: pool.reserveB, reserveOut: pool.reserveA };
    }
    return null;
}

function assertNever(value: never): never {
    throw new Error(`Unhandled pool variant: ${JSON.stringify(value)}`);
}

function reserveSpot(side: SwapSide): Decimal {
    return unitPrice(side.reserveOut, side.outputToken.decimals, side.reserveIn, side.inputToken.decimals);
}

function simulateVariant(pool: PoolState, side: SwapSide, amountIn: bigint): MathResult {
    switch (pool.variant) {
        case PoolVariant.ConstantProduct:
            return simulateConstantProduct(amountIn, side.reserveIn, side.reserveOut, pool.feeBps);
        case PoolVariant.Stabilized:
            return simulateStableSwap(
                amountIn,
                side.reserveIn,
                side.reserveOut,
                pool.amp,
                pool.feeBps,
                side.inputToken.decimals,
                side.outputToken.decimals
            );
        case PoolVariant.Concentrated:
            return simulateConcentrated(pool, amountIn, side.aToB);
        default:
            return assertNever(pool);
    }
}

function simulateConcentrated(pool: ConcentratedPool, amountIn: bigint, zeroForOne: boolean): MathResult {
    return simulateClmm(
        {
            sqrtPriceX64: pool.sqrtPriceX64,
            tickCurrent: pool.tickCurrent,
            liquidity: pool.liquidity,
            feeBps: pool.feeBps,
            ticks: pool.ticks,
            tickRange: pool.tickRange,
        },
        amountIn,
        zeroForOne
    );
}

/**
 * Marginal output per input (whole-token units) before any trade
 */
export function sideSpotPrice(pool: PoolState, side: SwapSide): Decimal {
    switch (pool.variant) {
        case PoolVariant.ConstantProduct:
            return reserveSpot(side);
        case PoolVariant.Stabilized:
            return stableSpotPrice(pool.amp, side.reserveIn, side.reserveOut, side.inputToken.decimals, side.outputToken.decimals)
                ?? reserveSpot(side);
        case PoolVariant.Concentrated: {
            const price1Per0 = sqrtPriceX64ToPrice(pool.sqrtPriceX64, pool.tokenA.decimals, pool.tokenB.decimals);
            if (side.aToB) return price1Per0;
            return price1Per0.isZero() ? new Dec(0) : new Dec(1).div(price1Per0);
        }
        default:
            return assertNever(pool);
    }
}

/** tokenB per tokenA */
export function poolSpotPrice(pool: PoolState): Decimal {
    return sideSpotPrice(pool, {
        aToB: true,
        inputToken: pool.tokenA,
        outputToken: pool.tokenB,
        reserveIn: pool.reserveA,
        reserveOut: pool.reserveB,
    });
}

/**
 * Quote an exact-input swap against one pool
 * @param poolTtlMs freshness window of pool state; sets validUntil
 */
export function quote(pool: PoolState, request: SwapRequest, poolTtlMs: number): QuoteOutcome {
    const side = resolveSide(pool, request);
    if (!side) {
        return {
            ok: false,
            error: {
                code: QuoteErrorCode.TokenMismatch,
                pool: pool.address,
                variant: pool.variant,
                message: `pool does not trade ${request.inputMint.toBase58()} -> ${request.outputMint.toBase58()}`,
            },
        };
    }

    const result = simulateVariant(pool, side, request.amountIn);
    if (!result.success) {
        return {
            ok: false,
            error: { code: result.error, pool: pool.address, variant: pool.variant, message: result.reason },
        };
    }

    const { inputToken, outputToken } = side;
    const spot = sideSpotPrice(pool, side);
    const effectivePrice = unitPrice(result.amountOut, outputToken.decimals, request.amountIn, inputToken.decimals);
    const netEffective = unitPrice(result.amountOut, outputToken.decimals, request.amountIn - result.feePaid, inputToken.decimals);

    const quoteResult: QuoteResult = {
        pool: pool.address,
        variant: pool.variant,
        source: pool.accounts.source,
        inputToken,
        outputToken,
        amountIn: request.amountIn,
        amountOut: result.amountOut,
        feeAmount: result.feePaid,
        priceImpactPct: priceImpactPct(spot, netEffective),
        effectivePrice,
        spotPrice: spot,
        validUntil: pool.observedAt + poolTtlMs,
    };
    return { ok: true, quote: Object.freeze(quoteResult) };
}
