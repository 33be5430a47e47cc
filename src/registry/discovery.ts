/**
 * Pool Discovery
 *
 * Finds pool accounts by mint with getProgramAccounts memcmp filters at
 * each venue's mint offsets. Address sets are cached in the `discovery`
 * namespace; concurrent lookups of the same pair share one fan-out.
 */

import type { PublicKey } from '@solana/web3.js';
import type { TtlCache } from '../cache/ttlCache.js';
import type { CacheNamespaces } from '../cache/types.js';
import { CLMM_MINT_OFFSETS, CLMM_POOL_SIZE } from '../decode/programs/raydiumClmm.js';
import { CP_SWAP_MINT_OFFSETS, CP_SWAP_POOL_SIZE } from '../decode/programs/raydiumCpSwap.js';
import { STABLE_MINT_OFFSETS } from '../decode/programs/raydiumStable.js';
import { AMM_V4_MINT_OFFSETS, AMM_V4_SIZE } from '../decode/programs/raydiumV4.js';
import type { ChainDataSource, ProgramAccountFilters } from '../rpc/chainSource.js';
import { PoolSource, PROGRAM_IDS } from '../types.js';
import { logger } from '../utils/logger.js';

const log = logger.child('discovery');

export interface DiscoveryVenue {
    source: PoolSource;
    programId: PublicKey;
    /** Offsets of the two mint fields in pool order */
    mintOffsets: readonly [number, number];
    dataSize?: number;
}

export const DISCOVERY_VENUES: readonly DiscoveryVenue[] = [
    {
        source: PoolSource.RaydiumAmmV4,
        programId: PROGRAM_IDS[PoolSource.RaydiumAmmV4],
        mintOffsets: [AMM_V4_MINT_OFFSETS.base, AMM_V4_MINT_OFFSETS.quote],
        dataSize: AMM_V4_SIZE,
    },
    {
        source: PoolSource.RaydiumCpSwap,
        programId: PROGRAM_IDS[PoolSource.RaydiumCpSwap],
        mintOffsets: [CP_SWAP_MINT_OFFSETS.token0, CP_SWAP_MINT_OFFSETS.token1],
        dataSize: CP_SWAP_POOL_SIZE,
    },
    {
        source: PoolSource.RaydiumStable,
        programId: PROGRAM_IDS[PoolSource.RaydiumStable],
        mintOffsets: [STABLE_MINT_OFFSETS.tokenA, STABLE_MINT_OFFSETS.tokenB],
    },
    {
        source: PoolSource.RaydiumClmm,
        programId: PROGRAM_IDS[PoolSource.RaydiumClmm],
        mintOffsets: [CLMM_MINT_OFFSETS.token0, CLMM_MINT_OFFSETS.token1],
        dataSize: CLMM_POOL_SIZE,
    },
];

function filtersFor(venue: DiscoveryVenue, matches: Array<[number, PublicKey]>): ProgramAccountFilters {
    const filters: ProgramAccountFilters = {
        memcmp: matches.map(([offset, mint]) => ({ offset, bytes: mint.toBase58() })),
    };
    if (venue.dataSize !== undefined) filters.dataSize = venue.dataSize;
    return filters;
}

export class PoolDiscovery {
    constructor(
        private readonly source: ChainDataSource,
        private readonly cache: TtlCache<CacheNamespaces>,
        private readonly maxPoolsPerType: number,
        private readonly venues: readonly DiscoveryVenue[] = DISCOVERY_VENUES
    ) {}

    /** Pool addresses (base58) trading a and b, in either mint order */
    findForPair(a: PublicKey, b: PublicKey): Promise<readonly string[]> {
        const [lo, hi] = [a.toBase58(), b.toBase58()].sort();
        return this.cache.getOrLoad('discovery', `pair:${lo}:${hi}`, () =>
            this.search(venue => {
                const [first, second] = venue.mintOffsets;
                return [
                    filtersFor(venue, [[first, a], [second, b]]),
                    filtersFor(venue, [[first, b], [second, a]]),
                ];
            })
        );
    }

    /** Pool addresses (base58) with `mint` on either side */
    findForToken(mint: PublicKey): Promise<readonly string[]> {
        return this.cache.getOrLoad('discovery', `token:${mint.toBase58()}`, () =>
            this.search(venue => venue.mintOffsets.map(offset => filtersFor(venue, [[offset, mint]])))
        );
    }

    private async search(queriesFor: (venue: DiscoveryVenue) => ProgramAccountFilters[]): Promise<readonly string[]> {
        const perVenue = await Promise.all(
            this.venues.map(async venue => {
                const results = await Promise.all(
                    queriesFor(venue).map(filters => this.source.getProgramAccounts(venue.programId, filters))
                );
                const unique = [...new Set(results.flat().map(account => account.address.toBase58()))].sort();
                if (unique.length > this.maxPoolsPerType) {
                    log.debug(`${venue.source}: ${unique.length} pools, keeping ${this.maxPoolsPerType}`);
                }
                return unique.slice(0, this.maxPoolsPerType);
            })
        );
        return Object.freeze(perVenue.flat());
    }
}
