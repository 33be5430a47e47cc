/**
 * Chain data source
 *
 * The only way the core talks to the cluster. ConnectionChainSource is the
 * production implementation over @solana/web3.js; tests use an in-process
 * fake with the same interface.
 */

import {
    Connection,
    PublicKey,
    type AddressLookupTableAccount,
    type Commitment,
    type GetProgramAccountsFilter,
    type VersionedTransaction,
} from '@solana/web3.js';
import { RpcError, errorMessage } from '../errors.js';
import { classifyError } from './classify.js';
import { ConcurrencyLimiter } from './limiter.js';

// getMultipleAccounts accepts at most 100 keys per call
export const MAX_ACCOUNTS_PER_REQUEST = 100;

export interface AccountData {
    readonly address: PublicKey;
    readonly owner: PublicKey;
    readonly data: Uint8Array;
    readonly lamports: number;
}

export interface MemcmpFilter {
    offset: number;
    /** base58 */
    bytes: string;
}

export interface ProgramAccountFilters {
    dataSize?: number;
    memcmp?: MemcmpFilter[];
}

export interface SimulationOutcome {
    /** null on success */
    err: string | null;
    logs: string[];
    /** Post-simulation data of the watched accounts, in request order */
    accounts: (Uint8Array | null)[];
    unitsConsumed?: number;
}

export type ConfirmationLevel = 'processed' | 'confirmed' | 'finalized';

export interface SignatureStatus {
    slot: number;
    confirmation: ConfirmationLevel | null;
    /** On-chain execution error, null on success */
    err: string | null;
}

export interface BlockhashInfo {
    blockhash: string;
    lastValidBlockHeight: number;
}

export interface ChainDataSource {
    getAccounts(addresses: readonly PublicKey[]): Promise<(AccountData | null)[]>;
    getProgramAccounts(programId: PublicKey, filters: ProgramAccountFilters): Promise<AccountData[]>;
    getLatestBlockhash(): Promise<BlockhashInfo>;
    simulateTransaction(tx: VersionedTransaction, watch: readonly PublicKey[]): Promise<SimulationOutcome>;
    sendTransaction(tx: VersionedTransaction): Promise<string>;
    getSignatureStatus(signature: string): Promise<SignatureStatus | null>;
    getAddressLookupTable(address: PublicKey): Promise<AddressLookupTableAccount | null>;
    /** Net change of `owner`'s balance of `mint` in a landed transaction */
    getTransactionBalanceChange?(signature: string, owner: PublicKey, mint: PublicKey): Promise<bigint | null>;
}

export interface ConnectionSourceOptions {
    timeoutMs: number;
    commitment?: Commitment;
}

function stringifyErr(err: unknown): string | null {
    if (err === null || err === undefined) return null;
    return typeof err === 'string' ? err : JSON.stringify(err);
}

export class ConnectionChainSource implements ChainDataSource {
    private readonly commitment: Commitment;

    constructor(
        private readonly connection: Connection,
        private readonly limiter: ConcurrencyLimiter,
        private readonly options: ConnectionSourceOptions
    ) {
        this.commitment = options.commitment ?? 'confirmed';
    }

    static fromUrl(url: string, limiter: ConcurrencyLimiter, options: ConnectionSourceOptions): ConnectionChainSource {
        return new ConnectionChainSource(new Connection(url, options.commitment ?? 'confirmed'), limiter, options);
    }

    async getAccounts(addresses: readonly PublicKey[]): Promise<(AccountData | null)[]> {
        const chunks: PublicKey[][] = [];
        for (let i = 0; i < addresses.length; i += MAX_ACCOUNTS_PER_REQUEST) {
            chunks.push(addresses.slice(i, i + MAX_ACCOUNTS_PER_REQUEST));
        }
        const results = await Promise.all(
            chunks.map(chunk =>
                this.call(`getMultipleAccounts(${chunk.length})`, () =>
                    this.connection.getMultipleAccountsInfo(chunk, this.commitment)
                ).then(infos =>
                    infos.map((info, i): AccountData | null => {
                        const address = chunk[i];
                        if (!info || !address) return null;
                        return {
                            address,
                            owner: info.owner,
                            data: new Uint8Array(info.data),
                            lamports: info.lamports,
                        };
                    })
                )
            )
        );
        return results.flat();
    }

    async getProgramAccounts(programId: PublicKey, filters: ProgramAccountFilters): Promise<AccountData[]> {
        const rpcFilters: GetProgramAccountsFilter[] = [];
        if (filters.dataSize !== undefined) rpcFilters.push({ dataSize: filters.dataSize });
        for (const m of filters.memcmp ?? []) {
            rpcFilters.push({ memcmp: { offset: m.offset, bytes: m.bytes } });
        }
        const accounts = await this.call(`getProgramAccounts(${programId.toBase58()})`, () =>
            this.connection.getProgramAccounts(programId, { commitment: this.commitment, filters: rpcFilters })
        );
        return accounts.map(({ pubkey, account }) => ({
            address: pubkey,
            owner: account.owner,
            data: new Uint8Array(account.data),
            lamports: account.lamports,
        }));
    }

    getLatestBlockhash(): Promise<BlockhashInfo> {
        return this.call('getLatestBlockhash', () => this.connection.getLatestBlockhash(this.commitment));
    }

    async simulateTransaction(tx: VersionedTransaction, watch: readonly PublicKey[]): Promise<SimulationOutcome> {
        const response = await this.call('simulateTransaction', () =>
            this.connection.simulateTransaction(tx, {
                sigVerify: false,
                replaceRecentBlockhash: true,
                commitment: this.commitment,
                accounts: { encoding: 'base64', addresses: watch.map(k => k.toBase58()) },
            })
        );
        const value = response.value;
        const accounts = (value.accounts ?? []).map(acc => {
            if (!acc) return null;
            const [b64] = acc.data;
            return b64 === undefined ? null : new Uint8Array(Buffer.from(b64, 'base64'));
        });
        return {
            err: stringifyErr(value.err),
            logs: value.logs ?? [],
            accounts,
            unitsConsumed: value.unitsConsumed,
        };
    }

    sendTransaction(tx: VersionedTransaction): Promise<string> {
        // Retries are owned by the submitter, so the node must not rebroadcast
        return this.call('sendTransaction', () =>
            this.connection.sendRawTransaction(tx.serialize(), { skipPreflight: true, maxRetries: 0 })
        );
    }

    async getSignatureStatus(signature: string): Promise<SignatureStatus | null> {
        const response = await this.call('getSignatureStatus', () =>
            this.connection.getSignatureStatus(signature, { searchTransactionHistory: false })
        );
        const status = response.value;
        if (!status) return null;
        return {
            slot: status.slot,
            confirmation: status.confirmationStatus ?? null,
            err: stringifyErr(status.err),
        };
    }

    async getAddressLookupTable(address: PublicKey): Promise<AddressLookupTableAccount | null> {
        const response = await this.call('getAddressLookupTable', () =>
            this.connection.getAddressLookupTable(address, { commitment: this.commitment })
        );
        return response.value;
    }

    async getTransactionBalanceChange(signature: string, owner: PublicKey, mint: PublicKey): Promise<bigint | null> {
        const tx = await this.call('getTransaction', () =>
            this.connection.getTransaction(signature, { commitment: 'confirmed', maxSupportedTransactionVersion: 0 })
        );
        const meta = tx?.meta;
        if (!meta) return null;
        const ownerKey = owner.toBase58();
        const mintKey = mint.toBase58();
        const pick = (balances: typeof meta.preTokenBalances): bigint => {
            const entry = (balances ?? []).find(b => b.owner === ownerKey && b.mint === mintKey);
            return entry ? BigInt(entry.uiTokenAmount.amount) : 0n;
        };
        return pick(meta.postTokenBalances) - pick(meta.preTokenBalances);
    }

    // ========================================================================
    // PRIVATE
    // ========================================================================

    /** Timed out calls keep their limiter slot until web3.js settles them */
    private call<T>(label: string, fn: () => Promise<T>): Promise<T> {
        const { timeoutMs } = this.options;
        return this.limiter.run(
            async () => {
                try {
                    return await fn();
                } catch (err) {
                    const classified = classifyError(err);
                    throw new RpcError(`${label}: ${errorMessage(err)}`, classified.transient, err);
                }
            },
            { ms: timeoutMs, error: () => new RpcError(`${label}: RPC timeout after ${timeoutMs}ms`, true) }
        );
    }
}
