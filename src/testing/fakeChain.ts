/**
 * In-process ChainDataSource for tests
 *
 * Accounts live in a map keyed by base58 address. Program-account queries
 * filter that map by owner, dataSize and memcmp. Simulation, send and status
 * responses are scripted per test; every call is counted.
 */

import type { AddressLookupTableAccount, PublicKey, VersionedTransaction } from '@solana/web3.js';
import bs58 from 'bs58';
import type {
    AccountData,
    BlockhashInfo,
    ChainDataSource,
    ProgramAccountFilters,
    SignatureStatus,
    SimulationOutcome,
} from '../rpc/chainSource.js';

export interface FakeAccount {
    owner: PublicKey;
    data: Uint8Array;
    lamports?: number;
}

export interface CallCounts {
    getAccounts: number;
    accountsRequested: number;
    getProgramAccounts: number;
    getLatestBlockhash: number;
    simulateTransaction: number;
    sendTransaction: number;
    getSignatureStatus: number;
    getAddressLookupTable: number;
    getTransactionBalanceChange: number;
}

/** Outcome of one scripted call: a value, or an error to throw */
export type Scripted<T> = T | Error;

export type SimulateHandler = (tx: VersionedTransaction, watch: readonly PublicKey[]) => SimulationOutcome;

function startsWith(data: Uint8Array, offset: number, bytes: Uint8Array): boolean {
    if (offset + bytes.length > data.length) return false;
    for (let i = 0; i < bytes.length; i++) {
        if (data[offset + i] !== bytes[i]) return false;
    }
    return true;
}

function take<T>(queue: Scripted<T>[], fallback: () => T): T {
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next === undefined) return fallback();
    if (next instanceof Error) throw next;
    return next;
}

export class FakeChain implements ChainDataSource {
    readonly accounts = new Map<string, FakeAccount & { address: PublicKey }>();
    readonly lookupTables = new Map<string, AddressLookupTableAccount>();
    readonly calls: CallCounts = {
        getAccounts: 0,
        accountsRequested: 0,
        getProgramAccounts: 0,
        getLatestBlockhash: 0,
        simulateTransaction: 0,
        sendTransaction: 0,
        getSignatureStatus: 0,
        getAddressLookupTable: 0,
        getTransactionBalanceChange: 0,
    };
    readonly sent: VersionedTransaction[] = [];

    /** The last entry repeats once the queue is down to one */
    sendResults: Scripted<string>[] = [];
    statusResults: Scripted<SignatureStatus | null>[] = [];
    balanceChange: bigint | null = null;
    simulate: SimulateHandler = () => ({ err: null, logs: [], accounts: [] });
    blockhash: BlockhashInfo = { blockhash: bs58.encode(new Uint8Array(32).fill(7)), lastValidBlockHeight: 1_000 };

    setAccount(address: PublicKey, account: FakeAccount): void {
        this.accounts.set(address.toBase58(), { ...account, address });
    }

    deleteAccount(address: PublicKey): void {
        this.accounts.delete(address.toBase58());
    }

    async getAccounts(addresses: readonly PublicKey[]): Promise<(AccountData | null)[]> {
        this.calls.getAccounts++;
        this.calls.accountsRequested += addresses.length;
        return addresses.map(address => {
            const account = this.accounts.get(address.toBase58());
            if (!account) return null;
            return { address, owner: account.owner, data: account.data, lamports: account.lamports ?? 0 };
        });
    }

    async getProgramAccounts(programId: PublicKey, filters: ProgramAccountFilters): Promise<AccountData[]> {
        this.calls.getProgramAccounts++;
        const memcmp = (filters.memcmp ?? []).map(m => ({ offset: m.offset, bytes: bs58.decode(m.bytes) }));
        const out: AccountData[] = [];
        for (const account of this.accounts.values()) {
            if (!account.owner.equals(programId)) continue;
            if (filters.dataSize !== undefined && account.data.length !== filters.dataSize) continue;
            if (!memcmp.every(m => startsWith(account.data, m.offset, m.bytes))) continue;
            out.push({
                address: account.address,
                owner: account.owner,
                data: account.data,
                lamports: account.lamports ?? 0,
            });
        }
        return out;
    }

    async getLatestBlockhash(): Promise<BlockhashInfo> {
        this.calls.getLatestBlockhash++;
        return this.blockhash;
    }

    async simulateTransaction(tx: VersionedTransaction, watch: readonly PublicKey[]): Promise<SimulationOutcome> {
        this.calls.simulateTransaction++;
        return this.simulate(tx, watch);
    }

    async sendTransaction(tx: VersionedTransaction): Promise<string> {
        this.calls.sendTransaction++;
        const signature = take(this.sendResults, () => `sig-${this.calls.sendTransaction}`);
        this.sent.push(tx);
        return signature;
    }

    async getSignatureStatus(_signature: string): Promise<SignatureStatus | null> {
        this.calls.getSignatureStatus++;
        return take(this.statusResults, () => ({ slot: 1, confirmation: 'confirmed', err: null }));
    }

    async getAddressLookupTable(address: PublicKey): Promise<AddressLookupTableAccount | null> {
        this.calls.getAddressLookupTable++;
        return this.lookupTables.get(address.toBase58()) ?? null;
    }

    async getTransactionBalanceChange(_signature: string, _owner: PublicKey, _mint: PublicKey): Promise<bigint | null> {
        this.calls.getTransactionBalanceChange++;
        return this.balanceChange;
    }
}
