/**
 * Transaction signer
 */

import { Keypair, type PublicKey, type VersionedTransaction } from '@solana/web3.js';
import bs58 from 'bs58';
import { readFileSync } from 'node:fs';

export interface Signer {
    readonly publicKey: PublicKey;
    sign(tx: VersionedTransaction): Promise<VersionedTransaction>;
}

export class KeypairSigner implements Signer {
    constructor(private readonly keypair: Keypair) {}

    get publicKey(): PublicKey {
        return this.keypair.publicKey;
    }

    async sign(tx: VersionedTransaction): Promise<VersionedTransaction> {
        tx.sign([this.keypair]);
        return tx;
    }
}

/**
 * Parse a secret key given either as a JSON byte array (solana-keygen
 * format) or as a base58 string.
 */
export function parseSecretKey(raw: string): Keypair {
    const text = raw.trim();
    if (text.startsWith('[')) {
        const parsed: unknown = JSON.parse(text);
        if (!Array.isArray(parsed) || !parsed.every(n => typeof n === 'number' && Number.isInteger(n) && n >= 0 && n < 256)) {
            throw new Error('Keypair file must contain an array of bytes');
        }
        return Keypair.fromSecretKey(Uint8Array.from(parsed));
    }
    return Keypair.fromSecretKey(bs58.decode(text));
}

export function loadKeypair(path: string): Keypair {
    return parseSecretKey(readFileSync(path, 'utf8'));
}
