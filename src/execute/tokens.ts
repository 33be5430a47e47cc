/**
 * Associated token accounts and wrapped SOL
 */

import { PublicKey, SystemProgram, TransactionInstruction } from '@solana/web3.js';
import { TOKEN_PROGRAM_ID } from '../decode/programs/splToken.js';

export const ASSOCIATED_TOKEN_PROGRAM_ID = new PublicKey('ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL');

// Associated token program: CreateIdempotent
const ATA_CREATE_IDEMPOTENT = 1;
// Token program instruction tags
const TOKEN_CLOSE_ACCOUNT = 9;
const TOKEN_SYNC_NATIVE = 17;

export function deriveAta(owner: PublicKey, mint: PublicKey, tokenProgram: PublicKey = TOKEN_PROGRAM_ID): PublicKey {
    const [ata] = PublicKey.findProgramAddressSync(
        [owner.toBytes(), tokenProgram.toBytes(), mint.toBytes()],
        ASSOCIATED_TOKEN_PROGRAM_ID,
    );
    return ata;
}

/** No-op on chain when the account already exists */
export function createAtaIdempotentIx(
    payer: PublicKey,
    owner: PublicKey,
    mint: PublicKey,
    tokenProgram: PublicKey = TOKEN_PROGRAM_ID,
): TransactionInstruction {
    const ata = deriveAta(owner, mint, tokenProgram);
    return new TransactionInstruction({
        programId: ASSOCIATED_TOKEN_PROGRAM_ID,
        keys: [
            { pubkey: payer, isSigner: true, isWritable: true },                      // 0 funding
            { pubkey: ata, isSigner: false, isWritable: true },                       // 1 associated account
            { pubkey: owner, isSigner: false, isWritable: false },                    // 2 wallet
            { pubkey: mint, isSigner: false, isWritable: false },                     // 3 mint
            { pubkey: SystemProgram.programId, isSigner: false, isWritable: false },  // 4 system program
            { pubkey: tokenProgram, isSigner: false, isWritable: false },             // 5 token program
        ],
        data: Buffer.from([ATA_CREATE_IDEMPOTENT]),
    });
}

export function syncNativeIx(account: PublicKey): TransactionInstruction {
    return new TransactionInstruction({
        programId: TOKEN_PROGRAM_ID,
        keys: [{ pubkey: account, isSigner: false, isWritable: true }],
        data: Buffer.from([TOKEN_SYNC_NATIVE]),
    });
}

export function closeAccountIx(account: PublicKey, destination: PublicKey, owner: PublicKey): TransactionInstruction {
    return new TransactionInstruction({
        programId: TOKEN_PROGRAM_ID,
        keys: [
            { pubkey: account, isSigner: false, isWritable: true },
            { pubkey: destination, isSigner: false, isWritable: true },
            { pubkey: owner, isSigner: true, isWritable: false },
        ],
        data: Buffer.from([TOKEN_CLOSE_ACCOUNT]),
    });
}

/**
 * Move lamports into the owner's wSOL account and sync its token balance.
 * The account must exist (see createAtaIdempotentIx).
 */
export function wrapSolIxs(owner: PublicKey, wsolAccount: PublicKey, lamports: bigint): TransactionInstruction[] {
    return [
        SystemProgram.transfer({ fromPubkey: owner, toPubkey: wsolAccount, lamports }),
        syncNativeIx(wsolAccount),
    ];
}
