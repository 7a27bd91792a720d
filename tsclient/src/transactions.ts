import { SendTransactionError, Transaction } from '@solana/web3.js';
import type {
    AccountInfo,
    BlockhashWithExpiryBlockHeight,
    Commitment,
    PublicKey,
    RpcResponseAndContext,
    SendOptions,
    SignatureStatus,
    Signer,
    TransactionInstruction,
    TransactionSignature
} from '@solana/web3.js';
import { setTimeout } from 'timers/promises';
import { NetworkError, describeError } from './errors';
import { consoleLogger } from './logger';
import type { Logger } from './logger';

/**
 * The RPC calls the client makes. `Connection` satisfies this; tests swap in an
 * in-process ledger.
 */
export interface LedgerRpc {
    getLatestBlockhash(commitment?: Commitment): Promise<BlockhashWithExpiryBlockHeight>;
    sendRawTransaction(rawTransaction: Buffer | Uint8Array | number[], options?: SendOptions): Promise<TransactionSignature>;
    getSignatureStatuses(signatures: TransactionSignature[]): Promise<RpcResponseAndContext<(SignatureStatus | null)[]>>;
    getAccountInfo(address: PublicKey, commitment?: Commitment): Promise<AccountInfo<Buffer> | null>;
    getBalance(address: PublicKey, commitment?: Commitment): Promise<number>;
}

export type TransactionOutcome =
    | { status: 'accepted'; signature: TransactionSignature }
    | { status: 'rejected'; reason: string; logs: string[]; signature?: TransactionSignature }
    | { status: 'timeout'; signature: TransactionSignature; attempts: number };

export interface ConfirmationOptions {
    intervalMs: number;
    maxAttempts: number;
}

export const DEFAULT_CONFIRMATION: ConfirmationOptions = {
    intervalMs: 1000,
    maxAttempts: 15
};

const TERMINAL_STATUSES = new Set(['confirmed', 'finalized']);

export class TransactionSubmitter {
    private rpc: LedgerRpc;
    private confirmation: ConfirmationOptions;
    private commitment: Commitment;
    private logger: Logger;

    constructor(
        rpc: LedgerRpc,
        options: { confirmation?: Partial<ConfirmationOptions>; commitment?: Commitment; logger?: Logger } = {}
    ) {
        this.rpc = rpc;
        this.confirmation = { ...DEFAULT_CONFIRMATION, ...options.confirmation };
        this.commitment = options.commitment ?? 'confirmed';
        this.logger = options.logger ?? consoleLogger;
    }

    /**
     * Binds the instruction to a recent blockhash, signs it with the fee payer
     * and sends it. Does not wait for confirmation.
     */
    async submit(
        operation: string,
        instruction: TransactionInstruction,
        payer: Signer
    ): Promise<TransactionOutcome> {
        let latest: BlockhashWithExpiryBlockHeight;
        try {
            latest = await this.rpc.getLatestBlockhash(this.commitment);
        } catch (error) {
            throw new NetworkError(`${operation}: failed to fetch latest blockhash: ${describeError(error)}`, {
                operation,
                cause: error
            });
        }

        const transaction = new Transaction({
            feePayer: payer.publicKey,
            blockhash: latest.blockhash,
            lastValidBlockHeight: latest.lastValidBlockHeight
        }).add(instruction);
        transaction.sign(payer);

        let signature: TransactionSignature;
        try {
            signature = await this.rpc.sendRawTransaction(transaction.serialize(), {
                preflightCommitment: this.commitment
            });
        } catch (error) {
            if (error instanceof SendTransactionError) {
                const { message, logs } = error.transactionError;
                return { status: 'rejected', reason: message, logs: logs ?? [] };
            }
            throw new NetworkError(`${operation}: failed to send transaction: ${describeError(error)}`, {
                operation,
                cause: error
            });
        }

        if (!signature) {
            return { status: 'rejected', reason: 'RPC returned an empty signature', logs: [] };
        }
        this.logger.info(`${operation} TX:`, signature);
        return { status: 'accepted', signature };
    }

    /**
     * Polls the signature status until it is confirmed or finalized. Running out
     * of attempts yields `timeout`: the transaction may still land later.
     */
    async awaitConfirmation(signature: TransactionSignature): Promise<TransactionOutcome> {
        const { intervalMs, maxAttempts } = this.confirmation;
        this.logger.info('Waiting confirmation...', signature);

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            await setTimeout(intervalMs);

            let status: SignatureStatus | null;
            try {
                const response = await this.rpc.getSignatureStatuses([signature]);
                status = response.value[0] ?? null;
            } catch (error) {
                this.logger.warn(`Status query ${attempt}/${maxAttempts} failed:`, describeError(error));
                continue;
            }

            if (status?.confirmationStatus && TERMINAL_STATUSES.has(status.confirmationStatus)) {
                if (status.err) {
                    return {
                        status: 'rejected',
                        reason: `transaction failed: ${JSON.stringify(status.err)}`,
                        logs: [],
                        signature
                    };
                }
                this.logger.info('Transaction confirmed', signature);
                return { status: 'accepted', signature };
            }
        }

        this.logger.warn('Confirmation timeout', signature);
        return { status: 'timeout', signature, attempts: maxAttempts };
    }

    async sendAndConfirm(
        operation: string,
        instruction: TransactionInstruction,
        payer: Signer
    ): Promise<TransactionOutcome> {
        const submitted = await this.submit(operation, instruction, payer);
        if (submitted.status !== 'accepted') {
            return submitted;
        }
        return this.awaitConfirmation(submitted.signature);
    }
}
