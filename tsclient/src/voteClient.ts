import {
    LAMPORTS_PER_SOL,
    SystemProgram,
    TransactionInstruction
} from '@solana/web3.js';
import type { Commitment, PublicKey, Signer, TransactionSignature } from '@solana/web3.js';
import {
    INITIALIZE_VOTING,
    VOTE,
    decodeVotingAccount,
    encodeInitializeVoting,
    encodeVote
} from './codec';
import type { VotingSession } from './codec';
import {
    ConfigurationError,
    ConfirmationTimeoutError,
    DecodeError,
    NetworkError,
    SubmissionRejectedError,
    describeError
} from './errors';
import { consoleLogger } from './logger';
import type { Logger } from './logger';
import { findVotePda, findVotingPda } from './pda';
import { buildTallyReport } from './report';
import type { TallyReport } from './report';
import { TransactionSubmitter } from './transactions';
import type { ConfirmationOptions, LedgerRpc, TransactionOutcome } from './transactions';

export const MIN_OPTIONS = 2;
export const MAX_OPTIONS = 3;

export interface VotingParams {
    companyId: bigint;
    votingId: bigint;
    question: string;
    options: string[];
    /** 0-based index into `options`. */
    selectedOption: number;
}

export interface VotingRunResult {
    votingPda: PublicKey;
    votePda: PublicKey;
    balanceLamports: number;
    /** True when this run created the voting account. */
    initialized: boolean;
    /** True when this run cast the vote. */
    voted: boolean;
    alreadyVoted: boolean;
    signatures: {
        initializeVoting?: TransactionSignature;
        vote?: TransactionSignature;
    };
    session: VotingSession;
    report: TallyReport;
}

export interface VotingClientOptions {
    confirmation?: Partial<ConfirmationOptions>;
    commitment?: Commitment;
    logger?: Logger;
}

/**
 * Mirrors the program's own checks so a bad request fails before it costs a
 * network round-trip. The program stays authoritative.
 */
export function validateVotingParams(params: VotingParams): void {
    const details: string[] = [];
    if (params.options.length < MIN_OPTIONS || params.options.length > MAX_OPTIONS) {
        details.push(`options: expected ${MIN_OPTIONS}-${MAX_OPTIONS} entries, got ${params.options.length}`);
    }
    if (!Number.isInteger(params.selectedOption) || params.selectedOption < 0 || params.selectedOption >= params.options.length) {
        details.push(`selectedOption: ${params.selectedOption} is not an index into ${params.options.length} options`);
    }
    if (details.length > 0) {
        throw new ConfigurationError('Invalid voting parameters', details);
    }
}

/**
 * Ensures a voting exists, ensures the payer has voted in it, then reads the
 * tallies back.
 *
 * The existence checks are not atomic: two concurrent runs can both see an
 * account as missing and both submit. The program refuses to create an account
 * that already exists, so the second submission is rejected; no client-side
 * lock is taken.
 */
export class VotingClient {
    private rpc: LedgerRpc;
    private programId: PublicKey;
    private payer: Signer;
    private submitter: TransactionSubmitter;
    private commitment: Commitment;
    private logger: Logger;

    constructor(
        rpc: LedgerRpc,
        programId: PublicKey,
        payer: Signer,
        options: VotingClientOptions = {}
    ) {
        this.rpc = rpc;
        this.programId = programId;
        this.payer = payer;
        this.commitment = options.commitment ?? 'confirmed';
        this.logger = options.logger ?? consoleLogger;
        this.submitter = new TransactionSubmitter(rpc, {
            confirmation: options.confirmation,
            commitment: this.commitment,
            logger: this.logger
        });
    }

    async run(params: VotingParams): Promise<VotingRunResult> {
        validateVotingParams(params);

        const balanceLamports = await this.getBalance();
        this.logger.info(`Balance: ${balanceLamports / LAMPORTS_PER_SOL} SOL`);

        const [votingPda] = findVotingPda(this.programId, params.companyId, params.votingId);
        const [votePda] = findVotePda(this.programId, votingPda, this.payer.publicKey);
        this.logger.info('Voting PDA:', votingPda.toBase58());
        this.logger.info('Vote PDA:', votePda.toBase58());

        const initializeVoting = await this.ensureVoting(votingPda, params);
        const vote = await this.ensureVote(votingPda, votePda, params);
        const session = await this.fetchVoting(votingPda);

        const signatures: VotingRunResult['signatures'] = {};
        if (initializeVoting !== null) {
            signatures.initializeVoting = initializeVoting;
        }
        if (vote !== null) {
            signatures.vote = vote;
        }

        return {
            votingPda,
            votePda,
            balanceLamports,
            initialized: initializeVoting !== null,
            voted: vote !== null,
            alreadyVoted: vote === null,
            signatures,
            session,
            report: buildTallyReport(session)
        };
    }

    /**
     * Sends `initialize_voting` unless the voting account already exists.
     * Returns the confirmed signature, or null when nothing was sent.
     */
    async ensureVoting(votingPda: PublicKey, params: VotingParams): Promise<TransactionSignature | null> {
        if (await this.accountExists(votingPda, INITIALIZE_VOTING)) {
            this.logger.info('Voting exists');
            return null;
        }
        this.logger.info('Initializing voting...');
        return this.sendAndConfirm(
            INITIALIZE_VOTING,
            this.buildInitializeVotingInstruction(votingPda, params),
            votingPda
        );
    }

    /**
     * Sends `vote` unless the payer's vote account already exists. Returns the
     * confirmed signature, or null when the payer had already voted.
     */
    async ensureVote(
        votingPda: PublicKey,
        votePda: PublicKey,
        params: VotingParams
    ): Promise<TransactionSignature | null> {
        if (await this.accountExists(votePda, VOTE)) {
            this.logger.info('User already voted');
            return null;
        }
        this.logger.info('Sending vote...');
        return this.sendAndConfirm(VOTE, this.buildVoteInstruction(votingPda, votePda, params), votePda);
    }

    async fetchVoting(votingPda: PublicKey): Promise<VotingSession> {
        const address = votingPda.toBase58();
        const account = await this.getAccountInfo(votingPda, 'fetch_voting');
        if (!account) {
            throw new NetworkError(`Voting account ${address} not found`, { operation: 'fetch_voting', address });
        }
        try {
            return decodeVotingAccount(account.data);
        } catch (error) {
            if (error instanceof DecodeError) {
                throw new DecodeError(error.message, { operation: 'fetch_voting', address, cause: error });
            }
            throw error;
        }
    }

    buildInitializeVotingInstruction(votingPda: PublicKey, params: VotingParams): TransactionInstruction {
        return new TransactionInstruction({
            keys: [
                { pubkey: votingPda, isSigner: false, isWritable: true },
                { pubkey: this.payer.publicKey, isSigner: true, isWritable: true },
                { pubkey: SystemProgram.programId, isSigner: false, isWritable: false },
            ],
            programId: this.programId,
            data: encodeInitializeVoting(params),
        });
    }

    buildVoteInstruction(votingPda: PublicKey, votePda: PublicKey, params: VotingParams): TransactionInstruction {
        return new TransactionInstruction({
            keys: [
                { pubkey: votingPda, isSigner: false, isWritable: true },
                { pubkey: votePda, isSigner: false, isWritable: true },
                { pubkey: this.payer.publicKey, isSigner: true, isWritable: true },
                { pubkey: SystemProgram.programId, isSigner: false, isWritable: false },
            ],
            programId: this.programId,
            data: encodeVote(params),
        });
    }

    private async sendAndConfirm(
        operation: string,
        instruction: TransactionInstruction,
        target: PublicKey
    ): Promise<TransactionSignature> {
        const address = target.toBase58();
        let outcome: TransactionOutcome;
        try {
            outcome = await this.submitter.sendAndConfirm(operation, instruction, this.payer);
        } catch (error) {
            if (error instanceof NetworkError) {
                throw new NetworkError(error.message, { operation, address, cause: error });
            }
            throw error;
        }

        switch (outcome.status) {
            case 'accepted':
                return outcome.signature;
            case 'rejected':
                throw new SubmissionRejectedError(outcome.reason, outcome.logs, { operation, address });
            case 'timeout':
                throw new ConfirmationTimeoutError(outcome.signature, outcome.attempts, { operation, address });
        }
    }

    private async getBalance(): Promise<number> {
        const address = this.payer.publicKey.toBase58();
        try {
            return await this.rpc.getBalance(this.payer.publicKey, this.commitment);
        } catch (error) {
            throw new NetworkError(`Failed to get balance: ${describeError(error)}`, {
                operation: 'get_balance',
                address,
                cause: error
            });
        }
    }

    private async getAccountInfo(address: PublicKey, operation: string) {
        try {
            return await this.rpc.getAccountInfo(address, this.commitment);
        } catch (error) {
            throw new NetworkError(`${operation}: failed to look up ${address.toBase58()}: ${describeError(error)}`, {
                operation,
                address: address.toBase58(),
                cause: error
            });
        }
    }

    private async accountExists(address: PublicKey, operation: string): Promise<boolean> {
        return (await this.getAccountInfo(address, operation)) !== null;
    }
}
