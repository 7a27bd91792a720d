import {
  Keypair,
  PublicKey,
  SendTransactionError,
  Transaction,
} from "@solana/web3.js";
import type {
  AccountInfo,
  BlockhashWithExpiryBlockHeight,
  RpcResponseAndContext,
  SignatureStatus,
  TransactionInstruction,
  TransactionSignature,
} from "@solana/web3.js";
import {
  INITIALIZE_VOTING,
  VOTE,
  VOTING_ACCOUNT_SPACE,
  accountDiscriminator,
  decodeInstruction,
  decodeVotingAccount,
  encodeVotingAccount,
} from "../tsclient/src/codec";
import type { LedgerRpc } from "../tsclient/src/transactions";
import { findVotePda, findVotingPda } from "../tsclient/src/pda";

// --- Test constants ---
export const PROGRAM_ID = new PublicKey("31RBt6nsdi6tEbKVffYi8CbT8HeLYQgdGyZo8J8uyP6k");
export const QUESTION = "Do you like Solana?";
export const OPTIONS = ["Yes", "No"];

export type RpcMethod = keyof LedgerRpc;

/**
 * In-process stand-in for an RPC node running the voting program. Submitted
 * transactions are verified, decoded with the client's own codec and applied
 * with the program's rules: 2-3 options, option index in range, and an account
 * may only be created once.
 */
export class FakeLedger implements LedgerRpc {
  readonly accounts = new Map<string, AccountInfo<Buffer>>();
  readonly balances = new Map<string, number>();
  readonly submitted: Transaction[] = [];
  readonly calls: RpcMethod[] = [];

  /** Status polls a signature needs before it reports `confirmed`. */
  confirmAfterPolls = 1;

  private readonly blockhash = Keypair.generate().publicKey.toBase58();
  private readonly polls = new Map<TransactionSignature, number>();
  private readonly failures = new Map<RpcMethod, Error>();

  constructor(readonly programId: PublicKey = PROGRAM_ID) {}

  /** Makes the next call to `method` throw `error`. */
  failNext(method: RpcMethod, error: Error): void {
    this.failures.set(method, error);
  }

  setAccount(address: PublicKey, data: Buffer): void {
    this.accounts.set(address.toBase58(), {
      executable: false,
      owner: this.programId,
      lamports: 1_000_000,
      data,
    });
  }

  countSubmitted(operation: string): number {
    return this.submitted
      .flatMap((tx) => tx.instructions)
      .filter((ix) => ix.programId.equals(this.programId) && decodeInstruction(ix.data).name === operation)
      .length;
  }

  async getLatestBlockhash(): Promise<BlockhashWithExpiryBlockHeight> {
    this.enter("getLatestBlockhash");
    return { blockhash: this.blockhash, lastValidBlockHeight: 1_000 };
  }

  async getBalance(address: PublicKey): Promise<number> {
    this.enter("getBalance");
    return this.balances.get(address.toBase58()) ?? 0;
  }

  async getAccountInfo(address: PublicKey): Promise<AccountInfo<Buffer> | null> {
    this.enter("getAccountInfo");
    return this.accounts.get(address.toBase58()) ?? null;
  }

  async sendRawTransaction(rawTransaction: Buffer | Uint8Array | number[]): Promise<TransactionSignature> {
    this.enter("sendRawTransaction");
    const tx = Transaction.from(rawTransaction);
    if (!tx.verifySignatures()) {
      throw this.reject("Transaction signature verification failure", []);
    }
    for (const ix of tx.instructions) {
      if (ix.programId.equals(this.programId)) {
        this.execute(ix);
      }
    }
    this.submitted.push(tx);
    const signature = `sig-${this.submitted.length}`;
    this.polls.set(signature, 0);
    return signature;
  }

  async getSignatureStatuses(
    signatures: TransactionSignature[]
  ): Promise<RpcResponseAndContext<(SignatureStatus | null)[]>> {
    this.enter("getSignatureStatuses");
    const value = signatures.map((signature): SignatureStatus | null => {
      const seen = this.polls.get(signature);
      if (seen === undefined) return null;
      this.polls.set(signature, seen + 1);
      return {
        slot: 1,
        confirmations: null,
        err: null,
        confirmationStatus: seen + 1 >= this.confirmAfterPolls ? "confirmed" : "processed",
      };
    });
    return { context: { slot: 1 }, value };
  }

  private enter(method: RpcMethod): void {
    this.calls.push(method);
    const failure = this.failures.get(method);
    if (failure) {
      this.failures.delete(method);
      throw failure;
    }
  }

  private reject(message: string, logs: string[]): SendTransactionError {
    return new SendTransactionError({
      action: "simulate",
      signature: "",
      transactionMessage: message,
      logs,
    });
  }

  private createAccount(address: PublicKey, data: Buffer): void {
    if (this.accounts.has(address.toBase58())) {
      throw this.reject(
        `Allocate: account ${address.toBase58()} already in use`,
        ["Program 11111111111111111111111111111111 failed: custom program error: 0x0"]
      );
    }
    this.setAccount(address, data);
  }

  private execute(ix: TransactionInstruction): void {
    const decoded = decodeInstruction(ix.data);
    const keys = ix.keys.map((meta) => meta.pubkey);

    if (decoded.name === INITIALIZE_VOTING) {
      const { companyId, votingId, question, options } = decoded.params;
      const [expected] = findVotingPda(this.programId, companyId, votingId);
      if (!keys[0]?.equals(expected)) {
        throw this.reject("ConstraintSeeds: voting", []);
      }
      if (options.length < 2 || options.length > 3) {
        throw this.reject("InvalidOptionsCount: Invalid number of options. Must be 2 or 3.", []);
      }
      const data = Buffer.alloc(VOTING_ACCOUNT_SPACE);
      encodeVotingAccount({
        companyId,
        votingId,
        question,
        options,
        votes: options.map(() => 0n),
        totalVotes: 0n,
      }).copy(data);
      this.createAccount(expected, data);
      return;
    }

    if (decoded.name === VOTE) {
      const [votingAddress, voteAddress, voter] = keys;
      const stored = votingAddress && this.accounts.get(votingAddress.toBase58());
      if (!votingAddress || !voteAddress || !voter || !stored) {
        throw this.reject("AccountNotInitialized: voting", []);
      }
      const [expectedVote] = findVotePda(this.programId, votingAddress, voter);
      if (!voteAddress.equals(expectedVote)) {
        throw this.reject("ConstraintSeeds: vote", []);
      }
      const session = decodeVotingAccount(stored.data);
      const { selectedOption } = decoded.params;
      if (selectedOption >= session.options.length) {
        throw this.reject("InvalidOption: Selected option does not exist.", []);
      }
      this.createAccount(
        voteAddress,
        Buffer.concat([accountDiscriminator("VoteAccount"), voter.toBuffer(), Buffer.from([selectedOption])])
      );
      const votes = session.votes.map((count, i) => (i === selectedOption ? count + 1n : count));
      const data = Buffer.alloc(VOTING_ACCOUNT_SPACE);
      encodeVotingAccount({ ...session, votes, totalVotes: session.totalVotes + 1n }).copy(data);
      this.setAccount(votingAddress, data);
    }
  }
}
