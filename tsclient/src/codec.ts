import { BN } from '@coral-xyz/anchor';
import * as borsh from 'borsh';
import { createHash } from 'crypto';
import { DecodeError, describeError } from './errors';

const U64_MAX = (1n << 64n) - 1n;
const DISCRIMINATOR_LENGTH = 8;

export const INITIALIZE_VOTING = 'initialize_voting';
export const VOTE = 'vote';
export const VOTING_ACCOUNT = 'VotingAccount';

/**
 * Bytes the program reserves for a VotingAccount: a question of up to ~256
 * bytes and up to 3 options of ~64 bytes each. Stored data is zero-padded to
 * this size, so decoding must tolerate trailing bytes.
 */
export const VOTING_ACCOUNT_SPACE =
    DISCRIMINATOR_LENGTH +
    8 + // company_id
    8 + // voting_id
    4 + 256 + // question
    4 + 3 * (4 + 64) + // options
    4 + 3 * 8 + // votes
    8; // total_votes

export interface VotingSession {
    companyId: bigint;
    votingId: bigint;
    question: string;
    options: string[];
    votes: bigint[];
    totalVotes: bigint;
}

export interface InitializeVotingParams {
    companyId: bigint;
    votingId: bigint;
    question: string;
    options: string[];
}

export interface VoteParams {
    companyId: bigint;
    votingId: bigint;
    selectedOption: number;
}

export type DecodedInstruction =
    | { name: typeof INITIALIZE_VOTING; params: InitializeVotingParams }
    | { name: typeof VOTE; params: VoteParams };

// Borsh schemas for the program's argument and account structs

class InitializeVotingArgs {
    companyId: BN;
    votingId: BN;
    question: string;
    options: string[];

    constructor(fields: { companyId: BN; votingId: BN; question: string; options: string[] }) {
        this.companyId = fields.companyId;
        this.votingId = fields.votingId;
        this.question = fields.question;
        this.options = fields.options;
    }
}

class VoteArgs {
    companyId: BN;
    votingId: BN;
    selectedOption: number;

    constructor(fields: { companyId: BN; votingId: BN; selectedOption: number }) {
        this.companyId = fields.companyId;
        this.votingId = fields.votingId;
        this.selectedOption = fields.selectedOption;
    }
}

class VotingAccountData {
    companyId: BN;
    votingId: BN;
    question: string;
    options: string[];
    votes: BN[];
    totalVotes: BN;

    constructor(fields: {
        companyId: BN;
        votingId: BN;
        question: string;
        options: string[];
        votes: BN[];
        totalVotes: BN;
    }) {
        this.companyId = fields.companyId;
        this.votingId = fields.votingId;
        this.question = fields.question;
        this.options = fields.options;
        this.votes = fields.votes;
        this.totalVotes = fields.totalVotes;
    }
}

/**
 * Field order for every struct on the wire. The encoder and the decoder both
 * read this map; there is no other copy of the layout.
 */
export const VOTING_SCHEMA: borsh.Schema = new Map<Function, unknown>([
    [InitializeVotingArgs, {
        kind: 'struct',
        fields: [
            ['companyId', 'u64'],
            ['votingId', 'u64'],
            ['question', 'string'],
            ['options', ['string']]
        ]
    }],
    [VoteArgs, {
        kind: 'struct',
        fields: [
            ['companyId', 'u64'],
            ['votingId', 'u64'],
            ['selectedOption', 'u8']
        ]
    }],
    [VotingAccountData, {
        kind: 'struct',
        fields: [
            ['companyId', 'u64'],
            ['votingId', 'u64'],
            ['question', 'string'],
            ['options', ['string']],
            ['votes', ['u64']],
            ['totalVotes', 'u64']
        ]
    }]
]);

const sha256Prefix = (preimage: string): Buffer =>
    createHash('sha256').update(preimage, 'utf8').digest().subarray(0, DISCRIMINATOR_LENGTH);

/** First 8 bytes of sha256("global:<name>"). */
export const instructionDiscriminator = (name: string): Buffer => sha256Prefix(`global:${name}`);

/** First 8 bytes of sha256("account:<Name>"). */
export const accountDiscriminator = (name: string): Buffer => sha256Prefix(`account:${name}`);

export const toU64 = (value: bigint, field: string): BN => {
    if (value < 0n || value > U64_MAX) {
        throw new RangeError(`${field} must fit in u64, got ${value}`);
    }
    return new BN(value.toString());
};

export const toU8 = (value: number, field: string): number => {
    if (!Number.isInteger(value) || value < 0 || value > 255) {
        throw new RangeError(`${field} must fit in u8, got ${value}`);
    }
    return value;
};

/** u64 as 8 little-endian bytes, the form used in PDA seeds. */
export const u64Seed = (value: bigint, field: string): Buffer => toU64(value, field).toArrayLike(Buffer, 'le', 8);

const fromU64 = (value: BN): bigint => BigInt(value.toString());

const withDiscriminator = (discriminator: Buffer, body: Uint8Array): Buffer =>
    Buffer.concat([discriminator, Buffer.from(body)]);

export function encodeInitializeVoting(params: InitializeVotingParams): Buffer {
    const args = new InitializeVotingArgs({
        companyId: toU64(params.companyId, 'companyId'),
        votingId: toU64(params.votingId, 'votingId'),
        question: params.question,
        options: params.options
    });
    return withDiscriminator(instructionDiscriminator(INITIALIZE_VOTING), borsh.serialize(VOTING_SCHEMA, args));
}

export function encodeVote(params: VoteParams): Buffer {
    const args = new VoteArgs({
        companyId: toU64(params.companyId, 'companyId'),
        votingId: toU64(params.votingId, 'votingId'),
        selectedOption: toU8(params.selectedOption, 'selectedOption')
    });
    return withDiscriminator(instructionDiscriminator(VOTE), borsh.serialize(VOTING_SCHEMA, args));
}

export function encodeVotingAccount(session: VotingSession): Buffer {
    const data = new VotingAccountData({
        companyId: toU64(session.companyId, 'companyId'),
        votingId: toU64(session.votingId, 'votingId'),
        question: session.question,
        options: session.options,
        votes: session.votes.map((count, i) => toU64(count, `votes[${i}]`)),
        totalVotes: toU64(session.totalVotes, 'totalVotes')
    });
    return withDiscriminator(accountDiscriminator(VOTING_ACCOUNT), borsh.serialize(VOTING_SCHEMA, data));
}

/**
 * Runs a borsh read over everything after the discriminator. Trailing bytes are
 * left unread, since accounts are allocated with reserved space.
 */
function readBody<T>(data: Uint8Array, what: string, read: (body: Buffer) => T): T {
    if (data.length < DISCRIMINATOR_LENGTH) {
        throw new DecodeError(
            `${what}: expected at least ${DISCRIMINATOR_LENGTH} bytes, got ${data.length}`,
            { operation: what }
        );
    }
    try {
        return read(Buffer.from(data.subarray(DISCRIMINATOR_LENGTH)));
    } catch (error) {
        throw new DecodeError(`${what}: ${describeError(error)}`, { operation: what, cause: error });
    }
}

export function decodeVotingAccount(data: Uint8Array): VotingSession {
    const raw = readBody(data, `decode ${VOTING_ACCOUNT}`, (body) =>
        borsh.deserializeUnchecked(VOTING_SCHEMA, VotingAccountData, body)
    );
    const session: VotingSession = {
        companyId: fromU64(raw.companyId),
        votingId: fromU64(raw.votingId),
        question: raw.question,
        options: raw.options,
        votes: raw.votes.map(fromU64),
        totalVotes: fromU64(raw.totalVotes)
    };

    if (session.options.length !== session.votes.length) {
        throw new DecodeError(
            `decode ${VOTING_ACCOUNT}: ${session.options.length} options but ${session.votes.length} tallies`
        );
    }
    const sum = session.votes.reduce((acc, count) => acc + count, 0n);
    if (sum !== session.totalVotes) {
        throw new DecodeError(
            `decode ${VOTING_ACCOUNT}: tallies sum to ${sum} but total is ${session.totalVotes}`
        );
    }
    return session;
}

export function decodeInstruction(data: Uint8Array): DecodedInstruction {
    const tag = Buffer.from(data.subarray(0, DISCRIMINATOR_LENGTH));

    if (tag.equals(instructionDiscriminator(INITIALIZE_VOTING))) {
        const args = readBody(data, `decode ${INITIALIZE_VOTING}`, (body) =>
            borsh.deserializeUnchecked(VOTING_SCHEMA, InitializeVotingArgs, body)
        );
        return {
            name: INITIALIZE_VOTING,
            params: {
                companyId: fromU64(args.companyId),
                votingId: fromU64(args.votingId),
                question: args.question,
                options: args.options
            }
        };
    }
    if (tag.equals(instructionDiscriminator(VOTE))) {
        const args = readBody(data, `decode ${VOTE}`, (body) =>
            borsh.deserializeUnchecked(VOTING_SCHEMA, VoteArgs, body)
        );
        return {
            name: VOTE,
            params: {
                companyId: fromU64(args.companyId),
                votingId: fromU64(args.votingId),
                selectedOption: args.selectedOption
            }
        };
    }
    throw new DecodeError(`unknown instruction discriminator ${tag.toString('hex')}`);
}
