import { Keypair, PublicKey, clusterApiUrl } from '@solana/web3.js';
import { getKeypairFromFile } from '@solana-developers/helpers';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError, describeError } from './errors';
import type { ConfirmationOptions } from './transactions';
import type { VotingParams } from './voteClient';
import { MAX_OPTIONS, MIN_OPTIONS } from './voteClient';

/** The deployed voting program. */
export const DEFAULT_PROGRAM_ID = '31RBt6nsdi6tEbKVffYi8CbT8HeLYQgdGyZo8J8uyP6k';
export const DEFAULT_WALLET_PATH = join(homedir(), '.config', 'solana', 'id.json');

const SECRET_KEY_LENGTH = 64;
const U64_MAX = (1n << 64n) - 1n;

export interface VotingConfig {
    rpcUrl: string;
    walletPath: string;
    /** Raw key material that takes the place of the wallet file. */
    secretKey?: number[];
    programId: PublicKey;
    voting: VotingParams;
    confirmation: ConfirmationOptions;
}

const u64String = z.string().trim().transform((value, ctx) => {
    if (!/^\d+$/.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an unsigned integer' });
        return z.NEVER;
    }
    const parsed = BigInt(value);
    if (parsed > U64_MAX) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must fit in u64' });
        return z.NEVER;
    }
    return parsed;
});

const publicKeyString = z.string().trim().transform((value, ctx) => {
    try {
        return new PublicKey(value);
    } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a public key (${describeError(error)})` });
        return z.NEVER;
    }
});

const integerString = (min: number, max: number = Number.MAX_SAFE_INTEGER) =>
    z.string().trim().min(1, 'must not be empty').pipe(z.coerce.number().int().min(min).max(max));

const keyBytesString = z.string().trim().transform((value, ctx) => {
    try {
        const parsed: unknown = JSON.parse(value);
        return parsed;
    } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a JSON byte array (${describeError(error)})` });
        return z.NEVER;
    }
}).pipe(z.array(z.number().int().min(0).max(255)).length(SECRET_KEY_LENGTH));

// ── Environment schema (unknown variables are ignored) ──

export const ConfigEnvSchema = z.object({
    VOTING_RPC_URL: z.string().url().default(clusterApiUrl('testnet')),
    ANCHOR_WALLET: z.string().min(1).default(DEFAULT_WALLET_PATH),
    VOTING_SECRET_KEY: keyBytesString.optional(),
    VOTING_PROGRAM_ID: publicKeyString.default(DEFAULT_PROGRAM_ID),
    VOTING_COMPANY_ID: u64String.default('1'),
    VOTING_ID: u64String.default('1'),
    VOTING_QUESTION: z.string().min(1).default('Do you like Solana?'),
    VOTING_OPTIONS: z
        .string()
        .default('Yes,No')
        .transform((value) => value.split(',').map((option) => option.trim()).filter((option) => option.length > 0))
        .pipe(z.array(z.string()).min(MIN_OPTIONS).max(MAX_OPTIONS)),
    VOTING_SELECTED_OPTION: integerString(0, 255).default('0'),
    VOTING_CONFIRM_INTERVAL_MS: integerString(0).default('1000'),
    VOTING_CONFIRM_MAX_ATTEMPTS: integerString(1).default('15'),
}).superRefine((env, ctx) => {
    if (env.VOTING_SELECTED_OPTION >= env.VOTING_OPTIONS.length) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['VOTING_SELECTED_OPTION'],
            message: `must be below the option count (${env.VOTING_OPTIONS.length})`,
        });
    }
});

const expandHome = (path: string): string =>
    path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;

/**
 * Builds the client configuration from environment variables. Every setting
 * has a default, so an empty environment reproduces the default session.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): VotingConfig {
    const result = ConfigEnvSchema.safeParse(env);
    if (!result.success) {
        const details = result.error.issues.map(
            (issue) => `${issue.path.join('.')}: ${issue.message}`,
        );
        throw new ConfigurationError('Config validation failed', details);
    }

    const parsed = result.data;
    const config: VotingConfig = {
        rpcUrl: parsed.VOTING_RPC_URL,
        walletPath: expandHome(parsed.ANCHOR_WALLET),
        programId: parsed.VOTING_PROGRAM_ID,
        voting: {
            companyId: parsed.VOTING_COMPANY_ID,
            votingId: parsed.VOTING_ID,
            question: parsed.VOTING_QUESTION,
            options: parsed.VOTING_OPTIONS,
            selectedOption: parsed.VOTING_SELECTED_OPTION,
        },
        confirmation: {
            intervalMs: parsed.VOTING_CONFIRM_INTERVAL_MS,
            maxAttempts: parsed.VOTING_CONFIRM_MAX_ATTEMPTS,
        },
    };
    if (parsed.VOTING_SECRET_KEY) {
        config.secretKey = parsed.VOTING_SECRET_KEY;
    }
    return config;
}

/**
 * Builds a keypair from raw ed25519 key material (64 bytes: secret ++ public),
 * the format of a Solana CLI `id.json`.
 */
export function keypairFromBytes(bytes: ArrayLike<number>): Keypair {
    if (bytes.length !== SECRET_KEY_LENGTH) {
        throw new ConfigurationError(`Key material must contain exactly ${SECRET_KEY_LENGTH} bytes, got ${bytes.length}`);
    }
    try {
        return Keypair.fromSecretKey(Uint8Array.from(bytes));
    } catch (error) {
        throw new ConfigurationError(`Invalid key material: ${describeError(error)}`, [], { cause: error });
    }
}

/**
 * Resolves the fee payer: raw key material when given, otherwise the wallet
 * file at `walletPath`.
 */
export async function loadPayer(walletPath: string, secretKey?: ArrayLike<number>): Promise<Keypair> {
    if (secretKey) {
        return keypairFromBytes(secretKey);
    }
    try {
        return await getKeypairFromFile(walletPath);
    } catch (error) {
        throw new ConfigurationError(`Cannot load wallet ${walletPath}: ${describeError(error)}`, [], { cause: error });
    }
}
