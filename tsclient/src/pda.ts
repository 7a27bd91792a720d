import { PublicKey } from '@solana/web3.js';
import { createHash } from 'crypto';
import { u64Seed } from './codec';
import { DerivationExhaustedError } from './errors';

// --- Seeds from the voting program ---
export const VOTING_SEED = Buffer.from('voting');
export const VOTE_SEED = Buffer.from('vote');

export const MAX_SEED_LENGTH = 32;
// The bump byte counts towards the ledger's 16-seed limit.
export const MAX_SEEDS = 15;

const PDA_MARKER = Buffer.from('ProgramDerivedAddress');

export type CurveCheck = (bytes: Uint8Array) => boolean;

const onEd25519Curve: CurveCheck = (bytes) => PublicKey.isOnCurve(bytes);

/**
 * Searches bumps 255..0 for the first sha256(seeds ++ [bump] ++ programId ++
 * "ProgramDerivedAddress") that is off the ed25519 curve, so no private key can
 * sign for it.
 */
export const findProgramAddress = (
  seeds: Uint8Array[],
  programId: PublicKey,
  isOnCurve: CurveCheck = onEd25519Curve
): [PublicKey, number] => {
  if (seeds.length > MAX_SEEDS) {
    throw new RangeError(`At most ${MAX_SEEDS} seeds are allowed, got ${seeds.length}`);
  }
  for (const seed of seeds) {
    if (seed.length > MAX_SEED_LENGTH) {
      throw new RangeError(`Seed of ${seed.length} bytes exceeds ${MAX_SEED_LENGTH}`);
    }
  }

  const programBytes = programId.toBuffer();
  for (let bump = 255; bump >= 0; bump--) {
    const hash = createHash('sha256');
    for (const seed of seeds) {
      hash.update(seed);
    }
    hash.update(Uint8Array.of(bump));
    hash.update(programBytes);
    hash.update(PDA_MARKER);
    const candidate = hash.digest();

    if (!isOnCurve(candidate)) {
      return [new PublicKey(candidate), bump];
    }
  }

  throw new DerivationExhaustedError(
    `No off-curve address for ${seeds.length} seeds under program ${programId.toBase58()}`,
    { operation: 'derive_address', address: programId.toBase58() }
  );
};

/**
 * Finds the PDA of a VotingAccount (one per company + voting)
 */
export const findVotingPda = (
  programId: PublicKey,
  companyId: bigint,
  votingId: bigint,
  isOnCurve?: CurveCheck
): [PublicKey, number] => {
  return findProgramAddress(
    [
      VOTING_SEED,
      u64Seed(companyId, 'companyId'), // u64, 8 bytes, little endian
      u64Seed(votingId, 'votingId'),
    ],
    programId,
    isOnCurve
  );
};

/**
 * Finds the PDA of a VoteAccount, the one-per-voter marker for a voting
 */
export const findVotePda = (
  programId: PublicKey,
  votingPda: PublicKey,
  voter: PublicKey,
  isOnCurve?: CurveCheck
): [PublicKey, number] => {
  return findProgramAddress(
    [VOTE_SEED, votingPda.toBuffer(), voter.toBuffer()],
    programId,
    isOnCurve
  );
};
