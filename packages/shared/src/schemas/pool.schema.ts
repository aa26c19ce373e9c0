import { z } from 'zod';

/**
 * Non-negative integer carried as a decimal string (JSON has no bigint)
 */
export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer string')
  .transform((value) => BigInt(value));

/**
 * 0x-prefixed hex string of an exact byte length
 */
export const hexBytes = (bytes: number) =>
  z
    .string()
    .regex(new RegExp(`^0x[0-9a-fA-F]{${bytes * 2}}$`), `must be 0x-prefixed ${bytes}-byte hex`);

/**
 * Withdrawal credential handed to the provisioning sink (32 bytes)
 */
export const WithdrawalCredentialSchema = hexBytes(32);

export const PubkeySchema = hexBytes(48);

export const SignatureSchema = hexBytes(96);

export const DepositDataRootSchema = hexBytes(32);

/**
 * Provisioning batch: parallel arrays of equal, non-zero length
 */
export const ProvisioningBatchSchema = z
  .object({
    pubkeys: z.array(PubkeySchema).min(1),
    signatures: z.array(SignatureSchema),
    depositDataRoots: z.array(DepositDataRootSchema),
  })
  .refine(
    (batch) =>
      batch.signatures.length === batch.pubkeys.length &&
      batch.depositDataRoots.length === batch.pubkeys.length,
    { message: 'pubkeys, signatures and depositDataRoots must have equal length' }
  );

/**
 * Persisted pool accounting state
 */
export const SerializedPoolStateSchema = z.object({
  version: z.literal(1),
  timestamp: z.number().int().nonnegative(),
  state: z.object({
    claimedShares: UintStringSchema,
    accruedFee: UintStringSchema,
    lotsProvisioned: UintStringSchema,
  }),
  migrated: z.boolean(),
});

export type SerializedPoolState = z.input<typeof SerializedPoolStateSchema>;
