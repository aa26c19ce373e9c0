/**
 * Pool accounting types
 *
 * Every amount is an unsigned fixed-point integer scaled by 1e18.
 */

/**
 * Account identifier (depositor, operator, pool, vault, sink)
 */
export type Address = string;

/**
 * Accounting state of one pool
 */
export interface PoolState {
  /** Pooled capital backing outstanding minted shares */
  claimedShares: bigint;
  /** Fee collected and not yet withdrawn by the operator */
  accruedFee: bigint;
  /** Provisioning units sent to the sink so far */
  lotsProvisioned: bigint;
}

/**
 * Result of a fee policy call
 */
export interface FeeQuote {
  netAmount: bigint;
  fee: bigint;
}

/**
 * Parallel credential arrays for one provisioning call
 */
export interface ProvisioningBatch {
  /** 48-byte validator public keys, 0x-prefixed hex */
  pubkeys: string[];
  /** 96-byte deposit signatures, 0x-prefixed hex */
  signatures: string[];
  /** 32-byte deposit data roots, 0x-prefixed hex */
  depositDataRoots: string[];
}

/**
 * Net amounts produced by a deposit
 */
export interface DepositReceipt {
  caller: Address;
  grossAmount: bigint;
  netAmount: bigint;
  fee: bigint;
  claimedShares: bigint;
}

/**
 * Net amounts produced by a withdrawal
 */
export interface WithdrawReceipt {
  caller: Address;
  sharesBurned: bigint;
  netAmount: bigint;
  fee: bigint;
  feeRefunded: boolean;
  claimedShares: bigint;
}

/**
 * Authorization returned by the provisioning gate
 */
export interface BatchAuthorization {
  unitCount: bigint;
  amount: bigint;
  lotsProvisioned: bigint;
}

/**
 * Mutating pool operations, used for guard and log labels
 */
export type PoolOperation =
  | 'deposit'
  | 'stakeAndDeposit'
  | 'withdraw'
  | 'unstakeAndWithdraw'
  | 'provision'
  | 'withdrawAdminFee'
  | 'migrateShares'
  | 'setParameter';
