/**
 * Pool configuration
 *
 * Reads POOL_*, LOG_* and TELEGRAM_* variables, validates them with zod and
 * builds the pool, its fee policy and its logger.
 */

import { z } from 'zod';
import {
  InvalidParameterError,
  WithdrawalCredentialSchema,
  createLogger,
  loadEnvFromRoot,
  type Address,
  type LogLevel,
  type Logger,
} from '@pooled-staking/shared';
import { parseScaled } from '../math/fixed-point.js';
import {
  BasisPointFeePolicy,
  DISABLED_FEE_POLICY,
  UnitFeePolicy,
  enableFeePolicy,
  type FeePolicy,
} from '../fees/fee-policy.js';
import { StakingPool, type StakingPoolCollaborators } from '../pool/staking-pool.js';
import type { DepositWithdrawAccountingEngine } from '../accounting/deposit-withdraw-engine.js';
import { RoleAccessController } from '../collaborators/access-controller.js';

const DecimalAmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d{1,18})?$/, 'must be a decimal amount with at most 18 fractional digits')
  .transform((value) => parseScaled(value));

const PositiveIntegerSchema = z
  .string()
  .trim()
  .regex(/^[1-9]\d*$/, 'must be a positive integer')
  .transform((value) => BigInt(value));

const BooleanSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const PoolEnvSchema = z
  .object({
    POOL_ADDRESS: z.string().min(1).default('staking-pool'),
    POOL_OWNER: z.string().min(1),
    POOL_UNIT_SIZE: DecimalAmountSchema.default('32'),
    POOL_UNITS_PER_LOT: PositiveIntegerSchema,
    POOL_ADMIN_FEE: DecimalAmountSchema.default('0'),
    POOL_BUFFER: DecimalAmountSchema.default('0'),
    POOL_REFUND_FEES_ON_WITHDRAW: BooleanSchema.default('false'),
    POOL_WITHDRAWAL_CREDENTIAL: WithdrawalCredentialSchema.optional(),
    POOL_FEE_POLICY: z.enum(['disabled', 'unit', 'basis-point']).default('disabled'),
    POOL_FEE_PER_UNIT: DecimalAmountSchema.optional(),
    POOL_FEE_BPS: z
      .string()
      .trim()
      .regex(/^\d+$/, 'must be an integer')
      .transform((value) => BigInt(value))
      .optional(),
    LOG_LEVEL: LogLevelSchema.default('info'),
    LOG_DIR: z.string().min(1).optional(),
    LOG_CONSOLE: BooleanSchema.default('true'),
    LOG_FILE: BooleanSchema.default('true'),
    TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
    TELEGRAM_CHAT_ID: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.POOL_UNIT_SIZE === 0n) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['POOL_UNIT_SIZE'], message: 'must be positive' });
    }
    if (env.POOL_FEE_POLICY === 'unit' && env.POOL_FEE_PER_UNIT === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['POOL_FEE_PER_UNIT'], message: 'required by the unit fee policy' });
    }
    if (env.POOL_FEE_POLICY === 'basis-point' && env.POOL_FEE_BPS === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['POOL_FEE_BPS'], message: 'required by the basis-point fee policy' });
    }
  });

export type FeePolicyConfig =
  | { kind: 'disabled' }
  | { kind: 'unit'; feePerUnit: bigint }
  | { kind: 'basis-point'; feeBps: bigint };

export interface PoolConfig {
  pool: {
    address: Address;
    owner: Address;
    unitSize: bigint;
    unitsPerLot: bigint;
    adminFee: bigint;
    buffer: bigint;
    refundFeesOnWithdraw: boolean;
    withdrawalCredential: string | null;
    feePolicy: FeePolicyConfig;
  };
  logging: {
    level: LogLevel;
    dir?: string;
    console: boolean;
    file: boolean;
    telegramToken?: string;
    telegramChatId?: string;
  };
}

function feePolicyConfig(env: z.output<typeof PoolEnvSchema>): FeePolicyConfig {
  if (env.POOL_FEE_POLICY === 'unit' && env.POOL_FEE_PER_UNIT !== undefined) {
    return { kind: 'unit', feePerUnit: env.POOL_FEE_PER_UNIT };
  }
  if (env.POOL_FEE_POLICY === 'basis-point' && env.POOL_FEE_BPS !== undefined) {
    return { kind: 'basis-point', feeBps: env.POOL_FEE_BPS };
  }
  return { kind: 'disabled' };
}

/**
 * Validate an environment into a pool configuration
 */
export function loadPoolConfig(env: NodeJS.ProcessEnv): PoolConfig {
  const result = PoolEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidParameterError(`invalid pool configuration: ${issues.join('; ')}`);
  }

  const parsed = result.data;
  return {
    pool: {
      address: parsed.POOL_ADDRESS,
      owner: parsed.POOL_OWNER,
      unitSize: parsed.POOL_UNIT_SIZE,
      unitsPerLot: parsed.POOL_UNITS_PER_LOT,
      adminFee: parsed.POOL_ADMIN_FEE,
      buffer: parsed.POOL_BUFFER,
      refundFeesOnWithdraw: parsed.POOL_REFUND_FEES_ON_WITHDRAW,
      withdrawalCredential: parsed.POOL_WITHDRAWAL_CREDENTIAL ?? null,
      feePolicy: feePolicyConfig(parsed),
    },
    logging: {
      level: parsed.LOG_LEVEL,
      dir: parsed.LOG_DIR,
      console: parsed.LOG_CONSOLE,
      file: parsed.LOG_FILE,
      telegramToken: parsed.TELEGRAM_BOT_TOKEN,
      telegramChatId: parsed.TELEGRAM_CHAT_ID,
    },
  };
}

/**
 * Load .env from the project root, then validate process.env
 */
export function loadPoolConfigFromEnv(): PoolConfig {
  return loadPoolConfig(loadEnvFromRoot());
}

export function createFeePolicy(config: PoolConfig['pool']): FeePolicy {
  switch (config.feePolicy.kind) {
    case 'disabled':
      return DISABLED_FEE_POLICY;
    case 'unit':
      return enableFeePolicy(new UnitFeePolicy(config.unitSize, config.feePolicy.feePerUnit));
    case 'basis-point':
      return enableFeePolicy(new BasisPointFeePolicy(config.feePolicy.feeBps));
  }
}

/**
 * Access controller whose owner comes from POOL_OWNER
 */
export function createAccessController(config: PoolConfig['pool']): RoleAccessController {
  return new RoleAccessController(config.owner);
}

export function createPoolLogger(config: PoolConfig): Logger {
  return createLogger({
    service: 'staking-pool',
    level: config.logging.level,
    logDir: config.logging.dir,
    console: config.logging.console,
    file: config.logging.file,
    telegramToken: config.logging.telegramToken,
    telegramChatId: config.logging.telegramChatId,
    telegramLevels: ['error'],
  });
}

/**
 * Build a pool from validated configuration
 */
export function createStakingPool(
  config: PoolConfig,
  collaborators: StakingPoolCollaborators,
  options: { logger?: Logger; engine?: DepositWithdrawAccountingEngine } = {}
): StakingPool {
  return new StakingPool({
    address: config.pool.address,
    parameters: {
      unitSize: config.pool.unitSize,
      unitsPerLot: config.pool.unitsPerLot,
      adminFee: config.pool.adminFee,
      buffer: config.pool.buffer,
      refundFeesOnWithdraw: config.pool.refundFeesOnWithdraw,
      withdrawalCredential: config.pool.withdrawalCredential,
      feePolicy: createFeePolicy(config.pool),
    },
    collaborators,
    logger: options.logger ?? createPoolLogger(config),
    engine: options.engine,
  });
}
