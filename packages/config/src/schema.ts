import { z } from 'zod';

// ============================================================================
// Account Schemas
// ============================================================================

const ACCOUNT_ID_PATTERN = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/;

const accountIdSchema = z
  .string()
  .min(2)
  .max(64)
  .regex(ACCOUNT_ID_PATTERN, 'Invalid NEAR account id');

// ============================================================================
// Network Configuration Schema
// ============================================================================

const networkConfigSchema = z.object({
  id: z.enum(['mainnet', 'testnet', 'localnet']),
  rpcUrl: z.string().url().optional(),
  timeout: z.number().positive().int().optional(),
});

// ============================================================================
// Contract Configuration Schema
// ============================================================================

const contractConfigSchema = z.object({
  source: accountIdSchema,
  target: accountIdSchema.optional(),
});

// ============================================================================
// Indexer Configuration Schema
// ============================================================================

const indexerConfigSchema = z.object({
  dataFile: z.string().min(1).optional(),
  /** Node quota is 600 requests per minute */
  requestDelayMs: z.number().int().min(0).max(10_000).optional(),
  tipRefreshIntervalMs: z.number().int().positive().optional(),
  tipBackoffMs: z.number().int().positive().optional(),
  saveIntervalMs: z.number().int().positive().optional(),
  startBlock: z.number().int().nonnegative().optional(),
});

// ============================================================================
// Migration Configuration Schema
// ============================================================================

const migrationConfigSchema = z.object({
  batchSize: z.number().int().positive().max(10_000).optional(),
  commitRetries: z.number().int().positive().max(100).optional(),
  commitRetryDelayMs: z.number().int().nonnegative().optional(),
  gasTera: z.number().int().positive().max(300).optional(),
});

// ============================================================================
// Logging Configuration Schema
// ============================================================================

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']);

const loggingConfigSchema = z.object({
  level: logLevelSchema,
  timestamps: z.boolean().optional(),
  json: z.boolean().optional(),
  progress: z.boolean().optional(),
});

// ============================================================================
// Main Ledgerlift Configuration Schema
// ============================================================================

export const ledgerliftConfigSchema = z
  .object({
    network: networkConfigSchema.optional(),
    contract: contractConfigSchema.optional(),
    indexer: indexerConfigSchema.optional(),
    migration: migrationConfigSchema.optional(),
    logging: loggingConfigSchema.optional(),
  })
  .superRefine((config, ctx) => {
    if (config.contract?.target && config.contract.target === config.contract.source) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Target contract must differ from source contract "${config.contract.source}"`,
        path: ['contract', 'target'],
      });
    }
  });

export type LedgerliftConfigInput = z.input<typeof ledgerliftConfigSchema>;
export type LedgerliftConfigOutput = z.output<typeof ledgerliftConfigSchema>;

// Export individual schemas for reuse
export {
  accountIdSchema,
  networkConfigSchema,
  contractConfigSchema,
  indexerConfigSchema,
  migrationConfigSchema,
  loggingConfigSchema,
  ACCOUNT_ID_PATTERN,
};
