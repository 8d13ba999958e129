export {
  contractTotalsSchema,
  stateDataSchema,
  migrationInputSchema,
  migrationCheckResultSchema,
  checkpointSchema,
} from './schemas.ts';
export { encodeCheckpoint, decodeCheckpoint } from './CheckpointCodec.ts';
export {
  encodeStateData,
  decodeStateData,
  encodeContractTotals,
  decodeContractTotals,
  sortedAccounts,
} from './StateDataCodec.ts';
export {
  encodeMigrationInput,
  decodeMigrationInput,
  encodeCheckResult,
  decodeCheckResult,
} from './MigrationCodec.ts';
