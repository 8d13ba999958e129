// Chain RPC ports
export type {
  IChainRpc,
  BlockReference,
  AccessKeyView,
  CallFunctionResult,
} from './IChainRpc.ts';

// Chain client ports
export type {
  IChainClient,
  ITransactionSigner,
  UnsignedCall,
  SignedCall,
} from './IChainClient.ts';

// Logger ports
export type {
  ILogger,
  LogContext,
  ProgressInfo,
  ProgressPhase,
  PhaseProgress,
} from './ILogger.ts';
export { LOG_LEVEL_VALUES, verbosityToLogLevel } from './ILogger.ts';

// Repository ports
export type { ICheckpointRepository } from './ICheckpointRepository.ts';
export type { IStateRepository } from './IStateRepository.ts';
