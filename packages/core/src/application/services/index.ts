export {
  RECOGNIZED_METHODS,
  depositProofKey,
  isRecognizedMethod,
  parseCall,
} from './ActionParser.ts';
export type {
  ContractCall,
  DepositProof,
  FinishDepositArgs,
  FtTransferArgs,
  FtTransferCallArgs,
  ParsedCall,
  RecognizedMethod,
  WithdrawArgs,
} from './ActionParser.ts';

export { deserializeExact } from './borsh.ts';
export type { BorshSchema } from './borsh.ts';
