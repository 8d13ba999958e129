export { AccountId } from './AccountId.ts';
