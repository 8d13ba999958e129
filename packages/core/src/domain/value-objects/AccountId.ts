import { ACCOUNT_ID_PATTERN } from '@ledgerlift/config';

const MIN_LENGTH = 2;
const MAX_LENGTH = 64;

/**
 * NEAR account identifier rules
 */
export class AccountId {
  /**
   * Check whether a string is a valid account id
   */
  static isValid(value: string): boolean {
    return (
      value.length >= MIN_LENGTH &&
      value.length <= MAX_LENGTH &&
      ACCOUNT_ID_PATTERN.test(value)
    );
  }
}
