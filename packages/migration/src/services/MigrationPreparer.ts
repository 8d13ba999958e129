import { z } from 'zod';
import type { IChainClient, ILogger, StateData } from '@ledgerlift/core';
import { ViewCallError, createStateData } from '@ledgerlift/core';
import type { CheckpointStore } from '@ledgerlift/indexer';

const amountJson = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal amount')
  .transform((value) => BigInt(value));

/**
 * Migration preparer options
 */
export interface MigrationPreparerOptions {
  client: IChainClient;
  store: CheckpointStore;
  /** Account of the contract holding the ledger */
  contractId: string;
  logger: ILogger;
}

/**
 * Turns an indexed account list into a ledger by asking the source contract
 * for every balance. Balances already fetched are kept in the checkpoint, so
 * an interrupted run continues where it stopped.
 */
export class MigrationPreparer {
  private readonly client: IChainClient;
  private readonly store: CheckpointStore;
  private readonly contractId: string;
  private readonly logger: ILogger;

  constructor(options: MigrationPreparerOptions) {
    this.client = options.client;
    this.store = options.store;
    this.contractId = options.contractId;
    this.logger = options.logger.child({ module: 'prepare', contract: options.contractId });
  }

  async prepare(signal?: AbortSignal): Promise<StateData> {
    const { dataset, preparedBalances } = this.store.checkpoint;
    const accounts = [...dataset.accounts].sort();
    const pending = accounts.filter((account) => !preparedBalances.has(account));

    this.logger.info('Preparing balances', { accounts: accounts.length, pending: pending.length });

    try {
      for (const [index, account] of pending.entries()) {
        signal?.throwIfAborted();

        const balance = await this.viewAmount('ft_balance_of', { account_id: account });
        this.store.update((checkpoint) => {
          checkpoint.preparedBalances.set(account, balance);
        });
        this.store.scheduleSave();

        this.logger.progress({
          phase: 'preparing',
          current: index + 1,
          total: pending.length,
          percentage: ((index + 1) / pending.length) * 100,
          detail: account,
        });
      }
    } finally {
      this.logger.clearProgress();
      await this.store.flush();
    }

    const totalEthSupplyOnNear = await this.viewAmount('ft_total_eth_supply_on_near', {});
    const totalEthSupplyOnAurora = await this.viewAmount('ft_total_eth_supply_on_aurora', {});

    const balances = new Map<string, bigint>();
    for (const account of accounts) {
      const balance = this.store.checkpoint.preparedBalances.get(account);
      if (balance === undefined) {
        throw new Error(`No balance prepared for ${account}`);
      }
      balances.set(account, balance);
    }

    const state = createStateData({
      contractData: { totalEthSupplyOnNear, totalEthSupplyOnAurora, accountStorageUsage: 0n },
      accounts: balances,
      accountsCounter: BigInt(balances.size),
      proofs: [...dataset.proofs].sort(),
    });

    this.logger.info('Ledger prepared', {
      accounts: state.accounts.size,
      proofs: state.proofs.length,
      totalSupply: totalEthSupplyOnNear,
    });
    return state;
  }

  /**
   * Call a view returning a JSON string amount
   */
  private async viewAmount(method: string, args: Record<string, string>): Promise<bigint> {
    const bytes = await this.client.requestView(this.contractId, method, new TextEncoder().encode(JSON.stringify(args)));
    const text = new TextDecoder().decode(bytes);

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch {
      throw new ViewCallError(this.contractId, method, `Unexpected result ${text}`);
    }

    const parsed = amountJson.safeParse(value);
    if (!parsed.success) {
      throw new ViewCallError(this.contractId, method, `Unexpected result ${text}`);
    }
    return parsed.data;
  }
}
