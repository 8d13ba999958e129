import type { StateData } from '../../domain/entities/index.ts';

/**
 * Persistence of migration-ready ledgers
 */
export interface IStateRepository {
  load(path: string): Promise<StateData>;
  save(path: string, state: StateData): Promise<void>;
}
