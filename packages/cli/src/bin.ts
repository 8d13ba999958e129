#!/usr/bin/env node
import { Command } from 'commander';
import { combineCommand } from './commands/combine.ts';
import { indexCommand } from './commands/index.ts';
import { migrateCommand } from './commands/migrate.ts';
import { parseCommand } from './commands/parse.ts';
import { prepareCommand } from './commands/prepare.ts';
import { parseHeight, parseNetwork } from './context.ts';

const program = new Command();

program
  .name('ledgerlift')
  .description('Move the eth-connector ledger into its successor contract')
  .version('0.1.0');

/**
 * Options every command accepts
 */
function withGlobalOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Increase verbosity', (_, prev: number) => prev + 1, 0)
    .option('-n, --network <id>', 'Network: mainnet, testnet or localnet', parseNetwork)
    .option('--rpc <url>', 'RPC endpoint overriding the network default');
}

// Index command - scan the chain for accounts and proofs
withGlobalOptions(program.command('index'))
  .description('Collect accounts and proofs touched by the source contract')
  .option('-b, --block <height>', 'Height to start from, overriding the checkpoint', parseHeight)
  .option('-d, --data-file <path>', 'Checkpoint file')
  .option('--contract <account>', 'Source contract account')
  .option('--stat', 'Print checkpoint statistics and exit')
  .option('--fullstat', 'Print statistics with every account and proof')
  .action(indexCommand);

// Parse command - decode a storage export
withGlobalOptions(program.command('parse'))
  .description('Decode a contract storage export into a migration file')
  .argument('<snapshot>', 'JSON export of the contract storage')
  .option('-o, --output <path>', 'Migration file to write')
  .action(parseCommand);

// Prepare command - fetch balances of indexed accounts
withGlobalOptions(program.command('prepare'))
  .description('Fetch balances of indexed accounts into a migration file')
  .option('-d, --data-file <path>', 'Checkpoint file')
  .option('--contract <account>', 'Source contract account')
  .option('-o, --output <path>', 'Migration file to write')
  .action(prepareCommand);

// Combine command
withGlobalOptions(program.command('combine'))
  .description('Merge two migration files, the second one winning')
  .argument('<first>', 'Base migration file')
  .argument('<second>', 'Migration file whose entries win')
  .requiredOption('-o, --output <path>', 'Migration file to write')
  .action(combineCommand);

// Migrate command
withGlobalOptions(program.command('migrate'))
  .description('Replay a migration file into the target contract and verify it')
  .argument('<file>', 'Migration file')
  .option('--check-only', 'Verify without committing')
  .option('-t, --target <account>', 'Target contract account')
  .option('--account <account>', 'Signer account')
  .option('--key <secret>', 'Signer secret key')
  .option('--key-file <path>', 'Key file with account_id and private_key')
  .action(migrateCommand);

await program.parseAsync();
