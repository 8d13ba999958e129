export { indexCommand } from './commands/index.ts';
export { parseCommand } from './commands/parse.ts';
export { prepareCommand } from './commands/prepare.ts';
export { combineCommand } from './commands/combine.ts';
export { migrateCommand } from './commands/migrate.ts';
export { runCommand, createChainClient, indexStartPosition, parseHeight, parseNetwork } from './context.ts';
export type { GlobalOptions, CommandContext } from './context.ts';
