// Terminal client: play one session in the console
// Usage: npm run play [-- --session hero] [-- --provider 3] [-- --load slot]

import 'dotenv/config';
import * as readline from 'readline/promises';
import { ZodError } from 'zod';
import { stdin as input, stdout as output } from 'process';
import { buildAppConfig, validateConfig } from '../src/utils/config.js';
import { createRuntime } from '../src/bootstrap.js';
import { closeDatabase } from '../src/infrastructure/database/lowdb/connection.js';
import type { NarrativeBlock } from '../src/domain/commands/types.js';
import type { GameSession } from '../src/application/game/GameSession.js';
import type { SessionRegistry } from '../src/application/game/SessionRegistry.js';
import { parsePlayArgs } from '../src/utils/cliArgs.js';
import { isLLMDebugEnabled } from '../src/utils/logger.js';
import { ConfigError, SaveCorruptedError, SaveNotFoundError } from '../src/utils/errors.js';

const QUIT = new Set(['quit', 'exit', 'q']);

function render(block: NarrativeBlock): string {
  switch (block.style) {
    case 'location':
      return `\n== ${block.text}`;
    case 'combat':
      return `[combat] ${block.text}`;
    case 'error':
      return `! ${block.text}`;
    case 'system':
      return `* ${block.text}`;
    default:
      return block.text;
  }
}

async function openSession(registry: SessionRegistry, argv: readonly string[]): Promise<GameSession | null> {
  try {
    return await registry.open(parsePlayArgs(argv));
  } catch (error) {
    if (
      error instanceof SaveNotFoundError ||
      error instanceof SaveCorruptedError ||
      error instanceof ConfigError ||
      error instanceof ZodError
    ) {
      const reason = error instanceof ZodError ? (error.issues[0]?.message ?? 'invalid flags') : error.message;
      console.error(`Could not start the session: ${reason}`);
      return null;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = buildAppConfig(process.env);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  const { registry } = await createRuntime(config);
  const session = await openSession(registry, process.argv.slice(2));
  if (!session) {
    process.exitCode = 1;
    await closeDatabase();
    return;
  }

  console.log(`\nSession: ${session.id} (resume later with --session ${session.id} --load <slot>)`);
  console.log(`Provider: ${session.providers.activeName}. Type "help" for commands, "quit" to leave.`);
  const opening = await session.handleCommand('look');
  opening.blocks.forEach((b) => console.log(render(b)));

  const rl = readline.createInterface({ input, output });
  try {
    for (;;) {
      const line = (await rl.question('\n> ')).trim();
      if (QUIT.has(line.toLowerCase())) break;
      const result = await session.handleCommand(line);
      result.blocks.forEach((b) => console.log(render(b)));
      if (isLLMDebugEnabled() && result.diagnostics.errors?.length) {
        console.log(`  (${result.diagnostics.errors.join('; ')})`);
      }
    }
  } finally {
    rl.close();
    await closeDatabase();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
