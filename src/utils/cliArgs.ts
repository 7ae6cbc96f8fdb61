// Utilities: Command-line flags for the terminal client

export interface PlayArgs {
  sessionId?: string;
  provider?: number;
  slotName?: string;
}

function flagValue(argv: readonly string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

/**
 * Reads `--session <id>`, `--provider <n>` and `--load <slot>`.
 */
export function parsePlayArgs(argv: readonly string[]): PlayArgs {
  const provider = flagValue(argv, '--provider');
  return {
    sessionId: flagValue(argv, '--session'),
    provider: provider === undefined ? undefined : parseInt(provider, 10),
    slotName: flagValue(argv, '--load'),
  };
}
