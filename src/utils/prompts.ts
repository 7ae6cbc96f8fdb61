// Utilities: Prompt management
// Pure functions for loading prompt files

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';

const DEFAULT_PROMPT_DIR = './data/prompts';

const promptCache = new Map<string, string>();

export function getPromptDir(): string {
  return resolve(process.env.PROMPT_DIR || DEFAULT_PROMPT_DIR);
}

/**
 * Load a prompt by name
 * Tries .md first, then .txt
 */
export function loadPrompt(name: string, useCache = true): string {
  const cached = useCache ? promptCache.get(name) : undefined;
  if (cached !== undefined) return cached;

  const dir = getPromptDir();
  const extensions = ['.md', '.txt'];

  for (const ext of extensions) {
    const path = resolve(dir, `${name}${ext}`);
    if (existsSync(path)) {
      const content = readFileSync(path, 'utf-8').trim();
      if (useCache) promptCache.set(name, content);
      return content;
    }
  }

  throw new Error(
    `Prompt not found: "${name}". Tried: ${extensions.map((e) => `${name}${e}`).join(', ')} in ${dir}`
  );
}

/**
 * Build a markdown section for prompts
 */
export function buildSection(title: string, body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '';
  return `# ${title}\n${trimmed}`;
}
