// Application layer: Retrieval
// Turns the current state plus a command into a bounded knowledge-store query

import type { KnowledgeStore, RetrievalContext } from '@/domain/knowledge/types.js';
import { emptyRetrievalContext } from '@/domain/knowledge/types.js';
import type { GameState } from '@/application/game/GameState.js';

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'that', 'this', 'from', 'into', 'onto', 'about',
  'what', 'where', 'when', 'who', 'why', 'how', 'are', 'was', 'were', 'you',
  'your', 'his', 'her', 'its', 'our', 'their', 'them', 'then', 'than', 'there',
  'here', 'have', 'has', 'had', 'can', 'could', 'would', 'should', 'will',
  'just', 'some', 'any', 'all', 'not', 'but', 'out', 'off', 'over', 'under',
  'again', 'very', 'too', 'also', 'does', 'did', 'done', 'let', 'lets', 'please',
]);

export const MIN_KEYWORD_LENGTH = 3;

export interface RetrieverOptions {
  topK: number;
}

export function extractKeywords(text: string): string[] {
  const seen = new Set<string>();
  for (const word of text.toLowerCase().split(/[^a-z0-9']+/)) {
    const cleaned = word.replace(/^'+|'+$/g, '');
    if (cleaned.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(cleaned)) {
      seen.add(cleaned);
    }
  }
  return [...seen];
}

/**
 * Runs of capitalised words, ignoring the first word of the command.
 */
export function extractProperNouns(text: string): string[] {
  const words = text.trim().split(/\s+/);
  const nouns: string[] = [];
  let run: string[] = [];

  words.forEach((word, index) => {
    const cleaned = word.replace(/[^A-Za-z'-]/g, '');
    if (index > 0 && /^[A-Z]/.test(cleaned)) {
      run.push(cleaned);
      return;
    }
    if (run.length > 0) nouns.push(run.join(' '));
    run = [];
  });
  if (run.length > 0) nouns.push(run.join(' '));

  return nouns;
}

export class Retriever {
  private readonly topK: number;

  constructor(
    private store: KnowledgeStore,
    options: RetrieverOptions
  ) {
    this.topK = Math.min(10, Math.max(1, Math.floor(options.topK)));
  }

  /**
   * Never throws; a failing store yields an empty context.
   */
  retrieve(state: GameState, commandText: string): RetrievalContext {
    const entities = this.candidateEntities(state, commandText);
    const keywords = extractKeywords(commandText);

    try {
      return this.store.query(entities, keywords, this.topK);
    } catch (error) {
      console.error('[Retriever] Knowledge store query failed:', error);
      return emptyRetrievalContext(entities, keywords);
    }
  }

  candidateEntities(state: GameState, commandText: string): Set<string> {
    const area = state.currentArea();
    const entities = new Set<string>([area.id, area.name, area.region]);
    if (area.subRegion) entities.add(area.subRegion);

    area.npcs.forEach((npc) => entities.add(npc));
    area.items.forEach((item) => entities.add(item));
    state.inventory.forEach((entry) => entities.add(entry.itemId));

    const lower = commandText.toLowerCase();
    for (const name of [...area.npcs, ...area.items]) {
      if (lower.includes(name.toLowerCase())) entities.add(name);
    }
    extractProperNouns(commandText).forEach((noun) => entities.add(noun));

    return entities;
  }
}
