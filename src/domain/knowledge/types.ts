// Domain layer: Knowledge store contract
// NO external dependencies - pure TypeScript

export interface DocumentChunk {
  id: string;
  text: string;
  score: number;
  source?: string;
}

export interface RelatedNode {
  entityId: string;
  label: string;
  relation: string;
  /** hops from the nearest query entity */
  distance: number;
}

/**
 * Per-turn retrieval result. Never persisted.
 */
export interface RetrievalContext {
  chunks: DocumentChunk[];
  relatedNodes: RelatedNode[];
  entities: string[];
  keywords: string[];
}

/**
 * Port implemented by the infrastructure layer.
 * Must be deterministic for identical inputs and never throw on unknown
 * entities or an empty store.
 */
export interface KnowledgeStore {
  query(entities: ReadonlySet<string>, keywords: readonly string[], limit: number): RetrievalContext;
}

export function emptyRetrievalContext(
  entities: Iterable<string> = [],
  keywords: readonly string[] = []
): RetrievalContext {
  return { chunks: [], relatedNodes: [], entities: [...entities], keywords: [...keywords] };
}

/**
 * Entity ids are lower-case slugs: "Old Tom" -> "old_tom".
 */
export function toEntityId(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}
