// Infrastructure layer: In-memory knowledge graph + document chunk store
// Implements the KnowledgeStore port with graph expansion and lexical scoring

import type {
  DocumentChunk,
  KnowledgeStore,
  RelatedNode,
  RetrievalContext,
} from '@/domain/knowledge/types.js';
import { emptyRetrievalContext, toEntityId } from '@/domain/knowledge/types.js';

export interface GraphNode {
  id: string;
  label: string;
  type: string;
  description?: string;
}

export interface GraphEdge {
  source: string;
  target: string;
  relation: string;
}

export interface StoredChunk {
  id: string;
  text: string;
  entityIds: string[];
  source?: string;
}

export interface KnowledgeGraphData {
  nodes: GraphNode[];
  edges: GraphEdge[];
  chunks: StoredChunk[];
}

const MAX_DEPTH = 2;
const ENTITY_WEIGHT = 3;
const DEPTH_WEIGHTS: Record<number, number> = { 1: 2, 2: 1 };

interface Neighbour {
  id: string;
  relation: string;
}

export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly labels = new Map<string, string>();
  private readonly adjacency = new Map<string, Neighbour[]>();
  private readonly chunks: Array<StoredChunk & { lower: string }>;

  constructor(data: KnowledgeGraphData = { nodes: [], edges: [], chunks: [] }) {
    for (const node of data.nodes) {
      this.nodes.set(node.id, node);
      this.labels.set(node.label.toLowerCase(), node.id);
    }

    for (const edge of data.edges) {
      if (!this.nodes.has(edge.source) || !this.nodes.has(edge.target)) continue;
      this.link(edge.source, { id: edge.target, relation: edge.relation });
      this.link(edge.target, { id: edge.source, relation: edge.relation });
    }
    for (const neighbours of this.adjacency.values()) {
      neighbours.sort((a, b) => a.id.localeCompare(b.id) || a.relation.localeCompare(b.relation));
    }

    this.chunks = data.chunks.map((chunk) => ({ ...chunk, lower: chunk.text.toLowerCase() }));
  }

  get size(): { nodes: number; chunks: number } {
    return { nodes: this.nodes.size, chunks: this.chunks.length };
  }

  query(entities: ReadonlySet<string>, keywords: readonly string[], limit: number): RetrievalContext {
    const uniqueKeywords = [...new Set(keywords.map((k) => k.toLowerCase()).filter(Boolean))];
    const context = emptyRetrievalContext(entities, uniqueKeywords);
    const max = Math.max(0, Math.floor(limit));
    if (max === 0 || (this.nodes.size === 0 && this.chunks.length === 0)) {
      return context;
    }

    const queryIds = new Set<string>();
    for (const entity of entities) {
      const id = this.resolveEntity(entity);
      if (id) queryIds.add(id);
    }

    const related = this.expand(queryIds);
    context.relatedNodes = related.slice(0, max * 2);

    const depthOf = new Map(related.map((node) => [node.entityId, node.distance]));
    const scored: DocumentChunk[] = [];
    for (const chunk of this.chunks) {
      let score = 0;
      for (const entityId of chunk.entityIds) {
        if (queryIds.has(entityId)) {
          score += ENTITY_WEIGHT;
          continue;
        }
        const depth = depthOf.get(entityId);
        if (depth !== undefined) score += DEPTH_WEIGHTS[depth] ?? 0;
      }
      for (const keyword of uniqueKeywords) {
        if (chunk.lower.includes(keyword)) score += 1;
      }
      if (score > 0) {
        scored.push({ id: chunk.id, text: chunk.text, score, source: chunk.source });
      }
    }

    scored.sort((a, b) => b.score - a.score || compareIds(a.id, b.id));
    context.chunks = scored.slice(0, max);
    return context;
  }

  /**
   * Slug lookup first, then exact label match.
   */
  private resolveEntity(entity: string): string | null {
    const slug = toEntityId(entity);
    if (!slug) return null;
    if (this.nodes.has(slug)) return slug;
    const byLabel = this.labels.get(entity.trim().toLowerCase());
    if (byLabel) return byLabel;
    // chunks may reference entities that have no graph node
    return this.chunks.some((chunk) => chunk.entityIds.includes(slug)) ? slug : null;
  }

  /**
   * Breadth-first walk from the query entities, undirected, up to MAX_DEPTH.
   */
  private expand(start: ReadonlySet<string>): RelatedNode[] {
    const seen = new Set(start);
    const related: RelatedNode[] = [];
    let frontier = [...start].sort(compareIds);

    for (let depth = 1; depth <= MAX_DEPTH && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const id of frontier) {
        for (const neighbour of this.adjacency.get(id) ?? []) {
          if (seen.has(neighbour.id)) continue;
          seen.add(neighbour.id);
          next.push(neighbour.id);
          related.push({
            entityId: neighbour.id,
            label: this.nodes.get(neighbour.id)?.label ?? neighbour.id,
            relation: neighbour.relation,
            distance: depth,
          });
        }
      }
      frontier = next.sort(compareIds);
    }

    return related.sort((a, b) => a.distance - b.distance || compareIds(a.entityId, b.entityId));
  }

  private link(from: string, neighbour: Neighbour): void {
    const list = this.adjacency.get(from);
    if (list) {
      list.push(neighbour);
    } else {
      this.adjacency.set(from, [neighbour]);
    }
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
