// Infrastructure layer: Knowledge graph file loader

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { InMemoryKnowledgeStore } from './InMemoryKnowledgeStore.js';
import type { KnowledgeGraphData } from './InMemoryKnowledgeStore.js';
import { WorldLoadError } from '@/utils/errors.js';

const knowledgeGraphSchema = z.object({
  nodes: z
    .array(
      z.object({
        id: z.string().min(1),
        label: z.string().min(1),
        type: z.string().default('entity'),
        description: z.string().optional(),
      })
    )
    .default([]),
  edges: z
    .array(
      z.object({
        source: z.string().min(1),
        target: z.string().min(1),
        relation: z.string().default('related_to'),
      })
    )
    .default([]),
  chunks: z
    .array(
      z.object({
        id: z.string().min(1),
        text: z.string(),
        entity_ids: z.array(z.string()).default([]),
        source: z.string().optional(),
      })
    )
    .default([]),
});

export function parseKnowledgeGraph(raw: unknown): KnowledgeGraphData {
  const parsed = knowledgeGraphSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorldLoadError('Knowledge graph is invalid', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return {
    nodes: parsed.data.nodes,
    edges: parsed.data.edges,
    chunks: parsed.data.chunks.map((chunk) => ({
      id: chunk.id,
      text: chunk.text,
      entityIds: chunk.entity_ids,
      source: chunk.source,
    })),
  };
}

/**
 * Load the knowledge graph JSON. A missing file yields an empty store.
 */
export function loadKnowledgeStore(filePath: string): InMemoryKnowledgeStore {
  const fullPath = resolve(filePath);
  if (!existsSync(fullPath)) {
    console.warn(`[KnowledgeStore] No knowledge graph at ${fullPath}, retrieval will be empty`);
    return new InMemoryKnowledgeStore();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new WorldLoadError(`Knowledge graph is not valid JSON: ${fullPath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const store = new InMemoryKnowledgeStore(parseKnowledgeGraph(raw));
  console.log(`[KnowledgeStore] Loaded ${store.size.nodes} nodes, ${store.size.chunks} chunks`);
  return store;
}
