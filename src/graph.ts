/**
 * Graph module — merge wikilink and semantic edges into one note graph.
 *
 * The graph is rebuilt from the current note set on every request. Notes
 * are referenced only by ID: adjacency is an ID-keyed map, never a web of
 * note objects, so reference cycles between notes cost nothing.
 */

import type {
  Adjacency,
  Backlink,
  GraphData,
  GraphEdge,
  NoteId,
  NoteStatus,
  NoteStore,
  NoteSummary,
} from "@/types";
import { SEMANTIC_NEIGHBOR_LIMIT, SEMANTIC_THRESHOLD } from "./config";
import { guardSimilarity, warnSkipped } from "./outcome";
import { extractReferencedTitles } from "./wikilink";

// ---------------------------------------------------------------------------
// Title resolution
// ---------------------------------------------------------------------------

/**
 * Build a case-insensitive title → ID index. When several notes share a
 * title, the first one in `notes` wins.
 */
export function buildTitleIndex(
  notes: Pick<NoteSummary, "id" | "title">[],
): Map<string, NoteId> {
  const index = new Map<string, NoteId>();
  for (const note of notes) {
    const key = note.title.toLowerCase();
    if (!index.has(key)) index.set(key, note.id);
  }
  return index;
}

/** Resolve a referenced title through the index. */
export function resolveTitle(
  index: Map<string, NoteId>,
  title: string,
): NoteId | undefined {
  return index.get(title.toLowerCase());
}

// ---------------------------------------------------------------------------
// Edge collection
// ---------------------------------------------------------------------------

/**
 * One wikilink edge per resolvable reference. Unresolved titles and
 * references a note makes to itself are dropped.
 */
export function collectWikilinkEdges(
  notes: Pick<NoteSummary, "id" | "title" | "content">[],
  titleIndex: Map<string, NoteId> = buildTitleIndex(notes),
): GraphEdge[] {
  const edges: GraphEdge[] = [];
  for (const note of notes) {
    for (const title of extractReferencedTitles(note.content)) {
      const targetId = resolveTitle(titleIndex, title);
      if (targetId === undefined || targetId === note.id) continue;
      edges.push({ source: note.id, target: targetId, kind: "wikilink", weight: 1 });
    }
  }
  return edges;
}

export interface SemanticEdgeOptions {
  /** Pairs must score strictly above this. */
  threshold: number;
  /** Nearest neighbours considered per note. */
  neighborLimit: number;
  /** Restrict both endpoints to notes with this status. */
  status?: NoteStatus;
  signal?: AbortSignal;
}

/**
 * Ask the store for nearest-neighbour pairs and turn them into semantic
 * edges between members of `noteIds`.
 *
 * Returns no edges, after logging a warning, when the store cannot answer
 * the query or the query fails. Only cancellation propagates.
 */
export async function loadSemanticEdges(
  store: NoteStore,
  noteIds: ReadonlySet<NoteId>,
  options: SemanticEdgeOptions,
): Promise<GraphEdge[]> {
  const { signal } = options;
  const outcome = await guardSimilarity(
    () =>
      store.semanticPairs(
        {
          perNoteLimit: options.neighborLimit,
          minSimilarity: options.threshold,
          status: options.status,
        },
        signal,
      ),
    signal,
  );
  signal?.throwIfAborted();

  if (!outcome.ok) {
    warnSkipped("semantic_edges_skipped", outcome, { threshold: options.threshold });
    return [];
  }

  const edges: GraphEdge[] = [];
  for (const pair of outcome.value) {
    if (pair.sourceId === pair.targetId) continue;
    if (!noteIds.has(pair.sourceId) || !noteIds.has(pair.targetId)) continue;
    edges.push({
      source: pair.sourceId,
      target: pair.targetId,
      kind: "semantic",
      weight: pair.similarity,
    });
  }
  return edges;
}

// ---------------------------------------------------------------------------
// Adjacency
// ---------------------------------------------------------------------------

/**
 * Build an undirected adjacency over `noteIds` from `edges`. Edges with an
 * endpoint outside the set, and self-edges, are ignored.
 */
export function buildAdjacency(
  noteIds: Iterable<NoteId>,
  edges: Iterable<GraphEdge>,
): Adjacency {
  const adjacency: Adjacency = new Map();
  for (const id of noteIds) adjacency.set(id, new Set());

  for (const edge of edges) {
    if (edge.source === edge.target) continue;
    const fromSource = adjacency.get(edge.source);
    const fromTarget = adjacency.get(edge.target);
    if (!fromSource || !fromTarget) continue;
    fromSource.add(edge.target);
    fromTarget.add(edge.source);
  }
  return adjacency;
}

/** Number of distinct neighbours per note. */
export function degreeMap(adjacency: Adjacency): Map<NoteId, number> {
  const degrees = new Map<NoteId, number>();
  for (const [id, neighbors] of adjacency) degrees.set(id, neighbors.size);
  return degrees;
}

// ---------------------------------------------------------------------------
// Graph building
// ---------------------------------------------------------------------------

export interface BuildGraphOptions {
  /** Similarity a semantic edge must exceed (default: config). */
  semanticThreshold?: number;
  /** Nearest neighbours considered per note (default: config). */
  neighborLimit?: number;
  signal?: AbortSignal;
}

/**
 * Build the rendered graph for `notes`: wikilink edges from their content
 * plus semantic edges from the store, with each node's distinct-neighbour
 * count.
 *
 * Mutual nearest neighbours produce one semantic edge from each side; the
 * rendering layer draws both.
 */
export async function buildGraph(
  notes: NoteSummary[],
  store: NoteStore,
  options: BuildGraphOptions = {},
): Promise<GraphData> {
  if (notes.length === 0) return { nodes: [], edges: [] };

  const noteIds = new Set(notes.map((n) => n.id));
  const wikilinkEdges = collectWikilinkEdges(notes);
  const semanticEdges = await loadSemanticEdges(store, noteIds, {
    threshold: options.semanticThreshold ?? SEMANTIC_THRESHOLD,
    neighborLimit: options.neighborLimit ?? SEMANTIC_NEIGHBOR_LIMIT,
    signal: options.signal,
  });

  const edges = [...wikilinkEdges, ...semanticEdges];
  const degrees = degreeMap(buildAdjacency(noteIds, edges));

  return {
    nodes: notes.map((n) => ({
      id: n.id,
      title: n.title,
      edgeCount: degrees.get(n.id) ?? 0,
    })),
    edges,
  };
}

/**
 * Load every note from the store and build its graph.
 * A failure to list notes propagates.
 */
export async function loadGraph(
  store: NoteStore,
  options: BuildGraphOptions = {},
): Promise<GraphData> {
  const notes = await store.listNotes({}, options.signal);
  return buildGraph(notes, store, options);
}

// ---------------------------------------------------------------------------
// Backlinks
// ---------------------------------------------------------------------------

/**
 * Notes whose wikilinks resolve to `noteId`, in `notes` order. Titles
 * resolve the same way as graph edges; a note linking more than once is
 * listed once, and a note never backlinks itself.
 */
export function collectBacklinks(
  notes: Pick<NoteSummary, "id" | "title" | "content">[],
  noteId: NoteId,
  titleIndex: Map<string, NoteId> = buildTitleIndex(notes),
): Backlink[] {
  const backlinks: Backlink[] = [];
  for (const note of notes) {
    if (note.id === noteId) continue;
    for (const title of extractReferencedTitles(note.content)) {
      if (resolveTitle(titleIndex, title) === noteId) {
        backlinks.push({ id: note.id, title: note.title });
        break;
      }
    }
  }
  return backlinks;
}

/**
 * Load every note and list the backlinks of `noteId`. Empty when the note
 * does not exist; a failure to list notes propagates.
 */
export async function loadBacklinks(
  store: NoteStore,
  noteId: NoteId,
  signal?: AbortSignal,
): Promise<Backlink[]> {
  const notes = await store.listNotes({}, signal);
  if (!notes.some((n) => n.id === noteId)) return [];
  return collectBacklinks(notes, noteId);
}
