/**
 * Clustering module — connected components of the note graph.
 *
 * Pure computation, no external dependencies. Runs union-find with path
 * compression over the merged adjacency, keeps components with more than
 * one member, and labels each by its most connected note (the hub).
 */

import type { Adjacency, Cluster, NoteId } from "@/types";
import { TOP_CLUSTER_COUNT } from "./config";

// ---------------------------------------------------------------------------
// Union-find
// ---------------------------------------------------------------------------

/**
 * Disjoint-set forest over a fixed set of IDs. Path compression only, no
 * union by rank. Each instance belongs to a single clustering call.
 */
export class UnionFind {
  private readonly parent = new Map<NoteId, NoteId>();

  constructor(ids: Iterable<NoteId>) {
    for (const id of ids) this.parent.set(id, id);
  }

  /** Canonical root of `id`'s set. IDs outside the forest are their own root. */
  find(id: NoteId): NoteId {
    let root = id;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    // Compress: point every node on the walked path straight at the root.
    let current = id;
    while (current !== root) {
      const up = this.parent.get(current);
      if (up === undefined) break;
      this.parent.set(current, root);
      current = up;
    }
    return root;
  }

  /** Merge the sets containing `a` and `b`. */
  union(a: NoteId, b: NoteId): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA !== rootB && this.parent.has(rootA)) {
      this.parent.set(rootA, rootB);
    }
  }
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

/** Highest degree wins; equal degrees go to the smallest ID. */
export function selectHub(
  members: NoteId[],
  edgeCounts: ReadonlyMap<NoteId, number>,
): NoteId {
  let hub = members[0];
  let best = edgeCounts.get(hub) ?? 0;
  for (const id of members.slice(1)) {
    const degree = edgeCounts.get(id) ?? 0;
    if (degree > best || (degree === best && id < hub)) {
      hub = id;
      best = degree;
    }
  }
  return hub;
}

/**
 * Group `noteIds` into connected components of `adjacency`.
 * Members keep their order from `noteIds`.
 */
export function connectedComponents(
  noteIds: NoteId[],
  adjacency: Adjacency,
): NoteId[][] {
  const forest = new UnionFind(noteIds);
  for (const [id, neighbors] of adjacency) {
    for (const neighbor of neighbors) forest.union(id, neighbor);
  }

  const groups = new Map<NoteId, NoteId[]>();
  for (const id of noteIds) {
    const root = forest.find(id);
    const group = groups.get(root);
    if (group) group.push(id);
    else groups.set(root, [id]);
  }
  return [...groups.values()];
}

/** Smallest ID in a non-empty list. */
function minId(ids: NoteId[]): NoteId {
  return ids.reduce((min, id) => (id < min ? id : min));
}

/**
 * Connected components with more than one member, largest first, capped
 * at `topN`. Equal-size components are ordered by their smallest member ID.
 *
 * @param noteIds    - Every note under consideration.
 * @param adjacency  - Undirected adjacency over those notes.
 * @param edgeCounts - Degree per note, used to pick each hub.
 * @param titles     - Title per note; the hub ID stands in when missing.
 * @param topN       - Maximum number of clusters returned (default: config).
 */
export function buildClusters(
  noteIds: NoteId[],
  adjacency: Adjacency,
  edgeCounts: ReadonlyMap<NoteId, number>,
  titles: ReadonlyMap<NoteId, string>,
  topN: number = TOP_CLUSTER_COUNT,
): Cluster[] {
  return connectedComponents(noteIds, adjacency)
    .filter((members) => members.length > 1)
    .map((members) => ({ members, anchor: minId(members) }))
    .sort((a, b) =>
      b.members.length - a.members.length ||
      (a.anchor < b.anchor ? -1 : a.anchor > b.anchor ? 1 : 0),
    )
    .slice(0, Math.max(0, topN))
    .map(({ members }) => {
      const hubId = selectHub(members, edgeCounts);
      return { hubId, hubTitle: titles.get(hubId) ?? hubId, members };
    });
}
