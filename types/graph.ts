/**
 * Graph types for the LinkWeave engine.
 *
 * The graph is derived on every request from the current note set and is
 * never persisted. Edges come from two sources: explicit `[[Title]]`
 * references and nearest-neighbour embedding similarity.
 */

import type { NoteId } from "./note";

/** Where an edge came from. */
export type EdgeKind = "wikilink" | "semantic";

/** A relationship between two notes. */
export interface GraphEdge {
  source: NoteId;
  target: NoteId;
  kind: EdgeKind;
  /** 1 for wikilinks, the raw similarity in [0, 1] for semantic edges. */
  weight: number;
}

/** A note rendered as a graph node. */
export interface GraphNode {
  id: NoteId;
  title: string;
  /** Number of distinct neighbours across both edge kinds. */
  edgeCount: number;
}

/** The graph payload served to the rendering front end. */
export interface GraphData {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/** A note whose content links to another note. */
export interface Backlink {
  id: NoteId;
  title: string;
}

/**
 * Undirected adjacency keyed by note ID. Every key is a note in the set
 * under consideration; values never contain the key itself.
 */
export type Adjacency = Map<NoteId, Set<NoteId>>;
