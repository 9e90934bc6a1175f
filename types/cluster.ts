/**
 * Cluster types for the LinkWeave engine.
 *
 * A cluster is a connected component of the merged wikilink + semantic
 * graph, labelled by its most connected member.
 */

import type { NoteId } from "./note";

/** A connected component with more than one member. */
export interface Cluster {
  /** Member with the highest degree. */
  hubId: NoteId;
  hubTitle: string;
  /** Member IDs in input order. */
  members: NoteId[];
}
