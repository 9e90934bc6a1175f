export type {
  NoteId,
  EmbeddingVector,
  NoteStatus,
  EmbedStatus,
  NoteSummary,
  Note,
  NoteVersion,
  SeedUsageMarker,
} from "./note";
export { EMBED_STATUSES, hasCompletedEmbedding } from "./note";

export type { EdgeKind, GraphEdge, GraphNode, GraphData, Backlink, Adjacency } from "./graph";

export type { Cluster } from "./cluster";

export type {
  KbHealthScorecard,
  UnconnectedNote,
  ClusterSummary,
  UnusedSeedNote,
  KbHealthOverview,
  ConnectionSuggestion,
  UnembeddedNote,
  LargeNote,
} from "./health";
export { emptyKbHealthOverview } from "./health";

export type { SearchResult, SearchType, SearchWeights, DuplicateCheckResult } from "./search";
export { SEARCH_TYPES } from "./search";

export type {
  SimilarityOutcome,
  ListNotesFilter,
  NeighborQuery,
  Neighbor,
  SemanticPairsQuery,
  SemanticPair,
  FullTextHit,
  NoteStore,
} from "./store";
export { similarityOk, similarityUnsupported, similarityError } from "./store";

export type {
  NoteRecord,
  NotesIndex,
  NoteEmbedding,
  EmbeddingsIndex,
  VersionsIndex,
  SeedUsageIndex,
} from "./vault";
export {
  emptyNotesIndex,
  emptyEmbeddingsIndex,
  emptyVersionsIndex,
  emptySeedUsageIndex,
} from "./vault";
