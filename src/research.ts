/**
 * Research module — turns the health overview into research prompts.
 *
 * The research agent must keep running when the knowledge base cannot be
 * analysed, so the overview is fetched through a wrapper that never throws
 * (cancellation aside).
 */

import { emptyKbHealthOverview, type KbHealthOverview, type NoteStore } from "@/types";
import { getOverview, type HealthOptions } from "./health";
import { rethrowIfAborted } from "./outcome";

/** Unused seeds mentioned per run. */
const UNTAPPED_SEED_COUNT = 3;

/**
 * Health overview for the research agent. Any failure other than
 * cancellation is logged and yields an empty overview.
 */
export async function getOverviewForResearch(
  store: NoteStore,
  options: HealthOptions = {},
): Promise<KbHealthOverview> {
  try {
    return await getOverview(store, options);
  } catch (error) {
    rethrowIfAborted(error, options.signal);
    console.warn(
      JSON.stringify({
        event: "research_overview_failed",
        message: error instanceof Error ? error.message : String(error),
      }),
    );
    return emptyKbHealthOverview();
  }
}

/** One line per research opportunity in the overview. */
export function describeOpportunities(overview: KbHealthOverview): string[] {
  const lines: string[] = [];

  for (const orphan of overview.newAndUnconnected) {
    lines.push(`Gap: note '${orphan.title}' has no connections`);
  }
  for (const cluster of overview.richestClusters) {
    lines.push(`Deepen: cluster anchored by '${cluster.hubTitle}' (${cluster.noteCount} notes)`);
  }
  for (const seed of overview.neverUsedAsSeeds.slice(0, UNTAPPED_SEED_COUNT)) {
    lines.push(
      `Untapped: '${seed.title}' (${seed.connectionCount} connections, never generated from)`,
    );
  }

  return lines;
}
