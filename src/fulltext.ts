/**
 * Full-text module — in-process keyword ranking for stores without a
 * search engine of their own.
 *
 * Pure computation. A document matches when every query term occurs in its
 * title or content. Rank grows with term occurrences and is damped by
 * document length, so short focused notes outrank long ones that mention a
 * term in passing.
 */

import type { FullTextHit, NoteId } from "@/types";

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/** Words kept around the first match when building a snippet. */
const SNIPPET_WORDS = 35;
/** Words of lead-in before the first match. */
const SNIPPET_LEAD = 5;

/** A document as seen by the ranker. */
export interface FullTextDocument {
  id: NoteId;
  title: string;
  content: string;
}

/** Lower-cased letter/digit runs. */
export function tokenize(text: string): string[] {
  return (text.match(TOKEN_PATTERN) ?? []).map((t) => t.toLowerCase());
}

/** Distinct query terms, in order of first appearance. */
export function queryTerms(query: string): string[] {
  return [...new Set(tokenize(query))];
}

/**
 * Up to {@link SNIPPET_WORDS} words of `content` starting a few words before
 * the first word containing a query term. Ellipses mark truncation.
 */
export function buildSnippet(content: string, terms: string[]): string {
  const words = content.split(/\s+/).filter((w) => w.length > 0);
  const termSet = new Set(terms);
  const firstHit = words.findIndex((w) => tokenize(w).some((t) => termSet.has(t)));
  const start = firstHit > SNIPPET_LEAD ? firstHit - SNIPPET_LEAD : 0;
  const end = Math.min(words.length, start + SNIPPET_WORDS);

  let snippet = words.slice(start, end).join(" ");
  if (start > 0) snippet = `...${snippet}`;
  if (end < words.length) snippet = `${snippet}...`;
  return snippet;
}

/** Raw rank of a document for the given terms, or null when it does not match. */
export function rankDocument(doc: FullTextDocument, terms: string[]): number | null {
  const tokens = tokenize(`${doc.title} ${doc.content}`);
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  let occurrences = 0;
  for (const term of terms) {
    const count = counts.get(term) ?? 0;
    if (count === 0) return null;
    occurrences += count;
  }
  return occurrences / (1 + Math.log(tokens.length));
}

/**
 * Rank `docs` against `query`, best first (ties by ID), capped at `limit`.
 * A query without any word characters matches nothing.
 */
export function searchDocuments(
  docs: FullTextDocument[],
  query: string,
  limit: number,
): FullTextHit[] {
  const terms = queryTerms(query);
  if (terms.length === 0) return [];

  const hits: FullTextHit[] = [];
  for (const doc of docs) {
    const rank = rankDocument(doc, terms);
    if (rank === null) continue;
    hits.push({
      id: doc.id,
      title: doc.title,
      snippet: buildSnippet(doc.content, terms),
      rank,
    });
  }

  hits.sort((a, b) => b.rank - a.rank || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return hits.slice(0, limit);
}
