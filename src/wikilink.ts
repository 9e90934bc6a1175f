/**
 * Wikilink module — extract `[[Title]]` references from note content.
 *
 * Pure text scanning, no external dependencies. Anything outside the
 * double-bracket delimiters, including surrounding markup, is ignored.
 */

/** Matches `[[Title]]`; the title is one or more characters other than `]`. */
export const WIKILINK_PATTERN = /\[\[([^\]]+)\]\]/g;

/**
 * Lazily yield every title referenced by a wikilink in `content`, in order
 * of appearance. Duplicates are preserved.
 *
 * The returned iterable is restartable: each iteration scans the content
 * from the beginning.
 */
export function extractReferencedTitles(content: string): Iterable<string> {
  return {
    *[Symbol.iterator]() {
      // Fresh regex per pass so lastIndex never leaks between iterations.
      const pattern = new RegExp(WIKILINK_PATTERN.source, "g");
      let match: RegExpExecArray | null;
      while ((match = pattern.exec(content)) !== null) {
        yield match[1];
      }
    },
  };
}

/** Render a title as wikilink text. */
export function formatWikilink(title: string): string {
  return `[[${title}]]`;
}
