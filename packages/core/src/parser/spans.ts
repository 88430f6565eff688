export interface FencedBlock {
  /** Offset of the opening backticks. */
  start: number;
  /** Offset just past the closing backticks, or the end of the text. */
  end: number;
  contentStart: number;
  content: string;
  language: string;
  terminated: boolean;
}

export interface BraceSpan {
  start: number;
  end: number;
  text: string;
  terminated: boolean;
}

// Fences open and close at the start of a line, so backticks inside a JSON
// string (where newlines are escaped) never split a block.
const FENCE_PATTERN = /^([ \t]*)(```([\w+-]*)[ \t]*\r?\n?)([\s\S]*?)(^[ \t]*```|(?![\s\S]))/gm;

/** Every triple-backtick block in order; an unclosed last fence runs to the end. */
export function extractFencedBlocks(text: string): FencedBlock[] {
  const blocks: FencedBlock[] = [];
  for (const match of text.matchAll(FENCE_PATTERN)) {
    const start = (match.index ?? 0) + (match[1] ?? "").length;
    const opener = match[2] ?? "";
    const closer = match[5] ?? "";
    blocks.push({
      start,
      end: (match.index ?? 0) + match[0].length,
      contentStart: start + opener.length,
      content: match[4] ?? "",
      language: (match[3] ?? "").toLowerCase(),
      terminated: closer.length > 0
    });
  }
  return blocks;
}

/**
 * Outermost balanced `{...}` substrings. Quotes only count once inside an
 * object, so apostrophes in surrounding prose do not hide a call. A span
 * still open at the end of the text is returned unterminated.
 */
export function extractBraceSpans(text: string): BraceSpan[] {
  const spans: BraceSpan[] = [];
  let depth = 0;
  let start = -1;
  let quote: '"' | "'" | null = null;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (depth === 0) {
      if (char === "{") {
        depth = 1;
        start = index;
        quote = null;
      }
      continue;
    }

    if (quote) {
      if (char === "\\") {
        index += 1;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        spans.push({
          start,
          end: index + 1,
          text: text.slice(start, index + 1),
          terminated: true
        });
      }
    }
  }

  if (depth > 0 && start >= 0) {
    spans.push({
      start,
      end: text.length,
      text: text.slice(start),
      terminated: false
    });
  }

  return spans;
}
