export type RepairName = "normalizeSingleQuotes" | "stripTrailingCommas" | "closeUnterminatedStructure";

export interface RepairResult {
  text: string;
  applied: RepairName[];
}

/**
 * Rewrites single-quoted strings that sit outside double-quoted spans as
 * double-quoted strings. Inner `"` are escaped and `\'` becomes a bare `'`.
 * An unterminated single-quoted string is left as it was.
 */
export function normalizeSingleQuotes(text: string): string {
  let output = "";
  let inDouble = false;
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (inDouble) {
      output += char;
      if (char === "\\" && index + 1 < text.length) {
        output += text[index + 1];
        index += 2;
        continue;
      }
      if (char === '"') {
        inDouble = false;
      }
      index += 1;
      continue;
    }

    if (char === '"') {
      inDouble = true;
      output += char;
      index += 1;
      continue;
    }

    if (char !== "'") {
      output += char;
      index += 1;
      continue;
    }

    let content = "";
    let cursor = index + 1;
    let closed = false;
    while (cursor < text.length) {
      const inner = text[cursor];
      if (inner === "\\" && cursor + 1 < text.length) {
        const next = text[cursor + 1];
        content += next === "'" ? "'" : `\\${next}`;
        cursor += 2;
        continue;
      }
      if (inner === "'") {
        closed = true;
        break;
      }
      content += inner === '"' ? '\\"' : inner;
      cursor += 1;
    }

    if (!closed) {
      output += text.slice(index);
      break;
    }

    output += `"${content}"`;
    index = cursor + 1;
  }

  return output;
}

/** Drops a comma followed only by whitespace before `}` or `]`, outside strings. */
export function stripTrailingCommas(text: string): string {
  let output = "";
  let inString = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      output += char;
      if (char === "\\" && index + 1 < text.length) {
        output += text[index + 1];
        index += 1;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      output += char;
      continue;
    }

    if (char === ",") {
      let lookahead = index + 1;
      while (lookahead < text.length && /\s/.test(text[lookahead])) {
        lookahead += 1;
      }
      const next = text[lookahead];
      if (next === "}" || next === "]") {
        continue;
      }
    }

    output += char;
  }

  return output;
}

/**
 * When the text ends inside an object or array, appends the closer for the
 * innermost open one (closing a dangling string first). Only one level is
 * closed.
 */
export function closeUnterminatedStructure(text: string): string {
  const stack: Array<"}" | "]"> = [];
  let inString = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (char === "\\") {
        index += 1;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      stack.push("}");
    } else if (char === "[") {
      stack.push("]");
    } else if ((char === "}" || char === "]") && stack[stack.length - 1] === char) {
      stack.pop();
    }
  }

  const closer = stack[stack.length - 1];
  if (!closer) {
    return text;
  }
  return `${inString ? `${text}"` : text.trimEnd()}${closer}`;
}

const REPAIRS: ReadonlyArray<readonly [RepairName, (text: string) => string]> = [
  ["normalizeSingleQuotes", normalizeSingleQuotes],
  ["stripTrailingCommas", stripTrailingCommas],
  ["closeUnterminatedStructure", closeUnterminatedStructure]
];

/** Runs every repair once, in order, and reports the ones that changed the text. */
export function applyRepairs(text: string): RepairResult {
  let current = text;
  const applied: RepairName[] = [];
  for (const [name, repair] of REPAIRS) {
    const next = repair(current);
    if (next !== current) {
      applied.push(name);
      current = next;
    }
  }
  return {
    text: current,
    applied
  };
}
