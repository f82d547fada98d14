import type { SyntaxDiagnostic } from "./gate.js";

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

type Open = { char: string; offset: number };

/**
 * Lexical well-formedness check for PHP source: tags, strings, heredocs,
 * comments and bracket balance. Nothing is executed.
 *
 * The scan stops at the first defect; one precise diagnostic beats a cascade.
 */
export function scanPhp(source: string): SyntaxDiagnostic[] {
  const lineStarts = computeLineStarts(source);
  const at = (offset: number, message: string): SyntaxDiagnostic[] => {
    const { line, column } = position(lineStarts, offset);
    return [{ line, column, message }];
  };

  const stack: Open[] = [];
  const len = source.length;
  let i = 0;
  let inPhp = false;

  while (i < len) {
    if (!inPhp) {
      const open = source.indexOf("<?", i);
      if (open === -1) break;
      i = open + 2;
      if (source.startsWith("php", i) && !isIdentChar(source[i + 3])) i += 3;
      else if (source[i] === "=") i += 1;
      inPhp = true;
      continue;
    }

    const ch = source[i];
    const next = source[i + 1];

    if (ch === "?" && next === ">") {
      inPhp = false;
      i += 2;
      continue;
    }

    if ((ch === "/" && next === "/") || (ch === "#" && next !== "[")) {
      i = skipLineComment(source, i);
      continue;
    }

    if (ch === "/" && next === "*") {
      const end = source.indexOf("*/", i + 2);
      if (end === -1) return at(i, "unterminated block comment");
      i = end + 2;
      continue;
    }

    if (ch === "'") {
      const end = skipSingleQuoted(source, i);
      if (end === -1) return at(i, "unterminated single-quoted string");
      i = end;
      continue;
    }

    if (ch === '"' || ch === "`") {
      const end = skipInterpolated(source, i, ch);
      if (end === -1) return at(i, ch === '"' ? "unterminated double-quoted string" : "unterminated backtick string");
      i = end;
      continue;
    }

    if (ch === "<" && source.startsWith("<<<", i)) {
      const heredoc = skipHeredoc(source, i);
      if (heredoc.kind === "error") return at(i, heredoc.message);
      if (heredoc.kind === "ok") {
        i = heredoc.end;
        continue;
      }
    }

    if (ch === "#" && next === "[") {
      stack.push({ char: "[", offset: i + 1 });
      i += 2;
      continue;
    }

    if (ch in OPENERS) {
      stack.push({ char: ch, offset: i });
    } else if (ch in CLOSERS) {
      const top = stack.pop();
      if (!top) return at(i, `unexpected '${ch}'`);
      if (top.char !== CLOSERS[ch]) {
        return at(i, `unexpected '${ch}', expecting '${OPENERS[top.char]}' to close '${top.char}' opened at ${describe(lineStarts, top.offset)}`);
      }
    }
    i++;
  }

  const unclosed = stack.pop();
  if (unclosed) return at(unclosed.offset, `unclosed '${unclosed.char}'`);
  return [];
}

function skipLineComment(source: string, start: number): number {
  let i = start;
  while (i < source.length && source[i] !== "\n") {
    // a closing tag ends a line comment and leaves PHP mode
    if (source[i] === "?" && source[i + 1] === ">") return i;
    i++;
  }
  return i;
}

function skipSingleQuoted(source: string, start: number): number {
  for (let i = start + 1; i < source.length; i++) {
    const ch = source[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch === "'") return i + 1;
  }
  return -1;
}

/** Double-quoted or backtick string, including `{$expr}` interpolation. */
function skipInterpolated(source: string, start: number, quote: string): number {
  for (let i = start + 1; i < source.length; i++) {
    const ch = source[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch === quote) return i + 1;
    if (ch === "{" && source[i + 1] === "$") {
      const end = skipInterpolation(source, i);
      if (end === -1) return -1;
      i = end - 1;
    }
  }
  return -1;
}

function skipInterpolation(source: string, start: number): number {
  let depth = 0;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (ch === "'") {
      const end = skipSingleQuoted(source, i);
      if (end === -1) return -1;
      i = end - 1;
    } else if (ch === '"') {
      const end = skipInterpolated(source, i, '"');
      if (end === -1) return -1;
      i = end - 1;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

type HeredocScan = { kind: "ok"; end: number } | { kind: "error"; message: string } | { kind: "none" };

const HEREDOC_HEAD = /^<<<[ \t]*(["']?)([A-Za-z_][A-Za-z0-9_]*)\1\r?\n/;

function skipHeredoc(source: string, start: number): HeredocScan {
  const head = HEREDOC_HEAD.exec(source.slice(start, start + 256));
  if (!head) return { kind: "none" };
  const label = head[2];
  // PHP 7.3+: the closing marker may be indented and followed by any non-identifier char
  const closing = new RegExp(`^[ \\t]*${label}(?![A-Za-z0-9_])`, "m");
  const bodyStart = start + head[0].length;
  const match = closing.exec(source.slice(bodyStart));
  if (!match) return { kind: "error", message: `unterminated heredoc '${label}'` };
  return { kind: "ok", end: bodyStart + match.index + match[0].length };
}

function isIdentChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

function computeLineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === "\n") starts.push(i + 1);
  }
  return starts;
}

function position(lineStarts: number[], offset: number): { line: number; column: number } {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: offset - lineStarts[lo] + 1 };
}

function describe(lineStarts: number[], offset: number): string {
  const { line, column } = position(lineStarts, offset);
  return `${line}:${column}`;
}
