/**
 * One retained instruction line: comment stripped, trimmed, never empty.
 */
export interface SourceLine {
  /** Instruction text. */
  text: string;
  /** 1-based line number in the original file. */
  line: number;
}

/**
 * Source file + its retained instruction lines, in file order.
 */
export interface SourceFile {
  path: string;
  text: string;
  lines: SourceLine[];
}

function stripComment(line: string): string {
  const slashes = line.indexOf('//');
  return slashes >= 0 ? line.slice(0, slashes) : line;
}

/**
 * Build a {@link SourceFile} from a path and UTF-8 source text.
 *
 * Everything from the first `//` to end of line is dropped, the rest is trimmed, and lines that
 * end up empty are discarded.
 */
export function makeSourceFile(path: string, text: string): SourceFile {
  const lines: SourceLine[] = [];
  const raw = text.split(/\r?\n/);
  for (let i = 0; i < raw.length; i++) {
    const instruction = stripComment(raw[i] ?? '').trim();
    if (instruction.length === 0) continue;
    lines.push({ text: instruction, line: i + 1 });
  }
  return { path, text, lines };
}
