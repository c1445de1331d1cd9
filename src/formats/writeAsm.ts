import type { AsmArtifact, AssemblyProgram, WriteAsmOptions } from './types.js';

export function isCommentLine(line: string): boolean {
  return line.startsWith('//');
}

/**
 * Create a deterministic `.asm` artifact: every block's lines, in program order.
 */
export function writeAsm(program: AssemblyProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const comments = opts?.comments ?? true;

  const lines: string[] = [];
  for (const block of program.blocks) {
    for (const line of block.lines) {
      if (!comments && isCommentLine(line)) continue;
      lines.push(line);
    }
  }

  return { kind: 'asm', text: lines.join(lineEnding) + lineEnding };
}
