import type { AsmBlock, AssemblyProgram, ListingArtifact, WriteListingOptions } from './types.js';
import { isCommentLine } from './writeAsm.js';

function isLabelLine(line: string): boolean {
  return line.startsWith('(');
}

function toRomAddress(n: number): string {
  return n.toString().padStart(5, '0');
}

function blockHeader(file: string, block: AsmBlock): string {
  if (block.origin !== 'command') return `// ${block.origin}`;
  if (!block.source) return '// command';
  return `// ${file}:${block.source.line}: ${block.source.text}`;
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * Each instruction is prefixed with its ROM address. Labels occupy no ROM word and are listed
 * unaddressed; echo comments are replaced by the block's source attribution.
 */
export function writeListing(
  program: AssemblyProgram,
  opts?: WriteListingOptions,
): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';

  const lines: string[] = [];
  lines.push('// vm2asm listing');
  lines.push(`// source: ${program.file}`);

  let rom = 0;
  for (const block of program.blocks) {
    lines.push('');
    lines.push(blockHeader(program.file, block));
    for (const line of block.lines) {
      if (isCommentLine(line)) continue;
      if (isLabelLine(line)) {
        lines.push(`       ${line}`);
        continue;
      }
      lines.push(`${toRomAddress(rom)}  ${line}`);
      rom++;
    }
  }

  lines.push('');
  lines.push(`// ${rom} instructions`);

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
