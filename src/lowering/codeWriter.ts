import type { ArithmeticOperator } from '../frontend/ast.js';
import { isArithmeticOperator } from '../frontend/ast.js';
import type { SourceLine } from '../frontend/source.js';
import type { DiagnosticId, TranslateError } from '../diagnostics/types.js';
import { DiagnosticIds, translateError } from '../diagnostics/types.js';
import type { AsmBlock, AssemblyProgram } from '../formats/types.js';
import type { Segment } from '../semantics/segments.js';
import { MAX_CONSTANT, SCRATCH_REGISTER, STACK_BASE, resolveSegment } from '../semantics/segments.js';

type BinaryOperator = 'add' | 'sub' | 'and' | 'or';
type UnaryOperator = 'neg' | 'not';
type ComparisonOperator = 'eq' | 'gt' | 'lt';

const binaryCompute: Record<BinaryOperator, string> = {
  add: 'M=M+D',
  sub: 'M=M-D',
  and: 'M=M&D',
  or: 'M=M|D',
};

const unaryCompute: Record<UnaryOperator, string> = {
  neg: 'M=-M',
  not: 'M=!M',
};

const comparisonJump: Record<ComparisonOperator, string> = {
  eq: 'JEQ',
  gt: 'JGT',
  lt: 'JLT',
};

/** Label the epilogue spins on. */
export const HALT_LABEL = 'END';

/**
 * Accumulates the target program for one translation run.
 *
 * Every `write*` call validates its input before touching the program, so a rejected command
 * never leaves a partial block behind.
 */
export class CodeWriter {
  private readonly file: string;
  private readonly blocks: AsmBlock[] = [];
  private comparisonLabelCounter = 0;
  private finished = false;

  constructor(file = '<memory>') {
    this.file = file;
    this.blocks.push({
      origin: 'prologue',
      lines: ['// initialize stack pointer', `@${STACK_BASE}`, 'D=A', '@SP', 'M=D'],
    });
  }

  /** Number of comparison label pairs generated so far. */
  get labelCount(): number {
    return this.comparisonLabelCounter;
  }

  get blockCount(): number {
    return this.blocks.length;
  }

  private fail(id: DiagnosticId, message: string, source?: SourceLine): TranslateError {
    return translateError(id, message, this.file, source?.line);
  }

  private append(lines: string[], source?: SourceLine): void {
    this.blocks.push({ origin: 'command', ...(source ? { source } : {}), lines });
  }

  private ensureOpen(source?: SourceLine): void {
    if (this.finished) {
      throw this.fail(DiagnosticIds.TranslatorState, 'Program already finished', source);
    }
  }

  /**
   * Emit one block for a stack operator.
   */
  writeArithmetic(command: string, source?: SourceLine): void {
    this.ensureOpen(source);
    if (!isArithmeticOperator(command)) {
      throw this.fail(DiagnosticIds.InvalidOperator, `Unknown arithmetic operator "${command}"`, source);
    }
    this.append(this.arithmeticLines(command), source);
  }

  private arithmeticLines(op: ArithmeticOperator): string[] {
    switch (op) {
      case 'add':
      case 'sub':
      case 'and':
      case 'or':
        // pop y into D, then fold into x in place
        return [`// ${op}`, '@SP', 'AM=M-1', 'D=M', 'A=A-1', binaryCompute[op]];
      case 'neg':
      case 'not':
        return [`// ${op}`, '@SP', 'A=M-1', unaryCompute[op]];
      case 'eq':
      case 'gt':
      case 'lt':
        return this.comparisonLines(op);
    }
  }

  private comparisonLines(op: ComparisonOperator): string[] {
    const n = this.comparisonLabelCounter++;
    const prefix = op.toUpperCase();
    const labelTrue = `${prefix}_TRUE_${n}`;
    const labelEnd = `${prefix}_END_${n}`;
    return [
      `// ${op}`,
      '@SP',
      'AM=M-1',
      'D=M',
      '@SP',
      'AM=M-1',
      'D=M-D',
      `@${labelTrue}`,
      `D;${comparisonJump[op]}`,
      '@SP',
      'A=M',
      'M=0',
      `@${labelEnd}`,
      '0;JMP',
      `(${labelTrue})`,
      '@SP',
      'A=M',
      'M=-1',
      `(${labelEnd})`,
      '@SP',
      'M=M+1',
    ];
  }

  /**
   * Emit one block moving a value between the stack and a segment slot.
   */
  writePushPop(
    command: 'push' | 'pop',
    segmentName: string,
    index: number,
    source?: SourceLine,
  ): void {
    this.ensureOpen(source);
    const segment = resolveSegment(segmentName);
    if (!segment) {
      throw this.fail(DiagnosticIds.UnknownSegment, `Unknown segment "${segmentName}"`, source);
    }
    this.checkIndex(command, segment, index, source);

    const echo = `// ${command} ${segmentName} ${index}`;
    this.append([echo, ...this.pushPopLines(command, segment, index)], source);
  }

  private checkIndex(
    command: 'push' | 'pop',
    segment: Segment,
    index: number,
    source?: SourceLine,
  ): void {
    if (!Number.isInteger(index) || index < 0) {
      throw this.fail(
        DiagnosticIds.InvalidIndex,
        `Index must be a non-negative integer, got ${index}`,
        source,
      );
    }
    switch (segment.kind) {
      case 'constant':
        if (command === 'pop') {
          throw this.fail(
            DiagnosticIds.InvalidSegmentAccess,
            'Cannot pop into the constant segment',
            source,
          );
        }
        if (index > MAX_CONSTANT) {
          throw this.fail(
            DiagnosticIds.IndexOutOfRange,
            `Constant ${index} exceeds ${MAX_CONSTANT}`,
            source,
          );
        }
        return;
      case 'fixed':
        if (index >= segment.size) {
          throw this.fail(
            DiagnosticIds.IndexOutOfRange,
            `Index ${index} is out of range for segment "${segment.name}" (size ${segment.size})`,
            source,
          );
        }
        return;
      case 'indirect':
        if (index > MAX_CONSTANT) {
          throw this.fail(
            DiagnosticIds.IndexOutOfRange,
            `Index ${index} exceeds ${MAX_CONSTANT}`,
            source,
          );
        }
        return;
    }
  }

  private pushPopLines(command: 'push' | 'pop', segment: Segment, index: number): string[] {
    const pushD = ['@SP', 'A=M', 'M=D', '@SP', 'M=M+1'];

    switch (segment.kind) {
      case 'constant':
        return [`@${index}`, 'D=A', ...pushD];
      case 'fixed': {
        const address = segment.base + index;
        if (command === 'push') return [`@${address}`, 'D=M', ...pushD];
        return ['@SP', 'M=M-1', '@SP', 'A=M', 'D=M', `@${address}`, 'M=D'];
      }
      case 'indirect':
        if (command === 'push') {
          return [`@${index}`, 'D=A', `@${segment.register}`, 'A=M+D', 'D=M', ...pushD];
        }
        return [
          `@${index}`,
          'D=A',
          `@${segment.register}`,
          'D=M+D',
          `@${SCRATCH_REGISTER}`,
          'M=D',
          '@SP',
          'AM=M-1',
          'D=M',
          `@${SCRATCH_REGISTER}`,
          'A=M',
          'M=D',
        ];
    }
  }

  /**
   * Append the halt loop and return the finished program. Allowed once.
   */
  finish(): AssemblyProgram {
    this.ensureOpen();
    this.finished = true;
    this.blocks.push({
      origin: 'epilogue',
      lines: [`(${HALT_LABEL})`, `@${HALT_LABEL}`, '0;JMP'],
    });
    return { file: this.file, blocks: this.blocks.map((b) => ({ ...b, lines: [...b.lines] })) };
  }
}
