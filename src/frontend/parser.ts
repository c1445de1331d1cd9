import { readFile } from 'node:fs/promises';

import type { CommandType, ParsedCommand } from './ast.js';
import { isArithmeticOperator } from './ast.js';
import type { SourceFile, SourceLine } from './source.js';
import { makeSourceFile } from './source.js';
import type { TranslateError } from '../diagnostics/types.js';
import { DiagnosticIds, translateError } from '../diagnostics/types.js';

/**
 * Token count (head included) each command class requires.
 */
const requiredTokens: Record<CommandType, number> = {
  arithmetic: 1,
  push: 3,
  pop: 3,
  label: 1,
  goto: 2,
  if: 2,
  function: 3,
  return: 1,
  call: 3,
};

function malformed(file: string, source: SourceLine, message: string): TranslateError {
  return translateError(DiagnosticIds.MalformedInstruction, message, file, source.line);
}

/**
 * Classify an instruction by its first token.
 *
 * Throws `MalformedInstruction` for anything outside the command set.
 */
export function classify(token: string, file: string, line?: number): CommandType {
  if (isArithmeticOperator(token)) return 'arithmetic';
  if (token.startsWith('(')) return 'label';
  switch (token) {
    case 'push':
      return 'push';
    case 'pop':
      return 'pop';
    case 'goto':
      return 'goto';
    case 'if-goto':
      return 'if';
    case 'function':
      return 'function';
    case 'return':
      return 'return';
    case 'call':
      return 'call';
    default:
      throw translateError(
        DiagnosticIds.MalformedInstruction,
        `Unknown command "${token}"`,
        file,
        line,
      );
  }
}

function parseIndex(file: string, source: SourceLine, token: string): number {
  if (/^[0-9]+$/.test(token)) {
    const value = Number.parseInt(token, 10);
    if (Number.isSafeInteger(value)) return value;
  }
  throw translateError(
    DiagnosticIds.InvalidIndex,
    `Expected a non-negative integer, got "${token}" in "${source.text}"`,
    file,
    source.line,
  );
}

/**
 * Parse one retained instruction line into a {@link ParsedCommand}.
 */
export function parseInstruction(file: string, source: SourceLine): ParsedCommand {
  const tokens = source.text.split(/\s+/);
  const [head = '', arg1 = '', arg2 = ''] = tokens;
  const type = classify(head, file, source.line);

  const need = requiredTokens[type];
  if (tokens.length < need) {
    throw translateError(
      DiagnosticIds.InsufficientTokens,
      `"${head}" expects ${need - 1} operand(s), got ${tokens.length - 1}: "${source.text}"`,
      file,
      source.line,
    );
  }
  if (tokens.length > need) {
    throw malformed(file, source, `Unexpected operand "${tokens[need] ?? ''}" in "${source.text}"`);
  }

  switch (type) {
    case 'arithmetic':
      if (!isArithmeticOperator(head)) {
        throw malformed(file, source, `Unknown operator "${head}"`);
      }
      return { type, arg1: head, source };
    case 'push':
    case 'pop':
      return { type, arg1, arg2: parseIndex(file, source, arg2), source };
    case 'function':
    case 'call':
      return { type, arg1, arg2: parseIndex(file, source, arg2), source };
    case 'goto':
    case 'if':
      return { type, arg1, source };
    case 'label': {
      const m = /^\(([^()\s]+)\)$/.exec(head);
      const name = m?.[1];
      if (name === undefined) {
        throw malformed(file, source, `Malformed label "${head}" (expected "(NAME)")`);
      }
      return { type, arg1: name, source };
    }
    case 'return':
      return { type, source };
  }
}

/**
 * Streams classified commands out of a VM source file.
 *
 * The whole input is read and stripped up front; `advance()` then walks the retained lines in
 * order, classifying each as it becomes current.
 */
export class Parser {
  private readonly source: SourceFile;
  private position = 0;
  private currentCommand: ParsedCommand | undefined;

  constructor(path: string, text: string) {
    this.source = makeSourceFile(path, text);
  }

  /**
   * Read `path` (UTF-8) and build a parser over it.
   */
  static async fromFile(path: string): Promise<Parser> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      throw translateError(
        DiagnosticIds.IoReadFailed,
        `Failed to read input file: ${String(err)}`,
        path,
      );
    }
    return new Parser(path, text);
  }

  get path(): string {
    return this.source.path;
  }

  /** Number of retained instruction lines. */
  get lineCount(): number {
    return this.source.lines.length;
  }

  hasMoreLines(): boolean {
    return this.position < this.source.lines.length;
  }

  /**
   * Move to the next retained line and classify it.
   *
   * On a classification error the parser stays on the failing line with no current command.
   */
  advance(): void {
    const next = this.source.lines[this.position];
    if (next === undefined) {
      throw translateError(
        DiagnosticIds.ExhaustedInput,
        'No more lines to advance to',
        this.source.path,
      );
    }
    this.position++;
    this.currentCommand = undefined;
    this.currentCommand = parseInstruction(this.source.path, next);
  }

  current(): ParsedCommand {
    if (this.currentCommand === undefined) {
      throw translateError(
        DiagnosticIds.NoCurrentCommand,
        'No current command (call advance() first)',
        this.source.path,
      );
    }
    return this.currentCommand;
  }

  commandType(): CommandType {
    return this.current().type;
  }

  arg1(): string {
    const cmd = this.current();
    if (cmd.type === 'return') {
      throw translateError(
        DiagnosticIds.NoCurrentCommand,
        '"return" has no arguments',
        this.source.path,
        cmd.source.line,
      );
    }
    return cmd.arg1;
  }

  arg2(): number {
    const cmd = this.current();
    if (!('arg2' in cmd)) {
      throw translateError(
        DiagnosticIds.NoCurrentCommand,
        `"${cmd.source.text}" has no index argument`,
        this.source.path,
        cmd.source.line,
      );
    }
    return cmd.arg2;
  }
}
