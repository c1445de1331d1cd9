import type { SourceLine } from './source.js';

/**
 * The nine stack operators accepted by `writeArithmetic`.
 */
export const ArithmeticOperators = ['add', 'sub', 'neg', 'eq', 'gt', 'lt', 'and', 'or', 'not'] as const;

export type ArithmeticOperator = (typeof ArithmeticOperators)[number];

export function isArithmeticOperator(token: string): token is ArithmeticOperator {
  return (ArithmeticOperators as readonly string[]).includes(token);
}

/**
 * Closed set of command classes a VM instruction can belong to.
 */
export type CommandType =
  | 'arithmetic'
  | 'push'
  | 'pop'
  | 'label'
  | 'goto'
  | 'if'
  | 'function'
  | 'return'
  | 'call';

interface CommandBase {
  source: SourceLine;
}

export interface ArithmeticCommand extends CommandBase {
  type: 'arithmetic';
  arg1: ArithmeticOperator;
}

/** `push segment index` / `pop segment index`. */
export interface PushPopCommand extends CommandBase {
  type: 'push' | 'pop';
  arg1: string;
  arg2: number;
}

/** `(NAME)`; `arg1` is the name without parentheses. */
export interface LabelCommand extends CommandBase {
  type: 'label';
  arg1: string;
}

export interface JumpCommand extends CommandBase {
  type: 'goto' | 'if';
  arg1: string;
}

/** `function name nLocals` / `call name nArgs`. */
export interface FunctionCommand extends CommandBase {
  type: 'function' | 'call';
  arg1: string;
  arg2: number;
}

export interface ReturnCommand extends CommandBase {
  type: 'return';
}

export type ParsedCommand =
  | ArithmeticCommand
  | PushPopCommand
  | LabelCommand
  | JumpCommand
  | FunctionCommand
  | ReturnCommand;
