/**
 * Base-pointer cells of the pointer-indirect segments.
 */
export type BaseRegister = 'LCL' | 'ARG' | 'THIS' | 'THAT';

/**
 * How a segment name resolves to memory.
 *
 * - `constant`: the index itself is the value; nothing is stored.
 * - `fixed`: slots live at `base + index` for `index < size`.
 * - `indirect`: slots live at `RAM[register] + index`.
 */
export type Segment =
  | { kind: 'constant'; name: 'constant' }
  | { kind: 'fixed'; name: string; base: number; size: number }
  | { kind: 'indirect'; name: string; register: BaseRegister };

/** Value the prologue stores in `SP`. */
export const STACK_BASE = 256;

/** Largest value an A-instruction can load. */
export const MAX_CONSTANT = 0x7fff;

/** General-purpose cell used to hold a computed pop target address. */
export const SCRATCH_REGISTER = 'R13';

const segmentTable: ReadonlyMap<string, Segment> = new Map<string, Segment>([
  ['constant', { kind: 'constant', name: 'constant' }],
  ['local', { kind: 'indirect', name: 'local', register: 'LCL' }],
  ['argument', { kind: 'indirect', name: 'argument', register: 'ARG' }],
  ['this', { kind: 'indirect', name: 'this', register: 'THIS' }],
  ['that', { kind: 'indirect', name: 'that', register: 'THAT' }],
  ['pointer', { kind: 'fixed', name: 'pointer', base: 3, size: 2 }],
  ['temp', { kind: 'fixed', name: 'temp', base: 5, size: 8 }],
  ['static', { kind: 'fixed', name: 'static', base: 16, size: STACK_BASE - 16 }],
]);

/**
 * Look up a segment by its VM name (case-sensitive).
 */
export function resolveSegment(name: string): Segment | undefined {
  return segmentTable.get(name);
}

export function segmentNames(): string[] {
  return [...segmentTable.keys()];
}
