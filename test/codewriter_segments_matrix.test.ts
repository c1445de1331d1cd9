import { describe, expect, it } from 'vitest';

import type { DiagnosticId } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { CodeWriter } from '../src/lowering/codeWriter.js';
import { resolveSegment, segmentNames } from '../src/semantics/segments.js';
import { captureError } from './test-helpers.js';

const pushD = ['@SP', 'A=M', 'M=D', '@SP', 'M=M+1'];

function emitted(command: 'push' | 'pop', segment: string, index: number): string[] | undefined {
  const writer = new CodeWriter();
  writer.writePushPop(command, segment, index);
  return writer.finish().blocks[1]?.lines;
}

describe('segment table', () => {
  it('models fixed and pointer-indirect segments separately', () => {
    expect(resolveSegment('constant')).toEqual({ kind: 'constant', name: 'constant' });
    expect(resolveSegment('temp')).toEqual({ kind: 'fixed', name: 'temp', base: 5, size: 8 });
    expect(resolveSegment('pointer')).toEqual({ kind: 'fixed', name: 'pointer', base: 3, size: 2 });
    expect(resolveSegment('static')).toEqual({ kind: 'fixed', name: 'static', base: 16, size: 240 });
    expect(resolveSegment('local')).toEqual({ kind: 'indirect', name: 'local', register: 'LCL' });
    expect(resolveSegment('argument')).toEqual({
      kind: 'indirect',
      name: 'argument',
      register: 'ARG',
    });
    expect(resolveSegment('this')).toEqual({ kind: 'indirect', name: 'this', register: 'THIS' });
    expect(resolveSegment('that')).toEqual({ kind: 'indirect', name: 'that', register: 'THAT' });
    expect(resolveSegment('heap')).toBeUndefined();
    expect(segmentNames()).toHaveLength(8);
  });
});

describe('code writer push/pop', () => {
  it('pushes a constant literal', () => {
    expect(emitted('push', 'constant', 7)).toEqual(['// push constant 7', '@7', 'D=A', ...pushD]);
  });

  it('accepts the largest 15-bit constant', () => {
    expect(emitted('push', 'constant', 32767)?.[1]).toBe('@32767');
  });

  it.each([
    ['temp', 2, 7],
    ['temp', 7, 12],
    ['pointer', 0, 3],
    ['pointer', 1, 4],
    ['static', 3, 19],
    ['static', 239, 255],
  ])('push %s %i reads RAM[%i] directly', (segment, index, address) => {
    expect(emitted('push', segment, index)).toEqual([
      `// push ${segment} ${index}`,
      `@${address}`,
      'D=M',
      ...pushD,
    ]);
  });

  it.each([
    ['temp', 2, 7],
    ['pointer', 1, 4],
    ['static', 0, 16],
  ])('pop %s %i stores into RAM[%i] directly', (segment, index, address) => {
    expect(emitted('pop', segment, index)).toEqual([
      `// pop ${segment} ${index}`,
      '@SP',
      'M=M-1',
      '@SP',
      'A=M',
      'D=M',
      `@${address}`,
      'M=D',
    ]);
  });

  it.each([
    ['local', 'LCL'],
    ['argument', 'ARG'],
    ['this', 'THIS'],
    ['that', 'THAT'],
  ])('push %s goes through the %s base pointer', (segment, register) => {
    expect(emitted('push', segment, 2)).toEqual([
      `// push ${segment} 2`,
      '@2',
      'D=A',
      `@${register}`,
      'A=M+D',
      'D=M',
      ...pushD,
    ]);
  });

  it.each([
    ['local', 'LCL'],
    ['that', 'THAT'],
  ])('pop %s computes the target through %s into R13', (segment, register) => {
    expect(emitted('pop', segment, 5)).toEqual([
      `// pop ${segment} 5`,
      '@5',
      'D=A',
      `@${register}`,
      'D=M+D',
      '@R13',
      'M=D',
      '@SP',
      'AM=M-1',
      'D=M',
      '@R13',
      'A=M',
      'M=D',
    ]);
  });
});

describe('code writer push/pop rejection matrix', () => {
  const cases: Array<['push' | 'pop', string, number, DiagnosticId, string]> = [
    ['push', 'heap', 0, DiagnosticIds.UnknownSegment, 'Unknown segment "heap"'],
    ['pop', 'Local', 0, DiagnosticIds.UnknownSegment, 'Unknown segment "Local"'],
    ['pop', 'constant', 1, DiagnosticIds.InvalidSegmentAccess, 'Cannot pop into the constant segment'],
    ['push', 'constant', 32768, DiagnosticIds.IndexOutOfRange, 'Constant 32768 exceeds 32767'],
    [
      'push',
      'temp',
      8,
      DiagnosticIds.IndexOutOfRange,
      'Index 8 is out of range for segment "temp" (size 8)',
    ],
    [
      'pop',
      'pointer',
      2,
      DiagnosticIds.IndexOutOfRange,
      'Index 2 is out of range for segment "pointer" (size 2)',
    ],
    [
      'push',
      'static',
      240,
      DiagnosticIds.IndexOutOfRange,
      'Index 240 is out of range for segment "static" (size 240)',
    ],
    ['push', 'local', 40000, DiagnosticIds.IndexOutOfRange, 'Index 40000 exceeds 32767'],
    ['push', 'local', -1, DiagnosticIds.InvalidIndex, 'Index must be a non-negative integer, got -1'],
    ['pop', 'temp', 1.5, DiagnosticIds.InvalidIndex, 'Index must be a non-negative integer, got 1.5'],
  ];

  it.each(cases)('%s %s %d -> %s', (command, segment, index, id, message) => {
    const writer = new CodeWriter('t.vm');
    const err = captureError(() =>
      writer.writePushPop(command, segment, index, { text: 'x', line: 3 }),
    );
    expect(err.diagnostic).toEqual({ id, severity: 'error', message, file: 't.vm', line: 3 });
    expect(writer.blockCount).toBe(1);
  });
});
