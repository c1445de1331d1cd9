import { describe, expect, it } from 'vitest';

import { execute, asmFor } from './test-helpers.js';
import { assemble, runAsm, stackOf } from './helpers/hack_machine.js';

describe('executed stack arithmetic', () => {
  it('push 7, push 8, add leaves 15 on top', () => {
    const res = execute(['push constant 7', 'push constant 8', 'add']);
    expect(res.ram[0]).toBe(257);
    expect(res.ram[256]).toBe(15);
  });

  it('push 10, push 10, eq leaves true (all bits set)', () => {
    const res = execute(['push constant 10', 'push constant 10', 'eq']);
    expect(res.ram[0]).toBe(257);
    expect(res.ram[256]).toBe(-1);
    expect(res.ram[256] & 0xffff).toBe(0xffff);
  });

  it('push 5, push 3, sub leaves 2', () => {
    const res = execute(['push constant 5', 'push constant 3', 'sub']);
    expect(res.ram[0]).toBe(257);
    expect(res.ram[256]).toBe(2);
  });

  it('ends with SP = 256 + net push count', () => {
    const res = execute([
      'push constant 1',
      'push constant 2',
      'push constant 3',
      'add',
      'neg',
      'push constant 4',
    ]);
    expect(res.ram[0]).toBe(259);
    expect(stackOf(res)).toEqual([1, -5, 4]);
  });

  it.each([
    ['add', 22],
    ['sub', 2],
    ['and', 8],
    ['or', 14],
  ])('%s combines the two top values and leaves the slot below alone', (op, expected) => {
    const res = execute(['push constant 99', 'push constant 12', 'push constant 10', op]);
    expect(res.ram[0]).toBe(258);
    expect(stackOf(res)).toEqual([99, expected]);
  });

  it.each([
    ['neg', -5],
    ['not', -6],
  ])('%s rewrites only the top value', (op, expected) => {
    const res = execute(['push constant 42', 'push constant 5', op]);
    expect(res.ram[0]).toBe(258);
    expect(stackOf(res)).toEqual([42, expected]);
  });

  it('wraps arithmetic at 16 bits', () => {
    const res = execute(['push constant 32767', 'push constant 1', 'add']);
    expect(res.ram[256]).toBe(-32768);
  });
});

describe('executed comparisons', () => {
  it.each([
    ['eq', 3, 7, 0],
    ['eq', 7, 7, -1],
    ['gt', 7, 3, -1],
    ['gt', 3, 7, 0],
    ['gt', 3, 3, 0],
    ['lt', 3, 7, -1],
    ['lt', 7, 3, 0],
    ['lt', 7, 7, 0],
  ])('%s %i %i -> %i', (op, x, y, expected) => {
    const res = execute([`push constant ${x}`, `push constant ${y}`, op]);
    expect(res.ram[0]).toBe(257);
    expect(res.ram[256]).toBe(expected);
  });

  it('compares negative values', () => {
    // 0 - 1 = -1; -1 < 0
    const res = execute(['push constant 0', 'push constant 1', 'sub', 'push constant 0', 'lt']);
    expect(stackOf(res)).toEqual([-1]);
  });

  it('generates distinct labels and strict booleans across many comparisons', () => {
    const lines: string[] = [];
    for (let i = 0; i < 6; i++) {
      lines.push(`push constant ${i}`, 'push constant 3', i % 2 === 0 ? 'lt' : 'gt');
      lines.push(`push constant ${i}`, 'push constant 3', 'eq');
    }
    const asm = asmFor(lines);

    // assemble() throws on duplicate labels
    const { labels } = assemble(asm);
    expect(labels.size).toBe(12 * 2 + 1);

    const res = runAsm(asm);
    const stack = stackOf(res);
    expect(stack).toEqual([-1, 0, 0, 0, -1, 0, 0, -1, 0, 0, -1, 0]);
    expect(stack.every((v) => v === 0 || v === -1)).toBe(true);
  });

  it('runs the full operator fixture', () => {
    const res = execute([
      'push constant 20',
      'push constant 6',
      'sub',
      'push constant 3',
      'add',
      'neg',
      'push constant 5',
      'gt',
      'not',
      'push constant 12',
      'push constant 10',
      'and',
      'push constant 1',
      'or',
      'push constant 9',
      'eq',
      'push constant 4',
      'push constant 4',
      'lt',
    ]);
    expect(res.ram[0]).toBe(259);
    expect(stackOf(res)).toEqual([-1, -1, 0]);
  });
});

describe('executed push/pop round trips', () => {
  const bases = { 1: 300, 2: 400, 3: 3000, 4: 3010 };

  it.each([
    ['temp', 0, 5],
    ['temp', 7, 12],
    ['static', 0, 16],
    ['static', 5, 21],
    ['pointer', 0, 3],
    ['pointer', 1, 4],
    ['local', 0, 300],
    ['local', 3, 303],
    ['argument', 1, 401],
    ['this', 2, 3002],
    ['that', 6, 3016],
  ])('push constant then pop %s %i stores into RAM[%i]', (segment, index, address) => {
    const res = execute(['push constant 1234', `pop ${segment} ${index}`], { ram: bases });
    expect(res.ram[address]).toBe(1234);
    expect(res.ram[0]).toBe(256);
  });

  it.each([
    ['temp', 4],
    ['static', 9],
    ['local', 2],
    ['argument', 0],
    ['this', 1],
    ['that', 3],
  ])('push reads back what pop %s %i stored', (segment, index) => {
    const res = execute(
      ['push constant 77', `pop ${segment} ${index}`, 'push constant 5', `push ${segment} ${index}`],
      { ram: bases },
    );
    expect(stackOf(res)).toEqual([5, 77]);
  });

  it('reads indirect segments relative to their base pointer', () => {
    const res = execute(['push local 1', 'push argument 0'], {
      ram: { ...bases, 301: 11, 400: 22 },
    });
    expect(stackOf(res)).toEqual([11, 22]);
  });

  it('moves values across segments', () => {
    const res = execute(
      [
        'push constant 111',
        'pop temp 2',
        'push constant 222',
        'pop static 5',
        'push constant 333',
        'pop local 1',
        'push temp 2',
        'push static 5',
        'add',
        'push local 1',
        'add',
        'pop argument 0',
      ],
      { ram: bases },
    );
    expect(res.ram[7]).toBe(111);
    expect(res.ram[21]).toBe(222);
    expect(res.ram[301]).toBe(333);
    expect(res.ram[400]).toBe(666);
    expect(res.ram[0]).toBe(256);
  });
});
