import { describe, expect, it } from 'vitest';

import type { Instruction } from '../src/ir/instructions.js';
import { lowerInstruction } from '../src/lowering/blocks.js';
import { writeAsm } from '../src/formats/writeAsm.js';
import { asmFor, definedLabels } from './test-helpers.js';

function render(instr: Instruction, index = 0): string[] {
  return writeAsm({ lines: lowerInstruction(instr, index) }).text.split('\n').slice(0, -1);
}

describe('instruction blocks', () => {
  it('pushes a pooled constant and counts it', () => {
    expect(render({ kind: 'Push', value: '-2.5' })).toEqual([
      '',
      '        # [PUSH -2.5]',
      '        mov rax, qword ptr [const_neg_2_5]',
      '        push rax',
      '        inc qword ptr [depth]',
    ]);
  });

  it('guards binary arithmetic and pops b before loading it under a', () => {
    expect(render({ kind: 'Plus' })).toEqual([
      '',
      '        # [PLUS]',
      '        # ensure there are at least 2 values on the stack',
      '        mov rax, qword ptr [depth]',
      '        cmp rax, 2',
      '        jb stack_error',
      '        pop rax',
      '        mov qword ptr [a], rax',
      '        pop rax',
      '        mov qword ptr [b], rax',
      '        fld qword ptr [b]',
      '        fadd qword ptr [a]',
      '        fstp qword ptr [a]',
      '        mov rax, qword ptr [a]',
      '        push rax',
      '        dec qword ptr [depth]',
    ]);
    expect(render({ kind: 'Minus' })).toContain('        fsub qword ptr [a]');
    expect(render({ kind: 'Multiply' })).toContain('        fmul qword ptr [a]');
  });

  it('checks the divisor for zero before dividing', () => {
    const lines = render({ kind: 'Divide' });
    const check = lines.indexOf('        jz division_by_zero');
    expect(lines.slice(check - 3, check + 1)).toEqual([
      '        pop rax',
      '        mov rcx, rax',
      '        shl rcx, 1',
      '        jz division_by_zero',
    ]);
    expect(check).toBeLessThan(lines.indexOf('        fdiv qword ptr [a]'));
  });

  it('needs one value for unary operations and leaves the depth alone', () => {
    const lines = render({ kind: 'Sqrt' });
    expect(lines.slice(0, 6)).toEqual([
      '',
      '        # [SQRT]',
      '        # ensure there is at least one value on the stack',
      '        mov rax, qword ptr [depth]',
      '        cmp rax, 1',
      '        jb stack_error',
    ]);
    expect(lines).toContain('        fsqrt');
    expect(lines.some((l) => l.includes('qword ptr [depth]') && !l.includes('mov rax'))).toBe(
      false,
    );
  });

  it('duplicates and swaps on the machine stack', () => {
    expect(render({ kind: 'Dup' }).slice(6)).toEqual([
      '        pop rax',
      '        push rax',
      '        push rax',
      '        inc qword ptr [depth]',
    ]);
    expect(render({ kind: 'Swap' }).slice(6)).toEqual([
      '        pop rax',
      '        pop rbx',
      '        push rax',
      '        push rbx',
    ]);
  });

  it('tags loop labels with the instruction index', () => {
    const lines = render({ kind: 'Power' }, 7);
    expect(lines).toContain('power_positive_7:');
    expect(lines).toContain('power_loop_7:');
    expect(lines).toContain('power_store_7:');
    expect(lines).toContain('        jo register_overflow');
    expect(render({ kind: 'Modulus' }, 3)).toContain('modulus_done_3:');
    expect(render({ kind: 'Factorial' }, 0)).toContain('factorial_loop_0:');
  });

  it('skips the power loop for bases -1, 0 and 1', () => {
    const lines = render({ kind: 'Power' }, 2);
    const start = lines.indexOf('power_positive_2:');
    expect(lines.slice(start, start + 15)).toEqual([
      'power_positive_2:',
      '        mov rcx, rax',
      '        # bases -1, 0 and 1 skip the loop: rax + 1 is at most 2 unsigned',
      '        mov rdx, rax',
      '        inc rdx',
      '        cmp rdx, 2',
      '        ja power_multiply_2',
      '        test rbx, 1',
      '        jnz power_store_2',
      '        # even exponent: -1 becomes 1, 0 and 1 stay',
      '        imul rax, rax',
      '        jmp power_store_2',
      'power_multiply_2:',
      '        dec rbx',
      '        jz power_store_2',
    ]);
  });

  it('short-circuits a modulus by -1', () => {
    const lines = render({ kind: 'Modulus' }, 4);
    const skip = lines.indexOf('        je modulus_done_4');
    expect(lines.slice(skip - 1, skip + 3)).toEqual([
      '        cmp rbx, -1',
      '        je modulus_done_4',
      '        cqo',
      '        idiv rbx',
    ]);
  });

  it('never defines a label twice in one program', () => {
    const text = asmFor('2 3 ^ 2 ^ 7 3 % 5 % + 4 ! + 3 fact +');
    const labels = definedLabels(text);
    expect(new Set(labels).size).toBe(labels.length);
    expect(labels).toContain('power_loop_2');
    expect(labels).toContain('power_loop_4');
    expect(labels).toContain('modulus_done_7');
    expect(labels).toContain('modulus_done_9');
    expect(labels).toContain('factorial_loop_12');
    expect(labels).toContain('factorial_loop_15');
  });
});
