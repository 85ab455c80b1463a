import type { Instruction, IrProgram } from '../ir/instructions.js';
import { STACK_EFFECTS } from '../ir/instructions.js';
import { constantSymbol } from '../lowering/constants.js';
import type { ListingArtifact, WriteListingOptions } from './types.js';

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

function formatInstruction(index: number, instr: Instruction, depthAfter: string): string {
  const effect = STACK_EFFECTS[instr.kind];
  const cols = [
    String(index).padStart(4, '0'),
    instr.kind.padEnd(9, ' '),
    `needs=${effect.requires}`,
    `delta=${signed(effect.delta)}`,
    `depth=${depthAfter}`,
  ];
  if (instr.kind === 'Push') cols.push(instr.value);
  return cols.join('  ');
}

/**
 * Create a deterministic `.lst` listing of the built instructions.
 *
 * `depth` is the evaluation-stack depth after each instruction as the generated program would
 * track it. The first instruction that would find too few operands is marked, and depth is
 * unknown (`?`) from there on because the program stops at that point.
 */
export function writeListing(ir: IrProgram, opts?: WriteListingOptions): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';

  const lines: string[] = [];
  lines.push(`; rpnasm listing: ${opts?.sourceName ?? '<expr>'}`);
  lines.push(`; ${ir.instructions.length} instructions, ${ir.constants.length} constants`);
  lines.push('');

  let depth: number | undefined = 0;
  for (const [index, instr] of ir.instructions.entries()) {
    const effect = STACK_EFFECTS[instr.kind];
    let marker = '';
    if (depth !== undefined && depth < effect.requires) {
      marker = '  ; stack_error';
      depth = undefined;
    } else if (depth !== undefined) {
      depth += effect.delta;
    }
    lines.push(formatInstruction(index, instr, depth === undefined ? '?' : String(depth)) + marker);
  }

  lines.push('');
  if (depth === undefined) {
    lines.push('; final depth: ?');
  } else {
    const verdict = depth === 1 ? 'ok' : depth > 1 ? 'stack_too_full' : 'stack_error';
    lines.push(`; final depth: ${depth} (${verdict})`);
  }

  lines.push('');
  lines.push('; constants:');
  for (const literal of ir.constants) {
    lines.push(`; ${constantSymbol(literal)} = ${literal}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
