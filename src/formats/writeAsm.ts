import type { AsmLine, AsmOperand, AsmProgram } from '../amd64/asm.js';
import { labelName } from '../amd64/asm.js';
import type { AsmArtifact, WriteAsmOptions } from './types.js';

const INDENT = '        ';

function renderOperand(op: AsmOperand): string {
  switch (op.kind) {
    case 'reg':
      return op.name;
    case 'imm':
      return String(op.value);
    case 'mem':
      return `qword ptr [${op.symbol}]`;
    case 'sym':
      return op.name;
    case 'label':
      return labelName(op.label);
  }
}

function renderLine(line: AsmLine): string {
  switch (line.kind) {
    case 'directive':
      return line.text;
    case 'data':
      return `${line.name}: ${line.directive} ${line.value}`;
    case 'label':
      return `${labelName(line.label)}:`;
    case 'instruction': {
      const operands = line.operands.map(renderOperand).join(', ');
      return operands.length > 0
        ? `${INDENT}${line.mnemonic} ${operands}`
        : `${INDENT}${line.mnemonic}`;
    }
    case 'comment':
      return line.level === 'top' ? `# ${line.text}` : `${INDENT}# ${line.text}`;
    case 'blank':
      return '';
  }
}

/**
 * Render a lowered program as GNU `as` Intel-syntax source.
 */
export function writeAsm(program: AsmProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const text = program.lines.map(renderLine).join(lineEnding) + lineEnding;
  return { kind: 'asm', text };
}
