/**
 * Data-section symbol for a pushed literal.
 *
 * `3` -> `const_3`, `0.03` -> `const_0_03`, `-3` -> `const_neg_3`, `-3.3` -> `const_neg_3_3`.
 *
 * The sign is taken from the text, so `-0` and `0` get distinct symbols (they are distinct data).
 */
export function constantSymbol(literal: string): string {
  const negative = literal.startsWith('-');
  const digits = (negative ? literal.slice(1) : literal).replace(/\./g, '_');
  return negative ? `const_neg_${digits}` : `const_${digits}`;
}

/**
 * Scratch cells in the data section.
 */
export const Cells = {
  /** Top operand of the current operation; also holds the result before it is pushed. */
  a: 'a',
  /** Second operand of a binary operation. */
  b: 'b',
  /** Number of values currently on the run-time evaluation stack. */
  depth: 'depth',
  /** Integer result of a truncating operation, reloaded with `fild`. */
  int: 'ival',
} as const;

/**
 * Format strings printed by the generated program.
 */
export const Messages = {
  fmt: 'Result %g\n',
  div_zero: 'Attempted division by zero.  Aborting\n',
  overflow: 'Overflow - value out of range.  Aborting\n',
  stack_err: 'Insufficient entries on the stack.  Aborting\n',
  stack_full: 'Too many entries remaining on the stack.  Aborting\n',
} as const;

export type MessageName = keyof typeof Messages;

/** Order in which the messages are laid out in the data section. */
export const MESSAGE_NAMES: readonly MessageName[] = [
  'fmt',
  'div_zero',
  'overflow',
  'stack_err',
  'stack_full',
];

/**
 * Shared run-time error handlers. Each loads its message and never returns.
 */
export const Handlers = {
  divisionByZero: 'division_by_zero',
  registerOverflow: 'register_overflow',
  stackTooFull: 'stack_too_full',
  stackError: 'stack_error',
  printAndExit: 'print_msg_and_exit',
} as const;
