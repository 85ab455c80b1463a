#!/usr/bin/env node
import { spawn } from 'node:child_process';
import { readFileSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  expression: string;
  outputPath?: string;
  debug: boolean;
  emitListing: boolean;
  assemble: boolean;
  run: boolean;
  programPath: string;
};

export interface ToolResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program, feeding `input` to its stdin when given.
 */
export type ToolRunner = (command: string, args: string[], input?: string) => Promise<ToolResult>;

export interface CliDeps {
  runTool: ToolRunner;
}

function usage(): string {
  return [
    'rpnasm [options] <expression>',
    '',
    'Options:',
    '  -o, --output <file>   Write assembly to <file> (default: stdout)',
    '  -l, --listing         Also write <output>.lst (requires --output)',
    '  -d, --debug           Insert a debug breakpoint after the entry sequence',
    '  -c, --compile         Assemble and link with gcc',
    '  -p, --program <file>  Executable written by --compile (default: a.out)',
    '  -r, --run             Run the executable after compiling (implies --compile)',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <expression> must be the last argument; quote it, e.g. rpnasm "3 4 +".',
    '  - Use "--" before an expression that starts with an operator.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Source runs from src/, the build from dist/src/.
  const candidates = [
    resolve(here, '..', 'package.json'),
    resolve(here, '..', '..', 'package.json'),
  ];
  for (const candidate of candidates) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (pkg !== null && typeof pkg === 'object' && 'version' in pkg) {
        return String(pkg.version);
      }
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

function isExpressionArg(a: string): boolean {
  // "-3 abs" is an expression, not an option.
  return !a.startsWith('-') || /^-[0-9]/.test(a);
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let debug = false;
  let emitListing = false;
  let assemble = false;
  let run = false;
  let programPath = 'a.out';
  let expression: string | undefined;

  const takeValue = (a: string, i: number): string => {
    const v = argv[i];
    if (v === undefined || v === '') fail(`${a} expects a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output') {
      outputPath = takeValue(a, ++i);
      continue;
    }
    if (a.startsWith('--output=')) {
      outputPath = a.slice('--output='.length);
      if (!outputPath) fail(`--output expects a value`);
      continue;
    }
    if (a === '-p' || a === '--program') {
      programPath = takeValue(a, ++i);
      continue;
    }
    if (a.startsWith('--program=')) {
      programPath = a.slice('--program='.length);
      if (!programPath) fail(`--program expects a value`);
      continue;
    }
    if (a === '-l' || a === '--listing') {
      emitListing = true;
      continue;
    }
    if (a === '-d' || a === '--debug') {
      debug = true;
      continue;
    }
    if (a === '-c' || a === '--compile') {
      assemble = true;
      continue;
    }
    if (a === '-r' || a === '--run') {
      run = true;
      assemble = true;
      continue;
    }

    let candidate = a;
    if (a === '--') {
      if (i !== argv.length - 2) fail(`Expected exactly one <expression> after "--"`);
      candidate = argv[++i] ?? '';
    } else if (!isExpressionArg(a)) {
      fail(`Unknown option "${a}"`);
    }
    if (expression !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <expression> argument (and it must be last)`);
    }
    expression = candidate;
  }

  if (expression === undefined) {
    fail(`Expected exactly one <expression> argument (and it must be last)`);
  }
  if (emitListing && !outputPath) fail(`--listing requires --output`);

  return {
    expression,
    ...(outputPath ? { outputPath } : {}),
    debug,
    emitListing,
    assemble,
    run,
    programPath,
  };
}

function artifactBase(outputPath: string): string {
  const resolved = resolve(outputPath);
  const ext = extname(resolved);
  return ext.length > 0 ? resolved.slice(0, -ext.length) : resolved;
}

async function writeArtifacts(outputPath: string, artifacts: Artifact[]): Promise<void> {
  const asmPath = resolve(outputPath);
  const lstPath = `${artifactBase(outputPath)}.lst`;
  await mkdir(dirname(asmPath), { recursive: true });

  const writes: Array<Promise<void>> = [];
  for (const a of artifacts) {
    if (a.kind === 'asm') writes.push(writeFile(asmPath, a.text, 'utf8'));
    if (a.kind === 'lst') writes.push(writeFile(lstPath, a.text, 'utf8'));
  }
  await Promise.all(writes);
  process.stdout.write(`${asmPath}\n`);
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

function reportDiagnostics(diagnostics: Diagnostic[]): void {
  for (const d of [...diagnostics].sort(compareDiagnosticsForCli)) {
    const loc =
      d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
    process.stderr.write(`${loc}: ${d.severity}: [${d.id}] ${d.message}\n`);
  }
}

/**
 * Spawn a child process, collecting its output.
 */
export const spawnTool: ToolRunner = (command, args, input) =>
  new Promise((resolveRun, rejectRun) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8').on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.setEncoding('utf8').on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', rejectRun);
    child.on('close', (code) => resolveRun({ code: code ?? 1, stdout, stderr }));
    // A child may exit without draining stdin; 'close' still reports its status.
    child.stdin.on('error', (err: Error) => {
      if (!('code' in err && err.code === 'EPIPE')) rejectRun(err);
    });
    child.stdin.end(input ?? '');
  });

async function runToolchain(
  parsed: CliOptions,
  asmText: string,
  deps: CliDeps,
): Promise<Diagnostic | undefined> {
  const toolError = (message: string): Diagnostic => ({
    id: DiagnosticIds.ToolchainError,
    severity: 'error',
    message,
    file: parsed.programPath,
  });

  let gcc: ToolResult;
  try {
    gcc = await deps.runTool(
      'gcc',
      ['-static', '-o', parsed.programPath, '-x', 'assembler', '-'],
      asmText,
    );
  } catch (err) {
    return toolError(`Error launching gcc: ${String(err)}`);
  }
  process.stderr.write(gcc.stderr);
  if (gcc.code !== 0) return toolError(`gcc exited with status ${gcc.code}`);
  if (!parsed.run) return undefined;

  const program = resolve(parsed.programPath);
  let res: ToolResult;
  try {
    res = await deps.runTool(program, []);
  } catch (err) {
    return toolError(`Error launching ${program}: ${String(err)}`);
  }
  process.stdout.write(res.stdout);
  process.stderr.write(res.stderr);
  if (res.code !== 0) return toolError(`${program} exited with status ${res.code}`);
  return undefined;
}

export async function runCli(
  argv: string[],
  deps: CliDeps = { runTool: spawnTool },
): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = compile(
      parsed.expression,
      { debug: parsed.debug, emitListing: parsed.emitListing },
      { formats: defaultFormatWriters },
    );
    reportDiagnostics(res.diagnostics);
    if (res.diagnostics.some((d) => d.severity === 'error')) return 1;

    const asm = res.artifacts.find((a) => a.kind === 'asm');
    if (!asm) return 1;

    if (parsed.outputPath) {
      try {
        await writeArtifacts(parsed.outputPath, res.artifacts);
      } catch (err) {
        reportDiagnostics([
          {
            id: DiagnosticIds.IoWriteFailed,
            severity: 'error',
            message: `Failed to write output: ${String(err)}`,
            file: parsed.outputPath,
          },
        ]);
        return 1;
      }
    } else if (!parsed.assemble) {
      process.stdout.write(asm.text);
    }

    if (parsed.assemble) {
      const toolFailure = await runToolchain(parsed, asm.text, deps);
      if (toolFailure) {
        reportDiagnostics([toolFailure]);
        return 1;
      }
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`rpnasm: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(self);
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
