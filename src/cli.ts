#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { translate } from './translate.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  emitListing: boolean;
  comments: boolean;
  lineEnding: '\n' | '\r\n';
};

function usage(): string {
  return [
    'vm2asm [options] <file.vm>',
    '',
    'Options:',
    '  -o, --output <file>   Output .asm path (default: <file>.asm next to the input)',
    '  -l, --listing         Also write a .lst listing next to the output',
    '      --no-comments     Strip "//" echo comments from the .asm output',
    '      --crlf            Use CRLF line endings',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <file.vm> must be the last argument.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function packageVersion(): string {
  const require = createRequire(import.meta.url);
  let dir = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts when run from source, dist/src/cli.js when built.
  for (let depth = 0; depth < 3; depth++) {
    const candidate = resolve(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = require(candidate);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
        return String(pkg.version);
      }
    }
    dir = resolve(dir, '..');
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let emitListing = false;
  let comments = true;
  let lineEnding: '\n' | '\r\n' = '\n';
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      if (a.startsWith('--output=')) {
        const v = a.slice('--output='.length);
        if (!v) fail(`--output expects a value`);
        outputPath = v;
        continue;
      }
      const v = argv[++i];
      if (!v) fail(`${a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '-l' || a === '--listing') {
      emitListing = true;
      continue;
    }
    if (a === '--no-comments') {
      comments = false;
      continue;
    }
    if (a === '--crlf') {
      lineEnding = '\r\n';
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <file.vm> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <file.vm> argument (and it must be last)`);
  }

  if (outputPath && extname(outputPath).toLowerCase() !== '.asm') {
    fail(`--output must end with ".asm"`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    emitListing,
    comments,
    lineEnding,
  };
}

type ArtifactPaths = { asm: string; lst: string };

function artifactPaths(entryFile: string, outputPath?: string): ArtifactPaths {
  const target = resolve(outputPath ?? entryFile);
  const ext = extname(target);
  const base = ext.length > 0 ? target.slice(0, -ext.length) : target;
  // An explicit --output is written exactly as given, extension case included.
  return { asm: outputPath !== undefined ? target : `${base}.asm`, lst: `${base}.lst` };
}

function ensureInputPreserved(entryFile: string, paths: ArtifactPaths, emitListing: boolean): void {
  const input = normalizePathForCompare(entryFile);
  const outputs = emitListing ? [paths.asm, paths.lst] : [paths.asm];
  if (outputs.some((p) => normalizePathForCompare(p) === input)) {
    fail('Output would overwrite the input file');
  }
}

async function writeArtifacts(paths: ArtifactPaths, artifacts: Artifact[]): Promise<void> {
  await mkdir(dirname(paths.asm), { recursive: true });
  const writes: Array<Promise<void>> = [];
  for (const artifact of artifacts) {
    if (artifact.kind === 'asm') writes.push(writeFile(paths.asm, artifact.text, 'utf8'));
    if (artifact.kind === 'lst') writes.push(writeFile(paths.lst, artifact.text, 'utf8'));
  }
  await Promise.all(writes);

  process.stdout.write(`${paths.asm}\n`);
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

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

export function formatDiagnostic(d: Diagnostic): string {
  const loc = d.line !== undefined ? `${d.file}:${d.line}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const paths = artifactPaths(parsed.entryFile, parsed.outputPath);
    ensureInputPreserved(parsed.entryFile, paths, parsed.emitListing);

    const res = await translate(
      parsed.entryFile,
      {
        emitListing: parsed.emitListing,
        comments: parsed.comments,
        lineEnding: parsed.lineEnding,
      },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    try {
      await writeArtifacts(paths, res.artifacts);
    } catch (err) {
      const d: Diagnostic = {
        id: DiagnosticIds.IoWriteFailed,
        severity: 'error',
        message: `Failed to write output: ${String(err)}`,
        file: paths.asm,
      };
      process.stderr.write(`${formatDiagnostic(d)}\n`);
      return 1;
    }
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`vm2asm: ${msg}\n`);
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
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
