import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, TranslateError } from './diagnostics/types.js';
import { Parser } from './frontend/parser.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import type {
  OutputSink,
  PipelineDeps,
  TranslateFn,
  TranslateResult,
  TranslatorOptions,
} from './pipeline.js';
import { VmTranslator } from './translator.js';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

function artifactSink(
  artifacts: Artifact[],
  diagnostics: Diagnostic[],
  file: string,
  options: TranslatorOptions,
  deps: PipelineDeps,
): OutputSink {
  const lineEnding = options.lineEnding ?? '\n';
  return {
    write(program) {
      artifacts.push(
        deps.formats.writeAsm(program, { lineEnding, comments: options.comments ?? true }),
      );
      if (!options.emitListing) return;
      if (deps.formats.writeListing) {
        artifacts.push(deps.formats.writeListing(program, { lineEnding }));
      } else {
        diagnostics.push({
          id: DiagnosticIds.Unknown,
          severity: 'warning',
          message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
          file,
        });
      }
    },
  };
}

function toDiagnostic(err: unknown, file: string): Diagnostic {
  if (err instanceof TranslateError) return err.diagnostic;
  return {
    id: DiagnosticIds.Unknown,
    severity: 'error',
    message: `Internal error during translation: ${String(err)}`,
    file,
  };
}

function runTranslator(
  parser: Parser,
  options: TranslatorOptions,
  deps: PipelineDeps,
): TranslateResult {
  const diagnostics: Diagnostic[] = [];
  const artifacts: Artifact[] = [];
  const sink = artifactSink(artifacts, diagnostics, parser.path, options, deps);

  try {
    const translator = new VmTranslator(parser, diagnostics, sink);
    translator.run();
    translator.close();
  } catch (err) {
    diagnostics.push(toDiagnostic(err, parser.path));
  }

  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }
  return { diagnostics, artifacts };
}

/**
 * Translate VM source text that is already in memory.
 *
 * `file` is only used for diagnostics and listing attribution.
 */
export function translateSource(
  file: string,
  text: string,
  options: TranslatorOptions = {},
  deps: PipelineDeps = { formats: defaultFormatWriters },
): TranslateResult {
  return runTranslator(new Parser(file, text), options, deps);
}

/**
 * Translate a `.vm` file.
 *
 * Read failures are reported as `VMA001` diagnostics; nothing is written to disk.
 */
export const translate: TranslateFn = async (
  entryFile: string,
  options: TranslatorOptions = {},
  deps: PipelineDeps = { formats: defaultFormatWriters },
): Promise<TranslateResult> => {
  let parser: Parser;
  try {
    parser = await Parser.fromFile(entryFile);
  } catch (err) {
    return { diagnostics: [toDiagnostic(err, entryFile)], artifacts: [] };
  }
  return runTranslator(parser, options, deps);
};
