import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, AssemblyProgram, FormatWriters } from './formats/types.js';

/**
 * Options that influence translation output and which artifacts are produced.
 */
export interface TranslatorOptions {
  /** Emit a `.lst` listing alongside the `.asm` text (default `false`). */
  emitListing?: boolean;
  /** Keep `//` echo comments in the `.asm` text (default `true`). */
  comments?: boolean;
  /** Line ending for text artifacts (default `\n`). */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a translation run: diagnostics plus any produced artifacts.
 *
 * `artifacts` is empty whenever `diagnostics` contains an error.
 */
export interface TranslateResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Receives the finished program exactly once, when the translator closes.
 */
export interface OutputSink {
  write(program: AssemblyProgram): void;
}

/**
 * Dependency injection surface for the translation pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level translate function signature used by the pipeline contract.
 */
export type TranslateFn = (
  entryFile: string,
  options?: TranslatorOptions,
  deps?: PipelineDeps,
) => Promise<TranslateResult>;
