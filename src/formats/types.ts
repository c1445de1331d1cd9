import type { SourceLine } from '../frontend/source.js';

/**
 * Target instructions generated for one source command (or the synthetic prologue/epilogue).
 *
 * Lines beginning with `//` are echo comments; `(NAME)` lines are label declarations; every
 * other line is an A- or C-instruction.
 */
export interface AsmBlock {
  origin: 'prologue' | 'command' | 'epilogue';
  /** Originating instruction, for `command` blocks. */
  source?: SourceLine;
  lines: string[];
}

/**
 * A finished translation: prologue, one block per translated command, epilogue.
 */
export interface AssemblyProgram {
  /** Path of the VM file the program was translated from. */
  file: string;
  blocks: AsmBlock[];
}

/**
 * Options for `.asm` source emission.
 */
export interface WriteAsmOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Keep `//` echo comments (default `true`).
   */
  comments?: boolean;
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory `.asm` artifact.
 */
export interface AsmArtifact {
  kind: 'asm';
  path?: string;
  text: string;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the translator.
 */
export type Artifact = AsmArtifact | ListingArtifact;

/**
 * Format writers used by the pipeline to turn a finished program into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: AssemblyProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeListing?(program: AssemblyProgram, opts?: WriteListingOptions): ListingArtifact;
}
