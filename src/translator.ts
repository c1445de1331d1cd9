import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, translateError } from './diagnostics/types.js';
import type { ParsedCommand } from './frontend/ast.js';
import type { Parser } from './frontend/parser.js';
import type { AssemblyProgram } from './formats/types.js';
import { CodeWriter } from './lowering/codeWriter.js';
import type { OutputSink } from './pipeline.js';

export type TranslatorState = 'idle' | 'running' | 'closed';

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

/**
 * Drives one translation: pulls commands from a {@link Parser} and feeds them to a
 * {@link CodeWriter}.
 *
 * Lifecycle: `idle` → `run()` → `running` → `close()` → `closed`. Warnings for commands that are
 * recognized but not translated are appended to `diagnostics`; errors are thrown.
 */
export class VmTranslator {
  readonly parser: Parser;
  readonly codeWriter: CodeWriter;
  private readonly diagnostics: Diagnostic[];
  private readonly sink: OutputSink | undefined;
  private lifecycle: TranslatorState = 'idle';

  constructor(parser: Parser, diagnostics: Diagnostic[], sink?: OutputSink) {
    this.parser = parser;
    this.codeWriter = new CodeWriter(parser.path);
    this.diagnostics = diagnostics;
    this.sink = sink;
  }

  get state(): TranslatorState {
    return this.lifecycle;
  }

  /**
   * Translate every remaining command. Stops at the first error.
   */
  run(): void {
    if (this.lifecycle !== 'idle') {
      throw translateError(
        DiagnosticIds.TranslatorState,
        `run() called while ${this.lifecycle}`,
        this.parser.path,
      );
    }
    this.lifecycle = 'running';

    while (this.parser.hasMoreLines()) {
      this.parser.advance();
      this.dispatch(this.parser.current());
    }
  }

  private dispatch(command: ParsedCommand): void {
    switch (command.type) {
      case 'arithmetic':
        this.codeWriter.writeArithmetic(command.arg1, command.source);
        return;
      case 'push':
      case 'pop':
        this.codeWriter.writePushPop(command.type, command.arg1, command.arg2, command.source);
        return;
      case 'label':
      case 'goto':
      case 'if':
      case 'function':
      case 'return':
      case 'call':
        this.diagnostics.push({
          id: DiagnosticIds.UnsupportedCommand,
          severity: 'warning',
          message: `"${command.source.text}" is not translated; no code emitted`,
          file: this.parser.path,
          line: command.source.line,
        });
        return;
      default:
        assertNever(command);
    }
  }

  /**
   * Append the halt epilogue and hand the finished program to the sink, once.
   */
  close(): AssemblyProgram {
    if (this.lifecycle === 'closed') {
      throw translateError(
        DiagnosticIds.TranslatorState,
        'close() called on a closed translator',
        this.parser.path,
      );
    }
    this.lifecycle = 'closed';

    const program = this.codeWriter.finish();
    if (this.sink) {
      try {
        this.sink.write(program);
      } catch (err) {
        throw translateError(
          DiagnosticIds.IoWriteFailed,
          `Failed to write output: ${err instanceof Error ? err.message : String(err)}`,
          this.parser.path,
        );
      }
    }
    return program;
  }
}
