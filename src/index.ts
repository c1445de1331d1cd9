export { translate, translateSource } from './translate.js';
export { VmTranslator } from './translator.js';
export type { TranslatorState } from './translator.js';
export { Parser, classify, parseInstruction } from './frontend/parser.js';
export { makeSourceFile } from './frontend/source.js';
export type { SourceFile, SourceLine } from './frontend/source.js';
export { ArithmeticOperators, isArithmeticOperator } from './frontend/ast.js';
export type { ArithmeticOperator, CommandType, ParsedCommand } from './frontend/ast.js';
export { CodeWriter, HALT_LABEL } from './lowering/codeWriter.js';
export { resolveSegment, segmentNames, STACK_BASE } from './semantics/segments.js';
export type { Segment } from './semantics/segments.js';
export { defaultFormatWriters } from './formats/index.js';
export { writeAsm } from './formats/writeAsm.js';
export { writeListing } from './formats/writeListing.js';
export type * from './formats/types.js';
export type * from './pipeline.js';
export { DiagnosticIds, TranslateError } from './diagnostics/types.js';
export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
