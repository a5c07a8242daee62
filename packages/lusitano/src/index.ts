export { compile, parse } from "./compiler";
export type { CompileOptions, CompileResult } from "./compiler";
export { Lexer } from "./lexer/lexer";
export { Parser } from "./parser/parser";
export { Analyzer } from "./analysis/analyzer";
export { ScopeManager } from "./analysis/symbol_table";
export type { Symbol, SymbolCategory, Scope } from "./analysis/symbol_table";
export { BUILTINS } from "./analysis/builtins";
export type { Type, Signature, PrimitiveName } from "./analysis/types";
export { Emitter } from "./codegen/emitter";
export type { EmitOptions } from "./codegen/emitter";
export { DiagnosticBag } from "./diagnostics";
export type { Diagnostic, DiagnosticCode, Phase, Severity } from "./diagnostics";
export { TokenType } from "./token";
export type { Token } from "./token";
export { CompileError, InternalCompilerError, formatError, formatDiagnostic } from "./errors";
export * as AST from "./ast/ast";
