import { Lexer } from "./lexer/lexer";
import { Parser } from "./parser/parser";
import { Analyzer } from "./analysis/analyzer";
import { Emitter } from "./codegen/emitter";
import { DiagnosticBag, groupByPhase } from "./diagnostics";
import type { Diagnostic, Phase } from "./diagnostics";
import type { Token } from "./token";
import * as AST from "./ast/ast";

export interface CompileOptions {
    /** Generate code even when lexical or syntax errors were found. */
    force?: boolean;
    /** Call `principal()` from an entry guard when the program declares it. Defaults to true. */
    entryPoint?: boolean;
}

export interface CompileResult {
    /** True only when no error was recorded; warnings do not count. */
    success: boolean;
    /** Generated source, or null when generation was skipped. */
    code: string | null;
    program: AST.Program;
    tokens: Token[];
    /** Fatal diagnostics and errors, in the order they were found. */
    diagnostics: readonly Diagnostic[];
    warnings: readonly Diagnostic[];
    /** `diagnostics` grouped by phase. */
    phases: Record<Phase, Diagnostic[]>;
}

export function compile(source: string, options: CompileOptions = {}): CompileResult {
    const diagnostics = new DiagnosticBag();

    const tokens = new Lexer(source, diagnostics).tokenize();
    const program = new Parser(tokens, diagnostics).parseProgram();
    new Analyzer(diagnostics).analyze(program);

    const code = !diagnostics.hasFatal() || options.force
        ? new Emitter({ entryPoint: options.entryPoint }).emit(program)
        : null;

    const errors = diagnostics.all().filter(d => d.severity !== "warning");
    return {
        success: errors.length === 0,
        code,
        program,
        tokens,
        diagnostics: errors,
        warnings: diagnostics.all().filter(d => d.severity === "warning"),
        phases: groupByPhase(errors),
    };
}

/** Scans and parses only; used by tooling that shows tokens or the raw tree. */
export function parse(source: string): { tokens: Token[]; program: AST.Program; diagnostics: readonly Diagnostic[] } {
    const diagnostics = new DiagnosticBag();
    const tokens = new Lexer(source, diagnostics).tokenize();
    const program = new Parser(tokens, diagnostics).parseProgram();
    return { tokens, program, diagnostics: diagnostics.all() };
}
