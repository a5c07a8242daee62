import * as path from "path";
import type { Diagnostic } from "./diagnostics";

// ANSI color codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";

const useColor = process.stderr.isTTY !== false;

function c(code: string, text: string): string {
    return useColor ? `${code}${text}${RESET}` : text;
}

/** Thrown only when the compiler breaks one of its own invariants; never for bad user input. */
export class InternalCompilerError extends Error {
    constructor(message: string) {
        super(`internal compiler error: ${message}`);
        this.name = "InternalCompilerError";
    }
}

/**
 * Thrown by the CLI when a file fails to compile.
 * Carries everything needed to render the diagnostics with source context.
 */
export class CompileError extends Error {
    public diagnostics: readonly Diagnostic[];
    public file: string;
    public source: string;

    constructor(diagnostics: readonly Diagnostic[], file: string, source: string) {
        super(`Compilation of ${file} failed with ${diagnostics.length} diagnostic(s)`);
        this.name = "CompileError";
        this.diagnostics = diagnostics;
        this.file = file;
        this.source = source;
    }
}

/**
 * Format a compiler error with source context.
 *
 * Example output:
 *   error[SyntaxError]: expected ')', found '{'
 *    --> exemplo.lus:3:12
 *     |
 *   3 | se (x > 10 {
 *     |            ^
 */
export function formatError(
    message: string,
    file: string,
    line: number,
    col: number,
    source: string,
    severity: "error" | "warning" = "error",
    code?: string,
): string {
    const lines = source.split("\n");
    const lineIdx = line - 1;
    const sourceLine = lineIdx >= 0 && lineIdx < lines.length ? lines[lineIdx].replace(/\r$/, "") : null;

    const gutterWidth = String(line).length;
    const emptyGutter = " ".repeat(gutterWidth);

    // Show relative path for cleaner output
    const relFile = path.relative(process.cwd(), file) || file;

    const label = code ? `${severity}[${code}]` : severity;
    const sevLabel = severity === "error" ? c(BOLD + RED, label) : c(BOLD + YELLOW, label);

    const parts: string[] = [
        `${sevLabel}${c(BOLD, ": " + message)}`,
        ` ${c(BLUE, "-->")} ${relFile}:${line}:${col}`,
    ];

    if (sourceLine !== null) {
        // col is 1-indexed from the lexer, so caret offset is col - 1 spaces
        const caretOffset = Math.max(0, col - 1);
        parts.push(
            ` ${emptyGutter} ${c(BLUE, "|")}`,
            ` ${c(BLUE, String(line).padStart(gutterWidth))} ${c(BLUE, "|")} ${sourceLine}`,
            ` ${emptyGutter} ${c(BLUE, "|")} ${" ".repeat(caretOffset)}${c(RED, "^")}`,
        );
    }

    return parts.join("\n");
}

export function formatDiagnostic(d: Diagnostic, file: string, source: string): string {
    const severity = d.severity === "warning" ? "warning" : "error";
    return formatError(d.message, file, d.line, d.column, source, severity, d.code);
}

/** One line per diagnostic, e.g. `3:12 syntax fatal SyntaxError: expected ')', found '{'`. */
export function summarizeDiagnostic(d: Diagnostic): string {
    return `${d.line}:${d.column} ${d.phase} ${d.severity} ${d.code}: ${d.message}`;
}
