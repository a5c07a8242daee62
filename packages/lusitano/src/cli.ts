#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import { compile, parse } from "./compiler";
import { compileFile, outputPathFor, parseBuildArgs } from "./commands";
import { CompileError, formatDiagnostic, summarizeDiagnostic } from "./errors";
import type { Diagnostic } from "./diagnostics";

const VERSION = "1.0.0";

function printUsage() {
    console.log(`lusitano ${VERSION}: compiles Lusitano programs to Python

USAGE:
    lusitano <command> <file.lus> [options]

COMMANDS:
    build       Compile a .lus source file to .py
    check       Report diagnostics without writing anything
    tokens      Print the token stream
    ast         Print the syntax tree as JSON
    help        Show this help message
    version     Print version

OPTIONS (build):
    -o <file>   Output file (default: source name with .py)
    --force     Write the output even when the program has errors
    --no-entry  Do not append the call to principal()

OPTIONS (check):
    --brief     One line per diagnostic, without source context

EXAMPLES:
    lusitano build fatorial.lus
    lusitano build fatorial.lus -o saida.py --no-entry`);
}

function reportDiagnostics(diagnostics: readonly Diagnostic[], file: string, source: string) {
    diagnostics.forEach(d => {
        console.error(formatDiagnostic(d, file, source));
        console.error("");
    });
}

function readSource(args: string[]): { file: string; source: string } {
    const file = args.find(arg => !arg.startsWith("-"));
    if (!file) {
        throw new Error("no input file specified");
    }
    return { file, source: fs.readFileSync(file, "utf8") };
}

function build(args: string[]) {
    const options = parseBuildArgs(args);
    const { source, result, code } = compileFile(options.file, options);
    reportDiagnostics([...result.diagnostics, ...result.warnings], options.file, source);

    const outFile = outputPathFor(options.file, options.out);
    fs.writeFileSync(outFile, code);
    console.log(`Compiled ${path.basename(options.file)} to ${path.basename(outFile)}`);
}

function check(args: string[]) {
    const { file, source } = readSource(args);
    const result = compile(source);
    const all = [...result.diagnostics, ...result.warnings];
    if (args.includes("--brief")) {
        all.forEach(d => console.error(summarizeDiagnostic(d)));
    } else {
        reportDiagnostics(all, file, source);
    }

    console.log(`${path.basename(file)}: ${result.diagnostics.length} error(s), ${result.warnings.length} warning(s)`);
    if (!result.success) {
        process.exit(1);
    }
}

function tokens(args: string[]) {
    const { file, source } = readSource(args);
    const parsed = parse(source);
    parsed.tokens.forEach(t => {
        console.log(`${t.line}:${t.column}\t${t.type}\t${t.literal}`);
    });
    reportDiagnostics(parsed.diagnostics.filter(d => d.phase === "lexical"), file, source);
}

function ast(args: string[]) {
    const { file, source } = readSource(args);
    const parsed = parse(source);
    console.log(JSON.stringify(parsed.program, null, 2));
    reportDiagnostics(parsed.diagnostics, file, source);
}

function run(command: string, args: string[]) {
    try {
        switch (command) {
            case "build":
                build(args);
                break;
            case "check":
                check(args);
                break;
            case "tokens":
                tokens(args);
                break;
            case "ast":
                ast(args);
                break;
        }
    } catch (e: unknown) {
        if (e instanceof CompileError) {
            reportDiagnostics(e.diagnostics, e.file, e.source);
            process.exit(1);
        }
        const message = e instanceof Error ? e.message : String(e);
        console.error(`\x1b[1m\x1b[31merror\x1b[0m\x1b[1m: ${message}\x1b[0m`);
        process.exit(1);
    }
}

function main() {
    const args = process.argv.slice(2);
    const command = args[0];

    switch (command) {
        case "build":
        case "check":
        case "tokens":
        case "ast":
            run(command, args.slice(1));
            break;
        case "version":
        case "--version":
        case "-v":
            console.log(`lusitano ${VERSION}`);
            break;
        case "help":
        case "--help":
        case "-h":
            printUsage();
            break;
        case undefined:
            printUsage();
            break;
        default:
            // A bare file name means build
            if (command.endsWith(".lus")) {
                run("build", args);
            } else {
                console.error(`error: unknown command '${command}'\n`);
                printUsage();
                process.exit(1);
            }
            break;
    }
}

main();
