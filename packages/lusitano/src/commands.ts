import * as fs from "fs";
import * as path from "path";
import { compile } from "./compiler";
import type { CompileResult } from "./compiler";
import { CompileError } from "./errors";

export interface BuildOptions {
    file: string;
    out: string | null;
    force: boolean;
    entryPoint: boolean;
}

/** Parses `<file> [-o out.py] [--force] [--no-entry]`. Throws on anything else. */
export function parseBuildArgs(args: string[]): BuildOptions {
    let file: string | null = null;
    let out: string | null = null;
    let force = false;
    let entryPoint = true;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "-o" || arg === "--out") {
            const value = args[i + 1];
            if (value === undefined || value.startsWith("-")) {
                throw new Error(`option '${arg}' needs a file name`);
            }
            out = value;
            i++;
        } else if (arg === "--force") {
            force = true;
        } else if (arg === "--no-entry") {
            entryPoint = false;
        } else if (arg.startsWith("-")) {
            throw new Error(`unknown option '${arg}'`);
        } else if (file === null) {
            file = arg;
        } else {
            throw new Error(`unexpected argument '${arg}'`);
        }
    }

    if (file === null) {
        throw new Error("no input file specified");
    }
    return { file, out, force, entryPoint };
}

/** `prog.lus` becomes `prog.py` next to it. */
export function outputPathFor(file: string, out: string | null = null): string {
    if (out !== null) return out;
    const parsed = path.parse(file);
    return path.join(parsed.dir, `${parsed.name}.py`);
}

export interface CompiledFile {
    source: string;
    result: CompileResult;
    code: string;
}

/**
 * Compiles one file from disk. Throws `CompileError` when the program has
 * errors (warnings alone do not stop it) unless `force` is set and code
 * could still be generated.
 */
export function compileFile(file: string, options: { force?: boolean; entryPoint?: boolean } = {}): CompiledFile {
    const source = fs.readFileSync(file, "utf8");
    const result = compile(source, { force: options.force, entryPoint: options.entryPoint });
    if (result.code === null || (!result.success && !options.force)) {
        throw new CompileError(result.diagnostics, file, source);
    }
    return { source, result, code: result.code };
}
