import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { compileFile, outputPathFor, parseBuildArgs } from "./commands";
import { CompileError } from "./errors";
import { HEADER } from "./codegen/emitter";

describe("parseBuildArgs", () => {
    it("should default to writing beside the source with an entry point", () => {
        expect(parseBuildArgs(["prog.lus"])).toEqual({ file: "prog.lus", out: null, force: false, entryPoint: true });
    });

    it("should read every option", () => {
        expect(parseBuildArgs(["--force", "prog.lus", "-o", "saida.py", "--no-entry"])).toEqual({
            file: "prog.lus",
            out: "saida.py",
            force: true,
            entryPoint: false,
        });
        expect(parseBuildArgs(["prog.lus", "--out", "b.py"]).out).toBe("b.py");
    });

    it("should reject bad arguments", () => {
        expect(() => parseBuildArgs([])).toThrow("no input file specified");
        expect(() => parseBuildArgs(["a.lus", "--verbose"])).toThrow("unknown option '--verbose'");
        expect(() => parseBuildArgs(["a.lus", "b.lus"])).toThrow("unexpected argument 'b.lus'");
        expect(() => parseBuildArgs(["a.lus", "-o"])).toThrow("option '-o' needs a file name");
        expect(() => parseBuildArgs(["a.lus", "-o", "--force"])).toThrow("option '-o' needs a file name");
    });
});

describe("outputPathFor", () => {
    it("should swap the extension for .py", () => {
        expect(outputPathFor("prog.lus")).toBe("prog.py");
        expect(outputPathFor(path.join("dir", "fatorial.lus"))).toBe(path.join("dir", "fatorial.py"));
        expect(outputPathFor("semextensao")).toBe("semextensao.py");
    });

    it("should prefer an explicit output", () => {
        expect(outputPathFor("prog.lus", "out.py")).toBe("out.py");
    });
});

describe("compileFile", () => {
    let dir: string;

    function write(name: string, source: string): string {
        const file = path.join(dir, name);
        fs.writeFileSync(file, source);
        return file;
    }

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "lusitano-"));
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should compile a clean file", () => {
        const file = write("ok.lus", "escreva(1)");
        const compiled = compileFile(file);
        expect(compiled.source).toBe("escreva(1)");
        expect(compiled.code).toBe(`${HEADER}\nprint(1)\n`);
    });

    it("should let warnings through", () => {
        const file = write("aviso.lus", "funcao f(): inteiro { se (verdadeiro) { retorna 1 } }");
        const compiled = compileFile(file);
        expect(compiled.result.warnings.map(d => d.code)).toEqual(["MissingReturnWarning"]);
    });

    it("should throw a CompileError carrying the diagnostics", () => {
        const file = write("erro.lus", "const K = 1\nK = 2");
        let caught: unknown = null;
        try {
            compileFile(file);
        } catch (e: unknown) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(CompileError);
        if (caught instanceof CompileError) {
            expect(caught.file).toBe(file);
            expect(caught.diagnostics.map(d => d.code)).toEqual(["ConstantReassignmentError"]);
        }
    });

    it("should return code for a broken file when forced", () => {
        const file = write("forcado.lus", "var = 1\nescreva(2)");
        expect(() => compileFile(file)).toThrow(CompileError);
        expect(compileFile(file, { force: true }).code).toBe(`${HEADER}\npass  # syntax error at line 1\nprint(2)\n`);
    });
});
