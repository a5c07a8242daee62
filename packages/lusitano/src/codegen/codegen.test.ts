import { describe, it, expect } from "vitest";
import { Lexer } from "../lexer/lexer";
import { Parser } from "../parser/parser";
import { Analyzer } from "../analysis/analyzer";
import { DiagnosticBag } from "../diagnostics";
import { Emitter, HEADER } from "./emitter";
import type { EmitOptions } from "./emitter";

function emitWithDiagnostics(input: string, options: EmitOptions = {}) {
    const diagnostics = new DiagnosticBag();
    const tokens = new Lexer(input, diagnostics).tokenize();
    const program = new Parser(tokens, diagnostics).parseProgram();
    new Analyzer(diagnostics).analyze(program);
    return { code: new Emitter(options).emit(program), diagnostics: diagnostics.all() };
}

/** Emits a program that must check cleanly; returns the lines after the header. */
function emitLines(input: string, options: EmitOptions = {}): string[] {
    const { code, diagnostics } = emitWithDiagnostics(input, options);
    expect(diagnostics).toEqual([]);
    const lines = code.split("\n");
    expect(lines[0]).toBe(HEADER);
    expect(lines[lines.length - 1]).toBe("");
    return lines.slice(1, -1);
}

describe("Python Codegen", () => {
    it("should emit the header, statements and a trailing newline", () => {
        const { code } = emitWithDiagnostics("var x: inteiro = 25\nescreva(x)");
        expect(code).toBe(`${HEADER}\nx = 25\nprint(x)\n`);
    });

    it("should emit functions, conditionals and counted loops", () => {
        const input = `
            funcao fatorial(n: inteiro): inteiro {
                se (n <= 1) { retorna 1 }
                retorna n * fatorial(n - 1)
            }
            para i de 1 ate 5 { escreva(fatorial(i)) }
        `;
        expect(emitLines(input)).toEqual([
            "def fatorial(n):",
            "    if n <= 1:",
            "        return 1",
            "    return n * fatorial(n - 1)",
            "for i in range(1, 5 + 1):",
            "    print(fatorial(i))",
        ]);
    });

    describe("declarations", () => {
        it("should give uninitialized variables the default of their type", () => {
            expect(emitLines("var a: inteiro\nvar b: real\nvar c: texto\nvar d: logico")).toEqual([
                "a = 0",
                "b = 0.0",
                'c = ""',
                "d = False",
            ]);
        });

        it("should emit constants as plain assignments", () => {
            expect(emitLines("const PI: real = 3.14159")).toEqual(["PI = 3.14159"]);
        });

        it("should normalize integer literals", () => {
            expect(emitLines("var z = 007\nvar zero = 0")).toEqual(["z = 7", "zero = 0"]);
        });

        it("should quote strings for the host", () => {
            expect(emitLines('escreva("a\\"b\\n")\nescreva("ação")')).toEqual(['print("a\\"b\\n")', 'print("ação")']);
        });
    });

    describe("expressions", () => {
        it("should parenthesize nested operators", () => {
            expect(emitLines("var r = (1 + 2) * 3\nvar s = 1 + 2 * 3")).toEqual(["r = (1 + 2) * 3", "s = 1 + (2 * 3)"]);
        });

        it("should keep unary minus bound tighter than power", () => {
            expect(emitLines("var p = -2 ** 2")).toEqual(["p = (-2) ** 2"]);
        });

        it("should use floor division between integers only", () => {
            expect(emitLines("var q = 7 / 2\nvar h = 7.0 / 2.0")).toEqual(["q = 7 // 2", "h = 7.0 / 2.0"]);
        });

        it("should map logical operators", () => {
            expect(emitLines("var l = nao verdadeiro e falso ou verdadeiro\nvar m = nao (1 == 2)")).toEqual([
                "l = ((not True) and False) or True",
                "m = not (1 == 2)",
            ]);
        });

        it("should emit a nested assignment as an assignment expression", () => {
            expect(emitLines("var a = 0\nvar b = 0\na = b = 3")).toEqual(["a = 0", "b = 0", "a = (b := 3)"]);
        });

        it("should parenthesize raiz inside an operator", () => {
            expect(emitLines("var r: real = raiz(16) ** 2.0\nvar s = 1.0 + raiz(4.0)")).toEqual([
                "r = ((16) ** 0.5) ** 2.0",
                "s = 1.0 + ((4.0) ** 0.5)",
            ]);
        });

        it("should map built-in functions", () => {
            const input = 'var r = raiz(16.0)\nvar t = paraTexto(42)\nvar n = tamanho("abc")\nvar a = absoluto(-3)\nvar k = arredonda(2.5)\nvar i = paraInteiro("7")\nvar f = paraReal(i)';
            expect(emitLines(input)).toEqual([
                "r = (16.0) ** 0.5",
                "t = str(42)",
                'n = len("abc")',
                "a = abs(-3)",
                "k = round(2.5)",
                'i = int("7")',
                "f = float(i)",
            ]);
        });
    });

    describe("statements", () => {
        it("should emit if chains as elif and else", () => {
            const input = 'var n = 5\nse (n > 3) { escreva("grande") } senao se (n > 1) { escreva("medio") } senao { }';
            expect(emitLines(input)).toEqual([
                "n = 5",
                "if n > 3:",
                '    print("grande")',
                "elif n > 1:",
                '    print("medio")',
                "else:",
                "    pass",
            ]);
        });

        it("should expand compound assignment in loops", () => {
            expect(emitLines("var i = 0\nenquanto (i < 3) { i += 1 }")).toEqual(["i = 0", "while i < 3:", "    i = i + 1"]);
        });

        it("should make the range end inclusive for every step", () => {
            const input = `
                var s = 2
                var n = 4
                para i de 10 ate 1 passo -1 { }
                para i de 0 ate 10 passo 2 { }
                para j de 0 ate 10 passo s { }
                para k de 1 ate n + 1 { }
            `;
            expect(emitLines(input)).toEqual([
                "s = 2",
                "n = 4",
                "for i in range(10, 1 - 1, -1):",
                "    pass",
                "for i in range(0, 10 + 1, 2):",
                "    pass",
                "_passo = s",
                "for j in range(0, 10 + (1 if _passo > 0 else -1), _passo):",
                "    pass",
                "for k in range(1, (n + 1) + 1):",
                "    pass",
            ]);
        });

        it("should evaluate a step of unknown sign once", () => {
            const input = `
                funcao passoDe(): inteiro { escreva("passo") retorna 1 }
                para i de 1 ate 3 passo passoDe() { escreva(i) }
            `;
            expect(emitLines(input)).toEqual([
                "def passoDe():",
                '    print("passo")',
                "    return 1",
                "_passo = passoDe()",
                "for i in range(1, 3 + (1 if _passo > 0 else -1), _passo):",
                "    print(i)",
            ]);
        });

        it("should not let the step binding clash with program names", () => {
            expect(emitLines("var _passo = 2\npara i de 1 ate 3 passo _passo { }")).toEqual([
                "_passo = 2",
                "_passo_1 = _passo",
                "for i in range(1, 3 + (1 if _passo_1 > 0 else -1), _passo_1):",
                "    pass",
            ]);
        });

        it("should emit escreva with and without separators", () => {
            expect(emitLines('escreva("x = ", 1)\nescreva()')).toEqual(['print("x = ", 1, sep="")', "print()"]);
        });

        it("should convert leia input to the target type", () => {
            const input = `
                var idade: inteiro
                leia("Idade: ", idade)
                var nome: texto
                leia(nome)
                var ok: logico
                leia(ok)
                var r: real
                leia(r)
            `;
            expect(emitLines(input)).toEqual([
                "idade = 0",
                'idade = int(input("Idade: "))',
                'nome = ""',
                "nome = input()",
                "ok = False",
                'ok = input().strip() == "verdadeiro"',
                "r = 0.0",
                "r = float(input())",
            ]);
        });

        it("should emit pass for an empty function", () => {
            expect(emitLines("funcao nada() { }")).toEqual(["def nada():", "    pass"]);
        });

        it("should neutralize retorna outside of a function", () => {
            const { code, diagnostics } = emitWithDiagnostics("escreva(1)\nretorna");
            expect(diagnostics.map(d => d.code)).toEqual(["ReturnTypeMismatchError"]);
            expect(code).toBe(`${HEADER}\nprint(1)\npass  # 'retorna' outside of a function\n`);
        });
    });

    describe("names and scopes", () => {
        it("should rename reserved and shadowing names", () => {
            expect(emitLines("var print = 1\nescreva(print)")).toEqual(["print_ = 1", "print(print_)"]);
            expect(emitLines("var x = 1\n{ var x = 2\nescreva(x) }\nescreva(x)")).toEqual([
                "x = 1",
                "x_1 = 2",
                "print(x_1)",
                "print(x)",
            ]);
        });

        it("should declare writes to globals", () => {
            expect(emitLines("var total = 0\nfuncao soma(n: inteiro) { total += n }")).toEqual([
                "total = 0",
                "def soma(n):",
                "    global total",
                "    total = total + n",
            ]);
        });

        it("should declare writes to enclosing functions as nonlocal", () => {
            const input = `
                funcao f() {
                    var c = 0
                    funcao g() { c += 1 }
                    g()
                }
            `;
            expect(emitLines(input)).toEqual([
                "def f():",
                "    c = 0",
                "    def g():",
                "        nonlocal c",
                "        c = c + 1",
                "    g()",
            ]);
        });
    });

    describe("entry point", () => {
        it("should call principal from an entry guard", () => {
            expect(emitLines('funcao principal() { escreva("oi") }')).toEqual([
                "def principal():",
                '    print("oi")',
                "",
                'if __name__ == "__main__":',
                "    principal()",
            ]);
        });

        it("should not add the guard when the program already calls principal", () => {
            expect(emitLines("funcao principal() { }\nprincipal()")).toEqual(["def principal():", "    pass", "principal()"]);
        });

        it("should not add the guard when disabled", () => {
            expect(emitLines("funcao principal() { }", { entryPoint: false })).toEqual(["def principal():", "    pass"]);
        });

        it("should ignore a principal that takes parameters", () => {
            expect(emitLines("funcao principal(n: inteiro) { }")).toEqual(["def principal(n):", "    pass"]);
        });
    });
});
