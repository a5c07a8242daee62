import * as AST from "../ast/ast";
import { isPrimitive } from "../analysis/types";
import type { Type } from "../analysis/types";

export const HEADER = "# Código gerado automaticamente pelo compilador Lusitano";

const INDENT = "    ";

const HOST_OPERATORS: Readonly<Record<AST.BinaryOperator, string>> = Object.freeze({
    "+": "+",
    "-": "-",
    "*": "*",
    "/": "/",
    "%": "%",
    "**": "**",
    "==": "==",
    "!=": "!=",
    "<": "<",
    "<=": "<=",
    ">": ">",
    ">=": ">=",
    e: "and",
    ou: "or",
});

const HOST_BUILTINS: Readonly<Record<string, (args: string[]) => string>> = Object.freeze({
    paraInteiro: (args: string[]) => `int(${args.join(", ")})`,
    paraReal: (args: string[]) => `float(${args.join(", ")})`,
    paraTexto: (args: string[]) => `str(${args.join(", ")})`,
    raiz: (args: string[]) => `(${args.join(", ")}) ** 0.5`,
    absoluto: (args: string[]) => `abs(${args.join(", ")})`,
    arredonda: (args: string[]) => `round(${args.join(", ")})`,
    tamanho: (args: string[]) => `len(${args.join(", ")})`,
});

// Built-ins lowered to an operator rather than a call; parenthesized like one.
const OPERATOR_BUILTINS: ReadonlySet<string> = new Set(["raiz"]);

export interface EmitOptions {
    /** Append an `if __name__ == "__main__"` call to `principal()` when applicable. Defaults to true. */
    entryPoint?: boolean;
}

/**
 * Lowers an analyzed program to Python source. Relies on the analyzer's
 * annotations (`type`, `symbol`, `outerWrites`) and checks nothing itself.
 */
export class Emitter {
    private lines: string[] = [];
    private depth: number = 0;
    private functionDepth: number = 0;
    private options: EmitOptions;

    constructor(options: EmitOptions = {}) {
        this.options = options;
    }

    public emit(program: AST.Program): string {
        this.lines = [HEADER];
        this.depth = 0;
        this.functionDepth = 0;

        program.body.forEach(stmt => this.emitStatement(stmt));

        const entry = this.entryPoint(program);
        if (entry !== null) {
            this.lines.push("", 'if __name__ == "__main__":', `${INDENT}${entry}()`);
        }
        return this.lines.join("\n") + "\n";
    }

    private line(text: string) {
        this.lines.push(INDENT.repeat(this.depth) + text);
    }

    /** Emits statements one level deeper, with `pass` when they produce nothing. */
    private emitSuite(stmts: AST.Statement[], preamble: string[] = []) {
        this.depth++;
        const before = this.lines.length;
        preamble.forEach(text => this.line(text));
        stmts.forEach(s => this.emitStatement(s));
        if (this.lines.length === before) {
            this.line("pass");
        }
        this.depth--;
    }

    private emitStatement(stmt: AST.Statement) {
        switch (stmt.kind) {
            case "FunctionDecl":
                this.emitFunctionDecl(stmt);
                return;
            case "VarDecl":
            case "ConstDecl":
                this.line(`${this.nameOf(stmt)} = ${stmt.init ? this.emitExpression(stmt.init, true) : this.defaultValue(stmt.symbol?.type)}`);
                return;
            case "Block":
                // Blocks have no counterpart; their statements sit at the current level.
                stmt.body.forEach(s => this.emitStatement(s));
                return;
            case "If":
                this.emitIf(stmt, "if");
                return;
            case "While":
                this.line(`while ${this.emitExpression(stmt.condition, true)}:`);
                this.emitSuite(stmt.body.body);
                return;
            case "ForRange":
                this.emitForRange(stmt);
                return;
            case "Return":
                if (this.functionDepth === 0) {
                    this.line("pass  # 'retorna' outside of a function");
                } else {
                    this.line(stmt.value ? `return ${this.emitExpression(stmt.value, true)}` : "return");
                }
                return;
            case "Print":
                this.line(this.emitPrint(stmt));
                return;
            case "Read":
                this.line(`${this.identifierName(stmt.target)} = ${this.emitRead(stmt)}`);
                return;
            case "Error":
                this.line(`pass  # syntax error at line ${stmt.line}`);
                return;
            case "Assignment":
                this.line(`${this.identifierName(stmt.target)} = ${this.emitExpression(stmt.value, true)}`);
                return;
            case "Binary":
            case "Unary":
            case "Call":
            case "Literal":
            case "Identifier":
                this.line(this.emitExpression(stmt, true));
                return;
            default:
                AST.unreachable(stmt);
        }
    }

    private emitFunctionDecl(fn: AST.FunctionDecl) {
        const params = fn.params.map(p => p.symbol?.emitName ?? p.name).join(", ");
        this.line(`def ${this.nameOf(fn)}(${params}):`);

        const preamble: string[] = [];
        const writes = fn.outerWrites;
        if (writes && writes.global.length > 0) preamble.push(`global ${writes.global.join(", ")}`);
        if (writes && writes.nonlocal.length > 0) preamble.push(`nonlocal ${writes.nonlocal.join(", ")}`);

        this.functionDepth++;
        this.emitSuite(fn.body.body, preamble);
        this.functionDepth--;
    }

    private emitIf(stmt: AST.If, keyword: "if" | "elif") {
        this.line(`${keyword} ${this.emitExpression(stmt.condition, true)}:`);
        this.emitSuite(stmt.consequence.body);

        const alternative = stmt.alternative;
        if (alternative === null) return;
        if (alternative.kind === "If") {
            this.emitIf(alternative, "elif");
        } else {
            this.line("else:");
            this.emitSuite(alternative.body);
        }
    }

    private emitForRange(loop: AST.ForRange) {
        const variable = loop.symbol?.emitName ?? loop.variable;
        const start = this.emitExpression(loop.start, true);
        const end = this.emitExpression(loop.end, false);

        let range: string;
        if (loop.step === null) {
            range = `range(${start}, ${end} + 1)`;
        } else {
            const step = this.emitExpression(loop.step, true);
            const sign = AST.literalSign(loop.step);
            if (sign > 0) {
                range = `range(${start}, ${end} + 1, ${step})`;
            } else if (sign < 0) {
                range = `range(${start}, ${end} - 1, ${step})`;
            } else {
                // bound once so the step is evaluated once
                const temp = loop.stepTemp?.emitName ?? "_passo";
                this.line(`${temp} = ${step}`);
                range = `range(${start}, ${end} + (1 if ${temp} > 0 else -1), ${temp})`;
            }
        }

        this.line(`for ${variable} in ${range}:`);
        this.emitSuite(loop.body.body);
    }

    private emitPrint(stmt: AST.Print): string {
        const args = stmt.args.map(a => this.emitExpression(a, true));
        if (args.length > 1) {
            return `print(${args.join(", ")}, sep="")`;
        }
        return `print(${args.join(", ")})`;
    }

    private emitRead(stmt: AST.Read): string {
        const input = `input(${stmt.prompt === null ? "" : JSON.stringify(stmt.prompt)})`;
        const target = stmt.target.type;
        if (target && isPrimitive(target, "inteiro")) return `int(${input})`;
        if (target && isPrimitive(target, "real")) return `float(${input})`;
        if (target && isPrimitive(target, "logico")) return `${input}.strip() == "verdadeiro"`;
        return input;
    }

    /**
     * `bare` drops the outermost parentheses of an operator expression; used
     * where the expression stands alone (conditions, statements, arguments).
     */
    private emitExpression(expr: AST.Expression, bare: boolean = false): string {
        switch (expr.kind) {
            case "Literal":
                return this.emitLiteral(expr);
            case "Identifier":
                return this.identifierName(expr);
            case "Assignment":
                return `(${this.identifierName(expr.target)} := ${this.emitExpression(expr.value, true)})`;
            case "Binary": {
                const integerDivision = expr.operator === "/" && expr.type !== undefined && isPrimitive(expr.type, "inteiro");
                const op = integerDivision ? "//" : HOST_OPERATORS[expr.operator];
                const text = `${this.emitExpression(expr.left)} ${op} ${this.emitExpression(expr.right)}`;
                return bare ? text : `(${text})`;
            }
            case "Unary": {
                const text = expr.operator === "nao"
                    ? `not ${this.emitExpression(expr.operand)}`
                    : `-${this.emitExpression(expr.operand)}`;
                return bare ? text : `(${text})`;
            }
            case "Call": {
                const args = expr.args.map(a => this.emitExpression(a, true));
                const symbol = expr.callee.symbol;
                const host = symbol?.builtin ? HOST_BUILTINS[symbol.name] : undefined;
                if (!host || !symbol) {
                    return `${this.identifierName(expr.callee)}(${args.join(", ")})`;
                }
                const text = host(args);
                return bare || !OPERATOR_BUILTINS.has(symbol.name) ? text : `(${text})`;
            }
            default:
                return AST.unreachable(expr);
        }
    }

    private emitLiteral(lit: AST.Literal): string {
        switch (lit.valueType) {
            case "inteiro":
                return lit.raw.replace(/^0+(?=\d)/, "");
            case "real":
                return lit.raw;
            case "texto":
                return JSON.stringify(lit.value);
            case "logico":
                return lit.value ? "True" : "False";
        }
    }

    private defaultValue(type: Type | undefined): string {
        if (type === undefined || type.kind !== "primitive") return "None";
        switch (type.name) {
            case "inteiro":
                return "0";
            case "real":
                return "0.0";
            case "texto":
                return '""';
            case "logico":
                return "False";
            case "vazio":
                return "None";
        }
    }

    private identifierName(ident: AST.Identifier): string {
        return ident.symbol?.emitName ?? ident.name;
    }

    private nameOf(decl: AST.FunctionDecl | AST.VarDecl | AST.ConstDecl): string {
        return decl.symbol?.emitName ?? decl.name;
    }

    /** Name to call from the entry guard, or null when the program needs none. */
    private entryPoint(program: AST.Program): string | null {
        if (this.options.entryPoint === false) return null;

        const principal = program.body.find(
            (s): s is AST.FunctionDecl => s.kind === "FunctionDecl" && s.name === "principal" && s.params.length === 0,
        );
        if (!principal || !principal.symbol) return null;

        const target = principal.symbol;
        const calls = (node: AST.Node): boolean => {
            if (node.kind === "FunctionDecl") return false;
            if (node.kind === "Call" && node.callee.symbol === target) return true;
            return AST.children(node).some(calls);
        };
        if (program.body.some(calls)) return null;

        return target.emitName;
    }
}
