import * as AST from "../ast/ast";
import { DiagnosticBag } from "../diagnostics";
import { ScopeManager, GLOBAL_SCOPE } from "./symbol_table";
import type { Symbol, SymbolCategory } from "./symbol_table";
import { BUILTINS } from "./builtins";
import {
    IntType, RealType, TextType, BoolType, VoidType, ErrorType,
    primitive, isPrimitive, isNumeric, isError, typesEqual, typeToString,
} from "./types";
import type { Type, Signature } from "./types";
import reservedNames from "../codegen/reserved.json";

const RESERVED: ReadonlySet<string> = new Set<string>(reservedNames);

interface FunctionContext {
    name: string;
    returnType: Type | null; // null when the function returns nothing
    globals: Set<string>;
    nonlocals: Set<string>;
}

/**
 * Resolves names, checks types and annotates the tree in place for the
 * emitter. Never stops at the first problem: a failed expression is typed
 * with the error sentinel and checking carries on.
 */
export class Analyzer {
    private scopes: ScopeManager = new ScopeManager();
    private diagnostics: DiagnosticBag;
    private functions: FunctionContext[] = [];
    private reportedUndeclared: Set<string> = new Set();

    constructor(diagnostics: DiagnosticBag = new DiagnosticBag()) {
        this.diagnostics = diagnostics;
    }

    public analyze(program: AST.Program) {
        for (const builtin of BUILTINS) {
            this.scopes.declare({
                name: builtin.name,
                type: { kind: "function", signatures: builtin.signatures },
                category: "function",
                scope: GLOBAL_SCOPE,
                line: 0,
                column: 0,
                emitName: builtin.name,
                builtin: true,
            });
        }

        program.body.forEach(stmt => this.visitStatement(stmt));
        program.type = VoidType;
    }

    private visitStatement(stmt: AST.Statement) {
        switch (stmt.kind) {
            case "FunctionDecl":
                this.visitFunctionDecl(stmt);
                return;
            case "VarDecl":
            case "ConstDecl":
                this.visitVariableDecl(stmt);
                return;
            case "Block":
                this.scopes.enter("block");
                this.visitBlockBody(stmt);
                this.scopes.exit();
                return;
            case "If":
                this.checkCondition(stmt.condition, "se");
                this.visitStatement(stmt.consequence);
                if (stmt.alternative) this.visitStatement(stmt.alternative);
                stmt.type = VoidType;
                return;
            case "While":
                this.checkCondition(stmt.condition, "enquanto");
                this.visitStatement(stmt.body);
                stmt.type = VoidType;
                return;
            case "ForRange":
                this.visitForRange(stmt);
                return;
            case "Return":
                this.visitReturn(stmt);
                return;
            case "Print":
                stmt.args.forEach(arg => this.checkValue(arg, this.visitExpression(arg), "escreva"));
                stmt.type = VoidType;
                return;
            case "Read":
                this.visitRead(stmt);
                return;
            case "Error":
                stmt.type = ErrorType;
                return;
            case "Assignment":
            case "Binary":
            case "Unary":
            case "Call":
            case "Literal":
            case "Identifier":
                this.visitExpression(stmt);
                return;
            default:
                AST.unreachable(stmt);
        }
    }

    private visitBlockBody(block: AST.Block) {
        block.body.forEach(s => this.visitStatement(s));
        block.type = VoidType;
    }

    private visitFunctionDecl(fn: AST.FunctionDecl) {
        const returnType = fn.returnType === null || fn.returnType === "vazio" ? null : primitive(fn.returnType);
        const params: Type[] = fn.params.map(p => primitive(p.typeName));
        const signature: Signature = { params, returnType: returnType ?? VoidType };

        // Declared before the body is checked so the function can call itself.
        fn.symbol = this.declare(fn.name, { kind: "function", signatures: [signature] }, "function", fn.line, fn.column);

        this.scopes.enter("function");
        const context: FunctionContext = { name: fn.name, returnType, globals: new Set(), nonlocals: new Set() };
        this.functions.push(context);

        for (const param of fn.params) {
            if (param.typeName === "vazio") {
                this.diagnostics.semantic(
                    "TypeMismatchError",
                    `parameter '${param.name}' cannot have type vazio`,
                    param.line,
                    param.column,
                );
            }
            param.symbol = this.declare(param.name, primitive(param.typeName), "parameter", param.line, param.column);
        }

        // The body shares the function scope with the parameters.
        this.visitBlockBody(fn.body);

        if (returnType !== null && !this.alwaysReturns(fn.body.body)) {
            this.diagnostics.semantic(
                "MissingReturnWarning",
                `function '${fn.name}' may reach its end without returning a value of type ${typeToString(returnType)}`,
                fn.line,
                fn.column,
                "warning",
            );
        }

        this.functions.pop();
        this.scopes.exit();

        fn.outerWrites = { global: [...context.globals], nonlocal: [...context.nonlocals] };
        fn.type = VoidType;
    }

    private alwaysReturns(stmts: AST.Statement[]): boolean {
        return stmts.some(s => {
            switch (s.kind) {
                case "Return":
                    return true;
                case "Block":
                    return this.alwaysReturns(s.body);
                case "If":
                    return s.alternative !== null &&
                        this.alwaysReturns(s.consequence.body) &&
                        this.alwaysReturns([s.alternative]);
                case "While":
                    // `enquanto (verdadeiro)` can only be left through `retorna`
                    return s.condition.kind === "Literal" && s.condition.value === true;
                default:
                    return false;
            }
        });
    }

    private visitVariableDecl(decl: AST.VarDecl | AST.ConstDecl) {
        const declared = decl.declaredType === null ? null : primitive(decl.declaredType);
        if (declared !== null && isPrimitive(declared, "vazio")) {
            this.diagnostics.semantic("TypeMismatchError", `variable '${decl.name}' cannot have type vazio`, decl.line, decl.column);
        }

        let symbolType: Type = declared ?? ErrorType;
        if (decl.init !== null) {
            const initType = this.visitExpression(decl.init);
            if (initType.kind === "function") {
                this.diagnostics.semantic(
                    "TypeMismatchError",
                    `cannot initialize '${decl.name}' with a function`,
                    decl.init.line,
                    decl.init.column,
                );
            } else if (isPrimitive(initType, "vazio")) {
                this.diagnostics.semantic(
                    "TypeMismatchError",
                    `cannot initialize '${decl.name}' with an expression of type vazio`,
                    decl.init.line,
                    decl.init.column,
                );
            } else if (declared !== null && !typesEqual(declared, initType)) {
                this.diagnostics.semantic(
                    "TypeMismatchError",
                    `cannot initialize '${decl.name}' of type ${typeToString(declared)} with a value of type ${typeToString(initType)}`,
                    decl.init.line,
                    decl.init.column,
                );
            } else if (declared === null) {
                symbolType = initType;
            }
        }

        const category: SymbolCategory = decl.kind === "ConstDecl" ? "constant" : "variable";
        decl.symbol = this.declare(decl.name, symbolType, category, decl.line, decl.column);
        decl.type = VoidType;
    }

    private visitForRange(loop: AST.ForRange) {
        const bounds: [AST.Expression, string][] = [[loop.start, "start"], [loop.end, "end"]];
        if (loop.step) bounds.push([loop.step, "step"]);
        for (const [expr, role] of bounds) {
            const t = this.visitExpression(expr);
            if (!typesEqual(t, IntType)) {
                this.diagnostics.semantic(
                    "TypeMismatchError",
                    `'para' ${role} must be inteiro, got ${typeToString(t)}`,
                    expr.line,
                    expr.column,
                );
            }
        }

        if (loop.step && AST.literalSign(loop.step) === 0) {
            // Declared under a key no source name can take; only its emitted name matters.
            loop.stepTemp = this.declare(`passo@${loop.line}:${loop.column}`, IntType, "variable", loop.line, loop.column, "_passo");
        }

        // The loop variable and the body share one scope.
        this.scopes.enter("block");
        loop.symbol = this.declare(loop.variable, IntType, "variable", loop.line, loop.column);
        this.visitBlockBody(loop.body);
        this.scopes.exit();
        loop.type = VoidType;
    }

    private visitReturn(ret: AST.Return) {
        const valueType = ret.value ? this.visitExpression(ret.value) : null;
        ret.type = VoidType;

        const context = this.functions[this.functions.length - 1];
        if (!context) {
            this.diagnostics.semantic("ReturnTypeMismatchError", "'retorna' outside of a function", ret.line, ret.column);
            return;
        }

        if (context.returnType === null) {
            if (ret.value) {
                this.diagnostics.semantic(
                    "ReturnTypeMismatchError",
                    `function '${context.name}' does not declare a return type but returns a value`,
                    ret.line,
                    ret.column,
                );
            }
            return;
        }

        if (valueType === null) {
            this.diagnostics.semantic(
                "ReturnTypeMismatchError",
                `function '${context.name}' must return a value of type ${typeToString(context.returnType)}`,
                ret.line,
                ret.column,
            );
        } else if (!typesEqual(valueType, context.returnType)) {
            this.diagnostics.semantic(
                "ReturnTypeMismatchError",
                `function '${context.name}' returns ${typeToString(context.returnType)}, got ${typeToString(valueType)}`,
                ret.line,
                ret.column,
            );
        }
    }

    private visitRead(read: AST.Read) {
        read.type = VoidType;
        const symbol = this.resolveIdentifier(read.target);
        if (!symbol) return;

        if (symbol.category === "constant") {
            this.diagnostics.semantic(
                "ConstantReassignmentError",
                `cannot read into constant '${symbol.name}'`,
                read.target.line,
                read.target.column,
            );
        } else if (symbol.category === "function") {
            this.diagnostics.semantic(
                "TypeMismatchError",
                `cannot read into function '${symbol.name}'`,
                read.target.line,
                read.target.column,
            );
        } else {
            this.recordOuterWrite(symbol);
        }
    }

    private checkCondition(condition: AST.Expression, keyword: string) {
        const t = this.visitExpression(condition);
        if (!typesEqual(t, BoolType)) {
            this.diagnostics.semantic(
                "TypeMismatchError",
                `'${keyword}' condition must be logico, got ${typeToString(t)}`,
                condition.line,
                condition.column,
            );
        }
    }

    /** Reports values that cannot be used as data: functions and calls to functions returning nothing. */
    private checkValue(expr: AST.Expression, t: Type, context: string) {
        if (t.kind === "function" || isPrimitive(t, "vazio")) {
            this.diagnostics.semantic(
                "TypeMismatchError",
                `'${context}' cannot use a value of type ${t.kind === "function" ? "funcao" : "vazio"}`,
                expr.line,
                expr.column,
            );
        }
    }

    private visitExpression(expr: AST.Expression): Type {
        const t = this.typeOf(expr);
        expr.type = t;
        return t;
    }

    private typeOf(expr: AST.Expression): Type {
        switch (expr.kind) {
            case "Literal":
                return primitive(expr.valueType);
            case "Identifier": {
                const symbol = this.resolveIdentifier(expr);
                return symbol ? symbol.type : ErrorType;
            }
            case "Assignment":
                return this.visitAssignment(expr);
            case "Binary":
                return this.visitBinary(expr);
            case "Unary":
                return this.visitUnary(expr);
            case "Call":
                return this.visitCall(expr);
            default:
                return AST.unreachable(expr);
        }
    }

    private visitAssignment(assign: AST.Assignment): Type {
        const valueType = this.visitExpression(assign.value);
        const symbol = this.resolveIdentifier(assign.target);
        if (!symbol) return ErrorType;

        if (symbol.category === "constant") {
            this.diagnostics.semantic(
                "ConstantReassignmentError",
                `cannot assign to constant '${symbol.name}'`,
                assign.line,
                assign.column,
            );
            return symbol.type;
        }
        if (symbol.category === "function") {
            this.diagnostics.semantic(
                "TypeMismatchError",
                `cannot assign to function '${symbol.name}'`,
                assign.line,
                assign.column,
            );
            return ErrorType;
        }
        if (!typesEqual(symbol.type, valueType)) {
            this.diagnostics.semantic(
                "TypeMismatchError",
                `cannot assign a value of type ${typeToString(valueType)} to '${symbol.name}' of type ${typeToString(symbol.type)}`,
                assign.line,
                assign.column,
            );
        }
        this.recordOuterWrite(symbol);
        return symbol.type;
    }

    private visitBinary(bin: AST.Binary): Type {
        const left = this.visitExpression(bin.left);
        const right = this.visitExpression(bin.right);
        if (isError(left) || isError(right)) return ErrorType;

        switch (bin.operator) {
            case "+":
            case "-":
            case "*":
            case "/":
            case "%":
            case "**":
                if (bin.operator === "+" && isPrimitive(left, "texto") && isPrimitive(right, "texto")) {
                    return TextType;
                }
                if (isNumeric(left) && isNumeric(right)) {
                    return isPrimitive(left, "real") || isPrimitive(right, "real") ? RealType : IntType;
                }
                return this.operandMismatch(bin, left, right);
            case "==":
            case "!=":
            case "<":
            case "<=":
            case ">":
            case ">=":
                if (left.kind === "primitive" && !isPrimitive(left, "vazio") && typesEqual(left, right)) {
                    return BoolType;
                }
                return this.operandMismatch(bin, left, right);
            case "e":
            case "ou":
                if (isPrimitive(left, "logico") && isPrimitive(right, "logico")) {
                    return BoolType;
                }
                return this.operandMismatch(bin, left, right);
        }
    }

    private operandMismatch(bin: AST.Binary, left: Type, right: Type): Type {
        this.diagnostics.semantic(
            "TypeMismatchError",
            `operator '${bin.operator}' cannot be applied to ${typeToString(left)} and ${typeToString(right)}`,
            bin.line,
            bin.column,
        );
        return ErrorType;
    }

    private visitUnary(unary: AST.Unary): Type {
        const operand = this.visitExpression(unary.operand);
        if (isError(operand)) return ErrorType;
        if (unary.operator === "-" && isNumeric(operand)) return operand;
        if (unary.operator === "nao" && isPrimitive(operand, "logico")) return BoolType;
        this.diagnostics.semantic(
            "TypeMismatchError",
            `operator '${unary.operator}' cannot be applied to ${typeToString(operand)}`,
            unary.line,
            unary.column,
        );
        return ErrorType;
    }

    private visitCall(call: AST.Call): Type {
        const argTypes = call.args.map(arg => this.visitExpression(arg));
        const symbol = this.resolveIdentifier(call.callee);
        if (!symbol) return ErrorType;

        const calleeType = symbol.type;
        if (calleeType.kind !== "function") {
            if (!isError(calleeType)) {
                this.diagnostics.semantic(
                    "TypeMismatchError",
                    `'${symbol.name}' is not a function`,
                    call.callee.line,
                    call.callee.column,
                );
            }
            return ErrorType;
        }

        const candidates = calleeType.signatures.filter(s => s.params.length === argTypes.length);
        if (candidates.length === 0) {
            const arities = [...new Set(calleeType.signatures.map(s => s.params.length))].join(" or ");
            this.diagnostics.semantic(
                "ArgumentCountMismatchError",
                `'${symbol.name}' expects ${arities} argument(s), got ${argTypes.length}`,
                call.line,
                call.column,
            );
            return ErrorType;
        }

        const match = candidates.find(s => s.params.every((p, i) => typesEqual(p, argTypes[i])));
        if (match) return match.returnType;

        if (candidates.length === 1) {
            const params = candidates[0].params;
            const index = params.findIndex((p, i) => !typesEqual(p, argTypes[i]));
            const arg = call.args[index];
            this.diagnostics.semantic(
                "TypeMismatchError",
                `argument ${index + 1} of '${symbol.name}' must be ${typeToString(params[index])}, got ${typeToString(argTypes[index])}`,
                arg.line,
                arg.column,
            );
        } else {
            this.diagnostics.semantic(
                "TypeMismatchError",
                `no overload of '${symbol.name}' accepts (${argTypes.map(typeToString).join(", ")})`,
                call.line,
                call.column,
            );
        }
        return ErrorType;
    }

    private resolveIdentifier(ident: AST.Identifier): Symbol | undefined {
        const symbol = this.scopes.resolve(ident.name);
        if (!symbol) {
            // a desugared `x += 1` mentions x twice at one source position
            const site = `${ident.line}:${ident.column}:${ident.name}`;
            if (!this.reportedUndeclared.has(site)) {
                this.reportedUndeclared.add(site);
                this.diagnostics.semantic(
                    "UndeclaredIdentifierError",
                    `'${ident.name}' is not declared`,
                    ident.line,
                    ident.column,
                );
            }
            ident.type = ErrorType;
            return undefined;
        }
        ident.symbol = symbol;
        ident.type = symbol.type;
        return symbol;
    }

    private declare(name: string, type: Type, category: SymbolCategory, line: number, column: number, emitBase: string = name): Symbol {
        const symbol: Symbol = {
            name,
            type,
            category,
            scope: this.scopes.currentScope,
            line,
            column,
            emitName: this.emitNameFor(emitBase),
        };
        const existing = this.scopes.declare(symbol);
        if (existing) {
            const where = existing.builtin ? "as a built-in function" : `at line ${existing.line}`;
            this.diagnostics.semantic(
                "DuplicateDeclarationError",
                `'${name}' is already declared in this scope (${where})`,
                line,
                column,
            );
        }
        return symbol;
    }

    /** Source name, escaped when the generated code reserves it, then made unique among visible names. */
    private emitNameFor(name: string): string {
        const base = RESERVED.has(name) ? `${name}_` : name;
        let candidate = base;
        for (let n = 1; this.scopes.isEmitNameVisible(candidate); n++) {
            candidate = `${base}_${n}`;
        }
        return candidate;
    }

    private recordOuterWrite(symbol: Symbol) {
        const context = this.functions[this.functions.length - 1];
        if (!context) return;
        const frame = this.scopes.frameOf(symbol.scope);
        if (frame === this.scopes.currentFrame) return;
        if (frame === GLOBAL_SCOPE) {
            context.globals.add(symbol.emitName);
        } else {
            context.nonlocals.add(symbol.emitName);
        }
    }
}
