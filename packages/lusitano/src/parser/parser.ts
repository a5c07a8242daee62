import { TokenType, StatementKeywords, describeToken, describeTokenType } from "../token";
import type { Token } from "../token";
import { DiagnosticBag } from "../diagnostics";
import type { PrimitiveName } from "../analysis/types";
import * as AST from "../ast/ast";

enum Precedence {
  LOWEST = 1,
  ASSIGN,      // = += -= *= /=
  LOGICAL_OR,  // ou
  LOGICAL_AND, // e
  EQUALS,      // == !=
  LESSGREATER, // > or <
  SUM,         // +
  PRODUCT,     // *
  POWER,       // **
  PREFIX,      // -X or nao X
  CALL,        // myFunction(X)
}

const PRECEDENCES: Readonly<Partial<Record<TokenType, Precedence>>> = Object.freeze({
  [TokenType.Equals]: Precedence.ASSIGN,
  [TokenType.PlusEq]: Precedence.ASSIGN,
  [TokenType.MinusEq]: Precedence.ASSIGN,
  [TokenType.StarEq]: Precedence.ASSIGN,
  [TokenType.SlashEq]: Precedence.ASSIGN,
  [TokenType.Ou]: Precedence.LOGICAL_OR,
  [TokenType.E]: Precedence.LOGICAL_AND,
  [TokenType.EqEq]: Precedence.EQUALS,
  [TokenType.NotEq]: Precedence.EQUALS,
  [TokenType.LT]: Precedence.LESSGREATER,
  [TokenType.GT]: Precedence.LESSGREATER,
  [TokenType.LtEq]: Precedence.LESSGREATER,
  [TokenType.GtEq]: Precedence.LESSGREATER,
  [TokenType.Plus]: Precedence.SUM,
  [TokenType.Minus]: Precedence.SUM,
  [TokenType.Slash]: Precedence.PRODUCT,
  [TokenType.Star]: Precedence.PRODUCT,
  [TokenType.Percent]: Precedence.PRODUCT,
  [TokenType.StarStar]: Precedence.POWER,
  [TokenType.LPharen]: Precedence.CALL,
});

const BINARY_OPERATORS: Readonly<Partial<Record<TokenType, AST.BinaryOperator>>> = Object.freeze({
  [TokenType.Plus]: "+",
  [TokenType.Minus]: "-",
  [TokenType.Star]: "*",
  [TokenType.Slash]: "/",
  [TokenType.Percent]: "%",
  [TokenType.StarStar]: "**",
  [TokenType.EqEq]: "==",
  [TokenType.NotEq]: "!=",
  [TokenType.LT]: "<",
  [TokenType.LtEq]: "<=",
  [TokenType.GT]: ">",
  [TokenType.GtEq]: ">=",
  [TokenType.E]: "e",
  [TokenType.Ou]: "ou",
});

// x op= v is parsed as x = x op v
const COMPOUND_OPERATORS: Readonly<Partial<Record<TokenType, AST.BinaryOperator>>> = Object.freeze({
  [TokenType.PlusEq]: "+",
  [TokenType.MinusEq]: "-",
  [TokenType.StarEq]: "*",
  [TokenType.SlashEq]: "/",
});

const TYPE_NAMES: Readonly<Partial<Record<TokenType, PrimitiveName>>> = Object.freeze({
  [TokenType.Inteiro]: "inteiro",
  [TokenType.Real]: "real",
  [TokenType.Texto]: "texto",
  [TokenType.Logico]: "logico",
  [TokenType.Vazio]: "vazio",
});

type PrefixParseFn = () => AST.Expression | null;
type InfixParseFn = (left: AST.Expression) => AST.Expression | null;

/**
 * Pratt parser over a materialized token array.
 *
 * Statement parsers start with `curToken` on the statement's first token and
 * leave it on the statement's last one. A parse function that fails records
 * one diagnostic and returns null; the enclosing statement then becomes an
 * `Error` node and the parser resynchronizes.
 */
export class Parser {
  private tokens: Token[];
  private position: number = 0;
  private diagnostics: DiagnosticBag;
  private errorIndex: number = 0; // token the last diagnostic points at

  private prefixParseFns: Partial<Record<TokenType, PrefixParseFn>> = {};
  private infixParseFns: Partial<Record<TokenType, InfixParseFn>> = {};

  constructor(tokens: Token[], diagnostics: DiagnosticBag = new DiagnosticBag()) {
    this.tokens = tokens.length > 0 && tokens[tokens.length - 1].type === TokenType.EOF
      ? tokens
      : [...tokens, this.eofAfter(tokens)];
    this.diagnostics = diagnostics;

    this.registerPrefix(TokenType.Identifier, this.parseIdentifier.bind(this));
    this.registerPrefix(TokenType.Integer, this.parseNumberLiteral.bind(this));
    this.registerPrefix(TokenType.Float, this.parseNumberLiteral.bind(this));
    this.registerPrefix(TokenType.String, this.parseStringLiteral.bind(this));
    this.registerPrefix(TokenType.Verdadeiro, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.Falso, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.Minus, this.parsePrefixExpression.bind(this));
    this.registerPrefix(TokenType.Nao, this.parsePrefixExpression.bind(this));
    this.registerPrefix(TokenType.LPharen, this.parseGroupedExpression.bind(this));

    this.registerInfix(TokenType.Plus, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Minus, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Star, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Slash, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Percent, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.StarStar, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.EqEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.NotEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.LT, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.LtEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.GT, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.GtEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.E, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Ou, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Equals, this.parseAssignment.bind(this));
    this.registerInfix(TokenType.PlusEq, this.parseAssignment.bind(this));
    this.registerInfix(TokenType.MinusEq, this.parseAssignment.bind(this));
    this.registerInfix(TokenType.StarEq, this.parseAssignment.bind(this));
    this.registerInfix(TokenType.SlashEq, this.parseAssignment.bind(this));
    this.registerInfix(TokenType.LPharen, this.parseCallExpression.bind(this));
  }

  private get curToken(): Token {
    return this.tokens[this.position];
  }

  private get peekToken(): Token {
    return this.tokens[Math.min(this.position + 1, this.tokens.length - 1)];
  }

  private nextToken() {
    if (this.position < this.tokens.length - 1) {
      this.position++;
    }
  }

  public parseProgram(): AST.Program {
    const first = this.curToken;
    const program: AST.Program = { kind: "Program", body: [], line: first.line, column: first.column };

    while (!this.curTokenIs(TokenType.EOF)) {
      program.body.push(this.parseDeclaration());
      this.nextToken();
    }
    return program;
  }

  private parseDeclaration(): AST.Statement {
    const start = this.position;
    const startToken = this.curToken;
    const before = this.diagnostics.size;

    const stmt = this.parseStatement();
    if (stmt !== null) {
      return stmt;
    }

    if (this.diagnostics.size === before) {
      this.errorAt("statement", this.position);
    }
    const diagnostic = this.diagnostics.all()[this.diagnostics.size - 1];
    this.synchronize(start);
    return { kind: "Error", message: diagnostic.message, line: startToken.line, column: startToken.column };
  }

  private parseStatement(): AST.Statement | null {
    switch (this.curToken.type) {
      case TokenType.Funcao:
        return this.parseFunctionDeclaration();
      case TokenType.Var:
        return this.parseVarDeclaration();
      case TokenType.Const:
        return this.parseConstDeclaration();
      case TokenType.Se:
        return this.parseIfStatement();
      case TokenType.Enquanto:
        return this.parseWhileStatement();
      case TokenType.Para:
        return this.parseForStatement();
      case TokenType.Escreva:
        return this.parsePrintStatement();
      case TokenType.Leia:
        return this.parseReadStatement();
      case TokenType.Retorna:
        return this.parseReturnStatement();
      case TokenType.LBrace:
        return this.parseBlockStatement();
      default:
        return this.parseExpressionStatement();
    }
  }

  /**
   * Discards tokens from the one that caused the error. A `{` takes its whole
   * balanced region with it. Stops after `;`, or before a statement keyword,
   * a `}` or EOF. Always moves past the statement's first token.
   */
  private synchronize(start: number) {
    let i = Math.max(this.errorIndex, start);
    let resume = i;
    for (;;) {
      const tok = this.tokens[i];
      if (tok.type === TokenType.EOF) {
        resume = i;
        break;
      }
      if (tok.type === TokenType.LBrace) {
        i = this.skipBalanced(i);
        continue;
      }
      if (tok.type === TokenType.Semi) {
        resume = i + 1;
        break;
      }
      if (tok.type === TokenType.RBrace || (StatementKeywords.has(tok.type) && i > start)) {
        resume = i;
        break;
      }
      i++;
    }
    if (resume <= start) {
      resume = start + 1;
    }
    // the caller's loop advances onto `resume`
    this.position = Math.min(resume, this.tokens.length - 1) - 1;
  }

  /** Index just past the `}` matching the `{` at `open`, or the EOF index. */
  private skipBalanced(open: number): number {
    let depth = 0;
    for (let i = open; i < this.tokens.length; i++) {
      const type = this.tokens[i].type;
      if (type === TokenType.EOF) return i;
      if (type === TokenType.LBrace) depth++;
      if (type === TokenType.RBrace) {
        depth--;
        if (depth === 0) return i + 1;
      }
    }
    return this.tokens.length - 1;
  }

  private parseFunctionDeclaration(): AST.FunctionDecl | null {
    const token = this.curToken; // 'funcao'
    if (!this.expectPeek(TokenType.Identifier)) return null;
    const name = this.curToken.literal;
    if (!this.expectPeek(TokenType.LPharen)) return null;

    const params: AST.Param[] = [];
    if (this.peekTokenIs(TokenType.RPharen)) {
      this.nextToken();
    } else {
      for (;;) {
        if (!this.expectPeek(TokenType.Identifier)) return null;
        const paramToken = this.curToken;
        if (!this.expectPeek(TokenType.Colon)) return null;
        const typeName = this.parseTypeName();
        if (typeName === null) return null;
        params.push({ name: paramToken.literal, typeName, line: paramToken.line, column: paramToken.column });
        if (this.peekTokenIs(TokenType.Comma)) {
          this.nextToken();
          continue;
        }
        if (!this.expectPeek(TokenType.RPharen)) return null;
        break;
      }
    }

    let returnType: PrimitiveName | null = null;
    if (this.peekTokenIs(TokenType.Colon)) {
      this.nextToken();
      returnType = this.parseTypeName();
      if (returnType === null) return null;
    }

    if (!this.expectPeek(TokenType.LBrace)) return null;
    const body = this.parseBlockStatement();
    if (body === null) return null;

    return { kind: "FunctionDecl", name, params, returnType, body, line: token.line, column: token.column };
  }

  /** Advances onto a type name. */
  private parseTypeName(): PrimitiveName | null {
    const name = TYPE_NAMES[this.peekToken.type];
    if (name === undefined) {
      this.errorAt("type name", this.position + 1);
      return null;
    }
    this.nextToken();
    return name;
  }

  private parseVarDeclaration(): AST.VarDecl | null {
    const token = this.curToken; // 'var'
    if (!this.expectPeek(TokenType.Identifier)) return null;
    const name = this.curToken.literal;

    let declaredType: PrimitiveName | null = null;
    if (this.peekTokenIs(TokenType.Colon)) {
      this.nextToken();
      declaredType = this.parseTypeName();
      if (declaredType === null) return null;
    }

    let init: AST.Expression | null = null;
    if (this.peekTokenIs(TokenType.Equals)) {
      this.nextToken();
      this.nextToken();
      init = this.parseExpression(Precedence.LOWEST);
      if (init === null) return null;
    } else if (declaredType === null) {
      this.errorAt("':' or '='", this.position + 1);
      return null;
    }

    this.skipOptionalSemicolon();
    return { kind: "VarDecl", name, declaredType, init, line: token.line, column: token.column };
  }

  private parseConstDeclaration(): AST.ConstDecl | null {
    const token = this.curToken; // 'const'
    if (!this.expectPeek(TokenType.Identifier)) return null;
    const name = this.curToken.literal;

    let declaredType: PrimitiveName | null = null;
    if (this.peekTokenIs(TokenType.Colon)) {
      this.nextToken();
      declaredType = this.parseTypeName();
      if (declaredType === null) return null;
    }

    if (!this.expectPeek(TokenType.Equals)) return null;
    this.nextToken();
    const init = this.parseExpression(Precedence.LOWEST);
    if (init === null) return null;

    this.skipOptionalSemicolon();
    return { kind: "ConstDecl", name, declaredType, init, line: token.line, column: token.column };
  }

  // Also entered on 'senaose', which reads exactly like 'se'.
  private parseIfStatement(): AST.If | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.LPharen)) return null;
    this.nextToken();
    const condition = this.parseExpression(Precedence.LOWEST);
    if (condition === null) return null;
    if (!this.expectPeek(TokenType.RPharen)) return null;
    if (!this.expectPeek(TokenType.LBrace)) return null;
    const consequence = this.parseBlockStatement();
    if (consequence === null) return null;

    let alternative: AST.Block | AST.If | null = null;
    if (this.peekTokenIs(TokenType.Senao)) {
      this.nextToken();
      if (this.peekTokenIs(TokenType.Se)) {
        this.nextToken();
        alternative = this.parseIfStatement();
      } else {
        if (!this.expectPeek(TokenType.LBrace)) return null;
        alternative = this.parseBlockStatement();
      }
      if (alternative === null) return null;
    } else if (this.peekTokenIs(TokenType.SenaoSe)) {
      this.nextToken();
      alternative = this.parseIfStatement();
      if (alternative === null) return null;
    }

    return { kind: "If", condition, consequence, alternative, line: token.line, column: token.column };
  }

  private parseWhileStatement(): AST.While | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.LPharen)) return null;
    this.nextToken();
    const condition = this.parseExpression(Precedence.LOWEST);
    if (condition === null) return null;
    if (!this.expectPeek(TokenType.RPharen)) return null;
    if (!this.expectPeek(TokenType.LBrace)) return null;
    const body = this.parseBlockStatement();
    if (body === null) return null;
    return { kind: "While", condition, body, line: token.line, column: token.column };
  }

  private parseForStatement(): AST.ForRange | null {
    const token = this.curToken; // 'para'
    if (!this.expectPeek(TokenType.Identifier)) return null;
    const variable = this.curToken.literal;
    if (!this.expectPeek(TokenType.De)) return null;
    this.nextToken();
    const start = this.parseExpression(Precedence.LOWEST);
    if (start === null) return null;
    if (!this.expectPeek(TokenType.Ate)) return null;
    this.nextToken();
    const end = this.parseExpression(Precedence.LOWEST);
    if (end === null) return null;

    let step: AST.Expression | null = null;
    if (this.peekTokenIs(TokenType.Passo)) {
      this.nextToken();
      this.nextToken();
      step = this.parseExpression(Precedence.LOWEST);
      if (step === null) return null;
    }

    if (!this.expectPeek(TokenType.LBrace)) return null;
    const body = this.parseBlockStatement();
    if (body === null) return null;
    return { kind: "ForRange", variable, start, end, step, body, line: token.line, column: token.column };
  }

  private parsePrintStatement(): AST.Print | null {
    const token = this.curToken; // 'escreva'
    if (!this.expectPeek(TokenType.LPharen)) return null;
    const args = this.parseExpressionList();
    if (args === null) return null;
    this.skipOptionalSemicolon();
    return { kind: "Print", args, line: token.line, column: token.column };
  }

  private parseReadStatement(): AST.Read | null {
    const token = this.curToken; // 'leia'
    if (!this.expectPeek(TokenType.LPharen)) return null;

    let prompt: string | null = null;
    if (this.peekTokenIs(TokenType.String)) {
      this.nextToken();
      prompt = typeof this.curToken.value === "string" ? this.curToken.value : "";
      if (!this.expectPeek(TokenType.Comma)) return null;
    }

    if (!this.expectPeek(TokenType.Identifier)) return null;
    const target = this.parseIdentifier();
    if (!this.expectPeek(TokenType.RPharen)) return null;
    this.skipOptionalSemicolon();
    return { kind: "Read", prompt, target, line: token.line, column: token.column };
  }

  private parseReturnStatement(): AST.Return | null {
    const token = this.curToken; // 'retorna'
    let value: AST.Expression | null = null;
    if (!this.peekTokenIs(TokenType.Semi) && !this.peekTokenIs(TokenType.RBrace) && !this.peekTokenIs(TokenType.EOF)) {
      this.nextToken();
      value = this.parseExpression(Precedence.LOWEST);
      if (value === null) return null;
    }
    this.skipOptionalSemicolon();
    return { kind: "Return", value, line: token.line, column: token.column };
  }

  private parseExpressionStatement(): AST.Expression | null {
    const expression = this.parseExpression(Precedence.LOWEST);
    if (expression === null) return null;
    this.skipOptionalSemicolon();
    return expression;
  }

  /** Starts on `{`, ends on the matching `}`. */
  private parseBlockStatement(): AST.Block | null {
    const open = this.curToken;
    const body: AST.Statement[] = [];
    this.nextToken();

    while (!this.curTokenIs(TokenType.RBrace)) {
      if (this.curTokenIs(TokenType.EOF)) {
        this.errorAt(describeTokenType(TokenType.RBrace), this.position);
        return null;
      }
      body.push(this.parseDeclaration());
      this.nextToken();
    }
    return { kind: "Block", body, line: open.line, column: open.column };
  }

  private parseExpression(precedence: number): AST.Expression | null {
    const prefix = this.prefixParseFns[this.curToken.type];
    if (!prefix) {
      this.errorAt("expression", this.position);
      return null;
    }

    let leftExp = prefix();

    while (leftExp !== null && !this.peekTokenIs(TokenType.Semi) && precedence < this.peekPrecedence()) {
      const infix = this.infixParseFns[this.peekToken.type];
      if (!infix) {
        return leftExp;
      }
      this.nextToken();
      leftExp = infix(leftExp);
    }

    return leftExp;
  }

  private parseIdentifier(): AST.Identifier {
    const tok = this.curToken;
    return { kind: "Identifier", name: tok.literal, line: tok.line, column: tok.column };
  }

  private parseNumberLiteral(): AST.Expression {
    const tok = this.curToken;
    const value = typeof tok.value === "number" ? tok.value : Number(tok.literal);
    const valueType = tok.type === TokenType.Float ? "real" : "inteiro";
    return { kind: "Literal", valueType, value, raw: tok.literal, line: tok.line, column: tok.column };
  }

  private parseStringLiteral(): AST.Expression {
    const tok = this.curToken;
    const value = typeof tok.value === "string" ? tok.value : "";
    return { kind: "Literal", valueType: "texto", value, raw: tok.literal, line: tok.line, column: tok.column };
  }

  private parseBoolean(): AST.Expression {
    const tok = this.curToken;
    const value = this.curTokenIs(TokenType.Verdadeiro);
    return { kind: "Literal", valueType: "logico", value, raw: tok.literal, line: tok.line, column: tok.column };
  }

  private parsePrefixExpression(): AST.Expression | null {
    const token = this.curToken;
    const operator: AST.UnaryOperator = token.type === TokenType.Nao ? "nao" : "-";
    this.nextToken();
    const operand = this.parseExpression(Precedence.PREFIX);
    if (operand === null) return null;
    return { kind: "Unary", operator, operand, line: token.line, column: token.column };
  }

  private parseInfixExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    const operator = BINARY_OPERATORS[token.type];
    if (operator === undefined) {
      this.errorAt("operator", this.position);
      return null;
    }
    const precedence = this.curPrecedence();
    this.nextToken();
    // ** is right-associative
    const right = this.parseExpression(operator === "**" ? precedence - 1 : precedence);
    if (right === null) return null;
    return { kind: "Binary", operator, left, right, line: token.line, column: token.column };
  }

  private parseAssignment(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    if (left.kind !== "Identifier") {
      this.errorAt("identifier", this.position, `invalid assignment target: expected identifier before '${token.literal}'`);
      return null;
    }
    this.nextToken();
    // right-associative: a = b = c
    const right = this.parseExpression(Precedence.ASSIGN - 1);
    if (right === null) return null;

    const compound = COMPOUND_OPERATORS[token.type];
    const value: AST.Expression = compound === undefined
      ? right
      : { kind: "Binary", operator: compound, left: { ...left }, right, line: token.line, column: token.column };
    return { kind: "Assignment", target: left, value, line: left.line, column: left.column };
  }

  private parseGroupedExpression(): AST.Expression | null {
    this.nextToken();
    const exp = this.parseExpression(Precedence.LOWEST);
    if (exp === null) return null;
    if (!this.expectPeek(TokenType.RPharen)) {
      return null;
    }
    return exp;
  }

  private parseCallExpression(callee: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    if (callee.kind !== "Identifier") {
      this.errorAt("identifier", this.position, "only a named function can be called");
      return null;
    }
    const args = this.parseExpressionList();
    if (args === null) return null;
    return { kind: "Call", callee, args, line: token.line, column: token.column };
  }

  /** Starts on `(`, ends on `)`. */
  private parseExpressionList(): AST.Expression[] | null {
    const list: AST.Expression[] = [];

    if (this.peekTokenIs(TokenType.RPharen)) {
      this.nextToken();
      return list;
    }

    this.nextToken();
    const first = this.parseExpression(Precedence.LOWEST);
    if (first === null) return null;
    list.push(first);

    while (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      this.nextToken();
      const next = this.parseExpression(Precedence.LOWEST);
      if (next === null) return null;
      list.push(next);
    }

    if (!this.expectPeek(TokenType.RPharen)) {
      return null;
    }

    return list;
  }

  private skipOptionalSemicolon() {
    if (this.peekTokenIs(TokenType.Semi)) {
      this.nextToken();
    }
  }

  private registerPrefix(tokenType: TokenType, fn: PrefixParseFn) {
    this.prefixParseFns[tokenType] = fn;
  }

  private registerInfix(tokenType: TokenType, fn: InfixParseFn) {
    this.infixParseFns[tokenType] = fn;
  }

  private curTokenIs(t: TokenType): boolean {
    return this.curToken.type === t;
  }

  private peekTokenIs(t: TokenType): boolean {
    return this.peekToken.type === t;
  }

  private expectPeek(t: TokenType): boolean {
    if (this.peekTokenIs(t)) {
      this.nextToken();
      return true;
    } else {
      this.errorAt(describeTokenType(t), this.position + 1);
      return false;
    }
  }

  private peekPrecedence(): number {
    return PRECEDENCES[this.peekToken.type] ?? Precedence.LOWEST;
  }

  private curPrecedence(): number {
    return PRECEDENCES[this.curToken.type] ?? Precedence.LOWEST;
  }

  private errorAt(expected: string, index: number, message?: string) {
    const at = Math.min(index, this.tokens.length - 1);
    const tok = this.tokens[at];
    this.errorIndex = at;
    this.diagnostics.syntax(expected, describeToken(tok), tok.line, tok.column, message);
  }

  private eofAfter(tokens: Token[]): Token {
    const last = tokens[tokens.length - 1];
    return last
      ? { type: TokenType.EOF, literal: "", line: last.line, column: last.column + last.literal.length }
      : { type: TokenType.EOF, literal: "", line: 1, column: 1 };
  }
}
