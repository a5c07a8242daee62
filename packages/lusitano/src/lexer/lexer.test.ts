import { describe, it, expect } from "vitest";
import { Lexer } from "./lexer";
import { TokenType } from "../token";
import { DiagnosticBag } from "../diagnostics";

function scan(input: string) {
  const diagnostics = new DiagnosticBag();
  const tokens = new Lexer(input, diagnostics).tokenize();
  return { tokens, diagnostics: diagnostics.all() };
}

describe("Lexer", () => {
  it("should tokenize basic symbols", () => {
    const input = "=+(){},;:";
    const lexer = new Lexer(input);

    const tests = [
      { type: TokenType.Equals, literal: "=" },
      { type: TokenType.Plus, literal: "+" },
      { type: TokenType.LPharen, literal: "(" },
      { type: TokenType.RPharen, literal: ")" },
      { type: TokenType.LBrace, literal: "{" },
      { type: TokenType.RBrace, literal: "}" },
      { type: TokenType.Comma, literal: "," },
      { type: TokenType.Semi, literal: ";" },
      { type: TokenType.Colon, literal: ":" },
      { type: TokenType.EOF, literal: "" },
    ];

    tests.forEach((tt) => {
      const tok = lexer.nextToken();
      expect(tok.type).toBe(tt.type);
      expect(tok.literal).toBe(tt.literal);
    });
  });

  it("should tokenize one- and two-character operators", () => {
    const { tokens, diagnostics } = scan("+= -= *= /= ** * == != <= >= < > % - /");
    expect(diagnostics).toEqual([]);
    expect(tokens.map(t => t.type)).toEqual([
      TokenType.PlusEq,
      TokenType.MinusEq,
      TokenType.StarEq,
      TokenType.SlashEq,
      TokenType.StarStar,
      TokenType.Star,
      TokenType.EqEq,
      TokenType.NotEq,
      TokenType.LtEq,
      TokenType.GtEq,
      TokenType.LT,
      TokenType.GT,
      TokenType.Percent,
      TokenType.Minus,
      TokenType.Slash,
      TokenType.EOF,
    ]);
  });

  it("should tell keywords from identifiers", () => {
    const { tokens } = scan("funcao fatorial senaose senao se xse verdadeiro falso e ou nao inteiro");
    expect(tokens.map(t => t.type)).toEqual([
      TokenType.Funcao,
      TokenType.Identifier,
      TokenType.SenaoSe,
      TokenType.Senao,
      TokenType.Se,
      TokenType.Identifier,
      TokenType.Verdadeiro,
      TokenType.Falso,
      TokenType.E,
      TokenType.Ou,
      TokenType.Nao,
      TokenType.Inteiro,
      TokenType.EOF,
    ]);
    expect(tokens[1].literal).toBe("fatorial");
  });

  it("should keep keyword matching case-sensitive", () => {
    const { tokens } = scan("Se SE se");
    expect(tokens.map(t => t.type)).toEqual([TokenType.Identifier, TokenType.Identifier, TokenType.Se, TokenType.EOF]);
  });

  it("should accept unicode letters in identifiers", () => {
    const { tokens, diagnostics } = scan("ação _x1 número2");
    expect(diagnostics).toEqual([]);
    expect(tokens.map(t => [t.type, t.literal])).toEqual([
      [TokenType.Identifier, "ação"],
      [TokenType.Identifier, "_x1"],
      [TokenType.Identifier, "número2"],
      [TokenType.EOF, ""],
    ]);
    // columns count characters
    expect(tokens[1].column).toBe(6);
  });

  it("should scan integer and real numbers", () => {
    const { tokens, diagnostics } = scan("123 3.14 1e10 2.5e-3 007");
    expect(diagnostics).toEqual([]);
    expect(tokens.map(t => [t.type, t.literal, t.value])).toEqual([
      [TokenType.Integer, "123", 123],
      [TokenType.Float, "3.14", 3.14],
      [TokenType.Float, "1e10", 1e10],
      [TokenType.Float, "2.5e-3", 0.0025],
      [TokenType.Integer, "007", 7],
      [TokenType.EOF, "", undefined],
    ]);
  });

  it("should only treat e as an exponent when digits follow", () => {
    const { tokens } = scan("5ex 5e+ 1");
    expect(tokens.map(t => [t.type, t.literal])).toEqual([
      [TokenType.Integer, "5"],
      [TokenType.Identifier, "ex"],
      [TokenType.Integer, "5"],
      [TokenType.E, "e"],
      [TokenType.Plus, "+"],
      [TokenType.Integer, "1"],
      [TokenType.EOF, ""],
    ]);
  });

  it("should decode string escapes and keep the raw lexeme", () => {
    const { tokens, diagnostics } = scan(`"a\\nb\\t\\"c\\"" 'it\\'s' "\\q"`);
    expect(diagnostics).toEqual([]);
    expect(tokens[0]).toMatchObject({ type: TokenType.String, literal: `"a\\nb\\t\\"c\\""`, value: 'a\nb\t"c"' });
    expect(tokens[1]).toMatchObject({ type: TokenType.String, literal: `'it\\'s'`, value: "it's" });
    // unknown escapes stay as written
    expect(tokens[2].value).toBe("\\q");
  });

  it("should report an unterminated string and keep the partial text", () => {
    const { tokens, diagnostics } = scan('var s = "abc\nescreva(s)');
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      phase: "lexical",
      severity: "fatal",
      code: "UnterminatedStringError",
      line: 1,
      column: 9,
    });
    expect(tokens[3]).toMatchObject({ type: TokenType.String, literal: '"abc', value: "abc" });
    expect(tokens[4]).toMatchObject({ type: TokenType.Escreva, line: 2, column: 1 });
  });

  it("should skip line and block comments", () => {
    const { tokens, diagnostics } = scan("// nada\nx /* varias\nlinhas */ y");
    expect(diagnostics).toEqual([]);
    expect(tokens.map(t => [t.literal, t.line, t.column])).toEqual([
      ["x", 2, 1],
      ["y", 3, 11],
      ["", 3, 12],
    ]);
  });

  it("should report an unterminated block comment", () => {
    const { tokens, diagnostics } = scan("x /* sem fim");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ code: "UnterminatedCommentError", line: 1, column: 3 });
    expect(tokens.map(t => t.type)).toEqual([TokenType.Identifier, TokenType.EOF]);
  });

  it("should suggest nao or != for a lone bang", () => {
    const { tokens, diagnostics } = scan("nao !x");
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("UnrecognizedCharacterError");
    expect(diagnostics[0].message).toBe("unexpected character '!'; did you mean 'nao' or '!='?");
    expect(diagnostics[0].column).toBe(5);
    expect(tokens.map(t => t.type)).toEqual([TokenType.Nao, TokenType.Identifier, TokenType.EOF]);
  });

  it("should record unrecognized characters and keep scanning", () => {
    const { tokens, diagnostics } = scan("x @ y # z");
    expect(diagnostics.map(d => [d.message, d.line, d.column])).toEqual([
      ["unrecognized character '@' (code 64)", 1, 3],
      ["unrecognized character '#' (code 35)", 1, 7],
    ]);
    expect(tokens.map(t => t.literal)).toEqual(["x", "y", "z", ""]);
  });

  it("should track lines and columns", () => {
    const { tokens } = scan("var x\n  escreva(x)");
    expect(tokens[2]).toMatchObject({ type: TokenType.Escreva, line: 2, column: 3 });
    expect(tokens[3]).toMatchObject({ type: TokenType.LPharen, line: 2, column: 10 });
  });
});
