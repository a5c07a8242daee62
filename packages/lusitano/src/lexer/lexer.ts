import { TokenType, lookupIdent } from "../token";
import type { Token } from "../token";
import { DiagnosticBag } from "../diagnostics";

const ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  '"': '"',
  "'": "'",
});

export class Lexer {
  private input: string[]; // code points, so columns count characters rather than UTF-16 units
  private position: number = 0; // current position in input (points to current char)
  private readPosition: number = 0; // current reading position in input (after current char)
  private ch: string | null = null; // current char under examination
  private line: number = 1;
  private column: number = 0;
  private diagnostics: DiagnosticBag;

  constructor(input: string, diagnostics: DiagnosticBag = new DiagnosticBag()) {
    this.input = Array.from(input);
    this.diagnostics = diagnostics;
    this.readChar();
  }

  /** Scans the whole input. The last token is always EOF. */
  public tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const tok = this.nextToken();
      tokens.push(tok);
      if (tok.type === TokenType.EOF) return tokens;
    }
  }

  public nextToken(): Token {
    for (;;) {
      this.skipWhitespace();

      const line = this.line;
      const col = this.column;

      if (this.ch === null) {
        return { type: TokenType.EOF, literal: "", line, column: col };
      }

      switch (this.ch) {
        case "=":
          return this.oneOrTwo("=", TokenType.EqEq, TokenType.Equals, line, col);
        case "!":
          if (this.peekChar() === "=") {
            return this.oneOrTwo("=", TokenType.NotEq, TokenType.NotEq, line, col);
          }
          this.diagnostics.lexical(
            "UnrecognizedCharacterError",
            "unexpected character '!'; did you mean 'nao' or '!='?",
            line,
            col,
          );
          this.readChar();
          continue;
        case "<":
          return this.oneOrTwo("=", TokenType.LtEq, TokenType.LT, line, col);
        case ">":
          return this.oneOrTwo("=", TokenType.GtEq, TokenType.GT, line, col);
        case "+":
          return this.oneOrTwo("=", TokenType.PlusEq, TokenType.Plus, line, col);
        case "-":
          return this.oneOrTwo("=", TokenType.MinusEq, TokenType.Minus, line, col);
        case "*":
          if (this.peekChar() === "*") {
            return this.oneOrTwo("*", TokenType.StarStar, TokenType.Star, line, col);
          }
          return this.oneOrTwo("=", TokenType.StarEq, TokenType.Star, line, col);
        case "/":
          if (this.peekChar() === "/") {
            this.skipLineComment();
            continue;
          }
          if (this.peekChar() === "*") {
            this.skipBlockComment(line, col);
            continue;
          }
          return this.oneOrTwo("=", TokenType.SlashEq, TokenType.Slash, line, col);
        case "%":
          return this.single(TokenType.Percent, line, col);
        case ";":
          return this.single(TokenType.Semi, line, col);
        case ":":
          return this.single(TokenType.Colon, line, col);
        case ",":
          return this.single(TokenType.Comma, line, col);
        case "(":
          return this.single(TokenType.LPharen, line, col);
        case ")":
          return this.single(TokenType.RPharen, line, col);
        case "{":
          return this.single(TokenType.LBrace, line, col);
        case "}":
          return this.single(TokenType.RBrace, line, col);
        case '"':
        case "'":
          return this.readString(this.ch, line, col);
        default:
          if (this.isLetter(this.ch)) {
            const literal = this.readIdentifier();
            return { type: lookupIdent(literal), literal, line, column: col };
          }
          if (this.isDigit(this.ch)) {
            return this.readNumber(line, col);
          }
          this.diagnostics.lexical(
            "UnrecognizedCharacterError",
            `unrecognized character '${this.ch}' (code ${this.ch.codePointAt(0)})`,
            line,
            col,
          );
          this.readChar();
      }
    }
  }

  private single(type: TokenType, line: number, column: number): Token {
    const literal = this.ch ?? "";
    this.readChar();
    return { type, literal, line, column };
  }

  private oneOrTwo(next: string, twoType: TokenType, oneType: TokenType, line: number, column: number): Token {
    const first = this.ch ?? "";
    if (this.peekChar() === next) {
      this.readChar();
      this.readChar();
      return { type: twoType, literal: first + next, line, column };
    }
    this.readChar();
    return { type: oneType, literal: first, line, column };
  }

  private readChar() {
    if (this.ch === "\n") {
      this.line += 1;
      this.column = 0;
    }
    if (this.readPosition >= this.input.length) {
      this.ch = null;
    } else {
      this.ch = this.input[this.readPosition];
    }
    this.position = this.readPosition;
    this.readPosition += 1;
    this.column += 1;
  }

  private peekChar(offset: number = 0): string | null {
    const index = this.readPosition + offset;
    return index < this.input.length ? this.input[index] : null;
  }

  private readIdentifier(): string {
    const position = this.position;
    while (this.ch !== null && (this.isLetter(this.ch) || this.isDigit(this.ch))) {
      this.readChar();
    }
    return this.input.slice(position, this.position).join("");
  }

  private readNumber(line: number, column: number): Token {
    const position = this.position;
    let isReal = false;
    while (this.ch !== null && this.isDigit(this.ch)) {
      this.readChar();
    }
    // Fractional part: '.' must be followed by a digit
    const afterDot = this.peekChar();
    if (this.ch === "." && afterDot !== null && this.isDigit(afterDot)) {
      isReal = true;
      this.readChar();
      while (this.ch !== null && this.isDigit(this.ch)) {
        this.readChar();
      }
    }
    if ((this.ch === "e" || this.ch === "E") && this.exponentFollows()) {
      isReal = true;
      this.readChar(); // e
      if (this.ch === "+" || this.ch === "-") this.readChar();
      while (this.ch !== null && this.isDigit(this.ch)) {
        this.readChar();
      }
    }
    const literal = this.input.slice(position, this.position).join("");
    return {
      type: isReal ? TokenType.Float : TokenType.Integer,
      literal,
      value: Number(literal),
      line,
      column,
    };
  }

  private exponentFollows(): boolean {
    const next = this.peekChar();
    if (next !== null && this.isDigit(next)) return true;
    if (next === "+" || next === "-") {
      const digit = this.peekChar(1);
      return digit !== null && this.isDigit(digit);
    }
    return false;
  }

  private readString(quote: string, line: number, column: number): Token {
    const position = this.position;
    let value = "";
    this.readChar(); // opening quote
    for (;;) {
      if (this.ch === null || this.ch === "\n") {
        const where = this.ch === null ? "end of file" : "end of line";
        this.diagnostics.lexical("UnterminatedStringError", `unterminated string: reached ${where}`, line, column);
        break;
      }
      if (this.ch === quote) {
        this.readChar();
        break;
      }
      if (this.ch === "\\") {
        this.readChar();
        const escaped: string | null = this.ch;
        if (escaped === null || escaped === "\n") {
          continue;
        }
        value += ESCAPES[escaped] ?? "\\" + escaped;
        this.readChar();
        continue;
      }
      value += this.ch;
      this.readChar();
    }
    const literal = this.input.slice(position, this.position).join("");
    return { type: TokenType.String, literal, value, line, column };
  }

  private skipLineComment() {
    while (this.ch !== null && this.ch !== "\n") {
      this.readChar();
    }
  }

  private skipBlockComment(line: number, column: number) {
    this.readChar(); // '/'
    this.readChar(); // '*'
    while (this.ch !== null) {
      if (this.ch === "*" && this.peekChar() === "/") {
        this.readChar();
        this.readChar();
        return;
      }
      this.readChar();
    }
    this.diagnostics.lexical("UnterminatedCommentError", `block comment opened at line ${line} is never closed`, line, column);
  }

  private skipWhitespace() {
    while (this.ch === " " || this.ch === "\t" || this.ch === "\n" || this.ch === "\r") {
      this.readChar();
    }
  }

  private isLetter(ch: string): boolean {
    return ch === "_" || /\p{L}/u.test(ch);
  }

  private isDigit(ch: string): boolean {
    return "0" <= ch && ch <= "9";
  }
}
