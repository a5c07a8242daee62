export enum TokenType {
  // Keywords
  Funcao = "FUNCAO",
  Retorna = "RETORNA",
  Var = "VAR",
  Const = "CONST",
  Se = "SE",
  Senao = "SENAO",
  SenaoSe = "SENAOSE",
  Enquanto = "ENQUANTO",
  Para = "PARA",
  De = "DE",
  Ate = "ATE",
  Passo = "PASSO",
  Escreva = "ESCREVA",
  Leia = "LEIA",
  E = "E",
  Ou = "OU",
  Nao = "NAO",
  Verdadeiro = "VERDADEIRO",
  Falso = "FALSO",

  // Type names
  Inteiro = "INTEIRO",
  Real = "REAL",
  Texto = "TEXTO",
  Logico = "LOGICO",
  Vazio = "VAZIO",

  // Literals
  Identifier = "IDENTIFIER",
  Integer = "INTEGER",
  Float = "FLOAT",
  String = "STRING",

  // Symbols
  LPharen = "LPHAREN", // (
  RPharen = "RPHAREN", // )
  LBrace = "LBRACE",   // {
  RBrace = "RBRACE",   // }
  Comma = "COMMA",     // ,
  Semi = "SEMI",       // ;
  Colon = "COLON",     // :
  Equals = "EQUALS",   // =
  PlusEq = "PLUSEQ",   // +=
  MinusEq = "MINUSEQ", // -=
  StarEq = "STAREQ",   // *=
  SlashEq = "SLASHEQ", // /=
  Plus = "PLUS",       // +
  Minus = "MINUS",     // -
  Star = "STAR",       // *
  StarStar = "STARSTAR", // **
  Slash = "SLASH",     // /
  Percent = "PERCENT", // %
  EqEq = "EQEQ",       // ==
  NotEq = "NOTEQ",     // !=
  LT = "LT",           // <
  GT = "GT",           // >
  LtEq = "LTEQ",       // <=
  GtEq = "GTEQ",       // >=

  EOF = "EOF",
}

export interface Token {
  type: TokenType;
  literal: string;
  /** Decoded value: the number of a numeric literal, the unescaped text of a string literal. */
  value?: number | string;
  line: number;
  column: number;
}

export const Keywords: Readonly<Record<string, TokenType>> = Object.freeze({
  funcao: TokenType.Funcao,
  retorna: TokenType.Retorna,
  var: TokenType.Var,
  const: TokenType.Const,
  se: TokenType.Se,
  senao: TokenType.Senao,
  senaose: TokenType.SenaoSe,
  enquanto: TokenType.Enquanto,
  para: TokenType.Para,
  de: TokenType.De,
  ate: TokenType.Ate,
  passo: TokenType.Passo,
  escreva: TokenType.Escreva,
  leia: TokenType.Leia,
  e: TokenType.E,
  ou: TokenType.Ou,
  nao: TokenType.Nao,
  verdadeiro: TokenType.Verdadeiro,
  falso: TokenType.Falso,
  inteiro: TokenType.Inteiro,
  real: TokenType.Real,
  texto: TokenType.Texto,
  logico: TokenType.Logico,
  vazio: TokenType.Vazio,
});

export function lookupIdent(ident: string): TokenType {
  return Object.prototype.hasOwnProperty.call(Keywords, ident) ? Keywords[ident] : TokenType.Identifier;
}

/** Tokens that can open a statement; the parser resynchronizes on them. */
export const StatementKeywords: ReadonlySet<TokenType> = new Set([
  TokenType.Funcao,
  TokenType.Var,
  TokenType.Const,
  TokenType.Se,
  TokenType.Enquanto,
  TokenType.Para,
  TokenType.Escreva,
  TokenType.Leia,
  TokenType.Retorna,
]);

/** How a token is named in syntax error messages. */
export function describeToken(tok: Token): string {
  switch (tok.type) {
    case TokenType.EOF:
      return "end of file";
    case TokenType.Identifier:
      return `identifier '${tok.literal}'`;
    case TokenType.Integer:
    case TokenType.Float:
      return `number ${tok.literal}`;
    case TokenType.String:
      return `string ${tok.literal}`;
    default:
      return `'${tok.literal}'`;
  }
}

const TOKEN_SPELLING: Partial<Record<TokenType, string>> = {
  [TokenType.LPharen]: "'('",
  [TokenType.RPharen]: "')'",
  [TokenType.LBrace]: "'{'",
  [TokenType.RBrace]: "'}'",
  [TokenType.Comma]: "','",
  [TokenType.Colon]: "':'",
  [TokenType.Equals]: "'='",
  [TokenType.Identifier]: "identifier",
  [TokenType.String]: "string",
  [TokenType.De]: "'de'",
  [TokenType.Ate]: "'ate'",
  [TokenType.EOF]: "end of file",
};

/** How an expected token type is named in syntax error messages. */
export function describeTokenType(type: TokenType): string {
  return TOKEN_SPELLING[type] ?? `'${type.toLowerCase()}'`;
}
