import type { PrimitiveName, Type } from "../analysis/types";
import type { Symbol } from "../analysis/symbol_table";
import { InternalCompilerError } from "../errors";

interface NodeBase {
  line: number;
  column: number;
  /** Filled in by the analyzer. */
  type?: Type;
}

export interface Program extends NodeBase {
  kind: "Program";
  body: Statement[];
}

export interface Param {
  name: string;
  typeName: PrimitiveName;
  line: number;
  column: number;
  symbol?: Symbol;
}

/** Names a function assigns to that belong to an outer frame, by emitted name. */
export interface OuterWrites {
  global: string[];
  nonlocal: string[];
}

export interface FunctionDecl extends NodeBase {
  kind: "FunctionDecl";
  name: string;
  params: Param[];
  returnType: PrimitiveName | null;
  body: Block;
  symbol?: Symbol;
  outerWrites?: OuterWrites;
}

export interface VarDecl extends NodeBase {
  kind: "VarDecl";
  name: string;
  declaredType: PrimitiveName | null;
  init: Expression | null;
  symbol?: Symbol;
}

export interface ConstDecl extends NodeBase {
  kind: "ConstDecl";
  name: string;
  declaredType: PrimitiveName | null;
  init: Expression;
  symbol?: Symbol;
}

export interface Block extends NodeBase {
  kind: "Block";
  body: Statement[];
}

export interface If extends NodeBase {
  kind: "If";
  condition: Expression;
  consequence: Block;
  alternative: Block | If | null;
}

export interface While extends NodeBase {
  kind: "While";
  condition: Expression;
  body: Block;
}

export interface ForRange extends NodeBase {
  kind: "ForRange";
  variable: string;
  start: Expression;
  end: Expression;
  step: Expression | null;
  body: Block;
  symbol?: Symbol;
  /** Name the step is bound to before the loop when its sign is not known statically. */
  stepTemp?: Symbol;
}

export interface Return extends NodeBase {
  kind: "Return";
  value: Expression | null;
}

export interface Print extends NodeBase {
  kind: "Print";
  args: Expression[];
}

export interface Read extends NodeBase {
  kind: "Read";
  prompt: string | null;
  target: Identifier;
}

/** Placeholder for a statement the parser could not make sense of. */
export interface ErrorNode extends NodeBase {
  kind: "Error";
  message: string;
}

export interface Assignment extends NodeBase {
  kind: "Assignment";
  target: Identifier;
  value: Expression;
}

export type BinaryOperator =
  | "+" | "-" | "*" | "/" | "%" | "**"
  | "==" | "!=" | "<" | "<=" | ">" | ">="
  | "e" | "ou";

export interface Binary extends NodeBase {
  kind: "Binary";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export type UnaryOperator = "-" | "nao";

export interface Unary extends NodeBase {
  kind: "Unary";
  operator: UnaryOperator;
  operand: Expression;
}

export interface Call extends NodeBase {
  kind: "Call";
  callee: Identifier;
  args: Expression[];
}

export type Literal = NodeBase & { kind: "Literal"; raw: string } & (
  | { valueType: "inteiro" | "real"; value: number }
  | { valueType: "texto"; value: string }
  | { valueType: "logico"; value: boolean }
);

export interface Identifier extends NodeBase {
  kind: "Identifier";
  name: string;
  symbol?: Symbol;
}

export type Expression = Assignment | Binary | Unary | Call | Literal | Identifier;

export type Statement =
  | FunctionDecl
  | VarDecl
  | ConstDecl
  | Block
  | If
  | While
  | ForRange
  | Return
  | Print
  | Read
  | ErrorNode
  | Expression;

export type Node = Program | Statement;

/** Direct children in source order. */
export function children(node: Node): Node[] {
  switch (node.kind) {
    case "Program":
    case "Block":
      return node.body;
    case "FunctionDecl":
      return [node.body];
    case "VarDecl":
      return node.init ? [node.init] : [];
    case "ConstDecl":
      return [node.init];
    case "If":
      return node.alternative
        ? [node.condition, node.consequence, node.alternative]
        : [node.condition, node.consequence];
    case "While":
      return [node.condition, node.body];
    case "ForRange":
      return node.step
        ? [node.start, node.end, node.step, node.body]
        : [node.start, node.end, node.body];
    case "Return":
      return node.value ? [node.value] : [];
    case "Print":
      return node.args;
    case "Read":
      return [node.target];
    case "Assignment":
      return [node.target, node.value];
    case "Binary":
      return [node.left, node.right];
    case "Unary":
      return [node.operand];
    case "Call":
      return [node.callee, ...node.args];
    case "Literal":
    case "Identifier":
    case "Error":
      return [];
    default:
      return unreachable(node);
  }
}

/** 1 or -1 for a non-zero integer literal (optionally negated), 0 when unknown. */
export function literalSign(expr: Expression): number {
  if (expr.kind === "Literal" && expr.valueType === "inteiro") {
    return Math.sign(expr.value);
  }
  if (expr.kind === "Unary" && expr.operator === "-") {
    return -literalSign(expr.operand);
  }
  return 0;
}

export function unreachable(node: never): never {
  throw new InternalCompilerError(`unhandled node ${JSON.stringify(node)}`);
}
