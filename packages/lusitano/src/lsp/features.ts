import {
  CompletionItem,
  CompletionItemKind,
  Diagnostic as LspDiagnostic,
  DiagnosticSeverity,
  Hover,
  MarkupKind,
} from 'vscode-languageserver';
import type { Diagnostic } from '../diagnostics';
import { Keywords } from '../token';
import { BUILTINS } from '../analysis/builtins';
import type { Symbol } from '../analysis/symbol_table';
import { signatureToString, typeToString } from '../analysis/types';
import * as AST from '../ast/ast';

const TYPE_NAMES: ReadonlySet<string> = new Set(['inteiro', 'real', 'texto', 'logico', 'vazio']);

/** Length of the word starting at a 1-based position, at least 1 so the range is never empty. */
function wordLength(text: string, line: number, column: number): number {
  const source = text.split('\n')[line - 1] ?? '';
  const match = /^[\p{L}\d_]+/u.exec(Array.from(source).slice(column - 1).join(''));
  return match ? Array.from(match[0]).length : 1;
}

/** Compiler positions are 1-based; LSP ranges are 0-based. */
export function toLspDiagnostics(diagnostics: readonly Diagnostic[], text: string): LspDiagnostic[] {
  return diagnostics.map(d => {
    const line = Math.max(0, d.line - 1);
    const character = Math.max(0, d.column - 1);
    return {
      severity: d.severity === 'warning' ? DiagnosticSeverity.Warning : DiagnosticSeverity.Error,
      range: {
        start: { line, character },
        end: { line, character: character + wordLength(text, d.line, d.column) },
      },
      message: d.message,
      code: d.code,
      source: `lusitano-${d.phase}`,
    };
  });
}

export function completionItems(): CompletionItem[] {
  const keywords: CompletionItem[] = Object.keys(Keywords).map(word => ({
    label: word,
    kind: TYPE_NAMES.has(word) ? CompletionItemKind.TypeParameter : CompletionItemKind.Keyword,
  }));
  const builtins: CompletionItem[] = BUILTINS.map(b => ({
    label: b.name,
    kind: CompletionItemKind.Function,
    detail: b.signatures.map(s => `${b.name}${signatureToString(s)}`).join(' | '),
  }));
  return [...keywords, ...builtins];
}

interface Named {
  name: string;
  line: number;
  column: number;
  symbol?: Symbol;
}

function covers(named: Named, line: number, column: number): boolean {
  return named.line === line && column >= named.column && column < named.column + Array.from(named.name).length;
}

/** Innermost identifier or parameter under a 1-based position. */
export function findNameAt(node: AST.Node, line: number, column: number): Named | null {
  if (node.kind === 'Identifier') {
    return covers(node, line, column) ? node : null;
  }
  if (node.kind === 'FunctionDecl') {
    const param = node.params.find(p => covers(p, line, column));
    if (param) return param;
  }
  for (const child of AST.children(node)) {
    const found = findNameAt(child, line, column);
    if (found) return found;
  }
  return null;
}

export function describeSymbol(symbol: Symbol): string {
  if (symbol.type.kind === 'function') {
    return symbol.type.signatures.map(s => `funcao ${symbol.name}${signatureToString(s)}`).join('\n');
  }
  const label = symbol.category === 'constant' ? 'const' : symbol.category === 'parameter' ? 'parametro' : 'var';
  return `${label} ${symbol.name}: ${typeToString(symbol.type)}`;
}

/** Hover for a 0-based LSP position over an analyzed program. */
export function hoverAt(program: AST.Program, line: number, character: number): Hover | null {
  const named = findNameAt(program, line + 1, character + 1);
  if (!named || !named.symbol) return null;
  return {
    contents: {
      kind: MarkupKind.Markdown,
      value: ['```lusitano', describeSymbol(named.symbol), '```'].join('\n'),
    },
    range: {
      start: { line, character: named.column - 1 },
      end: { line, character: named.column - 1 + Array.from(named.name).length },
    },
  };
}
