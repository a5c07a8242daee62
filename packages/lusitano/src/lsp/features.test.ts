import { describe, it, expect } from 'vitest';
import { CompletionItemKind, DiagnosticSeverity, MarkupKind } from 'vscode-languageserver';
import { compile } from '../compiler';
import { completionItems, findNameAt, hoverAt, toLspDiagnostics } from './features';

describe('toLspDiagnostics', () => {
  it('should convert positions to 0-based ranges over the offending word', () => {
    const text = 'escreva(valor)';
    const result = toLspDiagnostics(compile(text).diagnostics, text);
    expect(result).toEqual([
      {
        severity: DiagnosticSeverity.Error,
        range: { start: { line: 0, character: 8 }, end: { line: 0, character: 13 } },
        message: "'valor' is not declared",
        code: 'UndeclaredIdentifierError',
        source: 'lusitano-semantic',
      },
    ]);
  });

  it('should map warnings and keep one-character ranges for symbols', () => {
    const text = 'funcao f(): inteiro { }\nse (1 > 0 {\n}';
    const { diagnostics, warnings } = compile(text);
    const result = toLspDiagnostics([...diagnostics, ...warnings], text);
    expect(result.map(d => [d.severity, d.source, d.range.start, d.range.end])).toEqual([
      [DiagnosticSeverity.Error, 'lusitano-syntax', { line: 1, character: 10 }, { line: 1, character: 11 }],
      [DiagnosticSeverity.Warning, 'lusitano-semantic', { line: 0, character: 0 }, { line: 0, character: 6 }],
    ]);
  });
});

describe('completionItems', () => {
  it('should offer keywords, type names and built-in functions', () => {
    const items = completionItems();
    expect(items).toContainEqual({ label: 'enquanto', kind: CompletionItemKind.Keyword });
    expect(items).toContainEqual({ label: 'inteiro', kind: CompletionItemKind.TypeParameter });
    expect(items).toContainEqual({
      label: 'raiz',
      kind: CompletionItemKind.Function,
      detail: 'raiz(inteiro): real | raiz(real): real',
    });
  });
});

describe('hoverAt', () => {
  const source = [
    'funcao soma(a: inteiro, b: inteiro): inteiro { retorna a + b }',
    'const LIMITE: inteiro = 10',
    'var total = soma(1, LIMITE)',
    'escreva(total, raiz(4))',
  ].join('\n');
  const { program } = compile(source);

  it('should describe variables and constants', () => {
    expect(hoverAt(program, 3, 10)).toEqual({
      contents: { kind: MarkupKind.Markdown, value: '```lusitano\nvar total: inteiro\n```' },
      range: { start: { line: 3, character: 8 }, end: { line: 3, character: 13 } },
    });
    expect(hoverAt(program, 2, 20)?.contents).toEqual({
      kind: MarkupKind.Markdown,
      value: '```lusitano\nconst LIMITE: inteiro\n```',
    });
  });

  it('should describe functions and their overloads', () => {
    expect(hoverAt(program, 2, 12)?.contents).toEqual({
      kind: MarkupKind.Markdown,
      value: '```lusitano\nfuncao soma(inteiro, inteiro): inteiro\n```',
    });
    expect(hoverAt(program, 3, 15)?.contents).toEqual({
      kind: MarkupKind.Markdown,
      value: '```lusitano\nfuncao raiz(inteiro): real\nfuncao raiz(real): real\n```',
    });
  });

  it('should describe parameters at their declaration', () => {
    expect(hoverAt(program, 0, 12)?.contents).toEqual({
      kind: MarkupKind.Markdown,
      value: '```lusitano\nparametro a: inteiro\n```',
    });
  });

  it('should return null away from names', () => {
    expect(hoverAt(program, 0, 0)).toBeNull();
    expect(hoverAt(program, 9, 0)).toBeNull();
  });
});

describe('findNameAt', () => {
  it('should find the innermost identifier', () => {
    const { program } = compile('var x = 1\nescreva(x + 2)');
    expect(findNameAt(program, 2, 9)).toMatchObject({ name: 'x', line: 2, column: 9 });
    expect(findNameAt(program, 2, 10)).toBeNull();
  });
});
