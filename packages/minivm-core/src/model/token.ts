export interface Span {
  offset: number;
  line: number;
  column: number;
}

export type Keyword = 'let' | 'if' | 'else' | 'while' | 'print';

export type Operator = '+' | '-' | '*' | '/' | '=' | '==' | '<' | '>';

export type Punct = '(' | ')' | ';';

export type Token =
  | { kind: 'number', value: bigint, span: Span }
  | { kind: 'ident', name: string, span: Span }
  | { kind: 'keyword', keyword: Keyword, span: Span }
  | { kind: 'op', op: Operator, span: Span }
  | { kind: 'punct', punct: Punct, span: Span };

export const KEYWORDS: ReadonlySet<string> = new Set<Keyword>(['let', 'if', 'else', 'while', 'print']);

export function isKeyword(text: string): text is Keyword {
  return KEYWORDS.has(text);
}

export function describeToken(tok: Token | null): string {
  if (tok === null) return 'end of input';
  switch (tok.kind) {
    case 'number': return `number ${tok.value}`;
    case 'ident': return `identifier '${tok.name}'`;
    case 'keyword': return `'${tok.keyword}'`;
    case 'op': return `'${tok.op}'`;
    case 'punct': return `'${tok.punct}'`;
    default: {
      const _: never = tok;
      return 'unknown token';
    }
  }
}
