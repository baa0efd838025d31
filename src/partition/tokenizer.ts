/**
 * Recursive-descent tokenizer for Proposal Oracle responses.
 *
 * A response is expected to hold one list literal, `[a, b, c]` or
 * `{a, b, c}`, possibly wrapped in a markdown code fence and surrounded by
 * prose. Elements are split at top-level commas; nested `()`, `[]`, `{}`
 * groups and double-quoted strings stay inside their element.
 *
 * @packageDocumentation
 */

import { MalformedPartitionError } from './types.js';

const CLOSER_OF: ReadonlyMap<string, string> = new Map([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
]);

const CLOSERS: ReadonlySet<string> = new Set([')', ']', '}']);

const CODE_FENCE = /^[ \t]*```[^\n]*$/gm;
const IDENTIFIER_CHAR = /[A-Za-z0-9$]/;
const SPACED_HEAD = /(?:^|[^A-Za-z0-9$])(?:[A-Z][A-Za-z0-9$]*|exp|log|ln|sqrt)[ \t]+$/;
const QUOTED = /^"((?:[^"\\]|\\.)*)"$/;

class ProposalTokenizer {
  private pos: number;

  constructor(
    private readonly text: string,
    start: number,
    private readonly proposal: string
  ) {
    this.pos = start;
  }

  /** list := open (element (',' element)*)? close */
  parseList(): string[] {
    const open = this.text.charAt(this.pos);
    const close = CLOSER_OF.get(open);
    if (close === undefined) {
      throw this.error('NO_LIST_LITERAL', `Expected a list literal at offset ${String(this.pos)}`);
    }
    this.pos++;
    this.skipWhitespace();

    const elements: string[] = [];
    if (this.peek() === close) {
      this.pos++;
      return elements;
    }

    for (;;) {
      const element = this.parseElement(close);
      if (element === '') {
        throw this.error('EMPTY_ELEMENT', `Empty element at position ${String(elements.length + 1)}`);
      }
      elements.push(element);

      const next = this.peek();
      this.pos++;
      if (next === close) {
        return elements;
      }
      if (next !== ',') {
        throw this.error('UNBALANCED_DELIMITERS', `List opened with '${open}' is never closed`);
      }
    }
  }

  /** element := (group | string | char)*, up to a top-level ',' or the closer */
  private parseElement(close: string): string {
    const start = this.pos;
    while (this.pos < this.text.length) {
      const ch = this.peek();
      if (ch === ',' || ch === close) {
        break;
      }
      if (CLOSER_OF.has(ch)) {
        this.parseGroup();
      } else if (ch === '"') {
        this.parseString();
      } else if (CLOSERS.has(ch)) {
        throw this.error('UNBALANCED_DELIMITERS', `Unexpected '${ch}' at offset ${String(this.pos)}`);
      } else {
        this.pos++;
      }
    }
    return unquote(this.text.slice(start, this.pos).trim());
  }

  /** group := open (group | string | char)* matching-close */
  private parseGroup(): void {
    const open = this.peek();
    const close = CLOSER_OF.get(open);
    this.pos++;
    while (this.pos < this.text.length) {
      const ch = this.peek();
      if (ch === close) {
        this.pos++;
        return;
      }
      if (CLOSER_OF.has(ch)) {
        this.parseGroup();
      } else if (ch === '"') {
        this.parseString();
      } else if (CLOSERS.has(ch)) {
        throw this.error('UNBALANCED_DELIMITERS', `Unexpected '${ch}' at offset ${String(this.pos)}`);
      } else {
        this.pos++;
      }
    }
    throw this.error('UNBALANCED_DELIMITERS', `Group opened with '${open}' is never closed`);
  }

  private parseString(): void {
    this.pos++;
    while (this.pos < this.text.length) {
      const ch = this.peek();
      this.pos += ch === '\\' ? 2 : 1;
      if (ch === '"') {
        return;
      }
    }
    throw this.error('UNBALANCED_DELIMITERS', 'Unterminated string literal');
  }

  /** True once nothing but whitespace is left. */
  consumedAll(): boolean {
    return this.text.slice(this.pos).trim() === '';
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.peek())) {
      this.pos++;
    }
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private error(code: MalformedPartitionError['code'], message: string): MalformedPartitionError {
    return new MalformedPartitionError(code, message, this.proposal);
  }
}

function unquote(element: string): string {
  const match = QUOTED.exec(element);
  return match?.[1] !== undefined ? match[1].trim() : element;
}

/**
 * Whether the `[` at `i` opens a function head's arguments: it follows an
 * identifier directly, or follows a capitalised head such as `Log` after
 * spaces on the same line.
 */
function isHeadBracket(text: string, i: number): boolean {
  if (i > 0 && IDENTIFIER_CHAR.test(text.charAt(i - 1))) {
    return true;
  }
  return SPACED_HEAD.test(text.slice(0, i));
}

/**
 * Finds where the list literal starts: the first `[` that is not a function
 * head's bracket, otherwise the first `{`.
 */
function findListStart(text: string): number {
  for (let i = 0; i < text.length; i++) {
    if (text.charAt(i) === '[' && !isHeadBracket(text, i)) {
      return i;
    }
  }
  return text.indexOf('{');
}

/**
 * Extracts the elements of the list literal in a Proposal Oracle response.
 *
 * A list whose only element is itself a bracketed list is unwrapped, so
 * `[[0, h, Infinity]]` yields the same elements as `[0, h, Infinity]`.
 * Surrounding double quotes on an element are removed.
 *
 * @param text - Raw response text.
 * @returns The trimmed elements, possibly none for `[]`.
 * @throws MalformedPartitionError with code `EMPTY_PROPOSAL`,
 * `NO_LIST_LITERAL`, `UNBALANCED_DELIMITERS` or `EMPTY_ELEMENT`.
 *
 * @example
 * ```typescript
 * parseProposalList('Breakpoints:\n[0, h, h*m, Infinity]');
 * // ['0', 'h', 'h*m', 'Infinity']
 * ```
 */
export function parseProposalList(text: string): string[] {
  const body = text.replace(CODE_FENCE, '').trim();
  if (body === '') {
    throw new MalformedPartitionError('EMPTY_PROPOSAL', 'Proposal is empty', text);
  }

  const start = findListStart(body);
  if (start < 0) {
    throw new MalformedPartitionError('NO_LIST_LITERAL', 'Proposal contains no list literal', text);
  }

  let elements = new ProposalTokenizer(body, start, text).parseList();

  for (;;) {
    const [only] = elements;
    if (elements.length !== 1 || only === undefined || !only.startsWith('[')) {
      return elements;
    }
    const inner = new ProposalTokenizer(only, 0, text);
    const unwrapped = inner.parseList();
    if (!inner.consumedAll()) {
      return elements;
    }
    elements = unwrapped;
  }
}
