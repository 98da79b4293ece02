import { Element, type LetDecl } from '@wander/core';
import { ParseError } from './error.js';
import { tokenText, type Token } from './token.js';

type Production<T> = () => T | null;

/** How many upcoming tokens a parse error quotes. */
const CONTEXT_TOKENS = 8;

/**
 * Recursive descent with backtracking. Every production either returns its
 * result or returns `null`; `attempt` rewinds the cursor whenever a production
 * gives up, so a failed alternative never consumes input.
 */
export class Parser {
  private pos = 0;

  constructor(private tokens: readonly Token[]) {}

  private current(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isAtEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  /** Consume the current token when `check` accepts it. */
  private eat(check: (tok: Token) => boolean): boolean {
    const tok = this.current();
    if (tok !== undefined && check(tok)) {
      this.pos++;
      return true;
    }
    return false;
  }

  private eatName(): string | null {
    const tok = this.current();
    if (tok?.name) {
      this.pos++;
      return tok.name[0];
    }
    return null;
  }

  private attempt<T>(production: Production<T>): T | null {
    const saved = this.pos;
    const result = production();
    if (result === null) {
      this.pos = saved;
    }
    return result;
  }

  private first(productions: Production<Element>[]): Element | null {
    for (const production of productions) {
      const result = this.attempt(production);
      if (result !== null) return result;
    }
    return null;
  }

  private remaining(): string {
    const upcoming = this.tokens.slice(this.pos, this.pos + CONTEXT_TOKENS).map(tokenText);
    const more = this.tokens.length - this.pos > CONTEXT_TOKENS ? ' ...' : '';
    return `\`${upcoming.join(' ')}${more}\``;
  }

  // ── Script ─────────────────────────────────────────────────────

  parseScript(): Element {
    const items = this.sequence();
    if (!this.isAtEnd()) {
      throw new ParseError(`no production matched at ${this.remaining()}`);
    }
    return Element.Grouping(items);
  }

  /** Juxtaposed terms and `>>` markers, left flat for the translator. */
  private sequence(): Element[] {
    const items: Element[] = [];
    for (;;) {
      if (this.eat((t) => !!t.forward)) {
        items.push(Element.Forward());
        continue;
      }
      const term = this.attempt(() => this.term());
      if (term === null) return items;
      items.push(term);
    }
  }

  private element(): Element | null {
    const items = this.sequence();
    return items.length === 0 ? null : Element.Grouping(items);
  }

  private terms(): Element[] {
    const items: Element[] = [];
    for (let term = this.attempt(() => this.term()); term !== null; term = this.attempt(() => this.term())) {
      items.push(term);
    }
    return items;
  }

  // Bracketed forms come before bare names so `'(`, `#(` and `(a: 1)` are
  // never read as a name followed by a grouping.
  private term(): Element | null {
    return this.first([
      () => this.tuple(),
      () => this.set(),
      () => this.record(),
      () => this.parenRecord(),
      () => this.taggedName(),
      () => this.name(),
      () => this.boolean(),
      () => this.nothing(),
      () => this.int(),
      () => this.string(),
      () => this.letScope(),
      () => this.group(),
      () => this.conditional(),
      () => this.lambda(),
      () => this.list(),
    ]);
  }

  // ── Literals and names ─────────────────────────────────────────

  private boolean(): Element | null {
    const tok = this.current();
    if (!tok?.boolean) return null;
    this.pos++;
    return Element.Boolean(tok.boolean[0]);
  }

  private int(): Element | null {
    const tok = this.current();
    if (!tok?.int) return null;
    this.pos++;
    return Element.Int(tok.int[0]);
  }

  private string(): Element | null {
    const tok = this.current();
    if (!tok?.string) return null;
    this.pos++;
    return Element.String(tok.string[0]);
  }

  private nothing(): Element | null {
    return this.eat((t) => !!(t.nothing || t.questionMark)) ? Element.Nothing() : null;
  }

  private name(): Element | null {
    const name = this.eatName();
    return name === null ? null : Element.Name(name);
  }

  private taggedName(): Element | null {
    const name = this.eatName();
    if (name === null || !this.eat((t) => !!t.colon)) return null;
    const tag = this.eatName();
    return tag === null ? null : Element.TaggedName(name, tag);
  }

  // ── Collections ────────────────────────────────────────────────

  private list(): Element | null {
    if (!this.eat((t) => !!t.openSquare)) return null;
    const items = this.terms();
    return this.eat((t) => !!t.closeSquare) ? Element.List(items) : null;
  }

  private tuple(): Element | null {
    if (!this.eat((t) => !!t.singleQuote) || !this.eat((t) => !!t.openParen)) return null;
    const items = this.terms();
    return this.eat((t) => !!t.closeParen) ? Element.Tuple(items) : null;
  }

  private set(): Element | null {
    if (!this.eat((t) => !!t.hash) || !this.eat((t) => !!t.openParen)) return null;
    const items = this.terms();
    return this.eat((t) => !!t.closeParen) ? Element.Set(items) : null;
  }

  private recordFields(): [string, Element][] {
    const fields: [string, Element][] = [];
    for (;;) {
      const field = this.attempt((): [string, Element] | null => {
        const name = this.eatName();
        if (name === null || !this.eat((t) => !!t.colon)) return null;
        const value = this.attempt(() => this.term());
        return value === null ? null : [name, value];
      });
      if (field === null) return fields;
      fields.push(field);
    }
  }

  private record(): Element | null {
    if (!this.eat((t) => !!t.openBrace)) return null;
    const fields = this.recordFields();
    return this.eat((t) => !!t.closeBrace) ? Element.Record(new Map(fields)) : null;
  }

  private parenRecord(): Element | null {
    if (!this.eat((t) => !!t.openParen)) return null;
    const fields = this.recordFields();
    if (fields.length === 0) return null;
    return this.eat((t) => !!t.closeParen) ? Element.Record(new Map(fields)) : null;
  }

  private group(): Element | null {
    if (!this.eat((t) => !!t.openParen)) return null;
    const items = this.sequence();
    return this.eat((t) => !!t.closeParen) ? Element.Grouping(items) : null;
  }

  // ── Let / conditional / lambda ─────────────────────────────────

  private valDecl(): LetDecl | null {
    if (!this.eat((t) => !!t.val)) return null;
    const name = this.eatName();
    if (name === null) return null;
    let tag: string | null = null;
    if (this.eat((t) => !!t.colon)) {
      tag = this.eatName();
      if (tag === null) return null;
    }
    if (!this.eat((t) => !!t.equalSign)) return null;
    const value = this.element();
    return value === null ? null : { name, tag, value };
  }

  private letScope(): Element | null {
    if (!this.eat((t) => !!t.let)) return null;
    const decls: LetDecl[] = [];
    for (let decl = this.attempt(() => this.valDecl()); decl !== null; decl = this.attempt(() => this.valDecl())) {
      decls.push(decl);
    }
    if (!this.eat((t) => !!t.in)) {
      // `let val x = 1` on its own is accepted with an empty body.
      return Element.Let(decls, Element.Nothing());
    }
    const body = this.element() ?? Element.Nothing();
    return this.eat((t) => !!t.end) ? Element.Let(decls, body) : null;
  }

  private conditional(): Element | null {
    if (!this.eat((t) => !!t.if)) return null;
    const cond = this.element();
    if (cond === null || !this.eat((t) => !!t.then)) return null;
    const then = this.element();
    if (then === null || !this.eat((t) => !!t.else)) return null;
    const otherwise = this.element();
    if (otherwise === null || !this.eat((t) => !!t.end)) return null;
    return Element.Conditional(cond, then, otherwise);
  }

  private lambda(): Element | null {
    if (!this.eat((t) => !!t.lambda)) return null;
    const params: { name: string; tag: string | null }[] = [];
    for (let name = this.eatName(); name !== null; name = this.eatName()) {
      let tag: string | null = null;
      if (this.eat((t) => !!t.colon)) {
        tag = this.eatName();
        if (tag === null) return null;
      }
      params.push({ name, tag });
    }
    if (params.length === 0 || !this.eat((t) => !!t.arrow)) return null;
    const body = this.element();
    if (body === null) return null;
    // `\x y -> b` is `\x -> \y -> b`.
    return params.reduceRight<Element>(
      (inner, param) => Element.Lambda(param.name, param.tag, null, inner),
      body,
    );
  }
}

export function parse(tokens: readonly Token[]): Element {
  return new Parser(tokens).parseScript();
}
