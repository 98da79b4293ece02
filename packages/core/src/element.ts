import { handsum, type Handsum } from 'handsum';

export interface LetDecl {
  name: string;
  tag: string | null;
  value: Element;
}

interface TElement {
  Boolean(value: boolean): Element;
  Int(value: bigint): Element;
  /** Raw string literal body, escapes not yet resolved. */
  String(raw: string): Element;
  Nothing(): Element;
  Name(name: string): Element;
  TaggedName(name: string, tag: string): Element;
  HostFunction(name: string): Element;
  Let(decls: LetDecl[], body: Element): Element;
  Grouping(elements: Element[]): Element;
  Conditional(cond: Element, then: Element, otherwise: Element): Element;
  Lambda(param: string, input: string | null, output: string | null, body: Element): Element;
  Tuple(elements: Element[]): Element;
  List(elements: Element[]): Element;
  Set(elements: Element[]): Element;
  Record(fields: ReadonlyMap<string, Element>): Element;
  Forward(): Element;
}

interface IElement {}

export type Element = Handsum<TElement, IElement>;
export const Element = handsum<TElement, IElement>({});
