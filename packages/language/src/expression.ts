export interface LetBinding {
  name: string;
  tag: string | null;
  value: Expression;
}

export type Expression =
  | { tag: 'Boolean'; value: boolean }
  | { tag: 'Int'; value: bigint }
  | { tag: 'String'; raw: string }
  | { tag: 'Nothing' }
  | { tag: 'Name'; name: string }
  | { tag: 'TaggedName'; name: string; type: string }
  | { tag: 'HostFunction'; name: string }
  | { tag: 'Let'; decls: LetBinding[]; body: Expression }
  | { tag: 'Conditional'; cond: Expression; then: Expression; otherwise: Expression }
  | {
      tag: 'Lambda';
      param: string;
      input: string | null;
      output: string | null;
      body: Expression;
    }
  | { tag: 'Application'; expressions: Expression[] }
  | { tag: 'Tuple'; elements: Expression[] }
  | { tag: 'List'; elements: Expression[] }
  | { tag: 'Set'; elements: Expression[] }
  | { tag: 'Record'; fields: ReadonlyMap<string, Expression> };

export const Expression = {
  Boolean: (value: boolean): Expression => ({ tag: 'Boolean', value }),
  Int: (value: bigint): Expression => ({ tag: 'Int', value }),
  String: (raw: string): Expression => ({ tag: 'String', raw }),
  Nothing: (): Expression => ({ tag: 'Nothing' }),
  Name: (name: string): Expression => ({ tag: 'Name', name }),
  TaggedName: (name: string, type: string): Expression => ({ tag: 'TaggedName', name, type }),
  HostFunction: (name: string): Expression => ({ tag: 'HostFunction', name }),
  Let: (decls: LetBinding[], body: Expression): Expression => ({ tag: 'Let', decls, body }),
  Conditional: (cond: Expression, then: Expression, otherwise: Expression): Expression => ({
    tag: 'Conditional',
    cond,
    then,
    otherwise,
  }),
  Lambda: (
    param: string,
    input: string | null,
    output: string | null,
    body: Expression,
  ): Expression => ({ tag: 'Lambda', param, input, output, body }),
  Application: (expressions: Expression[]): Expression => ({ tag: 'Application', expressions }),
  Tuple: (elements: Expression[]): Expression => ({ tag: 'Tuple', elements }),
  List: (elements: Expression[]): Expression => ({ tag: 'List', elements }),
  Set: (elements: Expression[]): Expression => ({ tag: 'Set', elements }),
  Record: (fields: ReadonlyMap<string, Expression>): Expression => ({ tag: 'Record', fields }),
};
