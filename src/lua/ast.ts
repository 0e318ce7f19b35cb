/**
 * Lua syntax tree
 *
 * @module lua/ast
 */

export type BinaryOp =
  | '+' | '-' | '*' | '/' | '%' | '^' | '//'
  | '..'
  | '==' | '~=' | '<' | '<=' | '>' | '>='
  | 'and' | 'or';

export type UnaryOp = '-' | 'not' | '#';

interface Located {
  line: number;
}

export interface FunctionBody extends Located {
  params: string[];
  isVararg: boolean;
  body: Block;
  /** Name for tracebacks, e.g. `p.main` */
  name: string;
  chunk: string;
}

export type Expr =
  | ({ type: 'nil' } & Located)
  | ({ type: 'true' } & Located)
  | ({ type: 'false' } & Located)
  | ({ type: 'number'; value: number } & Located)
  | ({ type: 'string'; value: string } & Located)
  | ({ type: 'vararg' } & Located)
  | ({ type: 'function'; func: FunctionBody } & Located)
  | ({ type: 'table'; fields: TableField[] } & Located)
  | ({ type: 'binary'; op: BinaryOp; left: Expr; right: Expr } & Located)
  | ({ type: 'unary'; op: UnaryOp; operand: Expr } & Located)
  | ({ type: 'name'; name: string } & Located)
  | ({ type: 'index'; object: Expr; key: Expr } & Located)
  | ({ type: 'call'; callee: Expr; args: Expr[] } & Located)
  | ({ type: 'method'; object: Expr; method: string; args: Expr[] } & Located)
  | ({ type: 'paren'; expr: Expr } & Located);

export type CallExpr = Extract<Expr, { type: 'call' | 'method' }>;
export type AssignTarget = Extract<Expr, { type: 'name' | 'index' }>;

export type TableField =
  | { kind: 'item'; value: Expr }
  | { kind: 'keyed'; key: Expr; value: Expr };

export interface IfClause {
  cond: Expr;
  body: Block;
}

export type Stat =
  | ({ type: 'local'; names: string[]; values: Expr[] } & Located)
  | ({ type: 'localFunction'; name: string; func: FunctionBody } & Located)
  | ({ type: 'assign'; targets: AssignTarget[]; values: Expr[] } & Located)
  | ({ type: 'call'; call: CallExpr } & Located)
  | ({ type: 'do'; body: Block } & Located)
  | ({ type: 'while'; cond: Expr; body: Block } & Located)
  | ({ type: 'repeat'; body: Block; cond: Expr } & Located)
  | ({ type: 'if'; clauses: IfClause[]; orelse: Block | null } & Located)
  | ({ type: 'numericFor'; variable: string; start: Expr; limit: Expr; step: Expr | null; body: Block } & Located)
  | ({ type: 'genericFor'; names: string[]; exprs: Expr[]; body: Block } & Located)
  | ({ type: 'return'; values: Expr[] } & Located)
  | ({ type: 'break' } & Located);

export type Block = Stat[];

/** A parsed chunk: the body of an implicit vararg function */
export interface Chunk {
  name: string;
  main: FunctionBody;
}
