// Node constructors for the expression IR

import type { IR as IRTypes } from '../types.js';

/**
 * 表达式种类的封闭集合，与 `IR.Expression` 联合类型保持一致。
 */
export const EXPRESSION_KINDS: readonly IRTypes.ExpressionKind[] = [
  'Variable',
  'Constant',
  'GlobalReference',
  'Primitive',
  'Tuple',
  'Function',
  'Call',
  'Let',
  'Conditional',
  'TupleProjection',
];

export const IR = {
  // Expressions
  Var: (nameHint: string, typeAnnotation: IRTypes.Type | null = null): IRTypes.Variable => ({
    kind: 'Variable',
    nameHint,
    typeAnnotation,
  }),
  Constant: (data: unknown): IRTypes.Constant => ({ kind: 'Constant', data }),
  GlobalRef: (name: string): IRTypes.GlobalReference => ({ kind: 'GlobalReference', name }),
  Op: (name: string): IRTypes.Primitive => ({ kind: 'Primitive', name }),
  Tuple: (fields: readonly IRTypes.Expression[]): IRTypes.Tuple => ({ kind: 'Tuple', fields }),
  Function: (
    params: readonly IRTypes.Variable[],
    body: IRTypes.Expression,
    retType: IRTypes.Type | null = null,
    typeParams: readonly IRTypes.TypeVar[] = [],
    attrs: IRTypes.Attrs = null
  ): IRTypes.Function => ({
    kind: 'Function',
    typeParams,
    params,
    retType,
    body,
    attrs,
  }),
  Call: (
    op: IRTypes.Expression,
    args: readonly IRTypes.Expression[],
    attrs: IRTypes.Attrs = null,
    typeArgs: readonly IRTypes.Type[] = []
  ): IRTypes.Call => ({
    kind: 'Call',
    op,
    args,
    typeArgs,
    attrs,
  }),
  Let: (
    variable: IRTypes.Variable,
    value: IRTypes.Expression,
    body: IRTypes.Expression
  ): IRTypes.Let => ({ kind: 'Let', variable, value, body }),
  If: (
    cond: IRTypes.Expression,
    trueBranch: IRTypes.Expression,
    falseBranch: IRTypes.Expression
  ): IRTypes.Conditional => ({ kind: 'Conditional', cond, trueBranch, falseBranch }),
  TupleGetItem: (tuple: IRTypes.Expression, index: number): IRTypes.TupleProjection => ({
    kind: 'TupleProjection',
    tuple,
    index,
  }),

  // Types
  TypeVar: (name: string): IRTypes.TypeVar => ({ kind: 'TypeVar', name }),
  TypeName: (name: string): IRTypes.TypeName => ({ kind: 'TypeName', name }),
  TypeApp: (base: string, args: readonly IRTypes.Type[]): IRTypes.TypeApp => ({
    kind: 'TypeApp',
    base,
    args,
  }),
  FuncType: (
    params: readonly IRTypes.Type[],
    ret: IRTypes.Type,
    typeParams: readonly IRTypes.TypeVar[] = []
  ): IRTypes.FuncType => ({ kind: 'FuncType', typeParams, params, ret }),
  TupleType: (fields: readonly IRTypes.Type[]): IRTypes.TupleType => ({ kind: 'TupleType', fields }),

  // Guards
  isVariable: (node: IRTypes.Node): node is IRTypes.Variable => node.kind === 'Variable',
  isTypeVar: (node: IRTypes.Node): node is IRTypes.TypeVar => node.kind === 'TypeVar',
};
