// Node definitions for the expression IR

/**
 * IR 节点类型定义。
 *
 * 所有节点在构造后不可变；遍历引擎通过引用身份（`===`）判断节点是否被改写，
 * 从不比较结构。同一节点可以被多个父节点共享（DAG），但不存在环。
 */
export namespace IR {
  export interface Node {
    readonly kind: string;
  }

  /** 不透明的属性包，遍历时按引用原样携带 */
  export type Attrs = Readonly<Record<string, unknown>> | null;

  // ============================================================
  // 类型（由类型系统负责，遍历引擎只通过钩子触达）
  // ============================================================

  export interface TypeVar extends Node {
    readonly kind: 'TypeVar';
    readonly name: string;
  }

  export interface TypeName extends Node {
    readonly kind: 'TypeName';
    readonly name: string;
  }

  export interface TypeApp extends Node {
    readonly kind: 'TypeApp';
    readonly base: string;
    readonly args: readonly Type[];
  }

  export interface FuncType extends Node {
    readonly kind: 'FuncType';
    readonly typeParams: readonly TypeVar[];
    readonly params: readonly Type[];
    readonly ret: Type;
  }

  export interface TupleType extends Node {
    readonly kind: 'TupleType';
    readonly fields: readonly Type[];
  }

  export type Type = TypeVar | TypeName | TypeApp | FuncType | TupleType;

  // ============================================================
  // 表达式
  // ============================================================

  export interface Variable extends Node {
    readonly kind: 'Variable';
    readonly nameHint: string;
    readonly typeAnnotation: Type | null;
  }

  export interface Constant extends Node {
    readonly kind: 'Constant';
    /** 嵌入的数据载荷，引擎不解释其内容 */
    readonly data: unknown;
  }

  export interface GlobalReference extends Node {
    readonly kind: 'GlobalReference';
    readonly name: string;
  }

  export interface Primitive extends Node {
    readonly kind: 'Primitive';
    readonly name: string;
  }

  export interface Tuple extends Node {
    readonly kind: 'Tuple';
    readonly fields: readonly Expression[];
  }

  export interface Function extends Node {
    readonly kind: 'Function';
    readonly typeParams: readonly TypeVar[];
    readonly params: readonly Variable[];
    readonly retType: Type | null;
    readonly body: Expression;
    readonly attrs: Attrs;
  }

  export interface Call extends Node {
    readonly kind: 'Call';
    readonly op: Expression;
    readonly args: readonly Expression[];
    readonly typeArgs: readonly Type[];
    readonly attrs: Attrs;
  }

  export interface Let extends Node {
    readonly kind: 'Let';
    readonly variable: Variable;
    readonly value: Expression;
    readonly body: Expression;
  }

  export interface Conditional extends Node {
    readonly kind: 'Conditional';
    readonly cond: Expression;
    readonly trueBranch: Expression;
    readonly falseBranch: Expression;
  }

  export interface TupleProjection extends Node {
    readonly kind: 'TupleProjection';
    readonly tuple: Expression;
    readonly index: number;
  }

  export type Expression =
    | Variable
    | Constant
    | GlobalReference
    | Primitive
    | Tuple
    | Function
    | Call
    | Let
    | Conditional
    | TupleProjection;

  export type ExpressionKind = Expression['kind'];
}
