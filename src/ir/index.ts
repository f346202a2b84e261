/**
 * @module ir
 *
 * IR 遍历与改写引擎。
 *
 * 包含：
 * - IR 构造器 (IR, EXPRESSION_KINDS)
 * - 双重分派基类 (ExprFunctor)
 * - 带备忘的函数式改写器 (ExprMutator)
 * - 带访问计数的只读遍历器 (ExprVisitor, postOrderVisit)
 */

export { IR, EXPRESSION_KINDS } from './ir.js';
export { ExprFunctor } from './functor.js';
export type { TraversalOptions } from './functor.js';
export { ExprMutator } from './mutator.js';
export { ExprVisitor, postOrderVisit } from './visitor.js';
