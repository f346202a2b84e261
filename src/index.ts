/**
 * @module expr-functor
 *
 * 编译器中端表达式 IR 的遍历与改写引擎。
 *
 * 每个优化、类型检查或降级 pass 都通过继承 {@link ExprMutator} 或 {@link ExprVisitor}
 * 实现，而不是手写递归：
 *
 * @example 常量替换
 * ```typescript
 * import { ExprMutator, IR, type IRTypes } from 'expr-functor';
 *
 * const x = IR.Var('x');
 * class ReplaceX extends ExprMutator {
 *   override visitVariable(v: IRTypes.Variable): IRTypes.Expression {
 *     return v === x ? IR.Constant(1) : super.visitVariable(v);
 *   }
 * }
 *
 * const call = IR.Call(IR.Op('add'), [x, IR.Constant(5)]);
 * const out = new ReplaceX().rewrite(call); // add(1, 5)，op 与 attrs 保持同一引用
 * ```
 */

// 节点类型与构造器
export type { IR as IRTypes } from './types.js';
export { IR, EXPRESSION_KINDS } from './ir/ir.js';

// 遍历引擎
export { ExprFunctor, ExprMutator, ExprVisitor, postOrderVisit } from './ir/index.js';
export type { TraversalOptions } from './ir/index.js';

// 诊断
export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
} from './diagnostics/index.js';
export type { Diagnostic, DiagnosticContext } from './diagnostics/index.js';

// 配置与日志
export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger, logPerformance } from './utils/logger.js';
export type { LogMetadata, PerformanceMetrics } from './utils/logger.js';
