import type { IR } from '../types.js';
import { ConfigService } from '../config/config-service.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { EXPRESSION_KINDS } from './ir.js';

export interface TraversalOptions {
  /** pass 名称，用于日志与诊断上下文（默认取类名） */
  readonly name?: string;
  /** 最大嵌套深度，0 表示不限制；未设置时取 ConfigService.maxTraversalDepth */
  readonly maxDepth?: number;
}

/**
 * IR 表达式的双重分派基类。
 *
 * - `dispatch` 根据节点的 `kind` 调用对应的 `visitXxx` 处理器
 * - 未覆写的处理器统一落到 `visitDefault`；基类实现直接报错，
 *   子类（如 {@link ExprVisitor}）可覆写为空操作
 * - `switch` 与 `src/types.ts` 中的表达式种类保持一致，新增种类时编译期即报错
 *
 * @typeParam R - 每个处理器的返回类型
 */
export abstract class ExprFunctor<R> {
  protected readonly passName: string;
  protected readonly maxDepth: number;

  constructor(options: TraversalOptions = {}) {
    this.passName = options.name ?? this.constructor.name;
    this.maxDepth = options.maxDepth ?? ConfigService.getInstance().maxTraversalDepth;
  }

  dispatch(expr: IR.Expression): R {
    switch (expr.kind) {
      case 'Variable':
        return this.visitVariable(expr);
      case 'Constant':
        return this.visitConstant(expr);
      case 'GlobalReference':
        return this.visitGlobalReference(expr);
      case 'Primitive':
        return this.visitPrimitive(expr);
      case 'Tuple':
        return this.visitTuple(expr);
      case 'Function':
        return this.visitFunction(expr);
      case 'Call':
        return this.visitCall(expr);
      case 'Let':
        return this.visitLet(expr);
      case 'Conditional':
        return this.visitConditional(expr);
      case 'TupleProjection':
        return this.visitTupleProjection(expr);
      default: {
        const unknown: never = expr;
        return Diagnostics.unknownExprKind(kindOf(unknown), EXPRESSION_KINDS)
          .withPass(this.passName)
          .throw();
      }
    }
  }

  visitVariable(expr: IR.Variable): R {
    return this.visitDefault(expr);
  }

  visitConstant(expr: IR.Constant): R {
    return this.visitDefault(expr);
  }

  visitGlobalReference(expr: IR.GlobalReference): R {
    return this.visitDefault(expr);
  }

  visitPrimitive(expr: IR.Primitive): R {
    return this.visitDefault(expr);
  }

  visitTuple(expr: IR.Tuple): R {
    return this.visitDefault(expr);
  }

  visitFunction(expr: IR.Function): R {
    return this.visitDefault(expr);
  }

  visitCall(expr: IR.Call): R {
    return this.visitDefault(expr);
  }

  visitLet(expr: IR.Let): R {
    return this.visitDefault(expr);
  }

  visitConditional(expr: IR.Conditional): R {
    return this.visitDefault(expr);
  }

  visitTupleProjection(expr: IR.TupleProjection): R {
    return this.visitDefault(expr);
  }

  visitDefault(expr: IR.Expression): R {
    return Diagnostics.missingHandler(expr.kind, this.passName).withPass(this.passName).throw();
  }

  /**
   * 深度保护：超过 maxDepth 时抛出 R001 诊断，而不是等运行时栈溢出。
   */
  protected checkDepth(depth: number, expr: IR.Expression): void {
    if (this.maxDepth > 0 && depth > this.maxDepth) {
      Diagnostics.depthLimitExceeded(this.maxDepth, expr.kind).withPass(this.passName).throw();
    }
  }
}

// 运行时后备：读取不在封闭集合内的节点的 kind
function kindOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}
