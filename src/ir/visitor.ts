import { performance } from 'node:perf_hooks';
import type { IR } from '../types.js';
import { ConfigService } from '../config/config-service.js';
import { logPerformance } from '../utils/logger.js';
import { ExprFunctor, type TraversalOptions } from './functor.js';

/**
 * 只读的 IR 遍历器。
 *
 * - 每个节点（按引用身份）只在第一次到达时运行处理器并递归子节点
 * - 之后的每次到达只增加计数，便于分析阶段判断节点被多少个父节点共享
 * - 计数器在每次顶层 `visit` 开始时清空，返回后仍可通过 `visitCount` 读取
 *
 * 覆写某个 `visitXxx` 方法即可插入自定义逻辑；调用 `super.visitXxx` 继续默认递归。
 */
export class ExprVisitor extends ExprFunctor<void> {
  protected readonly visitCounter = new Map<IR.Expression, number>();
  private traversing = false;
  private depth = 0;

  visit(expr: IR.Expression): void {
    if (this.traversing) {
      this.visitCounted(expr);
      return;
    }

    this.visitCounter.clear();
    this.traversing = true;
    const started = performance.now();
    try {
      this.visitCounted(expr);
      if (ConfigService.getInstance().traceTraversals) {
        logPerformance({
          component: 'ir.visitor',
          operation: `visit ${this.passName}`,
          duration: performance.now() - started,
          metadata: { uniqueNodes: this.visitCounter.size },
        });
      }
    } finally {
      this.traversing = false;
      this.depth = 0;
    }
  }

  /** 类型钩子，默认不做任何事 */
  visitType(_type: IR.Type): void {}

  /** 节点在最近一次遍历中被到达的次数；从未到达时为 0 */
  visitCount(expr: IR.Expression): number {
    return this.visitCounter.get(expr) ?? 0;
  }

  visitCounts(): ReadonlyMap<IR.Expression, number> {
    return this.visitCounter;
  }

  protected get inTraversal(): boolean {
    return this.traversing;
  }

  private visitCounted(expr: IR.Expression): void {
    const count = this.visitCounter.get(expr);
    if (count !== undefined) {
      this.visitCounter.set(expr, count + 1);
      return;
    }

    this.depth++;
    try {
      this.checkDepth(this.depth, expr);
      super.dispatch(expr);
    } finally {
      this.depth--;
    }
    this.visitCounter.set(expr, 1);
  }

  /** 遍历之外直接分派等同于顶层 `visit` */
  override dispatch(expr: IR.Expression): void {
    if (this.traversing) {
      super.dispatch(expr);
    } else {
      this.visit(expr);
    }
  }

  override visitDefault(_expr: IR.Expression): void {}

  override visitVariable(expr: IR.Variable): void {
    if (expr.typeAnnotation !== null) {
      this.visitType(expr.typeAnnotation);
    }
  }

  override visitConstant(_expr: IR.Constant): void {}

  override visitGlobalReference(_expr: IR.GlobalReference): void {}

  override visitPrimitive(_expr: IR.Primitive): void {}

  override visitTuple(expr: IR.Tuple): void {
    for (const field of expr.fields) this.visit(field);
  }

  override visitFunction(expr: IR.Function): void {
    for (const param of expr.params) this.visit(param);
    this.visit(expr.body);
  }

  override visitCall(expr: IR.Call): void {
    this.visit(expr.op);
    for (const typeArg of expr.typeArgs) this.visitType(typeArg);
    for (const arg of expr.args) this.visit(arg);
  }

  override visitLet(expr: IR.Let): void {
    // 先值后变量，与 ExprMutator 的顺序不同
    this.visit(expr.value);
    this.visit(expr.variable);
    this.visit(expr.body);
  }

  override visitConditional(expr: IR.Conditional): void {
    this.visit(expr.cond);
    this.visit(expr.trueBranch);
    this.visit(expr.falseBranch);
  }

  override visitTupleProjection(expr: IR.TupleProjection): void {
    this.visit(expr.tuple);
  }
}

class PostOrderVisitor extends ExprVisitor {
  constructor(
    private readonly fn: (expr: IR.Expression) => void,
    options: TraversalOptions
  ) {
    super(options);
  }

  override visit(expr: IR.Expression): void {
    const seen = this.inTraversal && this.visitCount(expr) > 0;
    super.visit(expr);
    if (!seen) this.fn(expr);
  }
}

/**
 * 以后序（子节点先于父节点）对每个唯一节点调用一次 `fn`。
 */
export function postOrderVisit(
  expr: IR.Expression,
  fn: (expr: IR.Expression) => void,
  options: TraversalOptions = { name: 'postOrderVisit' }
): void {
  new PostOrderVisitor(fn, options).visit(expr);
}
