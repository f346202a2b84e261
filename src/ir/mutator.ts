import { performance } from 'node:perf_hooks';
import type { IR as IRTypes } from '../types.js';
import { ConfigService } from '../config/config-service.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { logPerformance } from '../utils/logger.js';
import { ExprFunctor } from './functor.js';
import { IR } from './ir.js';

/**
 * 以函数式方式改写 IR 的遍历器。
 *
 * 通过备忘表与“自身返回”摊销函数式更新的开销：
 * - 同一次顶层 `rewrite` 内，每个节点（按引用身份）最多改写一次，
 *   所有父节点拿到同一个改写结果，因此共享关系在输出中保持不变
 * - 子节点全部原样返回时，父节点也原样返回，不分配新对象
 *
 * 具体 pass 覆写 `visitXxx` 表达节点级变换，调用 `super.visitXxx` 继续默认的结构递归；
 * 类型位置统一经过 `rewriteType` 钩子。
 *
 * 入口是 `rewrite`（遍历之外的 `dispatch` 与之等价）；处理器只通过 `this.rewrite` 递归子节点。
 *
 * 递归深度等于最长的嵌套链，受 JavaScript 调用栈限制；极深的输入可通过
 * `maxDepth` 转为 R001 诊断。
 */
export class ExprMutator extends ExprFunctor<IRTypes.Expression> {
  private memo: Map<IRTypes.Expression, IRTypes.Expression> | null = null;
  private depth = 0;

  /**
   * 改写入口。顶层调用创建新的备忘表并在返回（或失败）时丢弃；
   * 处理器内部对子节点的递归调用复用同一张表。
   */
  rewrite(expr: IRTypes.Expression): IRTypes.Expression {
    if (this.memo !== null) {
      return this.rewriteMemoized(this.memo, expr);
    }

    const memo = new Map<IRTypes.Expression, IRTypes.Expression>();
    this.memo = memo;
    const started = performance.now();
    try {
      const result = this.rewriteMemoized(memo, expr);
      if (ConfigService.getInstance().traceTraversals) {
        logPerformance({
          component: 'ir.mutator',
          operation: `rewrite ${this.passName}`,
          duration: performance.now() - started,
          metadata: { uniqueNodes: memo.size, changed: result !== expr },
        });
      }
      return result;
    } finally {
      this.memo = null;
      this.depth = 0;
    }
  }

  /**
   * 类型钩子，默认原样返回。类型系统自己的改写器在这里接入。
   */
  rewriteType(type: IRTypes.Type): IRTypes.Type {
    return type;
  }

  private rewriteMemoized(
    memo: Map<IRTypes.Expression, IRTypes.Expression>,
    expr: IRTypes.Expression
  ): IRTypes.Expression {
    const cached = memo.get(expr);
    if (cached !== undefined) return cached;

    this.depth++;
    try {
      this.checkDepth(this.depth, expr);
      const rewritten = super.dispatch(expr);
      memo.set(expr, rewritten);
      return rewritten;
    } finally {
      this.depth--;
    }
  }

  /**
   * 遍历之外直接分派等同于顶层 `rewrite`，保证子节点共享同一张备忘表。
   * 直接调用 `visitXxx` 则没有这个保证，pass 应以 `rewrite` 为入口。
   */
  override dispatch(expr: IRTypes.Expression): IRTypes.Expression {
    return this.memo === null ? this.rewrite(expr) : super.dispatch(expr);
  }

  override visitVariable(expr: IRTypes.Variable): IRTypes.Expression {
    // 变量在备忘表的保证下只会改写一次，之后所有引用复用同一结果
    if (expr.typeAnnotation !== null) {
      const type = this.rewriteType(expr.typeAnnotation);
      if (type !== expr.typeAnnotation) {
        return IR.Var(expr.nameHint, type);
      }
    }
    return expr;
  }

  override visitConstant(expr: IRTypes.Constant): IRTypes.Expression {
    return expr;
  }

  override visitGlobalReference(expr: IRTypes.GlobalReference): IRTypes.Expression {
    return expr;
  }

  override visitPrimitive(expr: IRTypes.Primitive): IRTypes.Expression {
    return expr;
  }

  override visitTuple(expr: IRTypes.Tuple): IRTypes.Expression {
    const fields: IRTypes.Expression[] = [];
    let unchanged = true;
    for (const field of expr.fields) {
      const newField = this.rewrite(field);
      fields.push(newField);
      unchanged &&= newField === field;
    }
    return unchanged ? expr : IR.Tuple(fields);
  }

  override visitFunction(expr: IRTypes.Function): IRTypes.Expression {
    let unchanged = true;

    const typeParams: IRTypes.TypeVar[] = [];
    expr.typeParams.forEach((typeParam, i) => {
      const newTypeParam = this.expectTypeVar(
        this.rewriteType(typeParam),
        `Function.typeParams[${i}]`
      );
      typeParams.push(newTypeParam);
      unchanged &&= newTypeParam === typeParam;
    });

    const params: IRTypes.Variable[] = [];
    expr.params.forEach((param, i) => {
      const newParam = this.expectVariable(this.rewrite(param), `Function.params[${i}]`);
      params.push(newParam);
      unchanged &&= newParam === param;
    });

    const retType = expr.retType === null ? null : this.rewriteType(expr.retType);
    unchanged &&= retType === expr.retType;

    const body = this.rewrite(expr.body);
    unchanged &&= body === expr.body;

    return unchanged ? expr : IR.Function(params, body, retType, typeParams, expr.attrs);
  }

  override visitCall(expr: IRTypes.Call): IRTypes.Expression {
    const op = this.rewrite(expr.op);
    let unchanged = op === expr.op;

    const typeArgs: IRTypes.Type[] = [];
    for (const typeArg of expr.typeArgs) {
      const newTypeArg = this.rewriteType(typeArg);
      typeArgs.push(newTypeArg);
      unchanged &&= newTypeArg === typeArg;
    }

    const args: IRTypes.Expression[] = [];
    for (const arg of expr.args) {
      const newArg = this.rewrite(arg);
      args.push(newArg);
      unchanged &&= newArg === arg;
    }

    return unchanged ? expr : IR.Call(op, args, expr.attrs, typeArgs);
  }

  override visitLet(expr: IRTypes.Let): IRTypes.Expression {
    const variable = this.expectVariable(this.rewrite(expr.variable), 'Let.variable');
    const value = this.rewrite(expr.value);
    const body = this.rewrite(expr.body);

    if (variable === expr.variable && value === expr.value && body === expr.body) {
      return expr;
    }
    return IR.Let(variable, value, body);
  }

  override visitConditional(expr: IRTypes.Conditional): IRTypes.Expression {
    const cond = this.rewrite(expr.cond);
    const trueBranch = this.rewrite(expr.trueBranch);
    const falseBranch = this.rewrite(expr.falseBranch);

    if (
      cond === expr.cond &&
      trueBranch === expr.trueBranch &&
      falseBranch === expr.falseBranch
    ) {
      return expr;
    }
    return IR.If(cond, trueBranch, falseBranch);
  }

  override visitTupleProjection(expr: IRTypes.TupleProjection): IRTypes.Expression {
    const tuple = this.rewrite(expr.tuple);
    return tuple === expr.tuple ? expr : IR.TupleGetItem(tuple, expr.index);
  }

  private expectVariable(expr: IRTypes.Expression, position: string): IRTypes.Variable {
    if (IR.isVariable(expr)) return expr;
    return Diagnostics.binderMismatch(position, expr.kind).withPass(this.passName).throw();
  }

  private expectTypeVar(type: IRTypes.Type, position: string): IRTypes.TypeVar {
    if (IR.isTypeVar(type)) return type;
    return Diagnostics.typeBinderMismatch(position, type.kind).withPass(this.passName).throw();
  }
}
