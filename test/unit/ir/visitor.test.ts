import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ExprVisitor, postOrderVisit } from '../../../src/ir/visitor.js';
import { IR } from '../../../src/ir/ir.js';
import type { IR as IRTypes } from '../../../src/types.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { TestFactories } from '../../helpers/test-factories.js';

/** 记录处理器与类型钩子的首次到达顺序 */
class RecordingVisitor extends ExprVisitor {
  readonly events: string[] = [];

  override visitType(type: IRTypes.Type): void {
    this.events.push(`type:${type.kind === 'TypeName' || type.kind === 'TypeVar' ? type.name : type.kind}`);
  }

  override visitVariable(expr: IRTypes.Variable): void {
    this.events.push(`var:${expr.nameHint}`);
    super.visitVariable(expr);
  }

  override visitConstant(expr: IRTypes.Constant): void {
    this.events.push(`const:${String(expr.data)}`);
  }

  override visitPrimitive(expr: IRTypes.Primitive): void {
    this.events.push(`op:${expr.name}`);
  }
}

/** 统计每个变量被引用的次数（use-count 分析） */
class UseCounter extends ExprVisitor {
  usesOf(v: IRTypes.Variable): number {
    return this.visitCount(v);
  }
}

describe('ExprVisitor', () => {
  describe('访问计数', () => {
    it('同一常量出现三次时处理器只运行一次、计数为 3', () => {
      const c = IR.Constant(7);
      const tuple = IR.Tuple([c, c, c]);
      let constantVisits = 0;
      class Counting extends ExprVisitor {
        override visitConstant(_expr: IRTypes.Constant): void {
          constantVisits++;
        }
      }

      const visitor = new Counting();
      visitor.visit(tuple);

      assert.equal(constantVisits, 1);
      assert.equal(visitor.visitCount(c), 3);
      assert.equal(visitor.visitCount(tuple), 1);
    });

    it('未被到达的节点计数为 0', () => {
      const visitor = new ExprVisitor();
      visitor.visit(IR.Constant(1));
      assert.equal(visitor.visitCount(IR.Constant(1)), 0);
    });

    it('Let 的变量作为值、绑定和函数体共被计数三次', () => {
      const v = IR.Var('v');
      const let_ = IR.Let(v, v, v);

      const visitor = new RecordingVisitor();
      visitor.visit(let_);

      assert.deepEqual(visitor.events, ['var:v']);
      assert.equal(visitor.visitCount(v), 3);
    });

    it('use-count 分析区分共享与非共享变量', () => {
      const x = IR.Var('x');
      const y = IR.Var('y');
      const fn = IR.Function([x, y], IR.Call(IR.Op('mul'), [x, x]));

      const counter = new UseCounter();
      counter.visit(fn);

      // 参数位置本身也计一次
      assert.equal(counter.usesOf(x), 3);
      assert.equal(counter.usesOf(y), 1);
    });

    it('每次顶层调用重新开始计数', () => {
      const c = IR.Constant(7);
      const tuple = IR.Tuple([c, c, c]);
      const visitor = new ExprVisitor();

      visitor.visit(tuple);
      visitor.visit(tuple);

      assert.equal(visitor.visitCount(c), 3);
      assert.equal(visitor.visitCounts().size, 2);
    });

    it('默认遍历器只产生计数，不改动输入', () => {
      const samples = TestFactories.samplePerKind();
      const root = IR.Tuple(samples);
      const snapshot = JSON.stringify(root);

      const visitor = new ExprVisitor();
      visitor.visit(root);

      assert.equal(JSON.stringify(root), snapshot);
      assert.equal(visitor.visitCount(root), 1);
      for (const sample of samples) {
        assert.ok(visitor.visitCount(sample) >= 1);
      }
    });
  });

  describe('子节点顺序', () => {
    it('Let 先访问值，再访问变量和函数体', () => {
      const visitor = new RecordingVisitor();
      visitor.visit(IR.Let(IR.Var('v'), IR.Constant('value'), IR.Constant('body')));
      assert.deepEqual(visitor.events, ['const:value', 'var:v', 'const:body']);
    });

    it('Function 只访问参数与函数体，不访问类型参数与返回类型', () => {
      const visitor = new RecordingVisitor();
      const fn = IR.Function(
        [IR.Var('p', TestFactories.intType)],
        IR.Constant('body'),
        IR.TypeName('R'),
        [IR.TypeVar('T')],
        { inline: true }
      );

      visitor.visit(fn);

      assert.deepEqual(visitor.events, ['var:p', 'type:Int', 'const:body']);
    });

    it('Call 依次访问 op、类型实参与实参', () => {
      const visitor = new RecordingVisitor();
      visitor.visit(IR.Call(IR.Op('f'), [IR.Constant('a1')], null, [IR.TypeName('A')]));
      assert.deepEqual(visitor.events, ['op:f', 'type:A', 'const:a1']);
    });

    it('Conditional 与 TupleProjection 按字段顺序访问', () => {
      const visitor = new RecordingVisitor();
      const cond = IR.If(
        IR.Constant('c'),
        IR.TupleGetItem(IR.Tuple([IR.Constant('t0'), IR.Constant('t1')]), 1),
        IR.Constant('f')
      );

      visitor.visit(cond);

      assert.deepEqual(visitor.events, ['const:c', 'const:t0', 'const:t1', 'const:f']);
    });

    it('叶子节点不会继续递归', () => {
      const visitor = new RecordingVisitor();
      visitor.visit(IR.Tuple([IR.GlobalRef('main'), IR.Op('add')]));
      assert.deepEqual(visitor.events, ['op:add']);
    });
  });

  describe('postOrderVisit', () => {
    it('子节点先于父节点，每个唯一节点只回调一次', () => {
      const v = IR.Var('v');
      const value = IR.Constant('value');
      const op = IR.Op('inc');
      const call = IR.Call(op, [v]);
      const let_ = IR.Let(v, value, call);

      const order: IRTypes.Expression[] = [];
      postOrderVisit(let_, (expr) => order.push(expr));

      assert.equal(order.length, 5);
      assert.equal(order[0], value);
      assert.equal(order[1], v);
      assert.equal(order[2], op);
      assert.equal(order[3], call);
      assert.equal(order[4], let_);
    });

    it('共享子表达式只出现一次', () => {
      const c = IR.Constant(1);
      const pair = IR.Tuple([c, c]);
      const root = IR.Tuple([pair, pair, c]);

      const order: IRTypes.Expression[] = [];
      postOrderVisit(root, (expr) => order.push(expr));

      assert.equal(order.length, 3);
      assert.equal(order[0], c);
      assert.equal(order[1], pair);
      assert.equal(order[2], root);
    });
  });

  describe('深度限制', () => {
    it('超过 maxDepth 时抛出 R001', () => {
      assert.throws(
        () => new ExprVisitor({ maxDepth: 2 }).visit(TestFactories.projectionChain(3)),
        (err: unknown) =>
          err instanceof DiagnosticError && err.code === DiagnosticCode.R001_DepthLimitExceeded
      );
    });

    it('失败后下一次遍历从干净的状态开始', () => {
      const visitor = new ExprVisitor({ maxDepth: 2 });
      assert.throws(() => visitor.visit(TestFactories.projectionChain(3)));

      const c = IR.Constant(0);
      visitor.visit(IR.Tuple([c, c]));
      assert.equal(visitor.visitCount(c), 2);
      assert.equal(visitor.visitCounts().size, 2);
    });

    it('较长的 Let 链不设上限也能完成', () => {
      const chain = TestFactories.letChain(400);
      const visitor = new ExprVisitor({ maxDepth: 0 });
      visitor.visit(chain);
      assert.equal(visitor.visitCount(chain), 1);
    });

    it('pass 捕获子节点错误后深度计数恢复，不误报 R001', () => {
      class SpeculativeCheck extends ExprVisitor {
        readonly checked: unknown[] = [];

        override visitConstant(expr: IRTypes.Constant): void {
          if (expr.data === 'bad') throw new Error('unsupported constant');
          this.checked.push(expr.data);
        }

        override visitTuple(expr: IRTypes.Tuple): void {
          for (const field of expr.fields) {
            try {
              this.visit(field);
            } catch (err) {
              if (err instanceof DiagnosticError) throw err;
            }
          }
        }
      }
      const bad = IR.Constant('bad');
      const ok = IR.Constant('ok');
      const root = IR.Tuple([bad, IR.Constant('bad'), IR.Constant('bad'), ok]);
      const visitor = new SpeculativeCheck({ maxDepth: 2 });

      visitor.visit(root);

      assert.deepEqual(visitor.checked, ['ok']);
      assert.equal(visitor.visitCount(ok), 1);
      assert.equal(visitor.visitCount(bad), 0);
      assert.equal(visitor.visitCount(root), 1);
    });
  });

  describe('入口', () => {
    it('遍历之外直接调用 dispatch 等同于顶层 visit', () => {
      const shared = IR.Constant(1);
      const root = IR.Tuple([IR.Tuple([shared]), IR.Tuple([shared])]);
      const visitor = new ExprVisitor();

      visitor.dispatch(root);

      assert.equal(visitor.visitCount(shared), 2);
      assert.equal(visitor.visitCount(root), 1);
      assert.equal(visitor.visitCounts().size, 4);
    });
  });
});
