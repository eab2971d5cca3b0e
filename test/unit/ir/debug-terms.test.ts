import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ir } from '../../../src/ir/ir.js';
import { formatDebug } from '../../../src/ir/debug.js';
import { ProgramRegistry, withProgram } from '../../../src/ir/program.js';
import { ContractCode, ContractViolation } from '../../../src/diagnostics/contract.js';
import { TestFactories, createStdProgram } from '../../helpers/test-factories.js';

const std = createStdProgram();

describe('DebugPrinter 项', () => {
  describe('变量与宇宙', () => {
    it('宇宙下标渲染为 U{n}', () => {
      assert.equal(formatDebug(Ir.Universe(3)), 'U3');
    });

    it('类型变量渲染为 ?{depth}', () => {
      assert.equal(formatDebug(Ir.Var(0)), '?0');
      assert.equal(formatDebug(Ir.Var(12)), '?12');
    });

    it('生命周期变量与全称生命周期', () => {
      assert.equal(formatDebug(Ir.LifetimeVar(1)), "'?1");
      assert.equal(formatDebug(Ir.LifetimeForAll(4)), "'!4");
    });

    it('全称类型名渲染为 !{counter}', () => {
      assert.equal(formatDebug(Ir.ForAllName(2)), '!2');
      assert.equal(formatDebug(Ir.Apply(Ir.ForAllName(2))), '!2');
    });

    it('参数包装不添加任何内容', () => {
      assert.equal(formatDebug(Ir.TyParam(Ir.Var(3))), '?3');
      assert.equal(formatDebug(Ir.LifetimeParam(Ir.LifetimeVar(5))), "'?5");
    });
  });

  describe('条目名解析', () => {
    it('已安装程序时打印声明名', () => {
      const vec = Ir.Apply(TestFactories.vecId);
      assert.equal(withProgram(std, () => formatDebug(vec)), 'Vec');
    });

    it('未安装程序时打印带下标的结构形式', () => {
      assert.equal(formatDebug(Ir.Apply(TestFactories.vecId)), 'ItemId { index: 0 }');
    });

    it('程序不认识该 id 时同样回落', () => {
      const empty = ProgramRegistry.fromDeclarations([]);
      assert.equal(withProgram(empty, () => formatDebug(Ir.ItemId(7))), 'ItemId { index: 7 }');
    });

    it('名称原样输出，不转义', () => {
      const odd = ProgramRegistry.fromDeclarations([{ sort: 'Struct', name: 'a<b>"c', parameters: [] }]);
      assert.equal(withProgram(odd, () => formatDebug(Ir.ItemId(0))), 'a<b>"c');
    });

    it('关联类型渲染为 ({trait}::{name})', () => {
      const assoc = Ir.Apply(Ir.AssociatedType(TestFactories.iteratorId, 'Item'));
      assert.equal(withProgram(std, () => formatDebug(assoc)), '(Iterator::Item)');
      assert.equal(formatDebug(assoc), '(ItemId { index: 1 }::Item)');
    });
  });

  describe('类型', () => {
    it('应用类型渲染参数列表', () => {
      const ty = Ir.Apply(TestFactories.vecId, [
        Ir.TyParam(Ir.Var(0)),
        Ir.LifetimeParam(Ir.LifetimeVar(1)),
      ]);
      assert.equal(withProgram(std, () => formatDebug(ty)), "Vec<?0, '?1>");
    });

    it('嵌套应用类型', () => {
      const ty = TestFactories.vecOf(TestFactories.vecOf(TestFactories.u32()));
      assert.equal(withProgram(std, () => formatDebug(ty)), 'Vec<Vec<u32>>');
    });

    it('高阶类型渲染为 for<{n}> {ty}', () => {
      const ty = Ir.ForAllTy(2, TestFactories.vecOf(Ir.Var(1)));
      assert.equal(withProgram(std, () => formatDebug(ty)), 'for<2> Vec<?1>');
    });

    it('投影类型渲染为 <{traitRef}>::{name}', () => {
      const ty = Ir.Projection(TestFactories.iteratorRef(), 'Item');
      assert.equal(withProgram(std, () => formatDebug(ty)), '<?0 as Iterator>::Item');
    });
  });

  describe('trait 引用', () => {
    it('第一个参数是 Self，其余进入尖括号', () => {
      assert.equal(withProgram(std, () => formatDebug(TestFactories.intoRef())), 'Vec<?0> as Into<u32>');
    });

    it('只有 Self 时不输出尖括号', () => {
      assert.equal(withProgram(std, () => formatDebug(TestFactories.iteratorRef())), '?0 as Iterator');
    });

    it('Self 可以是生命周期', () => {
      const tr = Ir.TraitRef(TestFactories.iteratorId, [Ir.LifetimeParam(Ir.LifetimeForAll(0))]);
      assert.equal(withProgram(std, () => formatDebug(tr)), "'!0 as Iterator");
    });

    it('参数为空时抛出 ContractViolation', () => {
      const tr = Ir.TraitRef(TestFactories.iteratorId, []);
      assert.throws(
        () => formatDebug(tr),
        (err: unknown) =>
          err instanceof ContractViolation && err.code === ContractCode.C001_EmptyTraitParameters
      );
    });

    it('投影内部的空参数同样抛出', () => {
      const ty = Ir.Projection(Ir.TraitRef(TestFactories.iteratorId, []), 'Item');
      assert.throws(() => formatDebug(ty), ContractViolation);
    });
  });

  it('同一项渲染两次结果一致', () => {
    const ty = Ir.ForAllTy(1, Ir.Projection(TestFactories.intoRef(), 'Output'));
    const first = withProgram(std, () => formatDebug(ty));
    const second = withProgram(std, () => formatDebug(ty));
    assert.equal(first, 'for<1> <Vec<?0> as Into<u32>>::Output');
    assert.equal(second, first);
  });
});
