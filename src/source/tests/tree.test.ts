import { describe, expect, test } from 'vitest';

import { ast } from '../builders';
import { SourceTree } from '../tree';

describe('Source tree', () => {
  describe('Indexing', () => {
    test('[Ids] nodes are numbered in pre-order', () => {
      const arg = ast.int(1);
      const call = ast.call(undefined, 'foo', [arg]);
      const root = ast.toplevel([call]);
      const tree = new SourceTree(root);

      expect([tree.id(root), tree.id(call), tree.id(arg)]).toEqual([0, 1, 2]);
      expect(tree.size).toBe(3);
      expect(tree.parent(arg)).toBe(call);
      expect(tree.parent(root)).toBeUndefined();
    });

    test('[Slots] a call without receiver leaves slot 0 empty', () => {
      const arg = ast.int(1);
      const block = ast.block(['x'], []);
      const call = ast.call(undefined, 'foo', [arg], { block });
      const tree = new SourceTree(ast.toplevel([call]));

      expect(tree.childAt(call, 0)).toBeUndefined();
      expect(tree.childAt(call, 1)).toBe(arg);
      expect(tree.childAt(call, 2)).toBe(block);
      expect(tree.indexInParent(arg)).toBe(1);
      expect(tree.children(call).map(([index]) => index)).toEqual([1, 2]);
    });

    test('[Slots] for loops expose pattern, iterable and body', () => {
      const loop = ast.forIn(ast.local('x'), ast.local('xs'), []);
      const tree = new SourceTree(ast.toplevel([loop]));

      expect(tree.children(loop).map(([index, child]) => [index, child.type])).toEqual([
        [0, 'LocalVariableAccess'],
        [1, 'LocalVariableAccess'],
        [2, 'StmtSequence']
      ]);
    });

    test('[Types] nodes are listed by type', () => {
      const first = ast.array([]);
      const second = ast.array([first]);
      const tree = new SourceTree(ast.toplevel([second]));

      expect(tree.nodesOfType('ArrayLiteral')).toEqual([second, first]);
      expect(tree.nodesOfType('ForExpr')).toEqual([]);
    });

    test('[Sharing] a node used twice is rejected', () => {
      const x = ast.local('x');
      expect(() => new SourceTree(ast.toplevel([x, x]))).toThrow(
        '[source] A "LocalVariableAccess" node occurs more than once in the tree. ' +
          'Real nodes must be distinct objects.'
      );
    });

    test('[Rest Index] a splat position outside the elements is rejected', () => {
      const past = ast.tuple([ast.local('a'), ast.local('b')], 2);
      expect(() => new SourceTree(ast.toplevel([ast.assign(past, ast.local('w'))]))).toThrow(
        '[source] Tuple pattern rest index 2 must be an integer in [0, 2).'
      );

      const negative = ast.tuple([ast.local('a')], -1);
      expect(() => new SourceTree(ast.toplevel([ast.assign(negative, ast.local('w'))]))).toThrow(
        '[source] Tuple pattern rest index -1 must be an integer in [0, 1).'
      );

      const last = ast.tuple([ast.local('a'), ast.local('b')], 1);
      expect(() => new SourceTree(ast.toplevel([ast.assign(last, ast.local('w'))]))).not.toThrow();
    });

    test('[Foreign] ids exist only for nodes of the tree', () => {
      const tree = new SourceTree(ast.toplevel([]));
      const stray = ast.int(1);

      expect(tree.has(stray)).toBe(false);
      expect(() => tree.id(stray)).toThrow(
        '[source] The "IntegerLiteral" node does not belong to this tree.'
      );
    });
  });

  describe('Scopes and self', () => {
    test('[Scopes] blocks, methods and classes open scopes; for loops do not', () => {
      const inBlock = ast.local('y');
      const block = ast.block([], [inBlock]);
      const inLoop = ast.local('z');
      const loop = ast.forIn(ast.local('x'), ast.local('xs'), [inLoop]);
      const method = ast.methodDef('m', [], [
        ast.call(ast.local('xs'), 'each', [], { block }),
        loop
      ]);
      const klass = ast.classDef('C', [method]);
      const root = ast.toplevel([klass]);
      const tree = new SourceTree(root);

      expect(tree.enclosingScope(inBlock)).toBe(block);
      expect(tree.enclosingScope(inLoop)).toBe(method);
      expect(tree.enclosingScope(method)).toBe(klass);
      expect(tree.enclosingScope(root)).toBeUndefined();
      expect(tree.selfScope(inBlock)).toBe(method);
      expect(tree.selfScope(method)).toBe(klass);
      expect(tree.selfScope(root)).toBe(root);
      expect(tree.selfVariable(method).key).toBe(`self:${tree.id(method)}`);
    });
  });

  describe('Variable binding', () => {
    test('[Blocks] assignments in a block bind to an outer local of the same name', () => {
      const outer = ast.local('x');
      const inner = ast.local('x');
      const fresh = ast.local('z');
      const param = ast.local('y');
      const block = ast.block(['y'], [
        ast.assign(inner, param),
        ast.assign(fresh, ast.int(2))
      ]);
      const root = ast.toplevel([
        ast.assign(outer, ast.int(1)),
        ast.call(ast.local('xs'), 'each', [], { block })
      ]);
      const tree = new SourceTree(root);

      expect(tree.variableOf(inner)).toBe(tree.variableOf(outer));
      expect(tree.variableOf(outer).key).toBe('local:0:x');
      expect(tree.variableOf(fresh)).toBe(tree.localVariable(block, 'z'));
      const [declared] = block.params;
      expect(declared && tree.parameterVariable(declared)).toBe(tree.variableOf(param));
    });

    test('[Parameters] a block parameter shadows an outer local', () => {
      const outer = ast.local('x');
      const shadowed = ast.local('x');
      const block = ast.block(['x'], [shadowed]);
      const tree = new SourceTree(
        ast.toplevel([
          ast.assign(outer, ast.int(1)),
          ast.call(ast.local('xs'), 'each', [], { block })
        ])
      );

      expect(tree.variableOf(shadowed)).toBe(tree.localVariable(block, 'x'));
      expect(tree.variableOf(shadowed)).not.toBe(tree.variableOf(outer));
    });

    test('[Methods] method bodies do not see toplevel locals', () => {
      const outer = ast.local('x');
      const inner = ast.local('x');
      const method = ast.methodDef('m', [], [ast.assign(inner, ast.int(2))]);
      const tree = new SourceTree(
        ast.toplevel([ast.assign(outer, ast.int(1)), method])
      );

      expect(tree.variableOf(inner)).toBe(tree.localVariable(method, 'x'));
      expect(tree.variableOf(outer)).toBe(tree.localVariable(tree.root, 'x'));
    });

    test('[Storage] instance and class variables belong to the class; globals to nobody', () => {
      const ivar = ast.ivar('count');
      const cvar = ast.cvar('total');
      const klass = ast.classDef('C', [
        ast.methodDef('m', [], [ast.assign(ivar, ast.int(1)), cvar])
      ]);
      const first = ast.gvar('g');
      const second = ast.gvar('g');
      const tree = new SourceTree(ast.toplevel([klass, first, second]));

      expect(tree.variableOf(ivar).key).toBe(`ivar:${tree.id(klass)}:count`);
      expect(tree.variableOf(cvar).key).toBe(`cvar:${tree.id(klass)}:total`);
      expect(tree.variableOf(first)).toBe(tree.variableOf(second));
      expect(tree.variableOf(first).key).toBe('global:g');
    });
  });
});
