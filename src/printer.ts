import type { SynthesisEngine } from './engine';
import type { BinaryOperator, SourceNode } from './source/nodes';
import type {
  AstNode,
  OperatorKindTag,
  SyntheticNode,
  VariableAccessKind
} from './types';

import { OPERATOR_KINDS } from './rules';

const OPERATOR_SYMBOLS = new Map<OperatorKindTag, BinaryOperator>(
  Object.entries(OPERATOR_KINDS).flatMap(([symbol, tag]) =>
    isBinaryOperator(symbol) ? [[tag, symbol] as const] : []
  )
);

function isBinaryOperator(value: string): value is BinaryOperator {
  return Object.hasOwn(OPERATOR_KINDS, value);
}

/**
 * Renders the desugared view of a node as source-like text.
 *
 * Nodes with a desugared form print as that form, receivers include
 * implicit `self`, and statement sequences print in parentheses:
 *
 * ```
 * a.b = c   →   (a.b=(__synth__0 = c); __synth__0)
 * ```
 *
 * Used for debugging and for asserting desugarings in tests; the output is
 * not meant to be parsed back.
 */
export function printNode(engine: SynthesisEngine, node: AstNode): string {
  const print = (target: AstNode): string => {
    const desugared = engine.desugaredForm(target);
    if (desugared) return print(desugared);
    return target.type === 'Synthetic'
      ? printSynthetic(target)
      : printSource(target);
  };

  const at = (parent: AstNode, index: number): string => {
    const child = engine.child(parent, index);
    return child ? print(child) : '?';
  };

  const isBlock = (target: AstNode): boolean =>
    target.type === 'Synthetic'
      ? target.kind.tag === 'BraceBlock'
      : target.type === 'Block';

  // Arguments come from the resolved slots: the array constructor's arity
  // counts its receiver, a setter's counts the assigned value.
  const printCall = (call: AstNode, name: string, qualified: boolean): string => {
    let receiver: string | undefined;
    let block = '';
    const args: string[] = [];
    for (const [index, child] of engine.children(call)) {
      if (index === 0) receiver = print(child);
      else if (isBlock(child)) block = ` ${print(child)}`;
      else args.push(print(child));
    }

    const head =
      receiver !== undefined
        ? `${receiver}.${name}`
        : `${qualified ? '::' : ''}${name}`;
    return `${head}(${args.join(', ')})${block}`;
  };

  const printBlock = (params: string[], statements: string[]): string => {
    const head = params.length > 0 ? `|${params.join(', ')}| ` : '';
    return `{ ${head}${statements.join('; ')} }`;
  };

  const printSynthetic = (node: SyntheticNode): string => {
    const { kind } = node;
    switch (kind.tag) {
      case 'StmtSequence':
        return `(${engine
          .children(node)
          .map(([, child]) => print(child))
          .join('; ')})`;

      case 'AssignExpr':
        return `${at(node, 0)} = ${at(node, 1)}`;

      case 'BraceBlock': {
        const params: string[] = [];
        const statements: string[] = [];
        for (const [, child] of engine.children(node)) {
          const isParam =
            child.type === 'Synthetic'
              ? child.kind.tag === 'SimpleParameter'
              : child.type === 'SimpleParameter';
          (isParam ? params : statements).push(print(child));
        }
        return printBlock(params, statements);
      }

      case 'SimpleParameter':
        return at(node, 0);

      case 'SplatExpr':
        return `*${at(node, 0)}`;

      case 'IntegerLiteral':
        return String(kind.value);

      case 'RangeLiteral':
        return `${at(node, 0)}${kind.inclusive ? '..' : '...'}${at(node, 1)}`;

      case 'MethodCall':
        return printCall(node, kind.name, false);

      case 'ConstantReadAccess':
        return kind.name;

      case 'Self':
        return 'self';

      case 'LocalVariableAccessReal':
      case 'LocalVariableAccessSynth':
      case 'InstanceVariableAccess':
      case 'ClassVariableAccess':
      case 'GlobalVariableAccess':
        return printVariable(kind);

      default:
        return `${at(node, 0)} ${OPERATOR_SYMBOLS.get(kind.tag) ?? kind.tag} ${at(node, 1)}`;
    }
  };

  const printSource = (node: SourceNode): string => {
    switch (node.type) {
      case 'Toplevel':
        return node.body.map(print).join('\n');

      case 'ClassDef':
        return `class ${node.name}; ${node.body.map(print).join('; ')}; end`;

      case 'MethodDef':
        return (
          `def ${node.name}(${node.params.map(print).join(', ')}); ` +
          `${node.body.map(print).join('; ')}; end`
        );

      case 'Block':
        return printBlock(node.params.map(print), node.body.map(print));

      case 'SimpleParameter':
        return node.name;

      case 'StmtSequence':
        return `(${node.statements.map(print).join('; ')})`;

      case 'MethodCall':
        return printCall(node, node.name, node.qualified ?? false);

      case 'AssignExpr':
        return `${print(node.left)} = ${print(node.right)}`;

      case 'AssignOperation':
        return `${print(node.left)} ${node.operator}= ${print(node.right)}`;

      case 'BinaryOperation':
        return `${print(node.left)} ${node.operator} ${print(node.right)}`;

      case 'LocalVariableAccess':
        return node.name;
      case 'InstanceVariableAccess':
        return `@${node.name}`;
      case 'ClassVariableAccess':
        return `@@${node.name}`;
      case 'GlobalVariableAccess':
        return `$${node.name}`;
      case 'SelfAccess':
        return 'self';

      case 'IntegerLiteral':
        return String(node.value);

      case 'StringLiteral':
        return JSON.stringify(node.value);

      case 'ArrayLiteral':
        return `[${node.elements.map(print).join(', ')}]`;

      case 'RangeLiteral':
        return `${print(node.begin)}${node.inclusive ? '..' : '...'}${print(node.end)}`;

      case 'SplatExpr':
        return `*${print(node.operand)}`;

      case 'ConstantReadAccess':
        return node.scope ? `${print(node.scope)}::${node.name}` : node.name;

      case 'TuplePattern': {
        const elements = node.elements.map((element, j) => {
          const text =
            element.type === 'TuplePattern' ? `(${print(element)})` : print(element);
          return j === node.restIndex ? `*${text}` : text;
        });
        return elements.join(', ');
      }

      case 'ForExpr':
        return (
          `for ${print(node.pattern)} in ${print(node.value)}; ` +
          `${node.body.statements.map(print).join('; ')}; end`
        );
    }
  };

  return print(node);
}

function printVariable(kind: VariableAccessKind): string {
  switch (kind.tag) {
    case 'InstanceVariableAccess':
      return `@${kind.variable.name}`;
    case 'ClassVariableAccess':
      return `@@${kind.variable.name}`;
    case 'GlobalVariableAccess':
      return `$${kind.variable.name}`;
    case 'Self':
      return 'self';
    default:
      return kind.variable.name;
  }
}
