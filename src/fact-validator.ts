import type { SynthesisEngine } from './engine';
import type { AstNode, SynthesisDiagnostic } from './types';
import type { DiagnosticReportOptions } from './report';

import { SynthesisError } from './types';
import { formatNodeAddress } from './node-address';
import { reportDiagnostics } from './report';
import { walkAst } from './walker';

/**
 * Expands every node reachable from `root` and returns all defects found,
 * deduplicated, in discovery order.
 *
 * Covered:
 * 1. Conflicts and dangling references, as recorded by the engine while
 *    expanding. A thrown `SynthesisError` (dangling reference, or any
 *    conflict in strict mode) ends the walk; its diagnostic is kept.
 * 2. Location chains that leave the source tree.
 * 3. Variable-declaring nodes without a scope.
 */
export function validateFacts(
  engine: SynthesisEngine,
  root: AstNode = engine.source.root
): SynthesisDiagnostic[] {
  const found: SynthesisDiagnostic[] = [];

  try {
    walkAst(engine, root, node => {
      const location = checkLocation(engine, node);
      if (location) found.push(location);
      found.push(...checkScopes(engine, node));
    });
  } catch (error) {
    if (!(error instanceof SynthesisError)) throw error;
  }

  return dedupe([...engine.diagnostics(), ...found]);
}

/**
 * Throws a formatted report when {@link validateFacts} finds anything.
 */
export function assertValidFacts(
  engine: SynthesisEngine,
  root: AstNode = engine.source.root,
  options: DiagnosticReportOptions = {}
): void {
  reportDiagnostics(validateFacts(engine, root), options);
}

function checkLocation(
  engine: SynthesisEngine,
  node: AstNode
): SynthesisDiagnostic | undefined {
  let current: AstNode = node;
  while (current.type === 'Synthetic') {
    if (engine.explicitLocation(current)) return undefined;
    current = current.parent;
  }
  if (engine.source.has(current)) return undefined;

  const subject = engine.describe(node);
  return {
    code: 'unresolvable-location',
    message: `[synthesis] The location of ${subject} inherits from a "${current.type}" node outside the source tree.`,
    subject,
    facts: []
  };
}

function checkScopes(
  engine: SynthesisEngine,
  node: AstNode
): SynthesisDiagnostic[] {
  return engine
    .declaredVariables(node)
    .filter(variable => engine.variableScope(variable) === undefined)
    .map((variable): SynthesisDiagnostic => {
      const subject = formatNodeAddress(engine.addressOf(node));
      return {
        code: 'missing-scope',
        message: `[synthesis] ${engine.describe(node)} declares "${variable.name}" but has no enclosing scope.`,
        subject,
        facts: [`slot ${variable.slot} -> ${variable.key}`]
      };
    });
}

function dedupe(
  diagnostics: readonly SynthesisDiagnostic[]
): SynthesisDiagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter(({ code, subject, message }) => {
    const key = JSON.stringify([code, subject, message]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
