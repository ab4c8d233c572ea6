import type { DiagnosticCode, SynthesisDiagnostic } from './types';

/**
 * Defect severity & actionability
 * -------------------------------
 * Every diagnostic marks a rule-authoring defect: none is expected against a
 * well-formed tree, and the production query path never branches on them.
 * They differ in what the rule author can do about them:
 *
 * - `child-conflict` / `location-conflict`: two rules disagree. The fact
 *   lists name both rules; one of them must give way. Lenient engines keep
 *   answering with the first fact, so the defect only surfaces in
 *   validation unless `strict` is set.
 *
 * - `dangling-reference`: a rule assumed a child that does not exist
 *   (an argument index past the arity, a missing receiver). Always thrown
 *   at emission time as well.
 *
 * - `unresolvable-location` / `missing-scope`: the fact set escapes the
 *   source tree. These indicate a rule that references foreign nodes.
 *
 * Hint policy
 * -----------
 * Only the conflict codes carry a hint: the remedy is the same for every
 * conflict, while the other codes depend on the rule's own assumptions.
 */

export type DiagnosticReportOptions = {
  /**
   * What was validated (e.g. a file name), appended to the error header.
   */
  context?: string;

  /**
   * Maximum number of subjects to list in the summary line.
   * @default 5
   */
  maxPreview?: number;
};

/**
 * Formats a summary of diagnostics grouped by code, with an optional
 * preview of the affected subjects.
 *
 * @returns Summary string (e.g.
 *          `Summary: diagnostics=3 (child-conflict=2, missing-scope=1);
 *                    preview: "#4 [0]" (child-conflict), … (2 more)`);
 *          undefined if there is nothing to report
 */
export function formatDiagnostics(
  diagnostics: readonly SynthesisDiagnostic[],
  options: Pick<DiagnosticReportOptions, 'maxPreview'> = {}
): string | undefined {
  // Nothing to report
  if (diagnostics.length === 0) return undefined;

  const parts = [
    `Summary: diagnostics=${diagnostics.length} (${formatCodeDistribution(diagnostics)})`
  ];

  const previewLimit = options.maxPreview != null ? options.maxPreview : 5;

  // Respect disabled preview
  if (previewLimit > 0) {
    parts.push(formatSubjectPreview(diagnostics, previewLimit));
  }

  return parts.join('; ');
}

/**
 * Counts diagnostics per code, in order of first occurrence
 * (e.g. "child-conflict=2, missing-scope=1").
 */
function formatCodeDistribution(
  diagnostics: readonly SynthesisDiagnostic[]
): string {
  const countByCode = new Map<DiagnosticCode, number>();

  for (const { code } of diagnostics) {
    countByCode.set(code, (countByCode.get(code) ?? 0) + 1);
  }

  return Array.from(countByCode.entries())
    .map(([code, count]) => `${code}=${count}`)
    .join(', ');
}

function formatSubjectPreview(
  diagnostics: readonly SynthesisDiagnostic[],
  limit: number
): string {
  const items = diagnostics
    .slice(0, limit)
    .map(({ subject, code }) => `"${subject}" (${code})`);

  // Truncation indicator
  if (diagnostics.length > limit) {
    items.push(`… (${diagnostics.length - limit} more)`);
  }

  return `preview: ${items.join(', ')}`;
}

function formatHint(code: DiagnosticCode): string | undefined {
  switch (code) {
    case 'child-conflict':
    case 'location-conflict':
      return (
        'Hint: remove the overlapping fact from one of the rules, or run the ' +
        'engine with `strict: true` to stop at the query that uncovers it.'
      );

    default:
      return undefined;
  }
}

/**
 * Report (and throw) a non-empty list of diagnostics.
 *
 * The message leads with the first diagnostic and its facts, followed by
 * an optional hint and the summary of all diagnostics.
 *
 * @throws Always, unless `diagnostics` is empty
 */
export function reportDiagnostics(
  diagnostics: readonly SynthesisDiagnostic[],
  options: DiagnosticReportOptions = {}
): void {
  const [first] = diagnostics;
  if (!first) return;

  const header = options.context
    ? `[synthesis] Invalid fact set for ${options.context}.`
    : '[synthesis] Invalid fact set.';

  const messageParts = [
    header,
    `First defect (${first.code}): ${first.message}`,
    ...first.facts.map(fact => `  - ${fact}`)
  ];

  const hint = formatHint(first.code);
  if (hint) messageParts.push(hint);

  const summaryLine = formatDiagnostics(diagnostics, options);
  if (summaryLine) messageParts.push(summaryLine);

  throw new Error(messageParts.join('\n'));
}
