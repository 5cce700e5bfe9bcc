/**
 * @arch propweave.core.collector
 *
 * Accumulates convention and duplicate-member problems across a whole
 * hierarchy walk, then fails the build once with all of them.
 */
import type { HostType } from '../host/types.js';
import { ErrorCodes, PropertyBuildError, type BuildProblem, type ErrorCode } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export type ProblemKind = 'convention-violation' | 'duplicate-member';

export interface PropertyProblem {
  readonly kind: ProblemKind;
  readonly propertyName: string;
  readonly type: HostType;
  readonly message: string;
}

const PROBLEM_CODES: Record<ProblemKind, ErrorCode> = {
  'convention-violation': ErrorCodes.CONVENTION_VIOLATION,
  'duplicate-member': ErrorCodes.DUPLICATE_MEMBER,
};

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareProblems(a: BuildProblem, b: BuildProblem): number {
  return compareText(a.message, b.message) || compareText(a.code, b.code);
}

export class ProblemCollector {
  private readonly problems = new Map<string, BuildProblem[]>();

  add(problem: PropertyProblem): void {
    const entries = this.problems.get(problem.propertyName) ?? [];
    entries.push({ code: PROBLEM_CODES[problem.kind], message: problem.message });
    this.problems.set(problem.propertyName, entries);
    log.error(`${problem.type.name}.${problem.propertyName}: ${problem.message}`);
  }

  hasProblems(): boolean {
    return this.problems.size > 0;
  }

  /**
   * Problems grouped by property name, names and messages sorted.
   */
  snapshot(): ReadonlyMap<string, readonly BuildProblem[]> {
    const names = [...this.problems.keys()].sort();
    return new Map(names.map((name) => [name, [...(this.problems.get(name) ?? [])].sort(compareProblems)]));
  }

  /**
   * @throws PropertyBuildError listing every problem, when there is any
   */
  throwIfAny(root: HostType): void {
    if (!this.hasProblems()) {
      return;
    }
    const grouped = this.snapshot();
    throw new PropertyBuildError(formatProblems(root.name, grouped), root.name, grouped);
  }
}

/**
 * One numbered line per problem under a header naming the root type.
 */
export function formatProblems(typeName: string, grouped: ReadonlyMap<string, readonly BuildProblem[]>): string {
  const lines = [`Found property errors with type: ${typeName}`];
  let index = 1;
  for (const [name, entries] of grouped) {
    for (const { message } of entries) {
      lines.push(`\t${index})\t${name} -> ${message}`);
      index++;
    }
  }
  return lines.join('\n');
}
