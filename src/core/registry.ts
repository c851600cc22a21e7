import type { Document } from './document.js';
import type { CheckOptions } from './config.js';
import type { LogicalLine, PhysicalLine, PreviousLogicalLine } from './logical-line.js';
import type { Finding } from './types.js';

/** Everything a checker may read. Checkers never mutate it. */
export interface CheckerContext<L> {
  line: L;
  document: Document;
  options: CheckOptions;
  // Undefined for physical checks and for the first statement of a file
  previous?: PreviousLogicalLine;
}

interface DescriptorBase {
  /** Stable identity, e.g. "tabs_or_spaces" */
  name: string;
  /** Every code this checker can emit */
  codes: readonly string[];
  description: string;
}

export interface PhysicalChecker extends DescriptorBase {
  kind: 'physical';
  evaluate(context: CheckerContext<PhysicalLine>): Finding | undefined;
}

export interface LogicalChecker extends DescriptorBase {
  kind: 'logical';
  // Also evaluated on comment-only lines, with empty text and the comment's tokens
  commentLines: boolean;
  evaluate(context: CheckerContext<LogicalLine>): Finding | undefined;
}

export type CheckerDescriptor = PhysicalChecker | LogicalChecker;

export function physical(
  name: string,
  codes: readonly string[],
  description: string,
  evaluate: PhysicalChecker['evaluate'],
): PhysicalChecker {
  return { kind: 'physical', name, codes, description, evaluate };
}

export function logical(
  name: string,
  codes: readonly string[],
  description: string,
  evaluate: LogicalChecker['evaluate'],
  { commentLines = false }: { commentLines?: boolean } = {},
): LogicalChecker {
  return { kind: 'logical', name, codes, description, evaluate, commentLines };
}

/**
 * Two ordered checker collections assembled once. Registration order is
 * evaluation order, so diagnostics come out in a stable sequence.
 */
export class CheckerRegistry {
  readonly physical: readonly PhysicalChecker[];
  readonly logical: readonly LogicalChecker[];
  private readonly byName: ReadonlyMap<string, CheckerDescriptor>;

  private constructor(descriptors: readonly CheckerDescriptor[]) {
    const byName = new Map<string, CheckerDescriptor>();
    const physicalCheckers: PhysicalChecker[] = [];
    const logicalCheckers: LogicalChecker[] = [];
    for (const d of descriptors) {
      if (byName.has(d.name)) throw new Error(`Checker "${d.name}" already registered`);
      byName.set(d.name, d);
      if (d.kind === 'physical') physicalCheckers.push(d);
      else logicalCheckers.push(d);
    }
    this.byName = byName;
    this.physical = Object.freeze(physicalCheckers);
    this.logical = Object.freeze(logicalCheckers);
  }

  static of(descriptors: readonly CheckerDescriptor[]): CheckerRegistry {
    return new CheckerRegistry(descriptors);
  }

  static builder(): CheckerRegistryBuilder {
    return new CheckerRegistryBuilder();
  }

  get(name: string): CheckerDescriptor | undefined {
    return this.byName.get(name);
  }

  all(): CheckerDescriptor[] {
    return [...this.physical, ...this.logical];
  }

  /** The checker responsible for a code. */
  findByCode(code: string): CheckerDescriptor | undefined {
    return this.all().find((d) => d.codes.includes(code));
  }
}

export class CheckerRegistryBuilder {
  private readonly descriptors: CheckerDescriptor[] = [];

  add(...descriptors: CheckerDescriptor[]): this {
    this.descriptors.push(...descriptors);
    return this;
  }

  build(): CheckerRegistry {
    return CheckerRegistry.of(this.descriptors);
  }
}
