/**
 * @fileoverview DecisionTable - ordered (predicate, outcome) rows.
 *
 * Precedence rules read top to bottom: the first row whose predicate holds
 * produces the outcome. Keeping the rows as data makes each precedence order
 * testable on its own.
 *
 * @module @extent/core/support/DecisionTable
 */

export interface DecisionRow<I, O> {
  /** Short label, surfaced by {@link DecisionTable.explain} */
  readonly label: string;
  readonly when: (input: I) => boolean;
  readonly then: (input: I) => O;
}

export interface Decision<O> {
  readonly label: string;
  readonly outcome: O;
}

export class DecisionTable<I, O> {
  constructor(private readonly rows: ReadonlyArray<DecisionRow<I, O>>) {}

  /** Labels in evaluation order. */
  get labels(): string[] {
    return this.rows.map((row) => row.label);
  }

  /** First matching row's outcome, or undefined when no row matches. */
  evaluate(input: I): O | undefined {
    return this.explain(input)?.outcome;
  }

  /** Like {@link evaluate} but also reports which row decided. */
  explain(input: I): Decision<O> | undefined {
    for (const row of this.rows) {
      if (row.when(input)) return { label: row.label, outcome: row.then(input) };
    }
    return undefined;
  }
}

export function decisionTable<I, O>(rows: ReadonlyArray<DecisionRow<I, O>>): DecisionTable<I, O> {
  return new DecisionTable(rows);
}

/** A row that always matches; use it last. */
export function otherwise<I, O>(label: string, then: (input: I) => O): DecisionRow<I, O> {
  return { label, when: () => true, then };
}
