import type { Criteria, CriteriaValue, Relation } from "./criteria.js";

export interface SelectorStep {
  readonly relation: Relation | "self";
  readonly criteria: Criteria;
}

/**
 * Wire form of a selector. Keys are `${index}:${relation}` so the object keeps
 * step order and a relation may appear more than once.
 */
export type SelectorWire = Record<string, Record<string, CriteriaValue>>;

/**
 * Ordered navigation path from the implicit root to a target element.
 *
 * The first step holds the criteria for the starting element; every later step
 * moves along a relation (child, parent, sibling, ...). Selectors never change
 * after construction: append() returns a new chain.
 */
export class Selector {
  private chain: readonly SelectorStep[];

  constructor(criteria: Criteria = {}) {
    this.chain = [{ relation: "self", criteria: { ...criteria } }];
  }

  private static fromSteps(steps: readonly SelectorStep[]): Selector {
    const selector = new Selector();
    selector.chain = steps;
    return selector;
  }

  get steps(): readonly SelectorStep[] {
    return this.chain;
  }

  append(relation: Relation, criteria: Criteria = {}): Selector {
    return Selector.fromSteps([...this.chain, { relation, criteria: { ...criteria } }]);
  }

  copy(): Selector {
    return Selector.fromSteps(this.chain.map((step) => ({ relation: step.relation, criteria: { ...step.criteria } })));
  }

  toWire(): SelectorWire {
    const wire: SelectorWire = {};
    this.chain.forEach((step, index) => {
      wire[`${index}:${step.relation}`] = { ...step.criteria };
    });
    return wire;
  }

  toString(): string {
    return `Selector${JSON.stringify(this.toWire())}`;
  }
}
