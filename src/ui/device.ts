import { ApiError } from "../errors.js";
import type { RemoteAutomationService } from "../rpc/service.js";
import { isRelation, type Criteria } from "../selector/criteria.js";
import { Selector } from "../selector/selector.js";
import { UiObject } from "./ui-object.js";

export interface UiDeviceOptions {
  /** Make exists() and wait() on every handle raise instead of returning false. */
  raiseOnMissing?: boolean;
}

export interface SelectorStepInput {
  relation?: string;
  criteria?: Criteria;
}

/**
 * Entry point for building UI object handles on one device
 */
export class UiDevice {
  private readonly raiseOnMissing: boolean;

  constructor(
    readonly service: RemoteAutomationService,
    options: UiDeviceOptions = {}
  ) {
    this.raiseOnMissing = options.raiseOnMissing ?? false;
  }

  /**
   * Handle for the first object matching the criteria
   */
  select(criteria: Criteria): UiObject {
    return new UiObject(this.service, new Selector(criteria), this.raiseOnMissing);
  }

  /**
   * Build a handle from serialized navigation steps. The first step is the
   * starting object and takes no relation; every later step needs one.
   */
  fromSteps(steps: readonly SelectorStepInput[]): UiObject {
    const [first, ...rest] = steps;
    if (!first) {
      throw new ApiError("Selector needs at least one step");
    }
    if (first.relation !== undefined && first.relation !== "self") {
      throw new ApiError(`First selector step cannot have relation '${first.relation}'`, { relation: first.relation });
    }

    let selector = new Selector(first.criteria);
    rest.forEach((step, index) => {
      if (!isRelation(step.relation)) {
        throw new ApiError(`Unknown relation '${String(step.relation)}' at step ${index + 1}`, {
          step: index + 1,
          relation: step.relation,
        });
      }
      selector = selector.append(step.relation, step.criteria);
    });

    return new UiObject(this.service, selector, this.raiseOnMissing);
  }
}
