import { ApiError } from "../../errors.js";
import type { RemoteAutomationService } from "../../rpc/service.js";
import { isEmptyCriteria, type Criteria } from "../../selector/criteria.js";
import { Selector } from "../../selector/selector.js";
import type { UiObject } from "../ui-object.js";
import type { Direction, GestureMargins } from "../types.js";
import { NO_MARGINS, toWireMargins, type WireMargins } from "./margins.js";

/**
 * Scroll shapes, mutually exclusive:
 * - `percent` (and optionally `speed`): scroll a fixed distance
 * - `until`: scroll until an object matching the criteria is visible
 * - `target`: scroll until another UI object is visible
 * - nothing: scroll until the end is reached
 */
export interface ScrollOptions {
  percent?: number;
  /** Pixels per second; only valid together with `percent`. */
  speed?: number;
  target?: UiObject;
  until?: Criteria;
}

export class ScrollTo {
  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector,
    readonly direction: Direction,
    private readonly margins: WireMargins
  ) {}

  async perform(options: ScrollOptions = {}): Promise<boolean> {
    const { percent, speed, target, until } = options;
    const { margin, percent: marginPercent } = this.margins;
    const hasCriteria = !isEmptyCriteria(until);

    if (percent !== undefined && target === undefined && !hasCriteria) {
      return this.service.call(
        "scroll",
        this.selector.toWire(),
        this.direction,
        percent,
        speed ?? null,
        margin,
        marginPercent
      );
    }

    if (percent === undefined && speed === undefined) {
      if (target === undefined && until !== undefined && hasCriteria) {
        return this.service.call(
          "scrollUntil",
          this.selector.toWire(),
          new Selector(until).toWire(),
          this.direction,
          margin,
          marginPercent
        );
      }
      if (target !== undefined && !hasCriteria) {
        return this.service.call(
          "scrollUntil",
          this.selector.toWire(),
          target.selector.toWire(),
          this.direction,
          margin,
          marginPercent
        );
      }
      if (target === undefined && !hasCriteria) {
        return this.service.call("scrollUntilFinished", this.selector.toWire(), this.direction, margin, marginPercent);
      }
    }

    throw new ApiError("Scroll by percentage and scroll by condition cannot be mixed", {
      direction: this.direction,
      percent,
      speed,
      target: target?.selector.toWire(),
      until,
    });
  }

  /**
   * Scroll until an object matching the criteria is visible, then click it.
   * Resolves false without clicking when the object never shows up.
   */
  async click(criteria: Criteria): Promise<boolean> {
    if (isEmptyCriteria(criteria)) {
      throw new ApiError("Target to scroll to is not defined", { direction: this.direction });
    }
    if (await this.perform({ until: criteria })) {
      return this.service.call("clickObj", new Selector(criteria).toWire(), null);
    }
    return false;
  }
}

export class ScrollAction {
  private wireMargins: WireMargins = NO_MARGINS;

  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector
  ) {}

  margins(margins: GestureMargins): this {
    this.wireMargins = toWireMargins(margins);
    return this;
  }

  down(): ScrollTo {
    return this.to("DOWN");
  }

  left(): ScrollTo {
    return this.to("LEFT");
  }

  right(): ScrollTo {
    return this.to("RIGHT");
  }

  up(): ScrollTo {
    return this.to("UP");
  }

  private to(direction: Direction): ScrollTo {
    return new ScrollTo(this.service, this.selector, direction, this.wireMargins);
  }
}
