import { ApiError } from "../../errors.js";
import type { RemoteAutomationService } from "../../rpc/service.js";
import type { Selector } from "../../selector/selector.js";
import { DEFAULT_UI_WAIT_MS, guardedTimeout, toMilliseconds, type TimeUnit } from "../../utils/time.js";

export interface ClickOptions {
  /** How long to hold the click. */
  duration?: TimeUnit;
  /** @deprecated use `duration` */
  timeout?: TimeUnit;
  /** X coordinate of the point to click, within the visible bounds. */
  x?: number;
  y?: number;
}

/**
 * Click actions on one UI object
 */
export class ClickAction {
  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector
  ) {}

  /**
   * Click the object, optionally at a point and/or holding for a duration.
   * Both x and y are needed to click on a point.
   */
  async perform(options: ClickOptions = {}): Promise<boolean> {
    const { x, y } = options;
    let duration = options.duration;

    if (options.timeout !== undefined) {
      process.emitWarning("The 'timeout' option of click is deprecated, use 'duration' instead.", {
        type: "DeprecationWarning",
        code: "UIOBJECT_DEP_CLICK_TIMEOUT",
      });
      duration = options.timeout;
    }

    const durationMs = duration === undefined ? null : toMilliseconds(duration);

    if (x !== undefined && y !== undefined) {
      return this.service.call("clickObjPoint", this.selector.toWire(), x, y, durationMs);
    }
    if (x === undefined && y === undefined) {
      return this.service.call("clickObj", this.selector.toWire(), durationMs);
    }
    throw new ApiError("Must provide both x and y to click on point", { x, y });
  }

  /**
   * Click the lower right corner of the visible bounds
   */
  async bottomRight(): Promise<boolean> {
    const bounds = await this.service.call("getVisibleBounds", this.selector.toWire());
    if (!bounds) {
      return false;
    }
    return this.service.call("click", bounds.right, bounds.bottom);
  }

  /**
   * Click the upper left corner of the visible bounds
   */
  async topLeft(): Promise<boolean> {
    const bounds = await this.service.call("getVisibleBounds", this.selector.toWire());
    if (!bounds) {
      return false;
    }
    return this.service.call("click", bounds.left, bounds.top);
  }

  /**
   * Click and wait for a window transition.
   * Resolves true if the window changed within the timeout.
   */
  async wait(timeout: TimeUnit = DEFAULT_UI_WAIT_MS): Promise<boolean> {
    const timeoutMs = guardedTimeout(timeout, this.service.rpcTimeoutMs, "click.wait");
    return this.service.call("clickObjAndWait", this.selector.toWire(), timeoutMs);
  }
}
