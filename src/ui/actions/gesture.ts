import { ApiError } from "../../errors.js";
import type { RemoteAutomationService } from "../../rpc/service.js";
import type { Selector } from "../../selector/selector.js";
import type { Direction, GestureMargins } from "../types.js";
import { NO_MARGINS, toWireMargins, type WireMargins } from "./margins.js";

export type GestureKind = "swipe" | "fling";

export interface GestureOptions {
  /**
   * Swipe length as a percentage of the object's size, 0-100.
   * Fling distance is fixed, so fling only accepts 0.
   */
  percent?: number;
  /** Pixels per second. */
  speed?: number;
}

/**
 * A swipe or fling bound to one direction
 */
export class GestureTo {
  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector,
    readonly kind: GestureKind,
    readonly direction: Direction,
    private readonly margins: WireMargins
  ) {}

  async perform(options: GestureOptions = {}): Promise<boolean> {
    const percent = options.percent ?? 0;
    const speed = options.speed ?? null;

    if (this.kind === "fling") {
      if (percent !== 0) {
        throw new ApiError("fling gesture does not support changing the percent", {
          direction: this.direction,
          percent,
        });
      }
      return this.service.call(
        "fling",
        this.selector.toWire(),
        this.direction,
        speed,
        this.margins.margin,
        this.margins.percent
      );
    }

    if (!(percent >= 0 && percent <= 100)) {
      throw new ApiError("swipe gesture requires percent to be between 0 and 100", {
        direction: this.direction,
        percent,
      });
    }
    return this.service.call(
      "swipeObj",
      this.selector.toWire(),
      this.direction,
      percent,
      speed,
      this.margins.margin,
      this.margins.percent
    );
  }
}

export class GestureAction {
  private wireMargins: WireMargins = NO_MARGINS;

  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector,
    readonly kind: GestureKind
  ) {}

  /**
   * Set the margins the gesture keeps from the object's edges
   */
  margins(margins: GestureMargins): this {
    this.wireMargins = toWireMargins(margins);
    return this;
  }

  down(): GestureTo {
    return this.to("DOWN");
  }

  left(): GestureTo {
    return this.to("LEFT");
  }

  right(): GestureTo {
    return this.to("RIGHT");
  }

  up(): GestureTo {
    return this.to("UP");
  }

  private to(direction: Direction): GestureTo {
    return new GestureTo(this.service, this.selector, this.kind, direction, this.wireMargins);
  }
}
