import { ApiError } from "../../errors.js";
import type { RemoteAutomationService } from "../../rpc/service.js";
import { isEmptyCriteria, type Criteria } from "../../selector/criteria.js";
import { Selector } from "../../selector/selector.js";

export interface DragOptions {
  x?: number;
  y?: number;
  /** Pixels per second. */
  speed?: number;
  /** Criteria matching the object to drop onto. */
  target?: Criteria;
}

export class DragAction {
  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector
  ) {}

  /**
   * Drag this object either to a point or onto another object, not both
   */
  async to(options: DragOptions): Promise<boolean> {
    const { x, y, target } = options;
    const speed = options.speed ?? null;
    const hasTarget = !isEmptyCriteria(target);

    if (x === undefined && y === undefined && target !== undefined && hasTarget) {
      return this.service.call("dragObjToObj", this.selector.toWire(), new Selector(target).toWire(), speed);
    }
    if (x !== undefined && y !== undefined && !hasTarget) {
      return this.service.call("dragObj", this.selector.toWire(), x, y, speed);
    }
    throw new ApiError("Drag to object and drag to coordinates cannot be mixed", { x, y, target });
  }
}
