import type { RemoteAutomationService } from "../../rpc/service.js";
import type { Selector } from "../../selector/selector.js";

export class PinchAction {
  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector
  ) {}

  /**
   * Pinch close; percent is the size of the pinch relative to the object
   */
  async close(percent: number, speed?: number): Promise<boolean> {
    return this.service.call("pinchClose", this.selector.toWire(), percent, speed ?? null);
  }

  async open(percent: number, speed?: number): Promise<boolean> {
    return this.service.call("pinchOpen", this.selector.toWire(), percent, speed ?? null);
  }
}
