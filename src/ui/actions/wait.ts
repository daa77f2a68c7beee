import { UiObjectSearchError } from "../../errors.js";
import type { RemoteAutomationService } from "../../rpc/service.js";
import type { Selector } from "../../selector/selector.js";
import { DEFAULT_UI_WAIT_MS, guardedTimeout, type TimeUnit } from "../../utils/time.js";

/**
 * Waits for one UI object to appear or disappear.
 *
 * Every timeout must stay below the RPC channel's own timeout; longer values
 * are rejected before anything is sent.
 */
export class WaitAction {
  constructor(
    private readonly service: RemoteAutomationService,
    private readonly selector: Selector,
    private readonly raiseOnMissing = false
  ) {}

  /**
   * Wait for the object to appear, then click it.
   * Never raises a search error; resolves false if it did not appear.
   */
  async click(timeout: TimeUnit = DEFAULT_UI_WAIT_MS): Promise<boolean> {
    const timeoutMs = guardedTimeout(timeout, this.service.rpcTimeoutMs, "wait.click");
    if (await this.service.call("waitForExists", this.selector.toWire(), timeoutMs)) {
      return this.service.call("clickObj", this.selector.toWire(), null);
    }
    return false;
  }

  async exists(timeout: TimeUnit = DEFAULT_UI_WAIT_MS, raiseError = false): Promise<boolean> {
    const timeoutMs = guardedTimeout(timeout, this.service.rpcTimeoutMs, "wait.exists");
    if (await this.service.call("waitForExists", this.selector.toWire(), timeoutMs)) {
      return true;
    }
    if (this.raiseOnMissing || raiseError) {
      throw new UiObjectSearchError(`Not found ${this.selector} over ${timeoutMs} ms`);
    }
    return false;
  }

  async gone(timeout: TimeUnit = DEFAULT_UI_WAIT_MS, raiseError = false): Promise<boolean> {
    const timeoutMs = guardedTimeout(timeout, this.service.rpcTimeoutMs, "wait.gone");
    if (await this.service.call("waitUntilGone", this.selector.toWire(), timeoutMs)) {
      return true;
    }
    if (this.raiseOnMissing || raiseError) {
      throw new UiObjectSearchError(`Still found ${this.selector} over ${timeoutMs} ms`);
    }
    return false;
  }

  async assertExists(message: string, timeout: TimeUnit = DEFAULT_UI_WAIT_MS): Promise<void> {
    try {
      await this.exists(timeout, true);
    } catch (error) {
      if (error instanceof UiObjectSearchError) {
        throw new UiObjectSearchError(message, { cause: error });
      }
      throw error;
    }
  }

  async assertGone(message: string, timeout: TimeUnit = DEFAULT_UI_WAIT_MS): Promise<void> {
    try {
      await this.gone(timeout, true);
    } catch (error) {
      if (error instanceof UiObjectSearchError) {
        throw new UiObjectSearchError(message, { cause: error });
      }
      throw error;
    }
  }
}
