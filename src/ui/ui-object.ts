import { UiObjectSearchError } from "../errors.js";
import type { RemoteAutomationService } from "../rpc/service.js";
import type { Criteria, Relation } from "../selector/criteria.js";
import { Selector } from "../selector/selector.js";
import { ClickAction } from "./actions/click.js";
import { DragAction } from "./actions/drag.js";
import { GestureAction } from "./actions/gesture.js";
import { PinchAction } from "./actions/pinch.js";
import { ScrollAction } from "./actions/scroll.js";
import { WaitAction } from "./actions/wait.js";
import type { GestureMargins, Point, Rect, UiObjectInfo } from "./types.js";

/**
 * Client-side handle to a UI element on the device.
 *
 * A UiObject holds no reference to a live element: it pairs a selector chain
 * with the automation service, and every query re-resolves the chain on the
 * device. Navigation returns new handles and never touches this one.
 */
export class UiObject {
  constructor(
    private readonly service: RemoteAutomationService,
    readonly selector: Selector,
    private readonly raiseOnMissing = false
  ) {}

  private derive(relation: Relation, criteria?: Criteria): UiObject {
    return new UiObject(this.service, this.selector.append(relation, criteria), this.raiseOnMissing);
  }

  // ============ Navigation ============

  parent(): UiObject {
    return this.derive("parent");
  }

  ancestor(criteria?: Criteria): UiObject {
    return this.derive("ancestor", criteria);
  }

  /** Direct child matching the criteria. */
  child(criteria?: Criteria): UiObject {
    return this.derive("child", criteria);
  }

  sibling(criteria?: Criteria): UiObject {
    return this.derive("sibling", criteria);
  }

  /** Closest matching object below this one. */
  bottom(criteria?: Criteria): UiObject {
    return this.derive("bottom", criteria);
  }

  left(criteria?: Criteria): UiObject {
    return this.derive("left", criteria);
  }

  right(criteria?: Criteria): UiObject {
    return this.derive("right", criteria);
  }

  top(criteria?: Criteria): UiObject {
    return this.derive("top", criteria);
  }

  // ============ Actions ============

  click(): ClickAction {
    return new ClickAction(this.service, this.selector);
  }

  drag(): DragAction {
    return new DragAction(this.service, this.selector);
  }

  swipe(margins?: GestureMargins): GestureAction {
    const action = new GestureAction(this.service, this.selector, "swipe");
    return margins ? action.margins(margins) : action;
  }

  fling(margins?: GestureMargins): GestureAction {
    const action = new GestureAction(this.service, this.selector, "fling");
    return margins ? action.margins(margins) : action;
  }

  pinch(): PinchAction {
    return new PinchAction(this.service, this.selector);
  }

  scroll(margins?: GestureMargins): ScrollAction {
    const action = new ScrollAction(this.service, this.selector);
    return margins ? action.margins(margins) : action;
  }

  wait(): WaitAction {
    return new WaitAction(this.service, this.selector, this.raiseOnMissing);
  }

  async longClick(): Promise<boolean> {
    return this.service.call("longClick", this.selector.toWire());
  }

  /**
   * Set the text of an editable field
   */
  async setText(text: string): Promise<boolean> {
    return this.service.call("setText", this.selector.toWire(), text);
  }

  async clearText(): Promise<boolean> {
    return this.service.call("clear", this.selector.toWire());
  }

  // ============ Queries ============

  async exists(): Promise<boolean> {
    return this.lookup(this.raiseOnMissing);
  }

  // `strict` applies to this call only; the handle's own mode never changes
  private async lookup(strict: boolean): Promise<boolean> {
    const found = await this.service.call("exists", this.selector.toWire());
    if (!found && strict) {
      throw new UiObjectSearchError(`Not found ${this.selector}`);
    }
    return found;
  }

  /**
   * Fail with `message` unless the object exists, regardless of this
   * handle's own strict mode. The original search error is kept as `cause`.
   */
  async assertExists(message: string): Promise<void> {
    try {
      await this.lookup(true);
    } catch (error) {
      if (error instanceof UiObjectSearchError) {
        throw new UiObjectSearchError(message, { cause: error });
      }
      throw error;
    }
  }

  /** Number of objects matching this selector. */
  async count(): Promise<number> {
    const objects = await this.service.call("findObjects", this.selector.toWire());
    return objects.length;
  }

  async children(): Promise<UiObjectInfo[]> {
    return this.service.call("getChildren", this.selector.toWire());
  }

  /**
   * All objects under this one matching the criteria
   */
  async find(criteria: Criteria): Promise<UiObjectInfo[]> {
    return this.service.call("findChildObjects", this.selector.toWire(), new Selector(criteria).toWire());
  }

  async has(criteria: Criteria): Promise<boolean> {
    return this.service.call("hasChildObject", this.selector.toWire(), new Selector(criteria).toWire());
  }

  async info(): Promise<UiObjectInfo> {
    return this.service.call("getObjInfo", this.selector.toWire());
  }

  /** Null when nothing of the object is on screen. */
  async visibleBounds(): Promise<Rect | null> {
    const rect = await this.service.call("getVisibleBounds", this.selector.toWire());
    return rect && { left: rect.left, top: rect.top, right: rect.right, bottom: rect.bottom };
  }

  async visibleCenter(): Promise<Point | null> {
    const point = await this.service.call("getVisibleCenter", this.selector.toWire());
    return point && { x: point.x, y: point.y };
  }

  async displayId(): Promise<number> {
    return this.service.call("getDisplayId", this.selector.toWire());
  }

  async text(): Promise<string> {
    return this.service.call("getText", this.selector.toWire());
  }

  async className(): Promise<string> {
    return this.service.call("getClassName", this.selector.toWire());
  }

  /** Content description. */
  async description(): Promise<string> {
    return this.service.call("getContentDescription", this.selector.toWire());
  }

  async hint(): Promise<string> {
    return this.service.call("getHint", this.selector.toWire());
  }

  async packageName(): Promise<string> {
    return this.service.call("getApplicationPackage", this.selector.toWire());
  }

  /** Fully qualified resource name of the object's id. */
  async resourceId(): Promise<string> {
    return this.service.call("getResourceName", this.selector.toWire());
  }

  async isCheckable(): Promise<boolean> {
    return this.service.call("isCheckable", this.selector.toWire());
  }

  async isChecked(): Promise<boolean> {
    return this.service.call("isChecked", this.selector.toWire());
  }

  async isClickable(): Promise<boolean> {
    return this.service.call("isClickable", this.selector.toWire());
  }

  async isEnabled(): Promise<boolean> {
    return this.service.call("isEnabled", this.selector.toWire());
  }

  async isFocusable(): Promise<boolean> {
    return this.service.call("isFocusable", this.selector.toWire());
  }

  async isFocused(): Promise<boolean> {
    return this.service.call("isFocused", this.selector.toWire());
  }

  async isLongClickable(): Promise<boolean> {
    return this.service.call("isLongClickable", this.selector.toWire());
  }

  async isScrollable(): Promise<boolean> {
    return this.service.call("isScrollable", this.selector.toWire());
  }

  async isSelected(): Promise<boolean> {
    return this.service.call("isSelected", this.selector.toWire());
  }
}
