/**
 * Shapes returned by the snippet server for UI objects
 */

export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Point {
  x: number;
  y: number;
}

export type Direction = "DOWN" | "LEFT" | "RIGHT" | "UP";

// Properties of one matched object (getObjInfo, getChildren, findChildObjects)
export interface UiObjectInfo {
  text?: string | null;
  className?: string | null;
  contentDescription?: string | null;
  hint?: string | null;
  resourceName?: string | null;
  packageName?: string | null;
  displayId?: number;
  childCount?: number;
  visibleBounds?: Rect;
  visibleCenter?: Point;
  checkable?: boolean;
  checked?: boolean;
  clickable?: boolean;
  enabled?: boolean;
  focusable?: boolean;
  focused?: boolean;
  longClickable?: boolean;
  scrollable?: boolean;
  selected?: boolean;
}

/** Pixel margin or percentage margin for gestures; never both. */
export interface GestureMargins {
  margin?: number;
  percent?: number;
}
