import { ApiError } from "../../errors.js";
import type { GestureMargins } from "../types.js";

export interface WireMargins {
  margin: number | null;
  percent: number | null;
}

export const NO_MARGINS: WireMargins = { margin: null, percent: null };

export function toWireMargins(margins: GestureMargins = {}): WireMargins {
  const { margin, percent } = margins;
  if (margin !== undefined && percent !== undefined) {
    throw new ApiError("Pixel-based and percentage-based margin cannot be mixed", { margin, percent });
  }
  return { margin: margin ?? null, percent: percent ?? null };
}
