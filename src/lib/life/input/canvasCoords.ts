import type { CellCoord } from "../types";

export interface CanvasBounds {
  left: number;
  top: number;
  width: number;
  height: number;
}

type CanvasBoxElement = Pick<
  HTMLElement,
  "getBoundingClientRect" | "clientLeft" | "clientTop" | "clientWidth" | "clientHeight"
>;

/**
 * Bounds of the area the board is drawn on, inside any border
 */
export function canvasContentBounds(element: CanvasBoxElement): CanvasBounds {
  const rect = element.getBoundingClientRect();
  return {
    left: rect.left + element.clientLeft,
    top: rect.top + element.clientTop,
    width: element.clientWidth,
    height: element.clientHeight,
  };
}

/**
 * Convert client coordinates to the cell under the pointer.
 * Returns null outside the board so out-of-range cells never reach the core.
 */
export function clientToCell(
  clientX: number,
  clientY: number,
  bounds: CanvasBounds,
  gridSize: { width: number; height: number }
): CellCoord | null {
  const canvasX = clientX - bounds.left;
  const canvasY = clientY - bounds.top;

  if (
    bounds.width <= 0 ||
    bounds.height <= 0 ||
    canvasX < 0 ||
    canvasY < 0 ||
    canvasX >= bounds.width ||
    canvasY >= bounds.height
  ) {
    return null;
  }

  return {
    col: Math.min(Math.floor((canvasX / bounds.width) * gridSize.width), gridSize.width - 1),
    row: Math.min(Math.floor((canvasY / bounds.height) * gridSize.height), gridSize.height - 1),
  };
}
