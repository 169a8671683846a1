import type { ReadonlyGrid } from "../types";

export interface CellTheme {
  name: string;
  alive: string;
  dead: string;
  gridLine: string;
}

export const CELL_THEMES = {
  classic: { name: "Classic", alive: "#f8fafc", dead: "#0f172a", gridLine: "#1e293b" },
  ocean: { name: "Ocean", alive: "#38bdf8", dead: "#082f49", gridLine: "#0c4a6e" },
  ember: { name: "Ember", alive: "#fb923c", dead: "#1c1917", gridLine: "#292524" },
} satisfies Record<string, CellTheme>;

export type CellThemeName = keyof typeof CELL_THEMES;

export function isCellThemeName(value: string): value is CellThemeName {
  return Object.prototype.hasOwnProperty.call(CELL_THEMES, value);
}

type CellPainter = Pick<CanvasRenderingContext2D, "fillStyle" | "fillRect">;

/**
 * Paint every cell as a filled square, leaving a 1px gap for grid lines
 */
export function drawBoard(
  ctx: CellPainter,
  grid: ReadonlyGrid,
  canvasSize: { width: number; height: number },
  theme: CellTheme = CELL_THEMES.classic
): void {
  const cellWidth = canvasSize.width / grid.width;
  const cellHeight = canvasSize.height / grid.height;
  const gap = cellWidth > 4 && cellHeight > 4 ? 1 : 0;

  ctx.fillStyle = theme.gridLine;
  ctx.fillRect(0, 0, canvasSize.width, canvasSize.height);

  grid.forEachCell((alive, col, row) => {
    ctx.fillStyle = alive ? theme.alive : theme.dead;
    ctx.fillRect(
      col * cellWidth,
      row * cellHeight,
      cellWidth - gap,
      cellHeight - gap
    );
  });
}
