import type { LifeView, ReadonlyGrid, RunState } from "../types";

const RUN_STATE_LABELS: Record<RunState, string> = {
  running: "Running",
  paused: "Paused",
};

export function renderBoardText(
  grid: ReadonlyGrid,
  glyphs: { alive: string; dead: string } = { alive: "#", dead: "." }
): string {
  const lines: string[] = [];
  let line = "";

  grid.forEachCell((alive, col) => {
    line += alive ? glyphs.alive : glyphs.dead;
    if (col === grid.width - 1) {
      lines.push(line);
      line = "";
    }
  });

  return lines.join("\n");
}

export function runStateLabel(state: RunState): string {
  return RUN_STATE_LABELS[state];
}

/**
 * Status line for the state that will hold after this frame.
 * Reads the pending run state so a pause shows up without a frame of lag.
 */
export function formatStatus(view: LifeView): string {
  return [
    runStateLabel(view.pendingRunState),
    `Iteration ${view.iterations}`,
    `Alive ${view.grid.aliveCount}`,
  ].join(" · ");
}
