import React, { useCallback, useEffect, useRef, useState } from "react";
import {
  CELL_THEMES,
  canvasContentBounds,
  clientToCell,
  DEFAULT_LIFE_CONFIG,
  drawBoard,
  formatStatus,
  LifeEngine,
  LifeError,
  type LifeCommand,
  type LifeInputEvent,
} from "@/lib/life";
import {
  PerformanceTracker,
  PerformanceViewer,
  usePerformanceToggle,
} from "@/lib/performance";
import { usePersistedState } from "@/utils/localStorage.utils";
import {
  Card,
  CardContent,
  CardDescription,
  CardHeader,
  CardTitle,
} from "@/shared/ui/card";
import { Separator } from "@/shared/ui/separator";
import LifeControls from "./LifeControls";
import {
  DEFAULT_PREFERENCES,
  isLifePreferences,
  PREFERENCES_KEY,
} from "./preferences";

const CANVAS_WIDTH = 576;
const CANVAS_HEIGHT = 384;

interface StatusLine {
  text: string;
  isRunning: boolean;
}

export const GameOfLife: React.FC = () => {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const engineRef = useRef<LifeEngine | null>(null);
  const trackerRef = useRef(new PerformanceTracker());
  const [preferences, setPreferences] = usePersistedState(
    PREFERENCES_KEY,
    DEFAULT_PREFERENCES,
    isLifePreferences
  );
  const preferencesRef = useRef(preferences);
  preferencesRef.current = preferences;

  const [status, setStatus] = useState<StatusLine | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [restartCount, setRestartCount] = useState(0);
  const showPerformance = usePerformanceToggle();
  const [metrics, setMetrics] = useState(() => trackerRef.current.getMetrics());

  const config = DEFAULT_LIFE_CONFIG;

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const ctx = canvas.getContext("2d");
    if (!ctx) {
      setError("Canvas 2D rendering is not available in this browser");
      return;
    }

    let engine: LifeEngine;
    try {
      engine = new LifeEngine(
        { ...config, tickIntervalMs: preferencesRef.current.tickIntervalMs },
        { performance: trackerRef.current }
      );
    } catch (err) {
      setError(
        err instanceof LifeError
          ? err.baseMessage
          : `Error: ${err instanceof Error ? err.message : "Unknown error"}`
      );
      return;
    }

    engine.registerConsumer("boardNeedsRedraw", (view) => {
      drawBoard(
        ctx,
        view.grid,
        { width: canvas.width, height: canvas.height },
        CELL_THEMES[preferencesRef.current.theme]
      );
    });
    engine.registerConsumer("statusNeedsRedraw", (view) => {
      setStatus({
        text: formatStatus(view),
        isRunning: view.pendingRunState === "running",
      });
    });

    engineRef.current = engine;
    trackerRef.current.clear();
    engine.start();
    setError(null);

    return () => {
      engine.destroy();
      engineRef.current = null;
    };
  }, [config, restartCount]);

  useEffect(() => {
    engineRef.current?.setTickInterval(preferences.tickIntervalMs);
  }, [preferences.tickIntervalMs]);

  useEffect(() => {
    engineRef.current?.requestRedraw();
  }, [preferences.theme]);

  useEffect(() => {
    if (!showPerformance) return;

    const intervalId = window.setInterval(() => {
      setMetrics(trackerRef.current.getMetrics());
    }, 250);
    return () => window.clearInterval(intervalId);
  }, [showPerformance]);

  const send = useCallback((event: LifeInputEvent) => {
    engineRef.current?.enqueue(event);
  }, []);

  const handleCommand = useCallback(
    (command: LifeCommand) => send({ type: command }),
    [send]
  );

  const handleRestart = useCallback(() => {
    setStatus(null);
    setRestartCount((count) => count + 1);
  }, []);

  const handleCanvasMouseDown = (event: React.MouseEvent<HTMLCanvasElement>) => {
    const cell = clientToCell(
      event.clientX,
      event.clientY,
      canvasContentBounds(event.currentTarget),
      { width: config.width, height: config.height }
    );
    if (cell) {
      send({ type: "toggleCell", ...cell });
    }
  };

  return (
    <Card className="w-fit mx-auto">
      <PerformanceViewer metrics={metrics} isVisible={showPerformance} />

      <CardHeader className="text-center">
        <CardTitle>Conway's Game of Life</CardTitle>
        <CardDescription>
          {config.width}×{config.height} grid • click cells to toggle them
        </CardDescription>
      </CardHeader>

      <CardContent>
        <div className="flex gap-6 items-start">
          {/* Board on the left */}
          <div className="flex-shrink-0">
            <canvas
              ref={canvasRef}
              width={CANVAS_WIDTH}
              height={CANVAS_HEIGHT}
              onMouseDown={handleCanvasMouseDown}
              className="border-2 border-border rounded-lg shadow-lg cursor-pointer"
            />
          </div>

          {/* Controls on the right */}
          <div className="flex flex-col space-y-4 min-w-48">
            {error && (
              <div className="bg-destructive/10 border border-destructive/20 text-destructive rounded-md p-3 text-sm">
                <strong>Error:</strong> {error}
              </div>
            )}

            <LifeControls
              isReady={status !== null && !error}
              isRunning={status?.isRunning ?? false}
              onCommand={handleCommand}
              onRestart={handleRestart}
              tickIntervalMs={preferences.tickIntervalMs}
              onTickIntervalChange={(tickIntervalMs) =>
                setPreferences((prev) => ({ ...prev, tickIntervalMs }))
              }
              theme={preferences.theme}
              onThemeChange={(theme) =>
                setPreferences((prev) => ({ ...prev, theme }))
              }
            />

            <Separator />

            <div className="space-y-2 text-sm">
              <h3 className="text-muted-foreground">Status</h3>
              <p
                className={`font-mono ${
                  status?.isRunning ? "text-green-600" : "text-muted-foreground"
                }`}
              >
                {status?.text ?? "Initializing..."}
              </p>
            </div>
          </div>
        </div>
      </CardContent>
    </Card>
  );
};
