import React from "react";
import { Card, CardContent } from "@/shared/ui/card";
import type { PerformanceMetrics } from "../core/PerformanceTracker";

interface PerformanceViewerProps {
  metrics: PerformanceMetrics;
  isVisible: boolean;
}

interface MetricConfig {
  key: keyof PerformanceMetrics;
  label: string;
  format: (value: number) => string;
  className?: (value: number) => string;
}

const METRIC_DISPLAY_CONFIG: MetricConfig[] = [
  {
    key: "fps",
    label: "fps:",
    format: (value) => value.toFixed(0),
    className: (fps) => {
      if (fps >= 55) return "text-green-400";
      if (fps >= 30) return "text-yellow-400";
      return "text-red-400";
    },
  },
  {
    key: "transition",
    label: "gen:",
    format: (value) => `${value.toFixed(2)}ms`,
  },
  {
    key: "redraw",
    label: "draw:",
    format: (value) => `${value.toFixed(2)}ms`,
  },
];

export const PerformanceViewer: React.FC<PerformanceViewerProps> = React.memo(
  ({ metrics, isVisible }) => {
    if (!isVisible) return null;

    return (
      <Card className="fixed top-4 left-4 z-50 w-32 bg-black/80 text-white border-gray-600">
        <CardContent className="p-3 space-y-1">
          {METRIC_DISPLAY_CONFIG.map((config) => {
            const value = metrics[config.key];
            return (
              <div
                key={config.key}
                className="flex justify-between text-xs font-mono"
              >
                <span>{config.label}</span>
                <span className={config.className?.(value)}>
                  {config.format(value)}
                </span>
              </div>
            );
          })}
        </CardContent>
      </Card>
    );
  }
);
