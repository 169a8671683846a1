/**
 * Performance Feature Public API
 *  - Frame rate
 *  - Generation compute time
 *  - Board redraw time
 */

export {
  PerformanceTracker,
  type PerformanceMetrics,
  type TimedSection,
} from "./core/PerformanceTracker";
export { RollingAverage } from "./core/RollingAverage";
export { PerformanceViewer } from "./components/PerformanceViewer";
export { usePerformanceToggle } from "./hooks/usePerformanceToggle";
