import { useCallback, useEffect } from "react";
import {
  EraserIcon,
  PauseIcon,
  PlayIcon,
  RotateCcwIcon,
  SkipForwardIcon,
} from "lucide-react";
import { Button } from "@/shared/ui/button";
import {
  CELL_THEMES,
  commandForKey,
  isCellThemeName,
  SPEED_PRESETS,
  type CellThemeName,
  type LifeCommand,
} from "@/lib/life";

interface LifeControlsProps {
  isReady: boolean;
  isRunning: boolean;
  onCommand: (command: LifeCommand) => void;
  onRestart?: () => void;
  tickIntervalMs: number;
  onTickIntervalChange: (tickIntervalMs: number) => void;
  theme: CellThemeName;
  onThemeChange: (theme: CellThemeName) => void;
}

function LifeControls({
  isReady,
  isRunning,
  onCommand,
  onRestart,
  tickIntervalMs,
  onTickIntervalChange,
  theme,
  onThemeChange,
}: LifeControlsProps) {
  const send = useCallback(
    (command: LifeCommand) => {
      if (!isReady) return;
      try {
        onCommand(command);
      } catch (error) {
        console.error(`Failed to send "${command}":`, error);
      }
    },
    [isReady, onCommand]
  );

  // Keyboard controls
  useEffect(() => {
    const handleKeyDown = (event: KeyboardEvent) => {
      // Don't trigger if user is typing in an input field
      if (
        event.target instanceof HTMLInputElement ||
        event.target instanceof HTMLTextAreaElement ||
        event.target instanceof HTMLSelectElement
      ) {
        return;
      }

      if (event.code === "KeyR" && onRestart && isReady) {
        // Only handle restart if no modifier keys are pressed (allow Ctrl+R for refresh)
        if (!event.ctrlKey && !event.metaKey && !event.altKey && !event.shiftKey) {
          event.preventDefault();
          onRestart();
        }
        return;
      }

      const command = commandForKey(event);
      if (command) {
        event.preventDefault();
        send(command);
      }
    };

    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [isReady, onRestart, send]);

  return (
    <div className="flex flex-col gap-3 w-full">
      <h3 className="text-sm font-medium text-muted-foreground">Controls</h3>

      <Button
        onClick={() => send("togglePause")}
        disabled={!isReady}
        variant={isRunning ? "destructive" : "default"}
        size="sm"
        title="Pause or resume (Space)"
        className="w-full justify-start"
      >
        {isRunning ? (
          <>
            <PauseIcon className="w-4 h-4" aria-hidden="true" />
            Pause
          </>
        ) : (
          <>
            <PlayIcon className="w-4 h-4" aria-hidden="true" />
            Resume
          </>
        )}
      </Button>

      <Button
        onClick={() => send("step")}
        disabled={!isReady || isRunning}
        variant="outline"
        size="sm"
        title="Advance one generation (S key)"
        className="w-full justify-start"
      >
        <SkipForwardIcon className="w-4 h-4" aria-hidden="true" />
        Step
      </Button>

      <Button
        onClick={() => send("clear")}
        disabled={!isReady}
        variant="outline"
        size="sm"
        title="Kill every cell (C key)"
        className="w-full justify-start"
      >
        <EraserIcon className="w-4 h-4" aria-hidden="true" />
        Clear
      </Button>

      {onRestart && (
        <Button
          onClick={onRestart}
          disabled={!isReady}
          variant="secondary"
          size="sm"
          title="Reseed the board (R key)"
          className="w-full justify-start"
        >
          <RotateCcwIcon className="w-4 h-4" aria-hidden="true" />
          Restart
        </Button>
      )}

      <label className="flex flex-col gap-1 text-sm text-muted-foreground">
        Speed
        <select
          value={tickIntervalMs}
          onChange={(event) => onTickIntervalChange(Number(event.target.value))}
          className="h-8 rounded-md border border-input bg-background px-2 text-foreground"
        >
          {SPEED_PRESETS.map((preset) => (
            <option key={preset.name} value={preset.tickIntervalMs}>
              {preset.name} ({preset.tickIntervalMs}ms)
            </option>
          ))}
        </select>
      </label>

      <label className="flex flex-col gap-1 text-sm text-muted-foreground">
        Theme
        <select
          value={theme}
          onChange={(event) => {
            if (isCellThemeName(event.target.value)) {
              onThemeChange(event.target.value);
            }
          }}
          className="h-8 rounded-md border border-input bg-background px-2 text-foreground"
        >
          {Object.entries(CELL_THEMES).map(([key, value]) => (
            <option key={key} value={key}>
              {value.name}
            </option>
          ))}
        </select>
      </label>
    </div>
  );
}

export default LifeControls;
