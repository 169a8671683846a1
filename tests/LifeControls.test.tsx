// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";
import { cleanup, fireEvent, render, screen } from "@testing-library/react";

import LifeControls from "../src/components/LifeControls";

function renderControls(overrides: { isReady?: boolean; isRunning?: boolean } = {}) {
  const props = {
    isReady: true,
    isRunning: false,
    onCommand: vi.fn(),
    onRestart: vi.fn(),
    tickIntervalMs: 200,
    onTickIntervalChange: vi.fn(),
    theme: "classic" as const,
    onThemeChange: vi.fn(),
    ...overrides,
  };
  render(<LifeControls {...props} />);
  return props;
}

describe("LifeControls", () => {
  afterEach(() => {
    cleanup();
  });

  it("sends a step while paused", () => {
    const props = renderControls();

    fireEvent.click(screen.getByRole("button", { name: "Step" }));

    expect(props.onCommand).toHaveBeenCalledWith("step");
  });

  it("disables stepping while running and offers a pause", () => {
    renderControls({ isRunning: true });

    expect(screen.getByRole("button", { name: "Step" })).toHaveProperty("disabled", true);
    expect(screen.getByRole("button", { name: "Pause" })).toBeDefined();
  });

  it("sends clear and pause toggles from the buttons", () => {
    const props = renderControls();

    fireEvent.click(screen.getByRole("button", { name: "Resume" }));
    fireEvent.click(screen.getByRole("button", { name: "Clear" }));

    expect(props.onCommand.mock.calls).toEqual([["togglePause"], ["clear"]]);
  });

  it("maps key presses to commands", () => {
    const props = renderControls();

    fireEvent.keyDown(window, { code: "Space" });
    fireEvent.keyDown(window, { code: "KeyC" });
    fireEvent.keyDown(window, { code: "KeyS" });

    expect(props.onCommand.mock.calls).toEqual([["togglePause"], ["clear"], ["step"]]);
  });

  it("ignores chords and keys typed into form fields", () => {
    const props = renderControls();

    fireEvent.keyDown(window, { code: "KeyS", ctrlKey: true });
    fireEvent.keyDown(screen.getAllByRole("combobox")[0], { code: "KeyC" });

    expect(props.onCommand).not.toHaveBeenCalled();
  });

  it("restarts on R", () => {
    const props = renderControls();

    fireEvent.keyDown(window, { code: "KeyR" });

    expect(props.onRestart).toHaveBeenCalledTimes(1);
    expect(props.onCommand).not.toHaveBeenCalled();
  });

  it("does nothing until the engine is ready", () => {
    const props = renderControls({ isReady: false });

    fireEvent.keyDown(window, { code: "Space" });
    fireEvent.keyDown(window, { code: "KeyR" });

    expect(props.onCommand).not.toHaveBeenCalled();
    expect(props.onRestart).not.toHaveBeenCalled();
    expect(screen.getByRole("button", { name: "Clear" })).toHaveProperty("disabled", true);
  });

  it("reports speed and theme changes", () => {
    const props = renderControls();
    const [speed, theme] = screen.getAllByRole("combobox");

    fireEvent.change(speed, { target: { value: "500" } });
    fireEvent.change(theme, { target: { value: "ember" } });

    expect(props.onTickIntervalChange).toHaveBeenCalledWith(500);
    expect(props.onThemeChange).toHaveBeenCalledWith("ember");
  });
});
