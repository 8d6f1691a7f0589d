import { describe, expect, it } from "vitest";
import { toContainerState } from "./engine";

describe("toContainerState", () => {
  it.each([
    ["running", "running"],
    ["Restarting", "running"],
    ["paused", "running"],
    ["exited", "stopped"],
    ["created", "stopped"],
    ["dead", "stopped"],
  ])("maps %s to %s", (engineState, expected) => {
    expect(toContainerState(engineState)).toBe(expected);
  });
});
