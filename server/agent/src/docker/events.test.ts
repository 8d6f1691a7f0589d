import { describe, expect, it } from "vitest";
import { parseEngineEvent } from "./events";

describe("parseEngineEvent", () => {
  it("reads Action and Actor.ID", () => {
    const line = JSON.stringify({
      Type: "container",
      Action: "start",
      Actor: { ID: "abc123", Attributes: { name: "web" } },
      time: 1714557600,
    });
    expect(parseEngineEvent(line)).toEqual({
      type: "container",
      status: "start",
      id: "abc123",
    });
  });

  it("prefers the legacy status and id fields", () => {
    const line = JSON.stringify({
      Type: "container",
      status: "stop",
      id: "abc123",
      Action: "kill",
      Actor: { ID: "other" },
    });
    expect(parseEngineEvent(line)).toEqual({
      type: "container",
      status: "stop",
      id: "abc123",
    });
  });

  it("keeps events without an id", () => {
    const line = JSON.stringify({ Type: "image", Action: "pull" });
    expect(parseEngineEvent(line)).toEqual({
      type: "image",
      status: "pull",
      id: "",
    });
  });

  it.each(["", "   ", "garbage", "{oops", '{"Type":"network"}', '"text"'])(
    "rejects %j",
    (line) => {
      expect(parseEngineEvent(line)).toBeNull();
    },
  );
});
