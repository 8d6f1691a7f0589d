import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Hub } from "../hub/hub";
import {
  FakeContainers,
  FakeStreamFactory,
  makeContainer,
  tick,
} from "../test-helpers";
import { type FrameSocket, StreamConnection } from "./connection";

class FakeSocket implements FrameSocket {
  readyState = 1;
  sent: string[] = [];

  send(data: string): void {
    this.sent.push(data);
  }
}

describe("StreamConnection", () => {
  let streams: FakeStreamFactory;
  let hub: Hub;
  let loop: Promise<void>;
  let socket: FakeSocket;

  beforeEach(() => {
    streams = new FakeStreamFactory();
    hub = new Hub({
      containers: new FakeContainers([makeContainer({ id: "c1" })]),
      streams,
    });
    loop = hub.run();
    socket = new FakeSocket();
  });

  afterEach(async () => {
    hub.close();
    await loop;
  });

  it("streams frames for a subscription onto the socket", async () => {
    const connection = new StreamConnection(socket, hub);

    connection.handleMessage(
      JSON.stringify({ type: "subscribe", cid: "c1", resource: "metrics" }),
    );
    await vi.waitFor(() => expect(streams.opened).toHaveLength(1));

    streams.last().queue.push({ cpuPercent: 1.5 });
    await vi.waitFor(() => expect(socket.sent).toHaveLength(1));

    expect(socket.sent[0]).toBe(
      '{"cid":"c1","type":"metrics","content":{"cpuPercent":1.5}}',
    );
  });

  it("stops frames after unsubscribe", async () => {
    const connection = new StreamConnection(socket, hub);
    connection.handleMessage(
      JSON.stringify({ type: "subscribe", cid: "c1", resource: "logs" }),
    );
    await vi.waitFor(() => expect(streams.opened).toHaveLength(1));

    connection.handleMessage(
      JSON.stringify({ type: "unsubscribe", cid: "c1", resource: "logs" }),
    );
    await vi.waitFor(() => expect(hub.stats().receivers).toBe(0));

    streams.last().queue.push("line");
    await tick();
    expect(socket.sent).toEqual([]);
  });

  it("answers malformed JSON with a parse error", () => {
    const connection = new StreamConnection(socket, hub);

    connection.handleMessage("{not json");

    expect(socket.sent).toEqual([
      '{"type":"error","code":"PARSE_ERROR","message":"Invalid JSON"}',
    ]);
  });

  it("answers an unknown message shape with an error", () => {
    const connection = new StreamConnection(socket, hub);

    connection.handleMessage(
      JSON.stringify({ type: "subscribe", cid: "c1", resource: "cpu" }),
    );

    expect(socket.sent).toEqual([
      '{"type":"error","code":"INVALID_MESSAGE","message":"Expected {type, cid, resource}"}',
    ]);
  });

  it("sends nothing for an unknown container", async () => {
    const connection = new StreamConnection(socket, hub);

    connection.handleMessage(
      JSON.stringify({ type: "subscribe", cid: "ghost", resource: "metrics" }),
    );
    await tick();

    expect(streams.opened).toHaveLength(0);
    expect(socket.sent).toEqual([]);
  });

  it("leaves the hub on close and ends the writer", async () => {
    const connection = new StreamConnection(socket, hub);
    connection.handleMessage(
      JSON.stringify({ type: "subscribe", cid: "c1", resource: "metrics" }),
    );
    await vi.waitFor(() => expect(hub.stats().receivers).toBe(1));

    connection.close();
    connection.close();

    await connection.done;
    await vi.waitFor(() => expect(hub.stats().receivers).toBe(0));
    expect(connection.client.closed).toBe(true);
  });

  it("does not write to a socket that is not open", () => {
    socket.readyState = 3;
    const connection = new StreamConnection(socket, hub);

    connection.send({ cid: "c1", type: "logs", content: "x" });

    expect(socket.sent).toEqual([]);
  });
});
