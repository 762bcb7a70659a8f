import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EventSource } from "../core/event-source.js";
import { FakeSseServer } from "../testing/fake-sse-server.js";
import type { SSEEvent } from "../types/sse-event.js";

describe("EventSource over TCP", () => {
  let server: FakeSseServer;
  let url: string;

  beforeEach(async () => {
    server = new FakeSseServer();
    const port = await server.listen();
    url = `http://127.0.0.1:${port}/sub`;
  });

  afterEach(async () => {
    await server.close();
  });

  it("is connecting until the server answers", async () => {
    const source = await EventSource.open(url);
    await server.waitForClient();
    expect(source.state).toBe("connecting");
    source.close();
    await source.stopped();
  });

  it("sends the stream request with custom headers", async () => {
    const source = await EventSource.open(url, {
      headers: { Authorization: "Bearer test-secret" },
    });

    await expect.poll(() => server.request).toContain("GET /sub HTTP/1.1\r\n");
    expect(server.request).toContain("Accept: text/event-stream\r\n");
    expect(server.request).toContain("Authorization: Bearer test-secret\r\n");
    source.close();
    await source.stopped();
  });

  it("opens and delivers events sent by the server", async () => {
    const source = await EventSource.open(url);
    const received: SSEEvent[] = [];
    let opens = 0;
    source.onOpen(() => {
      opens++;
    });
    source.onMessage((event) => {
      received.push(event);
    });
    source.addEventListener("custom", (event) => {
      received.push(event);
    });

    await server.sendHead();
    await server.send(":keep-alive\n\ndata: some message\n\n");
    await server.send("event: custom\ndata: v\n\n");

    await expect.poll(() => received.length).toBe(2);
    expect(opens).toBe(1);
    expect(source.state).toBe("open");
    expect(received).toEqual([
      { type: "message", data: "some message" },
      { type: "custom", data: "v" },
    ]);
    source.close();
    await source.stopped();
  });

  it("stops receiving after close", async () => {
    const source = await EventSource.open(url);
    const received: string[] = [];
    source.onMessage((event) => {
      received.push(event.data);
    });

    await server.sendHead();
    await server.send("data: before\n\n");
    await expect.poll(() => received).toEqual(["before"]);

    source.close();
    await server.waitForDisconnect();
    await source.stopped();

    expect(source.state).toBe("closed");
    expect(received).toEqual(["before"]);
  });

  it("moves to closed when the server ends the stream", async () => {
    const source = await EventSource.open(url);
    await server.sendHead();
    await server.send("data: last\n\n");
    await server.endClient();

    await source.stopped();
    expect(source.state).toBe("closed");
  });
});
