import { createServer } from "node:net";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseEndpoint } from "../core/endpoint.js";
import { ConnectionError } from "../errors.js";
import { FakeSseServer } from "../testing/fake-sse-server.js";
import { buildRequest, TcpConnector } from "./tcp-connector.js";

async function readAll(chunks: AsyncIterable<Uint8Array>): Promise<string> {
  const decoder = new TextDecoder();
  let text = "";
  for await (const chunk of chunks) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

/** A port nothing listens on: bind an ephemeral port, then release it. */
async function closedPort(): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("no TCP address");
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

describe("buildRequest", () => {
  it("writes a GET for the event stream with the fixed headers", () => {
    const endpoint = parseEndpoint("http://127.0.0.1:8080/sub?topic=a");
    expect(buildRequest(endpoint)).toBe(
      "GET /sub?topic=a HTTP/1.1\r\n" +
        "Host: 127.0.0.1:8080\r\n" +
        "Accept: text/event-stream\r\n" +
        "Cache-Control: no-cache\r\n" +
        "\r\n",
    );
  });

  it("appends extra headers after the fixed ones", () => {
    const endpoint = parseEndpoint("https://example.test/events");
    expect(
      buildRequest(endpoint, { Authorization: "Bearer test-secret", "Last-Event-ID": "9" }),
    ).toBe(
      "GET /events HTTP/1.1\r\n" +
        "Host: example.test\r\n" +
        "Accept: text/event-stream\r\n" +
        "Cache-Control: no-cache\r\n" +
        "Authorization: Bearer test-secret\r\n" +
        "Last-Event-ID: 9\r\n" +
        "\r\n",
    );
  });
});

describe("TcpConnector", () => {
  let server: FakeSseServer;
  let port: number;

  beforeEach(async () => {
    server = new FakeSseServer();
    port = await server.listen();
  });

  afterEach(async () => {
    await server.close();
  });

  it("sends the request once connected", async () => {
    const connector = new TcpConnector({ headers: { "X-Client": "test" } });
    const endpoint = parseEndpoint(`http://127.0.0.1:${port}/sub`);
    const stream = await connector.connect(endpoint);

    await expect
      .poll(() => server.request)
      .toBe(buildRequest(endpoint, { "X-Client": "test" }));
    stream.shutdown();
  });

  it("delivers what the server sends until the server ends the connection", async () => {
    const connector = new TcpConnector();
    const stream = await connector.connect(parseEndpoint(`http://127.0.0.1:${port}/sub`));

    await server.sendHead();
    await server.send("data: hello\n\n");
    await server.endClient();

    expect(await readAll(stream.chunks())).toBe(
      "HTTP/1.1 200 OK\r\n" +
        "Content-Type: text/event-stream\r\n" +
        "Cache-Control: no-cache\r\n" +
        "\r\n" +
        "data: hello\n\n",
    );
  });

  it("shutdown ends the chunk sequence and closes the socket", async () => {
    const connector = new TcpConnector();
    const stream = await connector.connect(parseEndpoint(`http://127.0.0.1:${port}/sub`));
    await server.waitForClient();

    const reading = readAll(stream.chunks());
    stream.shutdown();

    await expect(reading).resolves.toBe("");
    await server.waitForDisconnect();
  });

  it("rejects with ConnectionError when the TLS handshake does not finish in time", async () => {
    // The fake server speaks plain TCP, so secureConnect never fires.
    const connector = new TcpConnector({ connectTimeoutMs: 50 });
    const endpoint = parseEndpoint(`https://127.0.0.1:${port}/sub`);

    const error = await connector.connect(endpoint).then(
      () => null,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ConnectionError);
    if (!(error instanceof ConnectionError)) return;
    expect(error.message).toBe(
      `Failed to connect to https://127.0.0.1:${port}/sub: timed out after 50ms`,
    );
    expect(error.cause).toBeInstanceOf(Error);
    if (!(error.cause instanceof Error)) return;
    expect(error.cause.message).toBe("timed out after 50ms");
    await server.waitForDisconnect();
  });

  it("rejects with ConnectionError when nothing listens", async () => {
    const connector = new TcpConnector();
    const unused = await closedPort();
    const endpoint = parseEndpoint(`http://127.0.0.1:${unused}/sub`);

    const error = await connector.connect(endpoint).then(
      () => null,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ConnectionError);
    if (!(error instanceof ConnectionError)) return;
    expect(error.message).toContain(`Failed to connect to http://127.0.0.1:${unused}/sub`);
    expect(error.cause).toBeInstanceOf(Error);
  });
});
