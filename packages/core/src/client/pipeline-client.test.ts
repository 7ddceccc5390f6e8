// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { HttpRequest } from "../http/request.js";
import { HeadersPolicy } from "../policies/headers.js";
import { AsyncFakeTransport } from "../test-utils/transports.js";

import { PipelineClient } from "./pipeline-client.js";

describe("PipelineClient", () => {
  it("should resolve relative URLs against the endpoint", async () => {
    const transport = new AsyncFakeTransport(() => ({ status: 200, body: "[]" }));
    const client = new PipelineClient({ endpoint: "https://example.test/api/", transport });

    const response = await client.sendRequest(new HttpRequest("GET", "items?page=2"));

    expect(response.json()).toEqual([]);
    expect(transport.sent[0]?.url).toBe("https://example.test/api/items?page=2");
  });

  it("should leave absolute URLs alone", async () => {
    const transport = new AsyncFakeTransport();
    const client = new PipelineClient({ endpoint: "https://example.test/api/", transport });

    await client.sendRequest(new HttpRequest("GET", "https://other.test/x"));

    expect(transport.sent[0]?.url).toBe("https://other.test/x");
  });

  it("should use the given policies instead of the standard ones", async () => {
    const transport = new AsyncFakeTransport();
    const client = new PipelineClient({
      endpoint: "https://example.test/",
      transport,
      policies: [new HeadersPolicy({ "x-only": "1" })],
    });

    await client.sendRequest(new HttpRequest("GET", "/"));

    expect(transport.sent[0]?.headers).toEqual({ "x-only": "1" });
  });

  it("should pass per-call options through the pipeline", async () => {
    const transport = new AsyncFakeTransport();
    const client = new PipelineClient({ endpoint: "https://example.test/", transport });

    await client.sendRequest(new HttpRequest("GET", "/"), { requestId: "req-7", timeoutMs: 1000 });

    expect(transport.sent[0]?.headers["x-client-request-id"]).toBe("req-7");
    expect(transport.sent[0]?.options).toEqual({ timeoutMs: 1000 });
  });

  it("should close the transport", async () => {
    const transport = new AsyncFakeTransport();
    const client = new PipelineClient({ endpoint: "https://example.test/", transport });

    await client.close();

    expect(transport.closeCount).toBe(1);
  });
});
