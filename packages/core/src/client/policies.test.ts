// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { HttpRequest } from "../http/request.js";
import { policyName } from "../pipeline/types.js";
import { AsyncPipeline } from "../pipeline/pipeline.js";
import { createMemoryLogger } from "../test-utils/logger.js";
import { AsyncFakeTransport, queuedReplies } from "../test-utils/transports.js";

import { createPolicies, createSyncPolicies } from "./policies.js";

import type { TokenCredential } from "../policies/bearer-token.js";

const credential: TokenCredential = {
  getToken: async () => ({ token: "test-token", expiresOnTimestamp: Date.now() + 60 * 60 * 1000 }),
};

describe("createPolicies", () => {
  it("should build the standard order", () => {
    expect(createPolicies().map(policyName)).toEqual([
      "HeadersPolicy",
      "UserAgentPolicy",
      "RequestIdPolicy",
      "DistributedTracingPolicy",
      "AsyncRetryPolicy",
      "AsyncRedirectPolicy",
      "CustomHookPolicy",
      "NetworkLoggingPolicy",
      "SensitiveHeaderCleanupPolicy",
    ]);
  });

  it("should add the bearer token and recorder when configured", () => {
    const names = createPolicies(
      { recording: { path: "traffic.jsonl" } },
      { credential, scopes: "scope/.default" }
    ).map(policyName);

    expect(names.indexOf("BearerTokenCredentialPolicy")).toBe(names.indexOf("AsyncRetryPolicy") + 1);
    expect(names.indexOf("TrafficRecorderPolicy")).toBe(names.indexOf("NetworkLoggingPolicy") + 1);
  });

  it("should apply settings to the policies it builds", async () => {
    const memory = createMemoryLogger("warn");
    const transport = new AsyncFakeTransport();
    const pipeline = new AsyncPipeline(
      transport,
      createPolicies(
        {
          headers: { "x-tenant": "t1" },
          userAgent: { applicationId: "inventory-app" },
          logging: { level: "info" },
          tracing: { enabled: false },
        },
        { logger: memory.logger }
      )
    );

    await pipeline.run(new HttpRequest("GET", "https://example.test/"));

    const sent = transport.sent[0];
    expect(sent?.headers["x-tenant"]).toBe("t1");
    expect(sent?.headers["user-agent"]).toMatch(/^inventory-app pipewright\//);
    expect(sent?.headers["x-client-request-id"]).toBeDefined();
    expect(memory.lines.map(line => line.msg)).toEqual(["Request", "Response"]);
  });
});

describe("createPolicies with retries", () => {
  const retrySettings = { retry: { backoffFactorMs: 0 } };

  function authorizations(transport: AsyncFakeTransport): Array<string | undefined> {
    return transport.sent.map(sent => sent.headers["authorization"]);
  }

  it("should keep enforceHttps off for the retried attempt", async () => {
    const transport = new AsyncFakeTransport(queuedReplies({ status: 503 }, { status: 200 }));
    const pipeline = new AsyncPipeline(
      transport,
      createPolicies(retrySettings, { credential, scopes: "scope/.default" })
    );

    const response = await pipeline.run(new HttpRequest("GET", "http://localhost/x"), {
      enforceHttps: false,
    });

    expect(response.httpResponse.status).toBe(200);
    expect(authorizations(transport)).toEqual(["Bearer test-token", "Bearer test-token"]);
  });

  it("should keep permitRedirects off for the retried attempt", async () => {
    const transport = new AsyncFakeTransport(
      queuedReplies(
        { status: 503 },
        { status: 302, headers: { location: "https://b.example/" } },
        { status: 200 }
      )
    );
    const pipeline = new AsyncPipeline(transport, createPolicies(retrySettings));

    const response = await pipeline.run(new HttpRequest("GET", "https://a.example/"), {
      permitRedirects: false,
    });

    expect(response.httpResponse.status).toBe(302);
    expect(transport.sent.map(sent => sent.url)).toEqual(["https://a.example/", "https://a.example/"]);
  });

  it("should keep loggingEnable off for the retried attempt", async () => {
    const memory = createMemoryLogger("info");
    const transport = new AsyncFakeTransport(queuedReplies({ status: 503 }, { status: 200 }));
    const pipeline = new AsyncPipeline(
      transport,
      createPolicies({ ...retrySettings, logging: { level: "info" } }, { logger: memory.logger })
    );

    await pipeline.run(new HttpRequest("GET", "https://example.test/"), { loggingEnable: false });

    expect(transport.sent).toHaveLength(2);
    expect(memory.messages("Request")).toEqual([]);
    expect(memory.messages("Response")).toEqual([]);
    expect(memory.messages("Retrying request")).toHaveLength(1);
  });

  it("should call a per-call request hook on every attempt", async () => {
    const seen: string[] = [];
    const transport = new AsyncFakeTransport(queuedReplies({ status: 503 }, { status: 200 }));
    const pipeline = new AsyncPipeline(transport, createPolicies(retrySettings));

    await pipeline.run(new HttpRequest("GET", "https://example.test/"), {
      rawRequestHook: request => {
        seen.push(request.httpRequest.url);
      },
    });

    expect(seen).toEqual(["https://example.test/", "https://example.test/"]);
  });

  it("should ask for CAE tokens on every attempt of a call that enables it", async () => {
    const requested: Array<boolean | undefined> = [];
    const expiring: TokenCredential = {
      getToken: async (_scopes, options) => {
        requested.push(options?.enableCae);
        return { token: "test-token", expiresOnTimestamp: Date.now() };
      },
    };
    const transport = new AsyncFakeTransport(queuedReplies({ status: 503 }, { status: 200 }));
    const pipeline = new AsyncPipeline(
      transport,
      createPolicies(retrySettings, { credential: expiring, scopes: "scope/.default" })
    );

    await pipeline.run(new HttpRequest("GET", "https://example.test/"), { enableCae: true });

    expect(requested).toEqual([true, true]);
    expect(transport.sent.map(sent => sent.options["enableCae"])).toEqual([undefined, undefined]);
  });

  it("should not send the token to a redirected host when the hop is retried", async () => {
    const transport = new AsyncFakeTransport(
      queuedReplies(
        { status: 302, headers: { location: "https://evil.example/" } },
        { status: 503 },
        { status: 200 }
      )
    );
    const pipeline = new AsyncPipeline(
      transport,
      createPolicies(retrySettings, { credential, scopes: "scope/.default" })
    );

    const response = await pipeline.run(new HttpRequest("GET", "https://a.example/"));

    expect(response.httpResponse.status).toBe(200);
    expect(transport.sent.map(sent => sent.url)).toEqual([
      "https://a.example/",
      "https://evil.example/",
      "https://evil.example/",
    ]);
    expect(authorizations(transport)).toEqual(["Bearer test-token", undefined, undefined]);
  });
});

describe("createSyncPolicies", () => {
  it("should build the synchronous order", () => {
    expect(createSyncPolicies().map(policyName)).toEqual([
      "HeadersPolicy",
      "UserAgentPolicy",
      "RequestIdPolicy",
      "DistributedTracingPolicy",
      "RetryPolicy",
      "RedirectPolicy",
      "CustomHookPolicy",
      "NetworkLoggingPolicy",
      "SensitiveHeaderCleanupPolicy",
    ]);
  });
});
