// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { flattenMultipartRequests, HttpRequest } from "./request.js";

const text = (bytes: Uint8Array): string => Buffer.from(bytes).toString("utf8");

describe("HttpRequest", () => {
  it("should upper-case the method and append query parameters", () => {
    const request = new HttpRequest("get", "https://example.test/search", {
      params: { q: "a b", page: 2, exact: true },
    });

    expect(request.method).toBe("GET");
    expect(request.url).toBe("https://example.test/search?q=a+b&page=2&exact=true");
  });

  it("should serialize JSON bodies and default the content type", () => {
    const request = new HttpRequest("POST", "https://example.test/items", { json: { a: 1 } });

    expect(request.body).toBe('{"a":1}');
    expect(request.headers.get("content-type")).toBe("application/json");
    expect(request.headers.get("content-length")).toBe("7");
  });

  it("should keep an explicit content type for JSON bodies", () => {
    const request = new HttpRequest("POST", "https://example.test/items", {
      headers: { "Content-Type": "application/merge-patch+json" },
      json: {},
    });

    expect(request.headers.get("content-type")).toBe("application/merge-patch+json");
  });

  it("should count content length in bytes", () => {
    const request = new HttpRequest("PUT", "https://example.test/", { body: "héllo" });

    expect(request.headers.get("content-length")).toBe("6");
    expect(text(request.bodyBytes())).toBe("héllo");
  });

  it("should serialize to the HTTP/1.1 wire form with sorted lower-case headers", () => {
    const request = new HttpRequest("POST", "https://example.test/items?x=1", {
      headers: { "X-B": "2", a: "1" },
      body: "hi",
    });

    expect(text(request.serialize())).toBe(
      "POST /items?x=1 HTTP/1.1\r\na: 1\r\ncontent-length: 2\r\nx-b: 2\r\n\r\nhi"
    );
  });

  it("should clone without sharing headers or bytes", () => {
    const original = new HttpRequest("POST", "https://example.test/", {
      headers: { "x-a": "1" },
      body: Buffer.from("abc"),
    });

    const copy = original.clone();
    copy.headers.set("x-a", "2");
    copy.bodyBytes()[0] = 0x7a;

    expect(original.headers.get("x-a")).toBe("1");
    expect(text(original.bodyBytes())).toBe("abc");
    expect(text(copy.bodyBytes())).toBe("zbc");
  });

  it("should leave requests without sub-requests unchanged when preparing a multipart body", () => {
    const request = new HttpRequest("GET", "https://example.test/");

    expect(request.prepareMultipartBody(5)).toBe(5);
    expect(request.body).toBeUndefined();
  });

  it("should number Content-IDs across nested changesets", () => {
    const changeset = new HttpRequest("POST", "https://example.test/$batch");
    changeset.setMultipartMixed([new HttpRequest("DELETE", "https://example.test/b")], {
      boundary: "inner",
    });
    const batch = new HttpRequest("POST", "https://example.test/$batch");
    batch.setMultipartMixed(
      [
        new HttpRequest("GET", "https://example.test/a"),
        changeset,
        new HttpRequest("GET", "https://example.test/c"),
      ],
      { boundary: "outer" }
    );

    expect(batch.prepareMultipartBody()).toBe(3);
    expect(batch.headers.get("content-type")).toBe("multipart/mixed; boundary=outer");
    expect(text(batch.bodyBytes())).toBe(
      "--outer\r\n" +
        "Content-Type: application/http\r\nContent-Transfer-Encoding: binary\r\nContent-ID: 0\r\n\r\n" +
        "GET /a HTTP/1.1\r\n\r\n" +
        "\r\n" +
        "--outer\r\n" +
        "Content-Type: multipart/mixed; boundary=inner\r\n\r\n" +
        "--inner\r\n" +
        "Content-Type: application/http\r\nContent-Transfer-Encoding: binary\r\nContent-ID: 1\r\n\r\n" +
        "DELETE /b HTTP/1.1\r\n\r\n" +
        "\r\n" +
        "--inner--\r\n" +
        "\r\n" +
        "--outer\r\n" +
        "Content-Type: application/http\r\nContent-Transfer-Encoding: binary\r\nContent-ID: 2\r\n\r\n" +
        "GET /c HTTP/1.1\r\n\r\n" +
        "\r\n" +
        "--outer--\r\n"
    );
  });

  it("should generate a batch boundary when none is given", () => {
    const batch = new HttpRequest("POST", "https://example.test/$batch");
    batch.setMultipartMixed([new HttpRequest("GET", "https://example.test/a")]);

    batch.prepareMultipartBody();

    expect(batch.headers.get("content-type")).toMatch(
      /^multipart\/mixed; boundary=batch_[0-9a-f-]{36}$/
    );
  });
});

describe("flattenMultipartRequests", () => {
  it("should list leaf sub-requests in order", () => {
    const a = new HttpRequest("GET", "https://example.test/a");
    const b = new HttpRequest("GET", "https://example.test/b");
    const c = new HttpRequest("GET", "https://example.test/c");
    const changeset = new HttpRequest("POST", "https://example.test/$batch");
    changeset.setMultipartMixed([b, c]);
    const batch = new HttpRequest("POST", "https://example.test/$batch");
    batch.setMultipartMixed([a, changeset]);

    expect(flattenMultipartRequests(batch)).toEqual([a, b, c]);
    expect(flattenMultipartRequests(a)).toEqual([]);
  });
});
