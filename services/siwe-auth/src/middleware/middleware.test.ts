import { describe, it } from "node:test";
import assert from "node:assert";
import type { Request, Response } from "express";
import { createCsrfGuard } from "./csrf.js";
import { extractSessionToken, readCookie } from "./session.js";

// Simple mock response
function createMockResponse(): Response & { statusCode: number; jsonData: unknown } {
  const res: Partial<Response> & { statusCode: number; jsonData: unknown } = {
    statusCode: 200,
    jsonData: null,
    status(code: number) {
      this.statusCode = code;
      return this as Response;
    },
    json(data: unknown) {
      this.jsonData = data;
      return this as Response;
    },
  };
  return res as Response & { statusCode: number; jsonData: unknown };
}

function mockRequest(method: string, headers: Record<string, string>): Request {
  return { method, path: "/auth/login", headers } as Request;
}

describe("readCookie", () => {
  it("finds a cookie among others", () => {
    assert.equal(readCookie("a=1; siwe_session=abc.def; b=2", "siwe_session"), "abc.def");
  });

  it("returns null when absent or empty", () => {
    assert.equal(readCookie(undefined, "siwe_session"), null);
    assert.equal(readCookie("siwe_session_old=x", "siwe_session"), null);
    assert.equal(readCookie("siwe_session=", "siwe_session"), null);
  });
});

describe("extractSessionToken", () => {
  it("prefers the bearer token over the cookie", () => {
    const req = mockRequest("GET", { authorization: "Bearer from-header", cookie: "siwe_session=from-cookie" });
    assert.equal(extractSessionToken(req, "siwe_session"), "from-header");
  });

  it("falls back to the cookie for other schemes", () => {
    const req = mockRequest("GET", { authorization: "Basic abc", cookie: "siwe_session=from-cookie" });
    assert.equal(extractSessionToken(req, "siwe_session"), "from-cookie");
  });
});

describe("CSRF guard", () => {
  const guard = createCsrfGuard({ exempt: false, trustedOrigins: ["https://app.example.com"] });

  function run(req: Request): { res: ReturnType<typeof createMockResponse>; nextCalled: boolean } {
    const res = createMockResponse();
    let nextCalled = false;
    guard(req, res, () => {
      nextCalled = true;
    });
    return { res, nextCalled };
  }

  it("lets safe methods through", () => {
    assert.equal(run(mockRequest("GET", {})).nextCalled, true);
  });

  it("accepts a trusted origin", () => {
    assert.equal(run(mockRequest("POST", { origin: "https://app.example.com" })).nextCalled, true);
  });

  it("accepts a trusted referer when origin is absent", () => {
    const { nextCalled } = run(mockRequest("POST", { referer: "https://app.example.com/login?x=1" }));
    assert.equal(nextCalled, true);
  });

  it("rejects an untrusted origin", () => {
    const { res, nextCalled } = run(mockRequest("POST", { origin: "https://evil.example.com" }));
    assert.equal(nextCalled, false);
    assert.equal(res.statusCode, 403);
    assert.deepEqual(res.jsonData, { error: "Request origin is not trusted", code: "CSRF_FAILED" });
  });

  it("rejects a POST with neither origin nor referer", () => {
    assert.equal(run(mockRequest("POST", {})).nextCalled, false);
  });
});
