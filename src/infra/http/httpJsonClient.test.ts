import { afterEach, describe, expect, it } from "vitest";
import { HttpJsonClient } from "./httpJsonClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("HttpJsonClient", () => {
  it("returns status, headers and body text without judging the status", async () => {
    setFetch(
      async () =>
        new Response('{"errors":[]}', {
          status: 404,
          statusText: "Not Found",
          headers: { "x-request-id": "req-1" },
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.send({
      url: "https://example.test/missing",
      method: "GET",
      timeoutMs: 500,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value.status).toBe(404);
    expect(result.value.statusText).toBe("Not Found");
    expect(result.value.headers["x-request-id"]).toBe("req-1");
    expect(result.value.body).toBe('{"errors":[]}');
  });

  it("form-encodes form bodies", async () => {
    let sentBody: unknown;
    let sentHeaders: unknown;
    setFetch(async (_input, init) => {
      sentBody = init?.body;
      sentHeaders = init?.headers;
      return new Response("{}", { status: 200 });
    });

    const client = new HttpJsonClient();
    await client.send({
      url: "https://example.test/token",
      method: "POST",
      body: {
        kind: "form",
        fields: { client_id: "id", grant_type: "client_credentials" },
      },
      timeoutMs: 500,
    });

    expect(sentBody).toBe("client_id=id&grant_type=client_credentials");
    expect(sentHeaders).toEqual({
      Accept: "application/json",
      "Content-Type": "application/x-www-form-urlencoded",
    });
  });

  it("serializes JSON bodies and keeps caller headers", async () => {
    let sentBody: unknown;
    let sentHeaders: unknown;
    setFetch(async (_input, init) => {
      sentBody = init?.body;
      sentHeaders = init?.headers;
      return new Response("{}", { status: 200 });
    });

    const client = new HttpJsonClient();
    await client.send({
      url: "https://example.test/stories",
      method: "POST",
      headers: { Authorization: "Bearer test-token" },
      body: { kind: "json", value: { title: "Draft" } },
      timeoutMs: 500,
    });

    expect(sentBody).toBe('{"title":"Draft"}');
    expect(sentHeaders).toEqual({
      Accept: "application/json",
      "Content-Type": "application/json",
      Authorization: "Bearer test-token",
    });
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(Object.assign(new Error("Aborted"), { name: "AbortError" }));
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.send({
      url: "https://example.test/timeout",
      method: "GET",
      timeoutMs: 5,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.retryable).toBe(true);
  });

  it("maps thrown fetch failures to transport errors", async () => {
    setFetch(async () => {
      throw new Error("socket reset");
    });

    const client = new HttpJsonClient();
    const result = await client.send({
      url: "https://example.test/reset",
      method: "GET",
      timeoutMs: 500,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected transport error");
    }

    expect(result.error.code).toBe("transport_error");
    expect(result.error.message).toBe("socket reset");
  });
});
