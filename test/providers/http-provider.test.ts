import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { HttpProvider, classifyStatus, parseRetryAfter } from "../../src/providers/http-provider.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

describe("HttpProvider", () => {
  let fetchMock: Mock<(...args: FetchArgs) => Promise<Response>>;

  beforeEach(() => {
    fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const provider = () =>
    new HttpProvider({
      name: "api",
      url: "http://llm.test/complete",
      headers: { Authorization: "Bearer test-secret" },
      model: "default-model",
      timeout: 1_000,
    });

  it("has correct type and name", () => {
    expect(provider().name).toBe("api");
    expect(provider().type).toBe("http");
  });

  it("posts the prompt and constraints as JSON", async () => {
    fetchMock.mockResolvedValue(new Response("done"));

    await provider().complete("write a schema", { maxTokens: 256, temperature: 0.1, system: "be terse" });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://llm.test/complete");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      prompt: "write a schema",
      model: "default-model",
      maxTokens: 256,
      temperature: 0.1,
      system: "be terse",
    });
  });

  it("reads the text field of a JSON reply", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ text: "generated" }), { headers: { "Content-Type": "application/json" } }),
    );
    await expect(provider().complete("p")).resolves.toBe("generated");
  });

  it("returns a plain-text reply as-is", async () => {
    fetchMock.mockResolvedValue(new Response("plain completion"));
    await expect(provider().complete("p")).resolves.toBe("plain completion");
  });

  it("maps 429 to rate_limited with the Retry-After delay", async () => {
    fetchMock.mockResolvedValue(new Response("slow down", { status: 429, headers: { "Retry-After": "2" } }));
    await expect(provider().complete("p")).rejects.toMatchObject({
      kind: "rate_limited",
      provider: "api",
      retryAfterMs: 2_000,
      message: "HTTP 429: slow down",
    });
  });

  it("maps 503 to transient and 400 to permanent", async () => {
    fetchMock.mockResolvedValueOnce(new Response("down", { status: 503 }));
    fetchMock.mockResolvedValueOnce(new Response("bad", { status: 400 }));

    await expect(provider().complete("p")).rejects.toMatchObject({ kind: "transient" });
    await expect(provider().complete("p")).rejects.toMatchObject({ kind: "permanent" });
  });

  it("rejects an empty completion as invalid output", async () => {
    fetchMock.mockResolvedValue(new Response("   "));
    await expect(provider().complete("p")).rejects.toMatchObject({
      kind: "invalid_output",
      message: "Provider returned an empty completion",
    });
  });

  it("classifies a network failure as transient", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    await expect(provider().complete("p")).rejects.toMatchObject({ kind: "transient", message: "fetch failed" });
  });

  it("health check reports reachability", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(provider().healthCheck()).resolves.toBe(true);
    await expect(provider().healthCheck()).resolves.toBe(false);
  });
});

describe("classifyStatus", () => {
  it.each([
    [429, "rate_limited"],
    [408, "transient"],
    [500, "transient"],
    [502, "transient"],
    [401, "permanent"],
    [404, "permanent"],
  ] as const)("maps %i to %s", (status, kind) => {
    expect(classifyStatus(status)).toBe(kind);
  });
});

describe("parseRetryAfter", () => {
  it("reads delta-seconds", () => {
    expect(parseRetryAfter("1.5")).toBe(1_500);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("2024-01-01T00:00:00Z");
    expect(parseRetryAfter("Mon, 01 Jan 2024 00:00:30 GMT", now)).toBe(30_000);
  });

  it("ignores missing or unreadable values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});
