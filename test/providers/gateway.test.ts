import { describe, expect, it, vi } from "vitest";
import { ProviderError } from "../../src/errors.js";
import type { ProviderAdapter } from "../../src/providers/adapter.js";
import { FunctionProvider, type CompletionFunction } from "../../src/providers/function-provider.js";
import { ProviderGateway, estimateTokens } from "../../src/providers/gateway.js";
import { ProviderHealthRegistry } from "../../src/providers/health.js";

const ok: CompletionFunction = async (prompt) => `done: ${prompt}`;

function failing(kind: ProviderError["kind"]): CompletionFunction {
  return async () => {
    throw new ProviderError(kind, `${kind} failure`);
  };
}

function gatewayWith(...providers: Array<[string, CompletionFunction]>): ProviderGateway {
  const gateway = new ProviderGateway({ rateLimit: false });
  for (const [name, fn] of providers) gateway.add(new FunctionProvider({ name, fn }));
  return gateway;
}

describe("ProviderGateway", () => {
  it("rejects a duplicate registration", () => {
    const gateway = gatewayWith(["a", ok]);
    expect(() => gateway.add(new FunctionProvider({ name: "a", fn: ok }))).toThrow('Provider "a" already registered');
  });

  it("orders providers by priority, then registration", () => {
    const gateway = new ProviderGateway({ rateLimit: false });
    gateway.add(new FunctionProvider({ name: "a", fn: ok }), { priority: 5 });
    gateway.add(new FunctionProvider({ name: "b", fn: ok }), { priority: 1 });
    gateway.add(new FunctionProvider({ name: "c", fn: ok }), { priority: 5 });
    expect(gateway.names()).toEqual(["b", "a", "c"]);
  });

  it("completes through the named provider and records health", async () => {
    const gateway = gatewayWith(["a", ok]);

    await expect(gateway.complete("a", "hello")).resolves.toBe("done: hello");

    expect(gateway.health.get("a")).toMatchObject({ totalCalls: 1, totalFailures: 0, circuit: "closed" });
  });

  it("fails permanently for an unknown provider", async () => {
    const gateway = gatewayWith(["a", ok]);
    await expect(gateway.complete("zzz", "hello")).rejects.toMatchObject({
      kind: "permanent",
      message: 'Unknown provider "zzz"',
    });
  });

  it("opens the circuit after repeated transient failures and stops calling the provider", async () => {
    const fn = vi.fn(failing("transient"));
    const gateway = gatewayWith(["a", fn]);

    for (let i = 0; i < 3; i++) {
      await expect(gateway.complete("a", "p")).rejects.toMatchObject({ kind: "transient" });
    }
    expect(gateway.circuitState("a")).toBe("open");

    await expect(gateway.complete("a", "p")).rejects.toMatchObject({ kind: "provider_unavailable", provider: "a" });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(gateway.health.get("a")).toMatchObject({
      totalCalls: 3,
      totalFailures: 3,
      consecutiveFailures: 3,
      rejectedCalls: 1,
      circuit: "open",
      failuresByKind: { transient: 3 },
    });
  });

  it("counts rate limits against the circuit", async () => {
    const gateway = gatewayWith(["a", failing("rate_limited")]);
    for (let i = 0; i < 3; i++) {
      await expect(gateway.complete("a", "p")).rejects.toMatchObject({ kind: "rate_limited" });
    }
    expect(gateway.circuitState("a")).toBe("open");
  });

  it("does not hold bad output or permanent errors against the circuit", async () => {
    const gateway = gatewayWith(["a", failing("invalid_output")], ["b", failing("permanent")]);
    for (let i = 0; i < 3; i++) {
      await expect(gateway.complete("a", "p")).rejects.toMatchObject({ kind: "invalid_output" });
      await expect(gateway.complete("b", "p")).rejects.toMatchObject({ kind: "permanent" });
    }
    expect(gateway.circuitState("a")).toBe("closed");
    expect(gateway.circuitState("b")).toBe("closed");
    expect(gateway.recentFailureRate("a")).toBe(0);
    expect(gateway.health.get("a")).toMatchObject({ totalFailures: 3, failuresByKind: { invalid_output: 3 } });
  });

  it("ranks by recent failure rate and leaves out open circuits", async () => {
    const gateway = gatewayWith(["a", failing("transient")], ["b", ok], ["c", ok]);
    await expect(gateway.complete("a", "p")).rejects.toThrow();

    expect(gateway.rank()).toEqual(["b", "c", "a"]);
    expect(gateway.rank(["b"])).toEqual(["c", "a"]);

    await expect(gateway.complete("a", "p")).rejects.toThrow();
    await expect(gateway.complete("a", "p")).rejects.toThrow();
    expect(gateway.rank()).toEqual(["b", "c"]);
  });

  it("does not count a cancelled call against the circuit", async () => {
    const gateway = gatewayWith(["a", () => new Promise<string>(() => {})]);
    const controller = new AbortController();

    const pending = gateway.complete("a", "p", { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: "transient" });
    expect(gateway.recentFailureRate("a")).toBe(0);
    expect(gateway.health.get("a")?.totalCalls).toBe(0);
  });

  it("applies the provider's rate limit and records its budget", async () => {
    const gateway = new ProviderGateway({ rateLimit: { maxRequests: 1, windowMs: 60_000, queueExcess: false } });
    gateway.add(new FunctionProvider({ name: "a", fn: ok }));

    await gateway.complete("a", "p");
    await expect(gateway.complete("a", "p")).rejects.toMatchObject({ kind: "rate_limited", provider: "a" });

    expect(gateway.circuitState("a")).toBe("closed");
    expect(gateway.health.get("a")?.budget).toMatchObject({ remainingRequests: 0, queued: 0 });
  });

  it("takes per-provider limits from the registration", async () => {
    const gateway = new ProviderGateway({ rateLimit: { maxRequests: 10, queueExcess: false } });
    gateway.add(new FunctionProvider({ name: "a", fn: ok }), { rateLimit: { maxRequests: 1 } });

    await gateway.complete("a", "p");
    await expect(gateway.complete("a", "p")).rejects.toMatchObject({ kind: "rate_limited" });
  });

  it("reports status, pinging providers that support it", async () => {
    const pinged: ProviderAdapter = {
      name: "pinged",
      type: "custom",
      complete: ok,
      healthCheck: async () => true,
    };
    const gateway = gatewayWith(["a", ok]);
    gateway.add(pinged);

    const statuses = await gateway.status({ ping: true });

    expect(statuses.map((s) => [s.name, s.circuit, s.reachable])).toEqual([
      ["a", "closed", undefined],
      ["pinged", "closed", true],
    ]);
  });

  it("shares a health registry passed in", async () => {
    const health = new ProviderHealthRegistry();
    const gateway = new ProviderGateway({ health, rateLimit: false });
    gateway.add(new FunctionProvider({ name: "a", fn: ok }));

    await gateway.complete("a", "p");

    expect(health.get("a")?.totalCalls).toBe(1);
  });
});

describe("estimateTokens", () => {
  it("counts roughly four characters per token", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});

describe("ProviderHealthRegistry", () => {
  it("tracks failure rate and consecutive failures", () => {
    const health = new ProviderHealthRegistry();
    health.recordFailure("a", "transient");
    health.recordFailure("a", "transient");
    health.recordSuccess("a");
    health.recordFailure("a", "rate_limited");

    expect(health.failureRate("a")).toBe(0.75);
    expect(health.get("a")).toMatchObject({
      consecutiveFailures: 1,
      failuresByKind: { transient: 2, rate_limited: 1 },
    });
    expect(health.failureRate("unknown")).toBe(0);
  });

  it("returns copies", () => {
    const health = new ProviderHealthRegistry();
    health.recordSuccess("a");
    const copy = health.get("a");
    if (copy) copy.totalCalls = 99;
    expect(health.get("a")?.totalCalls).toBe(1);
  });

  it("restores counters but not circuit state", () => {
    const health = new ProviderHealthRegistry();
    health.restore([
      {
        provider: "a",
        consecutiveFailures: 4,
        totalCalls: 10,
        totalFailures: 4,
        rejectedCalls: 2,
        failuresByKind: { transient: 4 },
        circuit: "open",
        lastStateChange: 0,
      },
    ]);

    expect(health.get("a")).toMatchObject({
      totalCalls: 10,
      totalFailures: 4,
      rejectedCalls: 2,
      consecutiveFailures: 0,
      circuit: "closed",
    });
  });
});
