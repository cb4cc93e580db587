import { describe, expect, test } from "vitest";
import { DomainRegistry } from "../domain";
import { bindDomain } from "../test-utils/fixtures/domains";
import { createMockTransportFactory } from "../test-utils/mocks/dns";
import { createFakeProbe } from "../test-utils/mocks/probes";
import { createProbe, probe } from "./index";

describe("probe", () => {
  test("folds a successful reply into the domain", async () => {
    const { registry, handle, domain } = bindDomain("example.com");
    const remote = createFakeProbe({ registry, handle });

    expect(await probe(remote)).toBe(true);

    expect(domain.queryCount).toBe(1);
    expect(domain.queryTimeAvg).toBe(10);
    expect(domain.pendingEvents).toHaveLength(1);
    expect(domain.pendingEvents[0]?.target).toBe("probe1.example.com");
  });

  test("still records the reply of a failed send", async () => {
    const { registry, handle, domain } = bindDomain("example.com");
    const remote = createFakeProbe({ registry, handle }, { success: false, durationMs: 2000 });

    expect(await probe(remote)).toBe(false);

    expect(domain.queryCount).toBe(0);
    expect(domain.pendingEvents).toHaveLength(1);
    expect(domain.pendingEvents[0]?.kind).toBe("SendRequest");
    expect(domain.pendingEvents[0]?.durationMs).toBe(2000);
  });

  test("turns a thrown error into an Error event", async () => {
    const { registry, handle, domain } = bindDomain("example.com");
    const remote = createFakeProbe({ registry, handle }, { throws: new Error("boom") });

    expect(await probe(remote)).toBe(false);

    expect(domain.pendingEvents).toHaveLength(1);
    expect(domain.pendingEvents[0]?.kind).toBe("Error");
    expect(domain.pendingEvents[0]?.target).toBe("example.com");
    expect(domain.pendingEvents[0]?.durationMs).toBeNull();
  });

  test("a failure on one domain leaves another untouched", async () => {
    const registry = new DomainRegistry();
    const a = bindDomain("a.example", registry);
    const b = bindDomain("b.example", registry);
    const probeA = createFakeProbe({ registry, handle: a.handle }, { success: false });
    const probeB = createFakeProbe({ registry, handle: b.handle }, { durationMs: 25 });

    const results = await Promise.all([probe(probeA), probe(probeB)]);

    expect(results).toEqual([false, true]);
    expect(a.domain.queryCount).toBe(0);
    expect(a.domain.pendingEvents).toHaveLength(1);
    expect(b.domain.queryCount).toBe(1);
    expect(b.domain.queryTimeAvg).toBe(25);
  });
});

describe("createProbe", () => {
  test("creates a DNS probe for the dns kind", async () => {
    const { registry, handle, domain } = bindDomain("example.com");
    const mock = createMockTransportFactory();

    const remote = createProbe(
      "dns",
      { registry, handle },
      { dns: { servers: ["192.0.2.53"], timeoutMs: 10 }, dnsDeps: { transportFactory: mock.factory } },
    );

    expect(remote.kind).toBe("dns");
    expect(await probe(remote)).toBe(true);
    expect(domain.queryCount).toBe(1);
    expect(domain.pendingEvents[0]?.target).toBe("eq52.example.com");
    remote.close();
  });
});
