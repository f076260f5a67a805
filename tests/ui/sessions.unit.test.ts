import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SessionRegistry, makeID } from "@/modules/ui/sessions";

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("makeID", () => {
  it("should append a short random suffix", () => {
    expect(makeID("form")).toMatch(/^form:[0-9a-f]{8}$/);
    expect(makeID("form")).not.toBe(makeID("form"));
  });

  it("should keep fixed ids as they are, capped at 100 characters", () => {
    expect(makeID("form:modal", false)).toBe("form:modal");
    expect(makeID("x".repeat(120), false)).toHaveLength(100);
  });
});

describe("SessionRegistry", () => {
  it("should dispatch to the registered callback", async () => {
    const registry = new SessionRegistry<string>();
    const callback = vi.fn();
    const id = registry.register("form:abc:next", callback);

    expect(id).toBe("form:abc:next");
    expect(registry.has(id)).toBe(true);
    await expect(registry.invoke(id, "ctx")).resolves.toBe(true);
    expect(callback).toHaveBeenCalledWith("ctx");
  });

  it("should report unknown ids without throwing", async () => {
    const registry = new SessionRegistry<string>();
    expect(registry.has("missing")).toBe(false);
    await expect(registry.invoke("missing", "ctx")).resolves.toBe(false);
  });

  it("should forget released ids", () => {
    const registry = new SessionRegistry<string>();
    registry.register("a", vi.fn());
    registry.register("b", vi.fn());
    registry.release("a", "b");
    expect(registry.size).toBe(0);
  });

  it("should expire entries after their ttl", () => {
    const registry = new SessionRegistry<string>();
    registry.register("a", vi.fn(), 1_000);
    vi.advanceTimersByTime(999);
    expect(registry.has("a")).toBe(true);
    vi.advanceTimersByTime(1);
    expect(registry.has("a")).toBe(false);
    expect(registry.size).toBe(0);
  });
});
