import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createNotificationCenter } from "./notifications";

describe("createNotificationCenter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("shows a toast until its ttl elapses", () => {
    const center = createNotificationCenter({ ttlMs: 1_000, now: () => 5_000 });

    const toast = center.notify("'Rooftop Sessions' added to wishlist", "success");

    expect(toast).toMatchObject({ tone: "success", createdAtMs: 5_000, expiresAtMs: 6_000 });
    expect(center.getActive().map((entry) => entry.message)).toEqual(["'Rooftop Sessions' added to wishlist"]);

    vi.advanceTimersByTime(999);
    expect(center.getActive()).toHaveLength(1);

    vi.advanceTimersByTime(1);
    expect(center.getActive()).toEqual([]);
  });

  it("notifies subscribers on every change until they unsubscribe", () => {
    const center = createNotificationCenter({ ttlMs: 1_000 });
    const seen: number[] = [];
    const unsubscribe = center.subscribe((active) => {
      seen.push(active.length);
    });

    const first = center.notify("first");
    center.notify("second");
    center.dismiss(first.id);
    unsubscribe();
    center.clear();

    expect(seen).toEqual([1, 2, 1]);
    expect(center.getActive()).toEqual([]);
  });

  it("numbers toasts per center", () => {
    const center = createNotificationCenter();

    expect(center.notify("first").id).toBe("toast-1");
    expect(center.notify("second").id).toBe("toast-2");
    expect(createNotificationCenter().notify("other").id).toBe("toast-1");
  });

  it("ignores dismissals of unknown toasts", () => {
    const center = createNotificationCenter();
    const listener = vi.fn();
    center.subscribe(listener);

    center.dismiss("toast-404");

    expect(listener).not.toHaveBeenCalled();
  });
});
