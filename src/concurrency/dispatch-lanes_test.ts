/**
 * Unit tests for DispatchLanes
 *
 * Tests per-sender serialization and backlog limits.
 */

import { expect, test } from "vitest";
import { DispatchLanes } from "./dispatch-lanes.ts";
import { BackpressureError } from "../errors.ts";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

test("DispatchLanes - acquire on an idle key resolves immediately", async () => {
  const lanes = new DispatchLanes({ maxQueuedPerLane: 4 });

  await lanes.acquire("client-1");

  expect(lanes.isActive("client-1")).toBe(true);
  expect(lanes.getMetrics()).toEqual({ activeLanes: 1, queued: 0 });
});

test("DispatchLanes - release on an empty lane frees the key", async () => {
  const lanes = new DispatchLanes({ maxQueuedPerLane: 4 });

  await lanes.acquire("client-1");
  lanes.release("client-1");

  expect(lanes.isActive("client-1")).toBe(false);
  expect(lanes.getMetrics()).toEqual({ activeLanes: 0, queued: 0 });
});

test("DispatchLanes - same key runs tasks one at a time in order", async () => {
  const lanes = new DispatchLanes({ maxQueuedPerLane: 4 });
  const order: string[] = [];
  const gate = deferred();

  const first = lanes.run("client-1", async () => {
    order.push("first-start");
    await gate.promise;
    order.push("first-end");
  });
  const second = lanes.run("client-1", async () => {
    order.push("second");
  });

  await Promise.resolve();
  expect(lanes.getMetrics()).toEqual({ activeLanes: 1, queued: 1 });

  gate.resolve();
  await Promise.all([first, second]);

  expect(order).toEqual(["first-start", "first-end", "second"]);
});

test("DispatchLanes - different keys do not wait for each other", async () => {
  const lanes = new DispatchLanes({ maxQueuedPerLane: 4 });
  const gate = deferred();
  let otherRan = false;

  const slow = lanes.run("client-1", () => gate.promise);
  await lanes.run("client-2", async () => {
    otherRan = true;
  });

  expect(otherRan).toBe(true);
  gate.resolve();
  await slow;
});

test("DispatchLanes - full backlog rejects with BackpressureError", async () => {
  const lanes = new DispatchLanes({ maxQueuedPerLane: 1 });
  const gate = deferred();

  const first = lanes.run("client-1", () => gate.promise);
  const second = lanes.run("client-1", async () => "queued");

  await expect(lanes.acquire("client-1")).rejects.toBeInstanceOf(
    BackpressureError,
  );

  gate.resolve();
  await first;
  expect(await second).toBe("queued");
});

test("DispatchLanes - lane is released when a task throws", async () => {
  const lanes = new DispatchLanes({ maxQueuedPerLane: 4 });

  await expect(
    lanes.run("client-1", () => Promise.reject(new Error("boom"))),
  ).rejects.toThrow("boom");

  expect(lanes.isActive("client-1")).toBe(false);
});
