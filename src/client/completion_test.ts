/**
 * Unit tests for Completion
 */

import { expect, test, vi } from "vitest";
import { Completion } from "./completion.ts";

test("Completion - starts pending", () => {
  const { completion } = Completion.create<number>();
  expect(completion.state).toBe("pending");
});

test("Completion - resolves once and runs resolve continuations", () => {
  const { completion, resolve, reject } = Completion.create<number>();
  const onResolve = vi.fn();
  const onReject = vi.fn();
  completion.onResolve(onResolve).onReject(onReject);

  resolve(1);
  resolve(2);
  reject(new Error("late"));

  expect(completion.state).toBe("resolved");
  expect(onResolve).toHaveBeenCalledTimes(1);
  expect(onResolve).toHaveBeenCalledWith(1);
  expect(onReject).not.toHaveBeenCalled();
});

test("Completion - rejects once and runs reject continuations", () => {
  const { completion, reject } = Completion.create<number>();
  const onReject = vi.fn();
  completion.onReject(onReject);

  const reason = new Error("boom");
  reject(reason);
  reject(new Error("again"));

  expect(completion.state).toBe("rejected");
  expect(onReject).toHaveBeenCalledTimes(1);
  expect(onReject).toHaveBeenCalledWith(reason);
});

test("Completion - late continuations run immediately", () => {
  const { completion, resolve } = Completion.create<string>();
  resolve("done");

  const onResolve = vi.fn();
  completion.onResolve(onResolve);
  expect(onResolve).toHaveBeenCalledWith("done");
});

test("Completion - is awaitable", async () => {
  const { completion, resolve } = Completion.create<string>();
  setTimeout(() => resolve("value"), 0);
  await expect(completion).resolves.toBe("value");
});

test("Completion - awaiting a rejected completion throws", async () => {
  const { completion, reject } = Completion.create<string>();
  reject(new Error("nope"));
  await expect(completion).rejects.toThrow("nope");
});

test("Completion - cancel runs the canceller and cancel continuations only", () => {
  const canceller = vi.fn();
  const { completion, resolve, reject } = Completion.create<number>(canceller);
  const onResolve = vi.fn();
  const onReject = vi.fn();
  const onCancel = vi.fn();
  completion.onResolve(onResolve).onReject(onReject).onCancel(onCancel);

  expect(completion.cancel()).toBe(true);
  resolve(1);
  reject(new Error("late"));

  expect(completion.state).toBe("cancelled");
  expect(canceller).toHaveBeenCalledTimes(1);
  expect(onCancel).toHaveBeenCalledTimes(1);
  expect(onResolve).not.toHaveBeenCalled();
  expect(onReject).not.toHaveBeenCalled();
});

test("Completion - cancel after settling is a no-op", () => {
  const canceller = vi.fn();
  const { completion, resolve } = Completion.create<number>(canceller);
  resolve(1);

  expect(completion.cancel()).toBe(false);
  expect(completion.state).toBe("resolved");
  expect(canceller).not.toHaveBeenCalled();
});

test("Completion - a throwing continuation does not stop the others", () => {
  const spy = vi.spyOn(console, "error").mockImplementation(() => {});
  const { completion, resolve } = Completion.create<number>();
  const second = vi.fn();
  completion
    .onResolve(() => {
      throw new Error("bad continuation");
    })
    .onResolve(second);

  resolve(7);

  expect(second).toHaveBeenCalledWith(7);
  spy.mockRestore();
});
