import { describe, expect, test } from "vitest";

import { InvalidTimezoneError } from "../src/errors.js";
import { buildThreads, filterRecords, followChain } from "../src/threads/thread-assembler.js";
import type { PostRecord } from "../src/threads/types.js";
import { makeRecord } from "./helpers.js";

function replyIds(thread: PostRecord | undefined): string[] {
  return (thread?.replies ?? []).map((r) => r.id);
}

describe("buildThreads", () => {
  test("drops retweets as roots and as replies", () => {
    const records = [
      makeRecord({ id: "1", text: "Original thought" }),
      makeRecord({ id: "2", text: "RT @other: their thought" }),
      makeRecord({ id: "3", text: "RT @other: reply", replyToId: "1" }),
      makeRecord({ id: "4", text: "continuing", replyToId: "1" }),
    ];

    const { threads, replyCount } = buildThreads(records);

    expect([...threads.keys()]).toEqual(["1"]);
    expect(replyIds(threads.get("1"))).toEqual(["4"]);
    expect(replyCount).toBe(1);
  });

  test("excludes bare mentions but keeps mention replies", () => {
    const records = [
      makeRecord({ id: "1", text: "Root" }),
      makeRecord({ id: "2", text: "@friend hello there" }),
      makeRecord({ id: "3", text: "@me and more", replyToId: "1" }),
    ];

    const { threads } = buildThreads(records);

    expect([...threads.keys()]).toEqual(["1"]);
    expect(replyIds(threads.get("1"))).toEqual(["3"]);
  });

  test("links replies into a chain regardless of input order", () => {
    const records = [
      makeRecord({ id: "13", replyToId: "12" }),
      makeRecord({ id: "11", replyToId: "10" }),
      makeRecord({ id: "10" }),
      makeRecord({ id: "12", replyToId: "11" }),
    ];

    const { threads, replyCount } = buildThreads(records);

    expect(replyIds(threads.get("10"))).toEqual(["11", "12", "13"]);
    expect(replyCount).toBe(3);
  });

  test("keeps the last reply when two answer the same post", () => {
    const records = [
      makeRecord({ id: "20" }),
      makeRecord({ id: "21", replyToId: "20" }),
      makeRecord({ id: "22", replyToId: "20" }),
      makeRecord({ id: "23", replyToId: "21" }),
    ];

    const { threads, replyCount } = buildThreads(records);

    expect(replyIds(threads.get("20"))).toEqual(["22"]);
    // Slots: 20 and 21
    expect(replyCount).toBe(2);
  });

  test("counts replies whose parent is not a thread", () => {
    const records = [makeRecord({ id: "30" }), makeRecord({ id: "31", replyToId: "999" })];

    const { threads, replyCount } = buildThreads(records);

    expect(replyIds(threads.get("30"))).toEqual([]);
    expect(replyCount).toBe(1);
  });

  test("is repeatable on the same input", () => {
    const records = [
      makeRecord({ id: "1" }),
      makeRecord({ id: "2", replyToId: "1" }),
      makeRecord({ id: "3", replyToId: "2" }),
      makeRecord({ id: "4" }),
    ];

    const first = buildThreads(records);
    const second = buildThreads(records);

    expect([...second.threads.entries()]).toEqual([...first.threads.entries()]);
    expect(second.replyCount).toBe(first.replyCount);
  });

  test("does not modify the input records", () => {
    const root = makeRecord({ id: "1" });
    const reply = makeRecord({ id: "2", replyToId: "1" });

    const { threads } = buildThreads([root, reply], { timeZone: "Europe/Madrid" });

    expect(root.replies).toEqual([]);
    expect(root.timeZone).toBe("UTC");
    expect(threads.get("1")?.timeZone).toBe("Europe/Madrid");
    expect(threads.get("1")?.replies[0].timeZone).toBe("Europe/Madrid");
  });
});

describe("filterRecords", () => {
  const bound = new Date("2020-01-01T00:00:00.000Z");

  test("excludes a record exactly at the after bound", () => {
    const records = [
      makeRecord({ id: "1", created: new Date("2020-01-01T00:00:00.000Z") }),
      makeRecord({ id: "2", created: new Date("2020-01-01T00:00:00.001Z") }),
    ];

    const { roots } = filterRecords(records, { after: bound });

    expect([...roots.keys()]).toEqual(["2"]);
  });

  test("excludes a record exactly at the before bound", () => {
    const records = [
      makeRecord({ id: "1", created: new Date("2019-12-31T23:59:59.999Z") }),
      makeRecord({ id: "2", created: new Date("2020-01-01T00:00:00.000Z") }),
    ];

    const { roots } = filterRecords(records, { before: bound });

    expect([...roots.keys()]).toEqual(["1"]);
  });

  test("compares instants regardless of the presentation zone", () => {
    const records = [makeRecord({ id: "1", created: new Date("2020-01-01T00:30:00.000Z") })];

    const { roots } = filterRecords(records, { after: bound, timeZone: "America/Los_Angeles" });

    expect(roots.get("1")?.timeZone).toBe("America/Los_Angeles");
  });

  test("rejects an unknown time zone", () => {
    expect(() => filterRecords([], { timeZone: "Mars/Olympus_Mons" })).toThrow(InvalidTimezoneError);
  });
});

describe("followChain", () => {
  test("stops when a reply revisits a post", () => {
    const second = makeRecord({ id: "2", replyToId: "3" });
    const third = makeRecord({ id: "3", replyToId: "2" });
    const replies = new Map([
      ["1", second],
      ["2", third],
      ["3", second],
    ]);

    expect(followChain("1", replies).map((r) => r.id)).toEqual(["2", "3"]);
  });

  test("stops at a reply that points back to the root", () => {
    const replies = new Map([["1", makeRecord({ id: "1", replyToId: "1" })]]);

    expect(followChain("1", replies)).toEqual([]);
  });

  test("truncates at the maximum chain length", () => {
    const replies = new Map<string, PostRecord>();
    for (let i = 1; i <= 5; i++) {
      replies.set(String(i - 1), makeRecord({ id: String(i), replyToId: String(i - 1) }));
    }

    expect(followChain("0", replies, 3).map((r) => r.id)).toEqual(["1", "2", "3"]);
  });
});
