import { readdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createDayRecordStore } from "../storage/dayRecordStore";
import type { DayRecordChangeEvent } from "../types";
import { dateKeyToIso } from "../utils/date";
import {
  createManualClock,
  createSequentialIds,
  createTempDir,
  makeDayRecord,
  makeItem,
} from "./helpers/fixtures";

const T0 = "2024-03-05T10:00:00.000Z";

describe("dayRecordStore", () => {
  let dir: string;
  let cleanup: () => void;
  let filePath: string;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
    filePath = join(dir, "dayRecords.json");
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    cleanup();
  });

  function createStore(clock = createManualClock(T0)) {
    return createDayRecordStore({
      filePath,
      clock,
      createId: createSequentialIds(),
    });
  }

  describe("addRecord", () => {
    it("creates the day on first note", () => {
      const store = createStore();

      const result = store.addRecord("2024-03-05", "buy milk");

      expect(result).toEqual({
        ok: true,
        value: { id: "id-1", content: "buy milk", createdAt: T0, updatedAt: T0 },
      });
      expect(store.hasRecord("2024-03-05")).toBe(true);
      expect(store.recordCount("2024-03-05")).toBe(1);
      expect(store.getRecords("2024-03-05")).toEqual([
        { id: "id-1", content: "buy milk", createdAt: T0, updatedAt: T0 },
      ]);
      expect(store.getRecord("2024-03-05")).toEqual({
        id: "id-2",
        date: dateKeyToIso("2024-03-05"),
        records: [
          { id: "id-1", content: "buy milk", createdAt: T0, updatedAt: T0 },
        ],
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it("appends to an existing day in insertion order", () => {
      const clock = createManualClock(T0);
      const store = createStore(clock);

      store.addRecord("2024-03-05", "first");
      clock.advance(1000);
      store.addRecord("2024-03-05", "second");

      expect(store.getRecords("2024-03-05").map((item) => item.content)).toEqual([
        "first",
        "second",
      ]);
      expect(store.getRecord("2024-03-05")?.updatedAt).toBe(
        "2024-03-05T10:00:01.000Z",
      );
      expect(store.getRecord("2024-03-05")?.createdAt).toBe(T0);
    });

    it("ignores time of day when keying", () => {
      const store = createStore();

      store.addRecord(new Date(2024, 2, 5, 23, 59), "late");

      expect(store.hasRecord("2024-03-05")).toBe(true);
      expect(store.recordCount(new Date(2024, 2, 5, 0, 1))).toBe(1);
      expect(store.getAllDates()).toEqual(["2024-03-05"]);
    });

    it("accepts blank content without marking the day", () => {
      const store = createStore();

      store.addRecord("2024-03-05", "   ");

      expect(store.recordCount("2024-03-05")).toBe(1);
      expect(store.hasRecord("2024-03-05")).toBe(false);
    });

    it("rejects an impossible date", () => {
      const store = createStore();

      const result = store.addRecord("2024-02-30", "nope");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toEqual({
        type: "Invalid",
        message: "Invalid date: 2024-02-30",
      });
      expect(store.getAllDates()).toEqual([]);
    });
  });

  describe("queries", () => {
    it("returns empty answers for unknown days", () => {
      const store = createStore();

      expect(store.getRecord("2024-05-01")).toBeNull();
      expect(store.getRecords("2024-05-01")).toEqual([]);
      expect(store.hasRecord("2024-05-01")).toBe(false);
      expect(store.recordCount("2024-05-01")).toBe(0);
    });

    it("returns copies that do not alias the store", () => {
      const store = createStore();
      store.addRecord("2024-03-05", "original");

      const items = store.getRecords("2024-03-05");
      items[0].content = "changed";

      expect(store.getRecords("2024-03-05")[0].content).toBe("original");
    });

    it("lists days with notes for one month", () => {
      const store = createStore();
      store.addRecord("2024-03-20", "b");
      store.addRecord("2024-03-05", "a");
      store.addRecord("2024-03-12", "  ");
      store.addRecord("2024-04-01", "c");

      expect(store.getDatesForMonth(2024, 2)).toEqual([
        "2024-03-05",
        "2024-03-20",
      ]);
      expect(store.getAllDates()).toEqual([
        "2024-03-05",
        "2024-03-12",
        "2024-03-20",
        "2024-04-01",
      ]);
    });
  });

  describe("updateRecord", () => {
    it("changes content and bumps both timestamps", () => {
      const clock = createManualClock(T0);
      const store = createStore(clock);
      store.addRecord("2024-03-05", "draft");
      clock.advance(60_000);

      const result = store.updateRecord("2024-03-05", "id-1", "final");

      expect(result).toEqual({
        ok: true,
        value: {
          id: "id-1",
          content: "final",
          createdAt: T0,
          updatedAt: "2024-03-05T10:01:00.000Z",
        },
      });
      expect(store.getRecord("2024-03-05")?.updatedAt).toBe(
        "2024-03-05T10:01:00.000Z",
      );
    });

    it("is a no-op for an unknown id", () => {
      const store = createStore();
      store.addRecord("2024-03-05", "draft");
      const listener = jest.fn();
      store.onChange(listener);

      const result = store.updateRecord("2024-03-05", "missing", "x");

      expect(result).toEqual({ ok: true, value: null });
      expect(listener).not.toHaveBeenCalled();
      expect(store.getRecords("2024-03-05")[0].content).toBe("draft");
    });
  });

  describe("deleteRecord", () => {
    it("keeps the remaining item and never moves updatedAt backwards", () => {
      const clock = createManualClock("2024-03-05T00:00:10.000Z");
      const store = createStore(clock);
      const a = store.addRecord("2024-03-05", "a");
      clock.set("2024-03-05T00:00:20.000Z");
      const b = store.addRecord("2024-03-05", "b");
      if (!a.ok || !b.ok) throw new Error("setup failed");
      clock.set("2024-03-05T00:00:15.000Z");

      const result = store.deleteRecord("2024-03-05", a.value.id);

      expect(result).toEqual({ ok: true, value: true });
      expect(store.getRecords("2024-03-05")).toEqual([b.value]);
      expect(store.getRecord("2024-03-05")?.updatedAt).toBe(
        "2024-03-05T00:00:20.000Z",
      );
    });

    it("bumps updatedAt to now when the clock is ahead", () => {
      const clock = createManualClock(T0);
      const store = createStore(clock);
      store.addRecord("2024-03-05", "a");
      store.addRecord("2024-03-05", "b");
      clock.set("2024-03-05T12:00:00.000Z");

      store.deleteRecord("2024-03-05", "id-1");

      expect(store.getRecord("2024-03-05")?.updatedAt).toBe(
        "2024-03-05T12:00:00.000Z",
      );
    });

    it("removes the day when its last item goes", () => {
      const store = createStore();
      store.addRecord("2024-03-05", "only");

      store.deleteRecord("2024-03-05", "id-1");

      expect(store.getRecord("2024-03-05")).toBeNull();
      expect(store.getAllDates()).toEqual([]);
      expect(JSON.parse(readFileSync(filePath, "utf8"))).toEqual({});
    });

    it("removes the whole day when no id is given", () => {
      const store = createStore();
      store.addRecord("2024-03-05", "a");
      store.addRecord("2024-03-05", "b");

      expect(store.deleteRecord("2024-03-05")).toEqual({ ok: true, value: true });
      expect(store.getRecord("2024-03-05")).toBeNull();
      expect(store.deleteDay("2024-03-05")).toEqual({ ok: true, value: false });
    });

    it("reports false for an unknown item", () => {
      const store = createStore();
      store.addRecord("2024-03-05", "a");

      expect(store.deleteRecord("2024-03-05", "missing")).toEqual({
        ok: true,
        value: false,
      });
      expect(store.recordCount("2024-03-05")).toBe(1);
    });
  });

  describe("persistence", () => {
    it("writes one object keyed by date", () => {
      const store = createStore();
      store.addRecord("2024-03-05", "buy milk");

      const file = JSON.parse(readFileSync(filePath, "utf8"));

      expect(Object.keys(file)).toEqual(["2024-03-05"]);
      expect(file["2024-03-05"]).toEqual({
        id: "id-2",
        date: dateKeyToIso("2024-03-05"),
        records: [
          { id: "id-1", content: "buy milk", createdAt: T0, updatedAt: T0 },
        ],
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it("leaves no temp files behind", () => {
      const store = createStore();
      store.addRecord("2024-03-05", "a");
      store.addRecord("2024-03-06", "b");

      expect(readdirSync(dir)).toEqual(["dayRecords.json"]);
    });

    it("round-trips through a fresh store", () => {
      const clock = createManualClock(T0);
      const store = createStore(clock);
      store.addRecord("2024-03-05", "a");
      clock.advance(5000);
      store.addRecord("2024-03-05", "b");
      store.addRecord("2024-12-31", "new year's eve");
      store.updateRecord("2024-03-05", "id-1", "a2");

      const reloaded = createStore();

      expect(reloaded.getAll()).toEqual(store.getAll());
    });

    it("keeps notes on their day when the file came from another timezone", () => {
      writeFileSync(
        filePath,
        JSON.stringify({
          "2024-03-05": {
            id: "day-1",
            date: "2024-03-04T16:00:00.000Z",
            records: [makeItem("item-1", "buy milk", T0)],
            createdAt: T0,
            updatedAt: T0,
          },
        }),
        "utf8",
      );

      const store = createStore();

      expect(store.getAllDates()).toEqual(["2024-03-05"]);
      expect(store.hasRecord("2024-03-05")).toBe(true);
      expect(store.getRecords("2024-03-05").map((item) => item.content)).toEqual([
        "buy milk",
      ]);
    });

    it("starts empty when the file is missing", () => {
      const store = createStore();

      expect(store.load()).toEqual({ ok: true, value: { loaded: 0, skipped: 0 } });
      expect(store.getAllDates()).toEqual([]);
      expect(console.error).not.toHaveBeenCalled();
    });

    it("starts empty on malformed JSON without throwing", () => {
      writeFileSync(filePath, "{not json", "utf8");

      const store = createStore();

      expect(store.getAllDates()).toEqual([]);
      expect(console.error).toHaveBeenCalled();
      const result = store.load();
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.type).toBe("Corrupt");
    });

    it("treats a non-object document as corrupt", () => {
      writeFileSync(filePath, "[1, 2, 3]", "utf8");

      const store = createStore();

      expect(store.getAllDates()).toEqual([]);
      expect(store.load()).toEqual({
        ok: false,
        error: {
          type: "Corrupt",
          message: "Record file must contain a JSON object.",
        },
      });
    });

    it("skips invalid entries and keeps the rest", () => {
      const good = makeDayRecord("2024-03-05", {
        id: "day-1",
        updatedAt: T0,
        records: [makeItem("item-1", "kept", T0)],
      });
      writeFileSync(
        filePath,
        JSON.stringify({
          "2024-03-05": good,
          "2024-03-06": { id: "day-2", date: "yesterday", records: [] },
        }),
        "utf8",
      );

      const store = createStore();

      expect(store.getAllDates()).toEqual(["2024-03-05"]);
      expect(store.load()).toEqual({ ok: true, value: { loaded: 1, skipped: 1 } });
      expect(console.warn).toHaveBeenCalled();
    });

    it("keeps the mutation in memory when the write fails", () => {
      const blocker = join(dir, "blocker");
      writeFileSync(blocker, "", "utf8");
      const store = createDayRecordStore({
        filePath: join(blocker, "dayRecords.json"),
        clock: createManualClock(T0),
        createId: createSequentialIds(),
      });

      const result = store.addRecord("2024-03-05", "unsaved");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.type).toBe("IO");
      expect(store.getRecords("2024-03-05").map((item) => item.content)).toEqual([
        "unsaved",
      ]);
    });
  });

  describe("onChange", () => {
    it("emits local changes with before and after", () => {
      const store = createStore();
      const events: DayRecordChangeEvent[] = [];
      store.onChange((event) => events.push(event));

      store.addRecord("2024-03-05", "a");
      store.deleteRecord("2024-03-05", "id-1");

      expect(events).toHaveLength(2);
      expect(events[0].reason).toBe("local");
      expect(events[0].changes[0].key).toBe("2024-03-05");
      expect(events[0].changes[0].previous).toBeNull();
      expect(events[0].changes[0].current?.records).toHaveLength(1);
      expect(events[1].changes[0].previous?.id).toBe("id-2");
      expect(events[1].changes[0].current).toBeNull();
    });

    it("stops after unsubscribe", () => {
      const store = createStore();
      const listener = jest.fn();
      const unsubscribe = store.onChange(listener);

      unsubscribe();
      store.addRecord("2024-03-05", "a");

      expect(listener).not.toHaveBeenCalled();
    });

    it("emits reload events for days that changed on disk", () => {
      const store = createStore();
      const listener = jest.fn();
      store.onChange(listener);
      const day = makeDayRecord("2024-05-01", {
        id: "day-9",
        updatedAt: T0,
        records: [makeItem("item-9", "from disk", T0)],
      });
      writeFileSync(filePath, JSON.stringify({ "2024-05-01": day }), "utf8");

      store.load();

      expect(listener).toHaveBeenCalledWith({
        reason: "reload",
        changes: [{ key: "2024-05-01", previous: null, current: day }],
      });
    });

    it("stays quiet when a reload finds nothing new", () => {
      const store = createStore();
      store.addRecord("2024-05-01", "saved");
      const listener = jest.fn();
      store.onChange(listener);

      expect(store.load()).toEqual({ ok: true, value: { loaded: 1, skipped: 0 } });
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("applyMerged", () => {
    it("does nothing for an empty batch", () => {
      const store = createStore();
      const listener = jest.fn();
      store.onChange(listener);

      expect(store.applyMerged([])).toEqual({ ok: true, value: [] });
      expect(listener).not.toHaveBeenCalled();
      expect(readdirSync(dir)).toEqual([]);
    });

    it("writes a batch once and emits one merge event", () => {
      const store = createStore();
      const listener = jest.fn();
      store.onChange(listener);
      const first = makeDayRecord("2024-05-01", {
        id: "day-1",
        updatedAt: T0,
        records: [makeItem("a", "one", T0)],
      });
      const second = makeDayRecord("2024-05-02", {
        id: "day-2",
        updatedAt: T0,
        records: [makeItem("b", "two", T0)],
      });

      const result = store.applyMerged([first, second]);

      expect(result).toEqual({ ok: true, value: ["2024-05-01", "2024-05-02"] });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0].reason).toBe("merge");
      expect(Object.keys(JSON.parse(readFileSync(filePath, "utf8")))).toEqual([
        "2024-05-01",
        "2024-05-02",
      ]);
    });

    it("removes a day when the winning copy has no items", () => {
      const store = createStore();
      store.addRecord("2024-05-01", "local");
      const emptied = makeDayRecord("2024-05-01", {
        id: "id-2",
        updatedAt: "2024-06-01T00:00:00.000Z",
        records: [],
      });

      expect(store.applyMerged([emptied])).toEqual({
        ok: true,
        value: ["2024-05-01"],
      });
      expect(store.getRecord("2024-05-01")).toBeNull();
    });
  });
});
