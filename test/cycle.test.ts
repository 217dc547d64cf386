import { describe, expect, it } from "vitest";
import { selectAction, unvisitedWindows } from "../src/core/cycle.js";
import { ids, makeWindow } from "./helpers.js";

const appX = { wm_class: "appx" };
const w1 = makeWindow("0x01", { wm_class: "appx.AppX" });
const w2 = makeWindow("0x02", { wm_class: "appx.AppX" });
const w3 = makeWindow("0x03", { wm_class: "appy.AppY" });
const w4 = makeWindow("0x04", { wm_class: "appx.AppX" });

describe("selectAction", () => {
  it("launches when the window spec has nothing to match on", () => {
    expect(selectAction({ command: "appx" }, [w1, w2], w1)).toEqual({
      kind: "launch",
      command: "appx",
    });
    expect(selectAction({}, [w1], null)).toEqual({ kind: "launch", command: null });
  });

  it("launches when no windows are open", () => {
    expect(selectAction({ ...appX, command: "appx" }, [], null)).toEqual({
      kind: "launch",
      command: "appx",
    });
  });

  it("launches when nothing matches", () => {
    expect(selectAction({ wm_class: "appz", command: "appz" }, [w1, w2, w3], w3)).toEqual({
      kind: "launch",
      command: "appz",
    });
  });

  it("launches nothing when there is no command", () => {
    expect(selectAction({ wm_class: "appz" }, [w1, w3], w1)).toEqual({
      kind: "launch",
      command: null,
    });
  });

  it("focuses the most recent match when the app isn't focused", () => {
    expect(selectAction(appX, [w3, w2, w1], w3)).toEqual({ kind: "focus", window: w2 });
  });

  it("focuses the most recent match when nothing is focused", () => {
    expect(selectAction(appX, [w3, w1, w2], null)).toEqual({ kind: "focus", window: w1 });
  });

  it("does nothing when the only match is focused", () => {
    expect(selectAction(appX, [w1, w3], w1)).toEqual({ kind: "noop", window: w1 });
  });

  it("advances to the second window of the app", () => {
    expect(selectAction(appX, [w1, w3, w2], w1)).toEqual({ kind: "advance", window: w2 });
  });

  it("advances to the next window after a promotion", () => {
    expect(selectAction(appX, [w2, w1, w3], w2)).toEqual({ kind: "advance", window: w1 });
  });

  it("wraps to the least recent match once every window was visited", () => {
    expect(selectAction(appX, [w1, w2, w3], w1)).toEqual({ kind: "advance", window: w2 });
  });

  it("steps through three windows and wraps", () => {
    // each advance promotes its target to the front
    expect(selectAction(appX, [w4, w3, w2, w1], w4)).toEqual({ kind: "advance", window: w2 });
    expect(selectAction(appX, [w2, w4, w3, w1], w2)).toEqual({ kind: "advance", window: w1 });
    expect(selectAction(appX, [w1, w2, w4, w3], w1)).toEqual({ kind: "advance", window: w4 });
  });
});

describe("unvisitedWindows", () => {
  it("excludes the leading run of matching windows", () => {
    const matching = [w1, w2, w4];
    expect(ids(unvisitedWindows(matching, [w1, w3, w2, w4]))).toEqual(["0x02", "0x04"]);
    expect(ids(unvisitedWindows(matching, [w2, w1, w3, w4]))).toEqual(["0x04"]);
  });

  it("is empty when all matching windows lead the order", () => {
    expect(unvisitedWindows([w1, w2], [w1, w2, w3])).toEqual([]);
  });
});
