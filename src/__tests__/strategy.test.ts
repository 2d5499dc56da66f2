import { describe, it, expect } from "vitest";
import {
  resolveStrategy,
  insertionPolicyFor,
  UnknownStrategyError,
  DEFAULT_STRATEGY,
} from "../crawler/strategy.js";
import { Frontier } from "../crawler/frontier.js";

describe("resolveStrategy", () => {
  it("should default to breadth-first when no name is given", () => {
    expect(resolveStrategy()).toBe("breadth-first");
    expect(DEFAULT_STRATEGY).toBe("breadth-first");
  });

  it.each([
    ["depth-first", "depth-first"],
    ["breadth-first", "breadth-first"],
    ["dfs", "depth-first"],
    ["bfs", "breadth-first"],
    ["DFS", "depth-first"],
    ["  Breadth-First  ", "breadth-first"],
  ])("should resolve %j to %s", (name, expected) => {
    expect(resolveStrategy(name)).toBe(expected);
  });

  it("should throw UnknownStrategyError for an unrecognized name", () => {
    expect(() => resolveStrategy("XYZ")).toThrow(UnknownStrategyError);
  });

  it("should include the rejected name and the valid names in the error", () => {
    let caught: unknown;
    try {
      resolveStrategy("random");
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof UnknownStrategyError)) {
      throw new Error("expected an UnknownStrategyError");
    }
    const error = caught;
    expect(error.name).toBe("UnknownStrategyError");
    expect(error.strategy).toBe("random");
    expect(error.validStrategies).toEqual(["depth-first", "breadth-first"]);
    expect(error.message).toBe(
      'Unknown strategy "random". Valid strategies are: depth-first, breadth-first',
    );
  });

  it("should reject an empty name", () => {
    expect(() => resolveStrategy("")).toThrow(UnknownStrategyError);
  });

  it("should not resolve names inherited from Object.prototype", () => {
    expect(() => resolveStrategy("constructor")).toThrow(UnknownStrategyError);
  });
});

describe("insertionPolicyFor", () => {
  it("should push to the front for depth-first", () => {
    const frontier = new Frontier();
    const push = insertionPolicyFor("depth-first");
    push(frontier, "a");
    push(frontier, "b");

    expect(frontier.pop()).toBe("b");
    expect(frontier.pop()).toBe("a");
  });

  it("should push to the back for breadth-first", () => {
    const frontier = new Frontier();
    const push = insertionPolicyFor("breadth-first");
    push(frontier, "a");
    push(frontier, "b");

    expect(frontier.pop()).toBe("a");
    expect(frontier.pop()).toBe("b");
  });
});
