import { describe, it, expect } from "vitest";
import { Frontier } from "../crawler/frontier.js";

/** Pop everything left in the frontier, in order. */
function drain(frontier: Frontier): string[] {
  const urls: string[] = [];
  for (let url = frontier.pop(); url !== undefined; url = frontier.pop()) {
    urls.push(url);
  }
  return urls;
}

describe("Frontier", () => {
  it("should start empty", () => {
    const frontier = new Frontier();
    expect(frontier.isEmpty()).toBe(true);
    expect(frontier.size).toBe(0);
    expect(frontier.pop()).toBeUndefined();
  });

  describe("pushBreadthFirst", () => {
    it("should pop URLs in insertion order", () => {
      const frontier = new Frontier();
      frontier.pushBreadthFirst("https://example.com/a");
      frontier.pushBreadthFirst("https://example.com/b");
      frontier.pushBreadthFirst("https://example.com/c");

      expect(drain(frontier)).toEqual([
        "https://example.com/a",
        "https://example.com/b",
        "https://example.com/c",
      ]);
    });
  });

  describe("pushDepthFirst", () => {
    it("should pop the most recently pushed URL first", () => {
      const frontier = new Frontier();
      frontier.pushDepthFirst("https://example.com/a");
      frontier.pushDepthFirst("https://example.com/b");
      frontier.pushDepthFirst("https://example.com/c");

      expect(drain(frontier)).toEqual([
        "https://example.com/c",
        "https://example.com/b",
        "https://example.com/a",
      ]);
    });

    it("should put a depth-first push ahead of pending breadth-first entries", () => {
      const frontier = new Frontier();
      frontier.pushBreadthFirst("https://example.com/a");
      frontier.pushBreadthFirst("https://example.com/b");
      frontier.pushDepthFirst("https://example.com/front");

      expect(frontier.pop()).toBe("https://example.com/front");
      expect(frontier.pop()).toBe("https://example.com/a");
    });
  });

  it("should keep duplicate entries", () => {
    const frontier = new Frontier();
    frontier.pushBreadthFirst("https://example.com/a");
    frontier.pushBreadthFirst("https://example.com/a");

    expect(frontier.size).toBe(2);
    expect(drain(frontier)).toEqual([
      "https://example.com/a",
      "https://example.com/a",
    ]);
  });

  it("should grow past its initial capacity and keep order at both ends", () => {
    const frontier = new Frontier(2);
    frontier.pushBreadthFirst("b1");
    frontier.pushBreadthFirst("b2");
    frontier.pushDepthFirst("d1");
    frontier.pushBreadthFirst("b3");
    frontier.pushDepthFirst("d2");

    expect(frontier.size).toBe(5);
    expect(drain(frontier)).toEqual(["d2", "d1", "b1", "b2", "b3"]);
    expect(frontier.isEmpty()).toBe(true);
  });

  it("should reuse space after pops wrap around the buffer", () => {
    const frontier = new Frontier(3);
    frontier.pushBreadthFirst("a");
    frontier.pushBreadthFirst("b");
    expect(frontier.pop()).toBe("a");
    frontier.pushBreadthFirst("c");
    frontier.pushBreadthFirst("d");
    frontier.pushDepthFirst("z");

    expect(drain(frontier)).toEqual(["z", "b", "c", "d"]);
  });

  it("should treat a non-positive capacity as one", () => {
    const frontier = new Frontier(0);
    frontier.pushBreadthFirst("a");
    frontier.pushBreadthFirst("b");
    expect(drain(frontier)).toEqual(["a", "b"]);
  });
});
