/**
 * Path reconstruction from direction maps
 */

import { describe, expect, it } from "vitest";
import { Direction, GridSpace } from "../src/core/coords";
import { DenseMap } from "../src/core/grid";
import { cameFromIntoPath, gotoIntoPath } from "../src/search";

describe("cameFromIntoPath", () => {
  const space = GridSpace.of(3, 1);
  const origin = space.first;
  const destination = space.last;
  const middle = space.positionOrThrow(1, 0);
  const empty = () => DenseMap.filled<Direction | undefined>(space, undefined);

  it("walks back from the destination", () => {
    const cameFrom = empty();
    cameFrom.set(middle, Direction.E);
    cameFrom.set(destination, Direction.E);
    expect(cameFromIntoPath(cameFrom, origin, destination).value).toEqual([
      Direction.E,
      Direction.E,
    ]);
  });

  it("returns an empty path when origin and destination coincide", () => {
    expect(cameFromIntoPath(empty(), origin, origin).value).toEqual([]);
  });

  it("reports a destination that was never reached", () => {
    const result = cameFromIntoPath(empty(), origin, destination);
    expect(result.error.code).toBe("UNREACHABLE");
    expect(result.error.details).toEqual({ origin: [0, 0], destination: [2, 0] });
  });

  it("reports a gap in the chain", () => {
    const cameFrom = empty();
    cameFrom.set(destination, Direction.E);
    const result = cameFromIntoPath(cameFrom, origin, destination);
    expect(result.error.code).toBe("INVALID_MOVEMENT");
    expect(result.error.message).toBe("No came-from entry at (1,0)");
  });

  it("reports an entry pointing out of the grid", () => {
    const cameFrom = empty();
    cameFrom.set(destination, Direction.S);
    const result = cameFromIntoPath(cameFrom, origin, destination);
    expect(result.error.message).toBe("Came-from entry at (2,0) leaves the grid");
  });

  it("gives up on loops", () => {
    const cameFrom = empty();
    cameFrom.set(destination, Direction.E);
    cameFrom.set(middle, Direction.W);
    const result = cameFromIntoPath(cameFrom, origin, destination);
    expect(result.error.code).toBe("LOOP");
    expect(result.error.details).toEqual({ steps: 4 });
  });
});

describe("gotoIntoPath", () => {
  const space = GridSpace.of(3, 1);
  const origin = space.first;
  const destination = space.last;
  const middle = space.positionOrThrow(1, 0);
  const empty = () => DenseMap.filled<Direction | undefined>(space, undefined);

  it("follows the map forwards", () => {
    const goto = empty();
    goto.set(origin, Direction.E);
    goto.set(middle, Direction.E);
    expect(gotoIntoPath(goto, origin, destination).value).toEqual([
      Direction.E,
      Direction.E,
    ]);
  });

  it("reports an origin with no entry as unreachable", () => {
    expect(gotoIntoPath(empty(), origin, destination).error.code).toBe("UNREACHABLE");
  });

  it("reports a gap after the first step", () => {
    const goto = empty();
    goto.set(origin, Direction.E);
    expect(gotoIntoPath(goto, origin, destination).error.message).toBe(
      "No go-to entry at (1,0)",
    );
  });

  it("gives up on loops", () => {
    const goto = empty();
    goto.set(origin, Direction.E);
    goto.set(middle, Direction.W);
    expect(gotoIntoPath(goto, origin, destination).error.details).toEqual({ steps: 4 });
  });
});
