import { describe, expect, it } from "vitest";
import { GridInvariantError, InvalidSizeError } from "../errors";
import { createRng } from "../rng";
import {
  assertSessionConsistent,
  canMove,
  changeSize,
  isSessionSolved,
  move,
  newSession,
  pause,
  restart,
  resume,
  sessionFromGrid,
  snapshotSession,
} from "../session";
import { assertPermutation, locateBlank } from "../systems/GridSystem";
import { isSolvable } from "../systems/SolvabilitySystem";

const centreBlank = () =>
  sessionFromGrid([
    [1, 2, 3],
    [4, 0, 5],
    [6, 7, 8],
  ]);

const oneMoveFromSolved = () =>
  sessionFromGrid([
    [1, 2, 3],
    [4, 5, 6],
    [7, 0, 8],
  ]);

describe("newSession", () => {
  it.each([2, 3, 4, 5, 6])("generates a solvable %i-grid", (size) => {
    const session = newSession(size, { rng: createRng("test-seed") });
    expect(() => assertPermutation(session.grid)).not.toThrow();
    expect(session.grid).toHaveLength(size);
    expect(isSolvable(session.grid)).toBe(true);
    expect(session.blank).toEqual(locateBlank(session.grid));
    expect(session.moves).toBe(0);
    expect(session.solvable).toBe(true);
    expect(session.status).toBe("playing");
  });

  it("rejects sizes below two and fractional sizes", () => {
    expect(() => newSession(1)).toThrow(InvalidSizeError);
    expect(() => newSession(0)).toThrow(InvalidSizeError);
    expect(() => newSession(2.5)).toThrow(InvalidSizeError);
  });

  it("never starts on the solved arrangement", () => {
    for (let seed = 0; seed < 200; seed += 1) {
      const session = newSession(2, { rng: createRng(seed) });
      expect(isSessionSolved(session)).toBe(false);
    }
  });

  it("steps off the solved arrangement when the walk is empty", () => {
    const session = newSession(3, { rng: createRng(7), shuffleIterations: 0 });
    expect(isSessionSolved(session)).toBe(false);
    expect([
      { row: 1, col: 2 },
      { row: 2, col: 1 },
    ]).toContainEqual(session.blank);
    expect(session.repaired).toBe(false);
  });
});

describe("sessionFromGrid", () => {
  it("repairs an unsolvable arrangement once", () => {
    const session = sessionFromGrid([
      [1, 2, 3],
      [4, 5, 6],
      [8, 7, 0],
    ]);
    expect(session.repaired).toBe(true);
    expect(session.grid).toEqual([
      [2, 1, 3],
      [4, 5, 6],
      [8, 7, 0],
    ]);
    expect(session.blank).toEqual({ row: 2, col: 2 });
    expect(session.solvable).toBe(true);
  });

  it("keeps a solvable arrangement as given", () => {
    const session = centreBlank();
    expect(session.repaired).toBe(false);
    expect(session.blank).toEqual({ row: 1, col: 1 });
  });

  it("refuses arrangements that are not permutations", () => {
    expect(() =>
      sessionFromGrid([
        [1, 1, 3],
        [4, 5, 6],
        [7, 8, 0],
      ])
    ).toThrow(GridInvariantError);
    expect(() => sessionFromGrid([[0]])).toThrow(InvalidSizeError);
  });
});

describe("canMove", () => {
  it("matches Manhattan adjacency to the blank", () => {
    for (const session of [centreBlank(), oneMoveFromSolved()]) {
      const { row: blankRow, col: blankCol } = session.blank;
      for (let row = -1; row <= 3; row += 1) {
        for (let col = -1; col <= 3; col += 1) {
          const expected =
            row >= 0 &&
            row < 3 &&
            col >= 0 &&
            col < 3 &&
            Math.abs(row - blankRow) + Math.abs(col - blankCol) === 1;
          expect(canMove(session, row, col)).toBe(expected);
        }
      }
    }
  });
});

describe("move", () => {
  it("returns to the prior grid after the inverse move", () => {
    const session = centreBlank();
    const before = session.grid.map((row) => [...row]);

    expect(move(session, 0, 1)).toBe(true);
    expect(session.grid[1][1]).toBe(2);
    expect(session.blank).toEqual({ row: 0, col: 1 });

    expect(move(session, 1, 1)).toBe(true);
    expect(session.grid).toEqual(before);
    expect(session.blank).toEqual({ row: 1, col: 1 });
    expect(session.moves).toBe(2);
  });

  it("leaves everything unchanged on a rejected move", () => {
    const session = centreBlank();
    const before = session.grid.map((row) => [...row]);

    expect(move(session, 0, 0)).toBe(false);
    expect(move(session, 5, 5)).toBe(false);
    expect(move(session, 1, 1)).toBe(false);

    expect(session.grid).toEqual(before);
    expect(session.blank).toEqual({ row: 1, col: 1 });
    expect(session.moves).toBe(0);
  });

  it("marks the session won on the solving move and stays terminal", () => {
    const session = oneMoveFromSolved();
    expect(move(session, 2, 2)).toBe(true);
    expect(session.status).toBe("won");
    expect(isSessionSolved(session)).toBe(true);

    expect(move(session, 2, 1)).toBe(false);
    expect(session.moves).toBe(1);
    expect(session.blank).toEqual({ row: 2, col: 2 });
  });

  it("keeps the tracked blank in step with the grid", () => {
    const session = newSession(4, { rng: createRng("test-seed") });
    const rng = createRng(99);
    for (let i = 0; i < 200; i += 1) {
      const row = Math.floor(rng() * 4);
      const col = Math.floor(rng() * 4);
      move(session, row, col);
      if (session.status === "won") break;
      expect(() => assertSessionConsistent(session)).not.toThrow();
    }
  });
});

describe("pause and resume", () => {
  it("blocks moves while paused", () => {
    const session = centreBlank();
    expect(pause(session)).toBe(true);
    expect(session.status).toBe("paused");
    expect(pause(session)).toBe(false);
    expect(move(session, 0, 1)).toBe(false);

    expect(resume(session)).toBe(true);
    expect(resume(session)).toBe(false);
    expect(move(session, 0, 1)).toBe(true);
  });

  it("cannot pause a won session", () => {
    const session = oneMoveFromSolved();
    move(session, 2, 2);
    expect(pause(session)).toBe(false);
    expect(session.status).toBe("won");
  });
});

describe("restart and changeSize", () => {
  it("starts over at the same size", () => {
    const session = centreBlank();
    move(session, 0, 1);
    const next = restart(session, { rng: createRng("test-seed") });
    expect(next).not.toBe(session);
    expect(next.size).toBe(3);
    expect(next.moves).toBe(0);
    expect(next.status).toBe("playing");
  });

  it("starts over at a new size", () => {
    const next = changeSize(centreBlank(), 5, { rng: createRng("test-seed") });
    expect(next.size).toBe(5);
    expect(next.grid).toHaveLength(5);
    expect(isSolvable(next.grid)).toBe(true);
  });
});

describe("snapshotSession", () => {
  it("is detached from later moves", () => {
    const session = centreBlank();
    const snapshot = snapshotSession(session);
    move(session, 0, 1);
    expect(snapshot.grid[1][1]).toBe(0);
    expect(snapshot.blank).toEqual({ row: 1, col: 1 });
    expect(snapshot.moves).toBe(0);
  });
});

describe("assertSessionConsistent", () => {
  it("throws when the tracked blank drifts", () => {
    const session = centreBlank();
    session.blank = { row: 0, col: 0 };
    expect(() => assertSessionConsistent(session)).toThrow(
      "Tracked blank (0, 0) does not match grid blank (1, 1)"
    );
  });
});
