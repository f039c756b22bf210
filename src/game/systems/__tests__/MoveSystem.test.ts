import { describe, expect, it } from "vitest";
import { cloneGrid, solvedGrid } from "../GridSystem";
import { applyMove, canMoveTile, movableTiles, tileForSlide } from "../MoveSystem";
import { isSolved } from "../WinCheckSystem";

describe("MoveSystem", () => {
  it("moves a tile adjacent to the blank", () => {
    const grid = [
      [1, 2, 3],
      [4, 0, 6],
      [7, 5, 8],
    ];
    const result = applyMove(grid, { row: 1, col: 1 }, 2, 1);
    expect(result.moved).toBe(true);
    expect(result.blank).toEqual({ row: 2, col: 1 });
    expect(grid[1][1]).toBe(5);
    expect(grid[2][1]).toBe(0);
  });

  it("does not move a non-adjacent tile", () => {
    const grid = [
      [1, 2, 3],
      [4, 0, 6],
      [7, 5, 8],
    ];
    const before = cloneGrid(grid);
    const result = applyMove(grid, { row: 1, col: 1 }, 0, 0);
    expect(result.moved).toBe(false);
    expect(result.blank).toEqual({ row: 1, col: 1 });
    expect(grid).toEqual(before);
  });

  it("only allows tiles orthogonally next to the blank", () => {
    const grid = [
      [1, 2, 3],
      [4, 0, 5],
      [6, 7, 8],
    ];
    const blank = { row: 1, col: 1 };
    expect(canMoveTile(grid, blank, 0, 1)).toBe(true);
    expect(canMoveTile(grid, blank, 1, 0)).toBe(true);
    expect(canMoveTile(grid, blank, 1, 2)).toBe(true);
    expect(canMoveTile(grid, blank, 2, 1)).toBe(true);
    expect(canMoveTile(grid, blank, 0, 0)).toBe(false);
    expect(canMoveTile(grid, blank, 2, 2)).toBe(false);
    expect(canMoveTile(grid, blank, 1, 1)).toBe(false);
  });

  it("rejects coordinates outside the grid", () => {
    const grid = solvedGrid(3);
    const blank = { row: 2, col: 2 };
    expect(canMoveTile(grid, blank, 3, 2)).toBe(false);
    expect(canMoveTile(grid, blank, 2, 3)).toBe(false);
    expect(canMoveTile(grid, blank, -1, 0)).toBe(false);
  });

  it("lists the in-bounds neighbours of the blank", () => {
    expect(movableTiles(solvedGrid(3), { row: 0, col: 0 })).toEqual([
      { row: 1, col: 0 },
      { row: 0, col: 1 },
    ]);
  });

  it("maps a push direction to the tile on the opposite side of the blank", () => {
    const blank = { row: 1, col: 1 };
    expect(tileForSlide(blank, "up")).toEqual({ row: 2, col: 1 });
    expect(tileForSlide(blank, "down")).toEqual({ row: 0, col: 1 });
    expect(tileForSlide(blank, "left")).toEqual({ row: 1, col: 2 });
    expect(tileForSlide(blank, "right")).toEqual({ row: 1, col: 0 });
  });
});

describe("WinCheckSystem", () => {
  it("detects a solved grid", () => {
    const grid = [
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 0],
    ];
    expect(isSolved(grid)).toBe(true);
    expect(isSolved(solvedGrid(4))).toBe(true);
  });

  it("rejects a grid with the blank out of place", () => {
    expect(
      isSolved([
        [1, 2, 3],
        [4, 5, 6],
        [7, 0, 8],
      ])
    ).toBe(false);
    expect(
      isSolved([
        [1, 2],
        [0, 3],
      ])
    ).toBe(false);
  });
});
