import { countInversions, isSolvable, shallowEqual, useGameState } from "@/game";

const DebugOverlay = () => {
  const state = useGameState(
    (data) => ({
      status: data.status,
      moves: data.moves,
      grid: data.grid,
      blank: `${data.blank.row},${data.blank.col}`,
      repaired: data.repaired,
    }),
    shallowEqual
  );

  return (
    <div className="debug-overlay">
      <div>State: {state.status}</div>
      <div>Moves: {state.moves}</div>
      <div>Blank: ({state.blank})</div>
      <div>Inversions: {countInversions(state.grid)}</div>
      <div>Solvable: {isSolvable(state.grid) ? "yes" : "no"}</div>
      <div>Repaired: {state.repaired ? "yes" : "no"}</div>
      <div>Grid:</div>
      <pre>{state.grid.map((row) => row.join(" ")).join("\n")}</pre>
    </div>
  );
};

export default DebugOverlay;
