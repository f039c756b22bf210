import {
  DIFFICULTIES,
  difficultyLabel,
  formatElapsed,
  gameState,
  shallowEqual,
  useGameState,
} from "@/game";

const Hud = () => {
  const state = useGameState(
    (data) => ({
      size: data.size,
      moves: data.moves,
      status: data.status,
      time: formatElapsed(data.elapsedSeconds, { tenths: true }),
      showWin: data.ui.showWin,
    }),
    shallowEqual
  );

  return (
    <div className="hud">
      <div className="hud-panel">
        <div className="hud-title">{difficultyLabel(state.size)}</div>
        <div className="hud-meta">Moves: {state.moves}</div>
        <div className="hud-meta">Time: {state.time}</div>
        <div className="hud-actions">
          <select
            value={state.size}
            onChange={(event) => {
              gameState.changeSize(Number(event.target.value));
            }}
          >
            {DIFFICULTIES.map((difficulty) => (
              <option key={difficulty.size} value={difficulty.size}>
                {difficulty.label}
              </option>
            ))}
          </select>
          <button type="button" onClick={() => gameState.restart()}>
            Restart
          </button>
          <button
            type="button"
            disabled={state.status === "won"}
            onClick={() => gameState.togglePause()}
          >
            {state.status === "paused" ? "Resume" : "Pause"}
          </button>
        </div>
      </div>
      {state.showWin && (
        <div className="hud-win">
          <div className="hud-win-card">
            <div className="hud-win-title">Puzzle Solved</div>
            <div className="hud-win-body">
              {difficultyLabel(state.size)} in {state.moves} moves, {state.time}
            </div>
            <button
              type="button"
              onClick={() => {
                gameState.hideWin();
                gameState.restart();
              }}
            >
              Play again
            </button>
          </div>
        </div>
      )}
    </div>
  );
};

export default Hud;
