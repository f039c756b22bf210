import { useEffect } from "react";
import GameCanvas from "@/components/GameCanvas";
import { gameState } from "@/game";
import DebugOverlay from "@/ui/DebugOverlay";
import Hud from "@/ui/Hud";

const showDebug = new URLSearchParams(window.location.search).has("debug");

const App = () => {
  useEffect(() => {
    const onVisibilityChange = () => {
      if (document.hidden) gameState.pause();
    };
    document.addEventListener("visibilitychange", onVisibilityChange);
    return () => {
      document.removeEventListener("visibilitychange", onVisibilityChange);
    };
  }, []);

  return (
    <div className="app">
      <GameCanvas />
      <Hud />
      {showDebug && <DebugOverlay />}
    </div>
  );
};

export default App;
