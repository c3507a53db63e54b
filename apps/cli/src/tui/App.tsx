import React, { useCallback, useState } from "react";
import { Box, useApp } from "ink";
import { GameResult } from "@yesno/game";
import { StatusBar } from "./components/StatusBar.js";
import { GameBoard } from "./screens/GameBoard.js";
import { GameOver } from "./screens/GameOver.js";
import { MODE_LABELS } from "../modes.js";
import { Session } from "../session.js";

type Screen =
  | { type: "game" }
  | { type: "gameover"; result: GameResult };

interface AppProps {
  session: Session;
}

export function App({ session }: AppProps) {
  const { exit } = useApp();
  const [screen, setScreen] = useState<Screen>({ type: "game" });

  const handleGameOver = useCallback((result: GameResult) => {
    setScreen({ type: "gameover", result });
  }, []);

  // Leaving mid-game ends it where it stands
  const handleQuit = useCallback(() => {
    session.controller.close();
    exit();
  }, [session, exit]);

  return (
    <Box flexDirection="column">
      <StatusBar
        modeLabel={MODE_LABELS[session.mode]}
        oracleUrl={session.adapter ? session.settings.oracleUrl : null}
      />

      {screen.type === "game" && (
        <GameBoard session={session} onGameOver={handleGameOver} onQuit={handleQuit} />
      )}

      {screen.type === "gameover" && (
        <GameOver result={screen.result} onQuit={() => exit()} />
      )}
    </Box>
  );
}
