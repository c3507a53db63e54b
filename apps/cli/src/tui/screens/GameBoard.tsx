import React, { useCallback, useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";
import Spinner from "ink-spinner";
import {
  Animation,
  Coord,
  Directive,
  GameResult,
  INPUT_HINT,
  describeTurnBanner,
  playerLabel,
  renderBoard,
  renderScore,
} from "@yesno/game";
import { colors, stoneColors } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";
import { GifOverlay } from "./GifOverlay.js";
import { Session, submitTypedMove, thinkingDelay } from "../../session.js";

interface GameBoardProps {
  session: Session;
  onGameOver: (result: GameResult) => void;
  onQuit: () => void;
}

type Stage = "fetching" | "overlay" | "input" | "thinking" | "over";

interface Overlay {
  directive: Directive;
  animation: Animation | null;
  loading: boolean;
}

const MAX_MESSAGES = 4;
const FLASH_MS = 400;

export function GameBoard({ session, onGameOver, onQuit }: GameBoardProps) {
  const { controller, adapter, rng, settings, showGifs } = session;
  const [stage, setStage] = useState<Stage>("fetching");
  const [turnKey, setTurnKey] = useState(0);
  const [overlay, setOverlay] = useState<Overlay | null>(null);
  const [messages, setMessages] = useState<string[]>([]);
  const [lastMove, setLastMove] = useState<Coord | null>(null);
  const [flash, setFlash] = useState(false);
  const [inputBuffer, setInputBuffer] = useState("");
  const [error, setError] = useState("");

  const pushStatus = useCallback(() => {
    const status = controller.getStatus();
    setMessages((prev) => [...prev, status].slice(-MAX_MESSAGES));
  }, [controller]);

  useEffect(() => {
    const offs = [
      controller.on("directive", pushStatus),
      controller.on("pass", pushStatus),
      controller.on("placement", (placement) => {
        setLastMove({ row: placement.row, col: placement.col });
        pushStatus();
      }),
      controller.on("flash", () => setFlash(true)),
      controller.on("terminal", (result) => {
        setStage("over");
        onGameOver(result);
      }),
    ];
    return () => offs.forEach((off) => off());
  }, [controller, pushStatus, onGameOver]);

  const nextTurn = useCallback(() => {
    if (!controller.isTerminal()) setTurnKey((k) => k + 1);
  }, [controller]);

  const startPlacement = useCallback(() => {
    setOverlay(null);
    setStage(controller.isAiTurn() ? "thinking" : "input");
  }, [controller]);

  // One oracle request per turn
  useEffect(() => {
    if (controller.isTerminal()) return;
    let cancelled = false;
    setStage("fetching");

    controller
      .beginTurn()
      .then((turn) => {
        if (cancelled || !turn) return;
        if (turn.passed) {
          nextTurn();
          return;
        }
        if (!showGifs || !adapter) {
          startPlacement();
          return;
        }
        setOverlay({ directive: turn.directive, animation: null, loading: true });
        setStage("overlay");
        return adapter.fetchAnimation(turn.directive.imageUrl).then((animation) => {
          if (cancelled) return;
          setOverlay((prev) => (prev ? { ...prev, animation, loading: false } : prev));
        });
      })
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => {
      cancelled = true;
    };
  }, [turnKey, controller, adapter, showGifs, nextTurn, startPlacement]);

  useEffect(() => {
    if (stage !== "thinking") return;
    const timer = setTimeout(() => {
      try {
        controller.playAiTurn();
        nextTurn();
      } catch (err) {
        setError(err instanceof Error ? err.message : String(err));
      }
    }, thinkingDelay(rng, settings));
    return () => clearTimeout(timer);
  }, [stage, controller, rng, settings, nextTurn]);

  useEffect(() => {
    if (!flash) return;
    const timer = setTimeout(() => setFlash(false), FLASH_MS);
    return () => clearTimeout(timer);
  }, [flash]);

  const handleSubmitMove = useCallback(() => {
    const placement = submitTypedMove(controller, inputBuffer);
    setInputBuffer("");
    if (placement) nextTurn();
  }, [inputBuffer, controller, nextTurn]);

  useInput(
    (input, key) => {
      if (key.escape || (input === "q" && !inputBuffer)) {
        onQuit();
        return;
      }
      if (stage !== "input") return;

      if (key.return) {
        handleSubmitMove();
        return;
      }
      if (key.backspace || key.delete) {
        setInputBuffer((prev) => prev.slice(0, -1));
        return;
      }
      if (input && !key.ctrl && !key.meta) {
        setInputBuffer((prev) => prev + input);
      }
    },
    { isActive: stage !== "overlay" },
  );

  const player = controller.getCurrentPlayer();
  const label = playerLabel(player);
  const aiPlayer = controller.getAiPlayer();
  const boardHtml = renderBoard(controller.getBoard(), {
    highlight: stage === "input" ? controller.getTargets() : [],
    lastMove,
  });

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Box flexDirection="row" justifyContent="space-between">
        <Text color={colors.primary} bold>
          Turn {controller.getTurnNumber() + 1}
        </Text>
        <Text color={colors.dimmed}>
          {aiPlayer ? `AI plays ${playerLabel(aiPlayer)}` : "Two players"}
        </Text>
      </Box>

      <ColoredBoard html={boardHtml} flash={flash} />
      <Text color={colors.white}>{renderScore(controller.getBoard())}</Text>

      <Text>{""}</Text>
      {messages.map((msg, i) => (
        <Text key={i} color={i === messages.length - 1 ? colors.warning : colors.dimmed}>
          {msg}
        </Text>
      ))}
      <Text>{""}</Text>

      {stage === "fetching" && (
        <Box>
          <Text color={colors.secondary}>
            <Spinner type="dots" />
          </Text>
          <Text color={stoneColors[player]} bold> {describeTurnBanner(player)}</Text>
        </Box>
      )}

      {stage === "overlay" && overlay && (
        <GifOverlay
          directive={overlay.directive}
          animation={overlay.animation}
          loading={overlay.loading}
          onDismiss={startPlacement}
        />
      )}

      {stage === "thinking" && (
        <Box>
          <Text color={colors.secondary}>
            <Spinner type="dots" />
          </Text>
          <Text color={stoneColors[player]}> {label} (AI) is thinking...</Text>
        </Box>
      )}

      {stage === "input" && (
        <Box flexDirection="column">
          <Text color={stoneColors[player]} bold>
            {label} TO PLAY - {INPUT_HINT}
          </Text>
          <Box>
            <Text color={colors.secondary}>{"> "}</Text>
            <Text color={colors.text}>{inputBuffer}</Text>
            <Text color={colors.dimmed}>{"_"}</Text>
          </Box>
        </Box>
      )}

      {error && <Text color={colors.error}>{error}</Text>}
      <Text color={colors.dimmed}>[q/esc] quit</Text>
    </Box>
  );
}
