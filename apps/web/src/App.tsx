import './styles.css';

import React, { useEffect, useMemo, useState } from 'react';
import { pino } from 'pino';

import { createFrameClock, seededRandom } from '@mazetrace/core';
import type { FrameState } from '@mazetrace/core';

import { MazeStage } from './components/MazeStage.js';
import { StatusPanel } from './components/StatusPanel.js';
import { KeyboardInput } from './lib/keyboard-input.js';
import { resolveSettings } from './lib/settings.js';
import { startVisualizerSession } from './lib/visualizer-session.js';

const logger = pino({ browser: { asObject: true }, level: 'info' });

export default function App() {
  const settings = useMemo(() => resolveSettings(window.location.search, logger), []);
  const [frame, setFrame] = useState<FrameState | null>(null);
  const [stopped, setStopped] = useState(false);

  useEffect(() => {
    const input = new KeyboardInput();
    const detach = input.attach(window);
    const { width, height, seed } = settings.maze;
    const session = startVisualizerSession(
      {
        width,
        height,
        fps: settings.fps,
        strategies: settings.strategies,
        initialStrategy: settings.initialStrategy,
        random: seed ? seededRandom(seed) : undefined,
        clock: createFrameClock(),
        input,
        logger,
        renderer: {
          // the visited set keeps growing in place during a run
          drawFrame: (next) => setFrame({ ...next, visited: new Set(next.visited) })
        }
      },
      {
        onStopped: () => setStopped(true),
        onError: (error) => logger.error({ err: error }, 'visualizer loop failed')
      }
    );

    return () => {
      session.dispose();
      detach();
    };
  }, [settings]);

  return (
    <div className="app-shell">
      {frame ? (
        <>
          <MazeStage frame={frame} palette={settings.palette} cellSize={settings.cellSize} />
          <StatusPanel status={frame.status} stopped={stopped} palette={settings.palette} />
        </>
      ) : null}
    </div>
  );
}
