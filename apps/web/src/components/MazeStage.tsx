import React, { useCallback } from 'react';
import { Graphics, Stage } from '@pixi/react';
import type { Graphics as PixiGraphics } from 'pixi.js';

import type { FrameState } from '@mazetrace/core';
import type { PaletteData } from '@mazetrace/data';

import { cellColor, toPixiColor } from '../lib/colors.js';

interface MazeStageProps {
  frame: FrameState;
  palette: PaletteData;
  cellSize: number;
}

export const MazeStage: React.FC<MazeStageProps> = ({ frame, palette, cellSize }) => {
  const { grid } = frame;

  const draw = useCallback(
    (g: PixiGraphics) => {
      g.clear();
      for (let y = 0; y < grid.height; y += 1) {
        for (let x = 0; x < grid.width; x += 1) {
          g.beginFill(toPixiColor(cellColor(frame, palette, { x, y })));
          g.drawRect(x * cellSize, y * cellSize, cellSize, cellSize);
          g.endFill();
        }
      }
    },
    [frame, palette, cellSize, grid]
  );

  return (
    <Stage
      width={grid.width * cellSize}
      height={grid.height * cellSize}
      options={{ background: toPixiColor(palette.wall), antialias: false }}
    >
      <Graphics draw={draw} />
    </Stage>
  );
};
