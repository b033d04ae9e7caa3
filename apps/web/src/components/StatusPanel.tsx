import React from 'react';

import type { VisualizerStatus } from '@mazetrace/core';
import type { PaletteData } from '@mazetrace/data';

import { formatStatusLines } from '../lib/hud.js';

interface StatusPanelProps {
  status: VisualizerStatus;
  stopped: boolean;
  palette: PaletteData;
}

export const StatusPanel: React.FC<StatusPanelProps> = ({ status, stopped, palette }) => (
  <div
    className="status-panel"
    data-testid="status-panel"
    style={{ background: palette.overlayBackground, color: palette.overlayText }}
  >
    {formatStatusLines(status, stopped).map((line) => (
      <div key={line}>{line}</div>
    ))}
  </div>
);
