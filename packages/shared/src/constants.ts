/**
 * @fileoverview Defaults and endpoint paths shared by server and simulator.
 */

import type { GameSettings } from './types/index.js';

/** Share of devices that start in the human group */
export const DEFAULT_HUMAN_PERCENTAGE = 50;

/** Advisory timeout handed to devices (seconds) */
export const DEFAULT_TIMEOUT_SECONDS = 30;

/** Default activity length (minutes) */
export const DEFAULT_DURATION_MINUTES = 15;

export const DEFAULT_GAME_SETTINGS: GameSettings = {
  humanPercentage: DEFAULT_HUMAN_PERCENTAGE,
  timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
  durationMinutes: DEFAULT_DURATION_MINUTES,
};

/** Port the wearables are flashed to poll */
export const DEFAULT_SERVER_PORT = 5000;

/** Interval between two polls of a wearable (ms) */
export const DEVICE_POLL_INTERVAL_MS = 1000;

/** Device check-in endpoint */
export const DEVICE_POLL_PATH = '/api/device';

/** WebSocket path of the operator snapshot feed */
export const SNAPSHOT_FEED_PATH = '/ws';
