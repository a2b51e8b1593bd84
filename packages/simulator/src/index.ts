import { DEFAULT_SERVER_PORT, DEVICE_POLL_INTERVAL_MS } from '@tagfield/shared';
import { DeviceSimulator } from './DeviceSimulator.js';
import { logger } from './utils/logger.js';

// Parse command line arguments
const args = process.argv.slice(2);
const serverUrl =
  // biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
  args[0] ?? process.env['SERVER_URL'] ?? `http://localhost:${DEFAULT_SERVER_PORT}`;

// biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
const count = Number(process.env['SIM_COUNT']) || 3;
// biome-ignore lint/complexity/useLiteralKeys: TS noPropertyAccessFromIndexSignature
const pollIntervalMs = Number(process.env['SIM_POLL_INTERVAL']) || DEVICE_POLL_INTERVAL_MS;

logger.info('Starting simulated devices', { serverUrl, count, pollIntervalMs });

const devices: DeviceSimulator[] = [];
for (let i = 1; i <= count; i++) {
  const device = new DeviceSimulator({
    serverUrl,
    id: `sim-${String(i).padStart(2, '0')}`,
    ip: `10.0.0.${i + 10}`,
    rssi: -40 - i,
    pollIntervalMs,
  });
  device.start();
  devices.push(device);
}

function shutdown(signal: string): void {
  logger.info(`${signal} received, stopping simulated devices...`);
  for (const device of devices) {
    device.stop();
  }
  process.exit(0);
}

// Graceful shutdown
process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
