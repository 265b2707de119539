/**
 * Quick demo: run the monitor on two local ports and feed it synthetic shreds.
 * - "uk" (20001) gets every shred right away.
 * - "de" (20002) gets most of them a few milliseconds later, misses one, and wins one.
 * - One truncated packet shows the malformed-packet warning.
 *
 * Run: npm run demo
 */

import { createSocket } from 'node:dgram';
import { createMonitor } from './monitor.js';
import { buildShredPacket } from './shred.js';
import type { Report } from './types.js';

const UK_PORT = 20001;
const DE_PORT = 20002;
const HOST = '127.0.0.1';

function delayMs(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function runDemo(): Promise<void> {
  const reports: Report[] = [];
  const monitor = createMonitor({
    streams: [
      { name: 'uk', port: UK_PORT },
      { name: 'de', port: DE_PORT },
    ],
    host: HOST,
    evictAfterMs: 300,
    statsIntervalMs: 0,
    onReport: (report) => reports.push(report),
  });
  await monitor.start();

  const sender = createSocket('udp4');
  const send = (port: number, packet: Buffer): Promise<void> =>
    new Promise((resolve, reject) => {
      sender.send(packet, port, HOST, (err) => (err ? reject(err) : resolve()));
    });

  for (let index = 0; index < 5; index++) {
    const packet = buildShredPacket({ slot: 100n, index, payloadLength: 1145 });
    if (index === 4) {
      // de wins this one
      await send(DE_PORT, packet);
      await delayMs(2);
      await send(UK_PORT, packet);
      continue;
    }
    await send(UK_PORT, packet);
    if (index === 2) continue; // never reaches de: reported as a miss
    await delayMs(3 + index);
    await send(DE_PORT, packet);
  }
  await send(DE_PORT, Buffer.from('short'));

  // Let the eviction window pass so the missing shred is reported
  await delayMs(500);
  await monitor.stop();
  sender.close();

  const matches = reports.filter((r) => r.type === 'match').length;
  const misses = reports.length - matches;
  console.log(`\nDemo done. ${matches} match(es), ${misses} miss(es).`);
}

runDemo().catch((err) => {
  console.error(err);
  process.exit(1);
});
