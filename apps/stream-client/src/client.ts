import { fetch } from 'undici';
import WebSocket from 'ws';
import { parseClientArgs, USAGE, type ClientArgs } from './cli-args.js';
import { formatFrame, formatStatus, parseFrameText } from './format.js';

/**
 * Stream client: subscribes to the live telemetry stream and prints each frame.
 *
 *   npm run stream                                  all telemetry, local server
 *   npm run stream -- --fields position             position only
 *   npm run stream -- --fields attitude battery
 *   npm run stream -- --host 192.168.1.50 --port 5000
 */

async function printStatus(baseUrl: string): Promise<void> {
  try {
    const res = await fetch(`${baseUrl}/status`);
    if (!res.ok) {
      console.warn(`⚠ /status answered ${res.status}`);
      return;
    }
    const line = formatStatus(await res.json());
    if (line) console.log(line);
  } catch (err) {
    console.warn(`⚠ could not read /status: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function readArgs(): ClientArgs {
  try {
    return parseClientArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    process.exit(2);
  }
}

async function main() {
  const args = readArgs();

  const authority = `${args.host}:${args.port}`;
  await printStatus(`http://${authority}`);

  const url = `ws://${authority}/telemetry/stream`;
  console.log(`Connecting to ${url} …`);

  const ws = new WebSocket(url);
  let count = 0;

  ws.on('open', () => {
    console.log('✓ Connected\n');
    ws.send(JSON.stringify({ subscribe: args.fields }));
    console.log(`  Subscribed to: ${args.fields.join(', ')}\n`);
    console.log('-'.repeat(60));
  });

  ws.on('message', (data) => {
    count += 1;
    for (const line of formatFrame(count, parseFrameText(data.toString()))) console.log(line);
    console.log();
  });

  ws.on('error', (err) => {
    console.error(`✗ ${err.message}`);
    process.exitCode = 1;
  });

  ws.on('close', () => {
    console.log(`\nReceived ${count} frames.  Bye!`);
    process.exit();
  });

  process.on('SIGINT', () => ws.close());
}

main().catch((err) => {
  console.error('✗ stream client failed', err);
  process.exit(1);
});
