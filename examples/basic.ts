/**
 * Basic Reconnect Example
 *
 * Starts a local `ws` server, connects a Client to it, kills the server
 * connection and lets the client reconnect on its own.
 *
 * Run with: npm run example
 * (set DEBUG=ws-resilience:* to see the internal trace)
 */

import { WebSocketServer } from 'ws';
import {
  Client,
  ExponentialReconnectStrategy,
  WsBackend,
  createConnectionRequest,
  describeReconnectReason,
  describeStatus,
  delay,
} from '../src/index.ts';

async function main() {
  // 1. A local echo server to talk to
  const server = new WebSocketServer({ host: '127.0.0.1', port: 3000 });
  server.on('connection', (socket) => {
    socket.on('message', (data, isBinary) => socket.send(data, { binary: isBinary }));
  });
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));

  // 2. The client: ping every 2s, exponential backoff starting at 250ms
  const client = new Client({
    request: createConnectionRequest('ws://127.0.0.1:3000', { timeout: 2000 }),
    backend: new WsBackend(),
    autoPingInterval: 2000,
    reconnectStrategy: new ExponentialReconnectStrategy({ scale: 250, maxRetryCount: 5 }),
    delegate: {
      onStatusChange: (status) => console.log(`status: ${describeStatus(status)}`),
      onEvent: (event) => {
        if (event.type === 'text') console.log(`echo: ${event.text}`);
      },
      onWillReconnect: (reason, delayMs) =>
        console.log(`reconnecting (${describeReconnectReason(reason)}) after ${Math.round(delayMs)}ms`),
      onDidReconnect: (_reason, attempt) => console.log(`reconnect attempt #${attempt}`),
    },
  });

  await client.connect();
  await delay(200);
  await client.sendText('hello');
  await delay(200);

  // 3. Drop the connection from the server side without a close handshake
  for (const socket of server.clients) {
    socket.terminate();
  }
  await delay(1500);
  await client.sendText('hello again');
  await delay(200);

  // 4. Intentional shutdown: no reconnect follows
  await client.disconnect();
  await delay(200);
  client.destroy();
  server.close();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
