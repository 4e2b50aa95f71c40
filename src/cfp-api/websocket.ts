import type { Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { WS_EVENTS, WS_PATH } from '@shared/constants';
import type { WsMessage } from '@shared/types';
import type { TalkTransitionEvent, TransitionEventSink } from '@core/events';

const HEARTBEAT_INTERVAL_MS = 30_000;

let wss: WebSocketServer | null = null;

export function initWebSocket(server: Server): WebSocketServer {
  wss = new WebSocketServer({ server, path: WS_PATH });

  wss.on('connection', (socket) => {
    send(socket, WS_EVENTS.CONNECTION_ESTABLISHED, { clients: wss?.clients.size ?? 0 });
    socket.on('error', (err) => console.error('[WS] Client error:', err.message));
  });

  const heartbeat = setInterval(() => broadcast(WS_EVENTS.HEARTBEAT, null), HEARTBEAT_INTERVAL_MS);
  heartbeat.unref();
  wss.on('close', () => clearInterval(heartbeat));

  console.warn(`[WS] Listening on ${WS_PATH}`);
  return wss;
}

export function closeWebSocket(): void {
  wss?.close();
  wss = null;
}

export function toMessage(event: WsMessage['event'], data: unknown, at: Date = new Date()): WsMessage {
  return { event, data, timestamp: at.toISOString() };
}

function send(socket: WebSocket, event: WsMessage['event'], data: unknown): void {
  if (socket.readyState === WebSocket.OPEN) {
    socket.send(JSON.stringify(toMessage(event, data)));
  }
}

export function broadcast(event: WsMessage['event'], data: unknown): void {
  if (!wss) return;
  for (const client of wss.clients) send(client, event, data);
}

// Committed transitions go out to every listener, the notification dispatcher included.
export const websocketEvents: TransitionEventSink = {
  publish(event: TalkTransitionEvent) {
    broadcast(WS_EVENTS.TRANSITION_APPLIED, {
      ...event,
      timestamp: event.timestamp.toISOString(),
    });
  },
};
