/**
 * WebSocket live event feed.
 * Rebroadcasts committed governance and oracle events to every open client.
 */

import type { FastifyInstance } from 'fastify';
import { v4 as uuid } from 'uuid';
import { EventBus, EventType } from '../infra/eventBus.js';
import { bigintReplacer } from './serializers.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const OPEN = 1;

export const formatEventMessage = (type: EventType | 'connected', data: unknown): string => JSON.stringify({
  id: uuid(),
  type,
  data,
  ts: new Date().toISOString(),
}, bigintReplacer);

export interface LiveFeed {
  connectedClients(): number;
}

/**
 * Register the `/ws` endpoint and subscribe to the bus. Must be called after
 * @fastify/websocket is registered. The subscription ends when the app closes.
 */
export async function registerWebSocket(app: FastifyInstance, bus: EventBus): Promise<LiveFeed> {
  const clients = new Set<WSLike>();

  const unsubscribe = bus.on('*', (event, data) => {
    const message = formatEventMessage(event, data);
    for (const ws of clients) {
      if (ws.readyState === OPEN) {
        ws.send(message);
      }
    }
  });

  app.addHook('onClose', async () => {
    unsubscribe();
    clients.clear();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(formatEventMessage('connected', { clients: clients.size }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });

  return { connectedClients: () => clients.size };
}
