/**
 * WebSocket live event feed.
 * Pushes governance events (stake.committed, proposal.created, vote.cast,
 * proposal.executed, clock.advanced, ...) to every connected client.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventType } from '../infra/eventBus.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const OPEN = 1;

export interface LiveFeed {
  connectedClients(): number;
  close(): void;
}

/**
 * Register the `/ws` endpoint and subscribe it to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the instance.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<LiveFeed> {
  const clients = new Set<WSLike>();

  const unsubscribe = eventBus.on('*', (event: EventType, data: unknown) => {
    const message = JSON.stringify({
      type: event,
      data,
      ts: new Date().toISOString(),
    });

    for (const ws of clients) {
      if (ws.readyState === OPEN) {
        ws.send(message);
      }
    }
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(JSON.stringify({
      type: 'connected',
      data: { clients: clients.size },
      ts: new Date().toISOString(),
    }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });

  return {
    connectedClients: () => clients.size,
    close: () => {
      unsubscribe();
      clients.clear();
    },
  };
}
