import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import type { DaemonEnvelope } from "@softcenter/shared";

export type ClientSocket = Pick<WebSocket, "send" | "close" | "readyState">;

type ClientSession = {
  sessionId: string;
  socket: ClientSocket;
  connectedAt: number;
};

export type ClientSessionSnapshot = {
  sessionId: string;
  connectedAt: string;
};

export class ClientRegistry {
  private readonly sessions = new Map<string, ClientSession>();

  register(socket: ClientSocket): string {
    const sessionId = randomUUID();
    this.sessions.set(sessionId, {
      sessionId,
      socket,
      connectedAt: Date.now()
    });
    return sessionId;
  }

  remove(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  send(sessionId: string, payload: DaemonEnvelope): boolean {
    const session = this.sessions.get(sessionId);
    if (!session || session.socket.readyState !== WebSocket.OPEN) {
      return false;
    }
    session.socket.send(JSON.stringify(payload));
    return true;
  }

  broadcast(payload: DaemonEnvelope): number {
    const raw = JSON.stringify(payload);
    let delivered = 0;
    for (const session of this.sessions.values()) {
      if (session.socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      session.socket.send(raw);
      delivered += 1;
    }
    return delivered;
  }

  list(): ClientSessionSnapshot[] {
    return [...this.sessions.values()].map((session) => ({
      sessionId: session.sessionId,
      connectedAt: new Date(session.connectedAt).toISOString()
    }));
  }

  closeAll(): void {
    for (const session of this.sessions.values()) {
      session.socket.close(1001, "daemon shutting down");
    }
    this.sessions.clear();
  }
}
