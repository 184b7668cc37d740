/**
 * RoomManager
 * Manages room lifecycle: each room owns one GameSession and the
 * connections watching it
 */

import type { GameConfig } from './GameConfig.js';
import type { Side } from './types.js';
import { GameSession } from './GameSession.js';

const OPEN = 1; // WebSocket.OPEN

export const MAX_ROOM_CONNECTIONS = 2;

/**
 * The part of a ws WebSocket the rooms use
 */
export interface Connection {
  readonly readyState: number;
  send(data: string): void;
}

export type GameRoom = {
  roomCode: string;
  session: GameSession;
  connections: Set<Connection>;
  createdAt: number;
};

export type RoomSummary = {
  roomCode: string;
  playerCount: number;
  mode: GameConfig['mode'];
  toMove: Side;
  gameOver: boolean;
};

export class RoomManager {
  private rooms: Map<string, GameRoom> = new Map();

  /**
   * Create a new game room
   */
  createRoom(roomCode: string, creator: Connection, config?: GameConfig): GameRoom {
    const room: GameRoom = {
      roomCode,
      session: new GameSession(config),
      connections: new Set([creator]),
      createdAt: Date.now()
    };

    this.rooms.set(roomCode, room);
    console.log(`✅ Room ${roomCode} created (mode: ${room.session.currentConfig.mode})`);
    return room;
  }

  /**
   * Join an existing room
   */
  joinRoom(roomCode: string, joiner: Connection): GameRoom | null {
    const room = this.rooms.get(roomCode);
    if (!room) {
      console.log(`❌ Room ${roomCode} not found`);
      return null;
    }

    if (room.connections.has(joiner)) {
      return room;
    }

    if (room.connections.size >= MAX_ROOM_CONNECTIONS) {
      console.log(`❌ Room ${roomCode} is full`);
      return null;
    }

    room.connections.add(joiner);
    console.log(`✅ Player joined room ${roomCode} (${room.connections.size}/${MAX_ROOM_CONNECTIONS})`);
    return room;
  }

  hasRoom(roomCode: string): boolean {
    return this.rooms.has(roomCode);
  }

  getRoom(roomCode: string): GameRoom | null {
    return this.rooms.get(roomCode) ?? null;
  }

  getRoomByConnection(connection: Connection): GameRoom | null {
    for (const room of this.rooms.values()) {
      if (room.connections.has(connection)) {
        return room;
      }
    }
    return null;
  }

  /**
   * Remove a connection from its room; empty rooms are deleted.
   * Returns the room the connection was in.
   */
  removeConnection(connection: Connection): GameRoom | null {
    const room = this.getRoomByConnection(connection);
    if (!room) return null;

    room.connections.delete(connection);
    console.log(`🚪 Player left room ${room.roomCode} (${room.connections.size} remaining)`);

    if (room.connections.size === 0) {
      this.rooms.delete(room.roomCode);
      console.log(`🗑️ Empty room ${room.roomCode} deleted`);
    }
    return room;
  }

  getAllRooms(): GameRoom[] {
    return Array.from(this.rooms.values());
  }

  listRooms(): RoomSummary[] {
    return this.getAllRooms().map(room => ({
      roomCode: room.roomCode,
      playerCount: room.connections.size,
      mode: room.session.currentConfig.mode,
      toMove: room.session.currentSide,
      gameOver: room.session.status().gameOver
    }));
  }

  /**
   * Broadcast message to all open connections in a room
   */
  broadcastToRoom(roomCode: string, message: unknown): void {
    const room = this.rooms.get(roomCode);
    if (!room) return;

    const messageStr = JSON.stringify(message);
    room.connections.forEach(connection => {
      if (connection.readyState === OPEN) {
        connection.send(messageStr);
      }
    });
  }
}
