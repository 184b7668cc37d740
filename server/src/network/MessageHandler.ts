/**
 * MessageHandler
 * Validates incoming WebSocket messages and routes them to room operations
 */

import { z } from 'zod';

import type { AIOrchestrator } from '../ai/AIOrchestrator.js';
import type { Connection, GameRoom, RoomManager } from '../game/RoomManager.js';
import { DEFAULT_GAME_CONFIG, mergeConfig } from '../game/GameConfig.js';
import { EngineInvariantError } from '../game/errors.js';

// ============================================================================
// Message Schema
// ============================================================================

const emptyPayload = z.object({}).passthrough().optional();

export const gameMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('createRoom'), payload: z.object({ config: z.unknown().optional() }).optional() }),
  z.object({ type: z.literal('joinRoom'), payload: z.object({ roomCode: z.string().trim().min(1) }) }),
  z.object({ type: z.literal('leaveRoom'), payload: emptyPayload }),
  z.object({ type: z.literal('listRooms'), payload: emptyPayload }),
  z.object({ type: z.literal('getState'), payload: emptyPayload }),
  z.object({ type: z.literal('move'), payload: z.unknown() }),
  z.object({ type: z.literal('agentMove'), payload: emptyPayload }),
  z.object({ type: z.literal('undo'), payload: emptyPayload }),
  z.object({ type: z.literal('reset'), payload: emptyPayload }),
  z.object({ type: z.literal('resign'), payload: emptyPayload }),
  z.object({ type: z.literal('configure'), payload: z.unknown() })
]);

export type GameMessage = z.infer<typeof gameMessageSchema>;

export type ServerMessageType = 'roomCreated' | 'gameState' | 'moveApplied' | 'roomsList' | 'error' | 'engineError';

export type MessageHandlerOptions = {
  generateRoomCode?: () => string;
};

function randomRoomCode(): string {
  return Math.random().toString(36).slice(2, 8).toUpperCase();
}

// ============================================================================
// MessageHandler
// ============================================================================

export class MessageHandler {
  private roomManager: RoomManager;
  private aiOrchestrator: AIOrchestrator;
  private connections: Set<Connection>;
  private generateRoomCode: () => string;

  constructor(
    roomManager: RoomManager,
    aiOrchestrator: AIOrchestrator,
    connections: Set<Connection>,
    options: MessageHandlerOptions = {}
  ) {
    this.roomManager = roomManager;
    this.aiOrchestrator = aiOrchestrator;
    this.connections = connections;
    this.generateRoomCode = options.generateRoomCode ?? randomRoomCode;
  }

  /**
   * Entry point for raw socket data
   */
  handleRaw(connection: Connection, data: string): void {
    let message: unknown;
    try {
      message = JSON.parse(data);
    } catch {
      this.send(connection, 'error', { message: 'Message is not valid JSON' });
      return;
    }
    this.handleMessage(connection, message);
  }

  /**
   * Main message router
   */
  handleMessage(connection: Connection, message: unknown): void {
    const parsed = gameMessageSchema.safeParse(message);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      this.send(connection, 'error', { message: `Invalid message - ${where}${issue?.message ?? 'unknown shape'}` });
      return;
    }

    const msg = parsed.data;
    console.log(`📨 ${msg.type}`);

    try {
      switch (msg.type) {
        case 'createRoom':
          this.handleCreateRoom(connection, msg.payload?.config);
          break;
        case 'joinRoom':
          this.handleJoinRoom(connection, msg.payload.roomCode);
          break;
        case 'leaveRoom':
          this.handleLeaveRoom(connection);
          break;
        case 'listRooms':
          this.send(connection, 'roomsList', { rooms: this.roomManager.listRooms() });
          break;
        case 'getState':
          this.withRoom(connection, room => this.send(connection, 'gameState', this.statePayload(room)));
          break;
        case 'move':
          this.withRoom(connection, room => this.handleMove(connection, room, msg.payload));
          break;
        case 'agentMove':
          this.withRoom(connection, room => this.handleAgentMove(connection, room));
          break;
        case 'undo':
          this.withRoom(connection, room => this.handleUndo(connection, room));
          break;
        case 'reset':
          this.withRoom(connection, room => this.handleSessionAction(connection, room, room.session.reset()));
          break;
        case 'resign':
          this.withRoom(connection, room => this.handleSessionAction(connection, room, room.session.resign()));
          break;
        case 'configure':
          this.withRoom(connection, room => this.handleSessionAction(connection, room, room.session.configure(msg.payload)));
          break;
      }
    } catch (error) {
      if (!(error instanceof EngineInvariantError)) throw error;
      console.error(`❌ Engine error while handling ${msg.type}:`, error.message);
      this.send(connection, 'engineError', { message: error.message, notation: error.notation });
    }
  }

  /**
   * Handle connection close
   */
  handleDisconnect(connection: Connection): void {
    this.connections.delete(connection);
    const room = this.roomManager.removeConnection(connection);
    if (room) {
      this.broadcastRoomsList();
    }
  }

  // ============================================================================
  // Room Handlers
  // ============================================================================

  private handleCreateRoom(connection: Connection, configPayload: unknown): void {
    const merged = mergeConfig(DEFAULT_GAME_CONFIG, configPayload);
    if (!merged.ok) {
      this.send(connection, 'error', { message: merged.reason });
      return;
    }

    // A connection belongs to one room at a time
    this.roomManager.removeConnection(connection);

    const roomCode = this.uniqueRoomCode();
    const room = this.roomManager.createRoom(roomCode, connection, merged.config);

    this.send(connection, 'roomCreated', { roomCode });
    this.send(connection, 'gameState', this.statePayload(room));
    this.broadcastRoomsList();

    this.aiOrchestrator.checkAndStartAIMove(roomCode);
  }

  private handleJoinRoom(connection: Connection, requestedCode: string): void {
    const roomCode = requestedCode.toUpperCase();
    const current = this.roomManager.getRoomByConnection(connection);
    if (current && current.roomCode !== roomCode) {
      this.roomManager.removeConnection(connection);
    }

    const room = this.roomManager.joinRoom(roomCode, connection);
    if (!room) {
      this.send(connection, 'error', { message: 'Room not found or full' });
      return;
    }

    this.roomManager.broadcastToRoom(room.roomCode, { type: 'gameState', payload: this.statePayload(room) });
    this.broadcastRoomsList();
  }

  private handleLeaveRoom(connection: Connection): void {
    const room = this.roomManager.removeConnection(connection);
    if (!room) {
      this.send(connection, 'error', { message: 'Not in a room' });
      return;
    }
    this.broadcastRoomsList();
  }

  // ============================================================================
  // Game Handlers
  // ============================================================================

  private handleMove(connection: Connection, room: GameRoom, payload: unknown): void {
    const outcome = room.session.applyHumanMove(payload);
    if (!outcome.ok) {
      this.send(connection, 'error', { message: outcome.reason });
      return;
    }

    this.roomManager.broadcastToRoom(room.roomCode, {
      type: 'moveApplied',
      payload: { roomCode: room.roomCode, move: outcome.move }
    });
    this.roomManager.broadcastToRoom(room.roomCode, { type: 'gameState', payload: this.statePayload(room) });

    this.aiOrchestrator.checkAndStartAIMove(room.roomCode);
  }

  private handleAgentMove(connection: Connection, room: GameRoom): void {
    if (this.aiOrchestrator.isPending(room.roomCode)) {
      this.send(connection, 'error', { message: 'An AI move is already in progress' });
      return;
    }

    const outcome = room.session.applyAgentMove();
    if (!outcome.ok) {
      this.send(connection, 'error', { message: outcome.reason });
      return;
    }

    this.roomManager.broadcastToRoom(room.roomCode, {
      type: 'moveApplied',
      payload: { roomCode: room.roomCode, move: outcome.move }
    });
    this.roomManager.broadcastToRoom(room.roomCode, { type: 'gameState', payload: this.statePayload(room) });
  }

  /**
   * Undo, reset, resign and configure: report failure to the sender,
   * broadcast the new state on success
   */
  private handleSessionAction(
    connection: Connection,
    room: GameRoom,
    outcome: { ok: true } | { ok: false; reason: string }
  ): void {
    if (!outcome.ok) {
      this.send(connection, 'error', { message: outcome.reason });
      return;
    }
    this.roomManager.broadcastToRoom(room.roomCode, { type: 'gameState', payload: this.statePayload(room) });
    this.aiOrchestrator.checkAndStartAIMove(room.roomCode);
  }

  /**
   * Against the AI, take back the AI's reply together with the human move
   * before it, so the human is to move again
   */
  private handleUndo(connection: Connection, room: GameRoom): void {
    const session = room.session;
    const outcome = session.undo();
    if (outcome.ok && session.currentConfig.mode === 'hva' && session.currentController === 'ai' && session.moveCount > 0) {
      session.undo();
    }
    this.handleSessionAction(connection, room, outcome);
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private withRoom(connection: Connection, action: (room: GameRoom) => void): void {
    const room = this.roomManager.getRoomByConnection(connection);
    if (!room) {
      this.send(connection, 'error', { message: 'Not in a room' });
      return;
    }
    action(room);
  }

  private statePayload(room: GameRoom) {
    return { roomCode: room.roomCode, state: room.session.snapshot() };
  }

  private uniqueRoomCode(): string {
    let code = this.generateRoomCode();
    while (this.roomManager.hasRoom(code)) {
      code = this.generateRoomCode();
    }
    return code;
  }

  private send(connection: Connection, type: ServerMessageType, payload: unknown): void {
    connection.send(JSON.stringify({ type, payload }));
  }

  private broadcastRoomsList(): void {
    const message = JSON.stringify({ type: 'roomsList', payload: { rooms: this.roomManager.listRooms() } });
    this.connections.forEach(client => {
      if (client.readyState === 1) { // WebSocket.OPEN
        client.send(message);
      }
    });
  }
}
