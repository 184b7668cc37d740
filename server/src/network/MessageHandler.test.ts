/**
 * MessageHandler Unit Tests
 * Message validation, room routing and broadcasts over fake connections
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { MessageHandler } from './MessageHandler.js';
import { AIOrchestrator, type Scheduler } from '../ai/AIOrchestrator.js';
import { RoomManager, type Connection, type RoomSummary } from '../game/RoomManager.js';
import type { MoveReport, SessionSnapshot } from '../game/GameSession.js';
import { Move } from '../game/Move.js';
import { moveGenerator } from '../game/MoveGenerator.js';
import { EAST } from '../game/constants.js';

// ============================================================================
// Test Harness
// ============================================================================

type ServerMessage = {
  type: string;
  payload: {
    message?: string;
    notation?: string | null;
    roomCode?: string;
    state?: SessionSnapshot;
    move?: MoveReport;
    rooms?: RoomSummary[];
  };
};

class FakeConnection implements Connection {
  readyState = 1;
  sent: string[] = [];

  send(data: string): void {
    this.sent.push(data);
  }

  messages(): ServerMessage[] {
    return this.sent.map(raw => {
      const message: ServerMessage = JSON.parse(raw);
      return message;
    });
  }

  types(): string[] {
    return this.messages().map(m => m.type);
  }

  last(): ServerMessage {
    const messages = this.messages();
    const message = messages[messages.length - 1];
    assert.ok(message, 'no message received');
    return message;
  }

  clear(): void {
    this.sent = [];
  }
}

function setup(schedule: Scheduler = () => {}) {
  const rooms = new RoomManager();
  const orchestrator = new AIOrchestrator(rooms, schedule);
  const connections = new Set<Connection>();
  const codes = ['ROOM01', 'ROOM02', 'ROOM03'];
  const handler = new MessageHandler(rooms, orchestrator, connections, {
    generateRoomCode: () => codes.shift() ?? 'ROOMXX'
  });

  const connect = () => {
    const connection = new FakeConnection();
    connections.add(connection);
    return connection;
  };
  const send = (connection: FakeConnection, message: unknown) => {
    handler.handleRaw(connection, JSON.stringify(message));
  };

  return { rooms, handler, connections, connect, send };
}

// ============================================================================
// Validation
// ============================================================================

test('MessageHandler - Invalid JSON', () => {
  const { handler, connect } = setup();
  const client = connect();

  handler.handleRaw(client, '{not json');
  assert.deepStrictEqual(client.messages(), [{ type: 'error', payload: { message: 'Message is not valid JSON' } }]);
});

test('MessageHandler - Unknown message type', () => {
  const { connect, send } = setup();
  const client = connect();

  send(client, { type: 'teleport' });
  assert.strictEqual(client.last().type, 'error');
  assert.match(client.last().payload.message ?? '', /^Invalid message - type: /);
});

test('MessageHandler - Missing payload field', () => {
  const { connect, send } = setup();
  const client = connect();

  send(client, { type: 'joinRoom', payload: {} });
  assert.strictEqual(client.last().payload.message, 'Invalid message - payload.roomCode: Required');
});

test('MessageHandler - Room actions need a room', () => {
  const { connect, send } = setup();
  const client = connect();

  for (const type of ['getState', 'agentMove', 'undo', 'reset', 'resign', 'leaveRoom']) {
    send(client, { type });
  }
  send(client, { type: 'move', payload: { notation: '3:c3c6' } });

  assert.strictEqual(client.sent.length, 7);
  for (const message of client.messages()) {
    assert.deepStrictEqual(message, { type: 'error', payload: { message: 'Not in a room' } });
  }
});

// ============================================================================
// Rooms
// ============================================================================

test('MessageHandler - Create a room', () => {
  const { rooms, connect, send } = setup();
  const creator = connect();

  send(creator, { type: 'createRoom', payload: { config: { mode: 'hva', aiDepth: 1 } } });

  assert.deepStrictEqual(creator.types(), ['roomCreated', 'gameState', 'roomsList']);
  assert.deepStrictEqual(creator.messages()[0].payload, { roomCode: 'ROOM01' });
  assert.strictEqual(creator.messages()[1].payload.state?.config.mode, 'hva');
  assert.deepStrictEqual(creator.last().payload.rooms, [
    { roomCode: 'ROOM01', playerCount: 1, mode: 'hva', toMove: 'black', gameOver: false }
  ]);
  assert.strictEqual(rooms.getRoom('ROOM01')?.session.currentConfig.aiDepth, 1);
});

test('MessageHandler - Create a room with a bad config', () => {
  const { rooms, connect, send } = setup();
  const creator = connect();

  send(creator, { type: 'createRoom', payload: { config: { mode: 'pvp' } } });

  assert.deepStrictEqual(creator.messages(), [{ type: 'error', payload: { message: "Unsupported mode 'pvp'." } }]);
  assert.strictEqual(rooms.getAllRooms().length, 0);
});

test('MessageHandler - Creating again moves the connection to the new room', () => {
  const { rooms, connect, send } = setup();
  const creator = connect();

  send(creator, { type: 'createRoom' });
  send(creator, { type: 'createRoom' });

  assert.ok(!rooms.hasRoom('ROOM01'));
  assert.strictEqual(rooms.getRoomByConnection(creator)?.roomCode, 'ROOM02');
});

test('MessageHandler - Join a room by code', () => {
  const { connect, send } = setup();
  const host = connect();
  const guest = connect();

  send(host, { type: 'createRoom' });
  host.clear();
  send(guest, { type: 'joinRoom', payload: { roomCode: 'room01' } });

  assert.deepStrictEqual(guest.types(), ['gameState', 'roomsList']);
  assert.deepStrictEqual(host.types(), ['gameState', 'roomsList']);
  assert.strictEqual(guest.last().payload.rooms?.[0].playerCount, 2);

  const late = connect();
  send(late, { type: 'joinRoom', payload: { roomCode: 'ROOM01' } });
  assert.strictEqual(late.last().payload.message, 'Room not found or full');
  send(late, { type: 'joinRoom', payload: { roomCode: 'NOSUCH' } });
  assert.strictEqual(late.last().payload.message, 'Room not found or full');
});

test('MessageHandler - List, leave and disconnect', () => {
  const { rooms, handler, connections, connect, send } = setup();
  const host = connect();
  const watcher = connect();

  send(host, { type: 'createRoom' });
  send(watcher, { type: 'listRooms' });
  assert.strictEqual(watcher.last().payload.rooms?.length, 1);

  send(host, { type: 'leaveRoom' });
  assert.strictEqual(rooms.getAllRooms().length, 0);
  assert.deepStrictEqual(watcher.last(), { type: 'roomsList', payload: { rooms: [] } });

  send(host, { type: 'leaveRoom' });
  assert.strictEqual(host.last().payload.message, 'Not in a room');

  send(host, { type: 'createRoom' });
  watcher.clear();
  handler.handleDisconnect(host);
  assert.ok(!connections.has(host));
  assert.strictEqual(rooms.getAllRooms().length, 0);
  assert.deepStrictEqual(watcher.messages(), [{ type: 'roomsList', payload: { rooms: [] } }]);
});

// ============================================================================
// Game Actions
// ============================================================================

test('MessageHandler - Moves are broadcast to the room', () => {
  const { connect, send } = setup();
  const host = connect();
  const guest = connect();
  send(host, { type: 'createRoom' });
  send(guest, { type: 'joinRoom', payload: { roomCode: 'ROOM01' } });
  host.clear();
  guest.clear();

  send(host, { type: 'move', payload: { notation: '3:c3c6' } });

  for (const client of [host, guest]) {
    assert.deepStrictEqual(client.types(), ['moveApplied', 'gameState']);
    assert.strictEqual(client.messages()[0].payload.move?.notation, '3:c3c6');
    assert.strictEqual(client.last().payload.state?.toMove, 'white');
  }
});

test('MessageHandler - Illegal move goes back to the sender only', () => {
  const { connect, send } = setup();
  const host = connect();
  const guest = connect();
  send(host, { type: 'createRoom' });
  send(guest, { type: 'joinRoom', payload: { roomCode: 'ROOM01' } });
  host.clear();
  guest.clear();

  send(guest, { type: 'move', payload: { notation: '1:a1a2' } });

  assert.deepStrictEqual(guest.messages(), [{ type: 'error', payload: { message: 'Cannot push own marble.' } }]);
  assert.deepStrictEqual(host.sent, []);
});

test('MessageHandler - AI replies and undo takes back both moves', () => {
  const { rooms, connect, send } = setup(task => task());
  const host = connect();
  send(host, { type: 'createRoom', payload: { config: { mode: 'hva', aiDepth: 1 } } });
  host.clear();

  send(host, { type: 'move', payload: { notation: '3:c3c6' } });
  assert.deepStrictEqual(host.types(), ['moveApplied', 'gameState', 'moveApplied', 'gameState']);
  assert.strictEqual(host.messages()[2].payload.move?.source, 'ai');

  const session = rooms.getRoom('ROOM01')?.session;
  assert.ok(session);
  assert.strictEqual(session.moveCount, 2);

  host.clear();
  send(host, { type: 'undo' });
  assert.strictEqual(session.moveCount, 0);
  assert.strictEqual(session.currentSide, 'black');
  assert.deepStrictEqual(host.types(), ['gameState']);

  send(host, { type: 'undo' });
  assert.strictEqual(host.last().payload.message, 'Nothing to undo');
});

test('MessageHandler - agentMove on a human turn', () => {
  const { connect, send } = setup();
  const host = connect();
  send(host, { type: 'createRoom' });

  send(host, { type: 'agentMove' });
  assert.strictEqual(host.last().payload.message, 'It is a human-controlled turn.');
});

test('MessageHandler - Resign, reset and getState', () => {
  const { connect, send } = setup();
  const host = connect();
  send(host, { type: 'createRoom' });

  send(host, { type: 'resign' });
  assert.deepStrictEqual(host.last().payload.state?.status, { gameOver: true, winner: 'white', reason: 'resign' });

  send(host, { type: 'resign' });
  assert.strictEqual(host.last().payload.message, 'Game is already over');

  send(host, { type: 'reset' });
  assert.strictEqual(host.last().payload.state?.status.gameOver, false);

  send(host, { type: 'getState' });
  assert.strictEqual(host.last().type, 'gameState');
  assert.strictEqual(host.last().payload.roomCode, 'ROOM01');
});

test('MessageHandler - Configure validates and broadcasts', () => {
  const { connect, send } = setup();
  const host = connect();
  send(host, { type: 'createRoom' });

  send(host, { type: 'configure', payload: { aiDepth: 7 } });
  assert.strictEqual(host.last().payload.message, 'aiDepth must be between 1 and 5.');

  send(host, { type: 'configure', payload: { maxMoves: 30 } });
  assert.strictEqual(host.last().payload.state?.config.maxMoves, 30);
});

test('MessageHandler - Engine errors reach the clients', t => {
  const tasks: Array<() => void> = [];
  const { connect, send } = setup(task => { tasks.push(task); });
  const host = connect();
  send(host, { type: 'createRoom' });

  send(host, { type: 'configure', payload: { mode: 'ava' } });
  assert.strictEqual(tasks.length, 1);

  send(host, { type: 'agentMove' });
  assert.strictEqual(host.last().payload.message, 'An AI move is already in progress');

  t.mock.method(moveGenerator, 'generateLegalMoves', () => [Move.of([{ row: 4, col: 5 }], EAST)]);
  const expected = { message: 'Agent produced invalid move: No black marble at e5.', notation: '1:e5e6' };

  // Scheduled AI turn
  tasks[0]();
  assert.deepStrictEqual(host.last(), { type: 'engineError', payload: { roomCode: 'ROOM01', ...expected } });

  // Requested AI turn
  send(host, { type: 'agentMove' });
  assert.deepStrictEqual(host.last(), { type: 'engineError', payload: expected });
});
