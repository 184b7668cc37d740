/**
 * AIOrchestrator
 * Plays AI-controlled turns for game rooms, one move per scheduled task so
 * an AI-vs-AI room never holds the event loop for a whole game
 */

import type { MoveReport } from '../game/GameSession.js';
import type { RoomManager } from '../game/RoomManager.js';
import { EngineInvariantError } from '../game/errors.js';

export type Scheduler = (task: () => void) => void;

export class AIOrchestrator {
  private roomManager: RoomManager;
  private schedule: Scheduler;
  private pending: Set<string> = new Set();

  constructor(roomManager: RoomManager, schedule: Scheduler = task => { setImmediate(task); }) {
    this.roomManager = roomManager;
    this.schedule = schedule;
  }

  /**
   * Check if the room's side to move is AI-controlled and schedule its move
   */
  checkAndStartAIMove(roomCode: string): void {
    const room = this.roomManager.getRoom(roomCode);
    if (!room) return;

    const session = room.session;
    if (session.status().gameOver || session.currentController !== 'ai' || this.pending.has(roomCode)) {
      return;
    }

    console.log(`🤖 Scheduling AI move for ${session.currentSide} in room ${roomCode}`);
    this.pending.add(roomCode);
    this.schedule(() => {
      this.pending.delete(roomCode);
      if (this.playAIMove(roomCode)) {
        this.checkAndStartAIMove(roomCode);
      }
    });
  }

  /**
   * Play one AI move now and broadcast the result. Returns null when the
   * room is gone, the turn is not the AI's, or the engine failed.
   */
  playAIMove(roomCode: string): MoveReport | null {
    const room = this.roomManager.getRoom(roomCode);
    if (!room) {
      console.log(`⚠️ Room ${roomCode} no longer exists`);
      return null;
    }

    try {
      const outcome = room.session.applyAgentMove();
      if (!outcome.ok) {
        console.log(`⚠️ AI move skipped in room ${roomCode}: ${outcome.reason}`);
        return null;
      }

      const { move } = outcome;
      console.log(`🤖 AI (${move.side}) played ${move.notation} in room ${roomCode} - ${move.search?.nodes ?? 0} nodes`);
      this.roomManager.broadcastToRoom(roomCode, { type: 'moveApplied', payload: { roomCode, move } });
      this.roomManager.broadcastToRoom(roomCode, { type: 'gameState', payload: { roomCode, state: room.session.snapshot() } });
      return move;
    } catch (error) {
      if (!(error instanceof EngineInvariantError)) throw error;
      console.error(`❌ AI move failed in room ${roomCode}:`, error.message);
      this.roomManager.broadcastToRoom(roomCode, {
        type: 'engineError',
        payload: { roomCode, message: error.message, notation: error.notation }
      });
      return null;
    }
  }

  isPending(roomCode: string): boolean {
    return this.pending.has(roomCode);
  }
}
