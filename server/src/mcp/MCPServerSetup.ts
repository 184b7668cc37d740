/**
 * MCPServerSetup
 * MCP (Model Context Protocol) server configuration for AI assistant integration.
 * Tools read and drive one GameSession; the assistant plays the human side.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { GameSession, SessionSnapshot } from "../game/GameSession.js";
import { EngineInvariantError } from "../game/errors.js";

type TextContent = { type: "text"; text: string };

export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};

// ============================================================================
// Tool Definitions
// ============================================================================

export const TOOLS = [
  {
    name: "get_state",
    description: "Show the board, the side to move, scores and game status",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "list_legal_moves",
    description: "List every legal move for the side to move, in notation, sorted",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "play_move",
    description: "Play a move for the side to move. Give either notation (e.g. '3:c3c6', '2:a1-a2>NW') or marbles plus a direction.",
    inputSchema: {
      type: "object",
      properties: {
        notation: { type: "string", description: "Move notation" },
        marbles: {
          type: "array",
          items: { type: "string" },
          minItems: 1,
          maxItems: 3,
          description: "Cells of the marbles to move, e.g. ['c3', 'c4']"
        },
        direction: { type: "string", enum: ["E", "W", "NW", "SE", "NE", "SW"], description: "Direction to move" }
      }
    }
  },
  {
    name: "agent_move",
    description: "Let the engine play the side to move (the side must be AI-controlled)",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "suggest_move",
    description: "Ask the engine for its best move for the side to move, without playing it",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "undo",
    description: "Take back the last move",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "reset",
    description: "Start a new game with the current configuration",
    inputSchema: { type: "object", properties: {} }
  },
  {
    name: "configure",
    description: "Change game settings; omitted fields keep their value. Layout changes apply on reset.",
    inputSchema: {
      type: "object",
      properties: {
        mode: { type: "string", enum: ["hvh", "hva", "ava"], description: "Who controls each side" },
        humanSide: { type: "string", enum: ["black", "white"], description: "Human side in 'hva' mode" },
        aiDepth: { type: "number", minimum: 1, maximum: 5, description: "Search depth in plies" },
        heuristic: { type: "string", description: "Evaluation preset: 'balanced' or 'material'" },
        tieBreak: { type: "string", enum: ["lexicographic", "first"], description: "How equal-valued moves are chosen" },
        boardLayout: { type: "string", enum: ["standard", "belgian_daisy", "german_daisy"], description: "Starting layout" },
        maxMoves: { type: "number", minimum: 0, description: "Move cap, 0 for none" }
      }
    }
  }
] satisfies Tool[];

const playMoveArguments = z
  .object({
    notation: z.string().optional(),
    marbles: z.array(z.string()).optional(),
    direction: z.union([z.string(), z.tuple([z.number(), z.number()])]).optional()
  })
  .strict()
  .refine(args => (args.notation === undefined) !== (args.marbles === undefined), {
    message: "Give either 'notation' or 'marbles' with 'direction'"
  });

// ============================================================================
// Tool Logic
// ============================================================================

function text(body: string): ToolResponse {
  return { content: [{ type: "text", text: body }] };
}

function failure(reason: string): ToolResponse {
  return { content: [{ type: "text", text: `❌ ${reason}` }], isError: true };
}

function statusLine(state: SessionSnapshot): string {
  const { status } = state;
  if (!status.gameOver) {
    return `${state.toMove} to move (${state.controller})`;
  }
  const result = status.winner ? `${status.winner} wins` : "draw";
  return `Game over: ${result} (${status.reason})`;
}

function describeState(session: GameSession): string {
  const state = session.snapshot();
  const lines = [
    session.getBoard().render(),
    statusLine(state),
    `Marbles: black ${state.marbleCounts.black}, white ${state.marbleCounts.white}`,
    `Moves played: ${state.history.length}`
  ];
  const last = state.history[state.history.length - 1];
  if (last) {
    lines.push(`Last move: ${last.side} ${last.notation}`);
  }
  return lines.join("\n");
}

/**
 * Run one tool against the session. Bad arguments and rejected moves come
 * back as error responses; unknown tool names throw.
 */
export function handleToolCall(session: GameSession, name: string, args: unknown = {}): ToolResponse {
  try {
    switch (name) {
      case "get_state":
        return text(describeState(session));

      case "list_legal_moves": {
        const notations = session.legalMoves().map(move => move.toNotation()).sort();
        return text([`${notations.length} legal moves for ${session.currentSide}:`, ...notations].join("\n"));
      }

      case "play_move": {
        const parsed = playMoveArguments.safeParse(args);
        if (!parsed.success) {
          return failure(parsed.error.issues[0]?.message ?? "Invalid arguments");
        }
        const outcome = session.applyHumanMove(parsed.data);
        if (!outcome.ok) return failure(outcome.reason);
        return text(`✅ ${outcome.move.side} played ${outcome.move.notation}\n${statusLine(session.snapshot())}`);
      }

      case "agent_move": {
        const outcome = session.applyAgentMove();
        if (!outcome.ok) return failure(outcome.reason);
        const { move } = outcome;
        return text(`🤖 ${move.side} played ${move.notation} (score ${move.search?.score ?? 0}, ${move.search?.nodes ?? 0} nodes)\n${statusLine(session.snapshot())}`);
      }

      case "suggest_move": {
        const outcome = session.suggestMove();
        if (!outcome.ok) return failure(outcome.reason);
        const { search } = outcome;
        if (!search.notation) return text(`No legal moves for ${session.currentSide}`);
        return text(`Suggested for ${session.currentSide}: ${search.notation} (score ${search.score}, depth ${search.depth}, ${search.nodes} nodes)`);
      }

      case "undo": {
        const outcome = session.undo();
        if (!outcome.ok) return failure(outcome.reason);
        return text(`↩️ Took back ${outcome.notation}\n${statusLine(session.snapshot())}`);
      }

      case "reset": {
        const outcome = session.reset();
        if (!outcome.ok) return failure(outcome.reason);
        return text(`🔄 New game (${session.currentConfig.boardLayout})\n${statusLine(session.snapshot())}`);
      }

      case "configure": {
        const outcome = session.configure(args);
        if (!outcome.ok) return failure(outcome.reason);
        return text(`⚙️ Configuration: ${JSON.stringify(outcome.config)}`);
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    if (!(error instanceof EngineInvariantError)) throw error;
    console.error(`❌ Engine error in ${name}:`, error.message);
    return failure(`Engine error: ${error.message}${error.notation ? ` (${error.notation})` : ""}`);
  }
}

/**
 * Create and configure the MCP server
 */
export function createMCPServer(session: GameSession): Server {
  const server = new Server(
    {
      name: "abalone-arena",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(session, name, args ?? {});
  });

  return server;
}
