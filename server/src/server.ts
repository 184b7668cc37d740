import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { URL } from "node:url";
import { WebSocketServer, type WebSocket } from "ws";

import { RoomManager } from "./game/RoomManager.js";
import { AIOrchestrator } from "./ai/AIOrchestrator.js";
import { MessageHandler } from "./network/MessageHandler.js";
import { loadServerConfig } from "./network/ServerConfig.js";

class AbaloneGameManager {
  private connections: Set<WebSocket> = new Set();
  private roomManager: RoomManager = new RoomManager();
  private messageHandler: MessageHandler;

  constructor() {
    const aiOrchestrator = new AIOrchestrator(this.roomManager);
    this.messageHandler = new MessageHandler(this.roomManager, aiOrchestrator, this.connections);
  }

  addConnection(ws: WebSocket) {
    this.connections.add(ws);
    console.log(`🆔 Connection opened (${this.connections.size} connected)`);

    ws.on('message', (data) => {
      this.messageHandler.handleRaw(ws, data.toString());
    });

    ws.on('close', (code) => {
      console.log(`🔌 WebSocket connection closed. Code: ${code}`);
      this.messageHandler.handleDisconnect(ws);
    });

    ws.on('error', (error) => {
      console.error(`💥 WebSocket error:`, error);
    });
  }

  roomCount(): number {
    return this.roomManager.getAllRooms().length;
  }
}

const config = loadServerConfig();
const gameManager = new AbaloneGameManager();

const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

  if (req.method === 'OPTIONS') {
    res.writeHead(204).end();
    return;
  }

  if (req.method === 'GET' && url.pathname === '/health') {
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ status: 'ok', rooms: gameManager.roomCount() }));
    return;
  }

  res.writeHead(404).end('Not Found');
});

httpServer.on("clientError", (err: Error, socket) => {
  console.error("HTTP client error", err);
  socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
});

// WebSocket server for game rooms
const wss = new WebSocketServer({ server: httpServer, path: '/ws' });

wss.on('connection', (ws) => {
  console.log('🎮 New WebSocket connection');
  gameManager.addConnection(ws);
});

httpServer.listen(config.port, config.host, () => {
  console.log(`Abalone server listening on http://localhost:${config.port}`);
  console.log(`  Health check: GET http://localhost:${config.port}/health`);
  console.log(`  🎮 WebSocket server: ws://localhost:${config.port}/ws`);
});
