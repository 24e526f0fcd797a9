/**
 * HTTP + WebSocket server for browser voice sessions.
 *
 * Responsibilities:
 * - Serve the Hono status routes and the built dashboard over one HTTP server
 * - Accept WebSocket upgrades on /ws/voice?user_id=<id>
 * - Refuse upgrades on other paths or beyond the connection limit
 * - Wrap each ws connection as a SessionSocket and hand it to the session manager
 * - Forward text frames to the manager and disconnect the session on close
 * - Send periodic ws.ping() to keep idle connections alive
 */

import { createServer } from "http";

import { getRequestListener } from "@hono/node-server";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";
import { WebSocketServer } from "ws";

import { describeError } from "./errors.js";
import { statusRoutes, VOICE_WS_PATH } from "./routes.js";

import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import type { RawData, WebSocket } from "ws";
import type { SessionManager, SessionSocket } from "./session-manager.js";
import type { ServerConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** User id assigned when the upgrade URL carries none */
const ANONYMOUS_USER_ID = "anonymous";

/** Built dashboard assets, relative to the working directory */
const DASHBOARD_DIST_DIR = "./dashboard/dist";

// ============================================================================
// INTERFACES
// ============================================================================

export interface VoiceServer {
  /** The underlying HTTP server (not yet listening) */
  server: Server;
  /** Start listening on the configured host and port */
  listen(): Promise<void>;
  /** Close every socket, stop pinging, and stop listening */
  close(): Promise<void>;
}

/** The part of WebSocketServer the upgrade handler uses */
export type UpgradeAcceptor = Pick<WebSocketServer, "handleUpgrade" | "emit">;

/** Counts accepted upgrades from the moment they are accepted until their socket closes */
export interface ConnectionLimiter {
  /** Take a slot; returns its release function, or null when all slots are taken */
  tryAcquire(): (() => void) | null;
  active(): number;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Build the voice server around a session manager.
 *
 * @param config - Server configuration
 * @param manager - Session manager that owns all sessions
 * @returns A VoiceServer ready to listen
 */
export function createVoiceServer(config: ServerConfig, manager: SessionManager): VoiceServer {
  const app = new Hono();
  app.route("/", statusRoutes(manager, config));
  app.use("/*", serveStatic({ root: DASHBOARD_DIST_DIR }));

  const server = createServer(getRequestListener(app.fetch));

  // Create WebSocket server (no automatic HTTP handling -- upgrades only)
  const wss = new WebSocketServer({ noServer: true });
  const limiter = createConnectionLimiter(config.maxConnections);

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    handleWebSocketUpgrade(req, socket, head, wss, manager, limiter);
  });

  // Periodic ping to keep idle connections alive through proxies
  const pingTimer = setInterval(() => {
    wss.clients.forEach((ws) => {
      if (ws.readyState === ws.OPEN) {
        ws.ping();
      }
    });
  }, config.heartbeatIntervalMs);
  pingTimer.unref();

  function listen(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(config.port, config.host, () => {
        server.off("error", reject);
        console.log(`[voice-server] listening on http://${config.host}:${config.port} (ws path ${VOICE_WS_PATH})`);
        resolve();
      });
    });
  }

  function close(): Promise<void> {
    clearInterval(pingTimer);
    wss.clients.forEach((ws) => ws.close(1001, "Server shutting down"));

    return new Promise<void>((resolve, reject) => {
      wss.close();
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  return { server, listen, close };
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Handle a WebSocket upgrade request for a voice session.
 *
 * @param req - HTTP upgrade request
 * @param socket - Underlying TCP socket
 * @param head - First packet of the upgraded stream
 * @param wss - Completes the WebSocket handshake
 * @param manager - Session manager to register the connection with
 * @param limiter - Slots for concurrent connections
 */
export function handleWebSocketUpgrade(
  req: IncomingMessage,
  socket: Duplex,
  head: Buffer,
  wss: UpgradeAcceptor,
  manager: SessionManager,
  limiter: ConnectionLimiter
): void {
  const url = new URL(req.url ?? "", `http://${req.headers.host ?? "localhost"}`);

  if (url.pathname !== VOICE_WS_PATH) {
    console.log(`[voice-server] rejected upgrade: invalid path ${url.pathname}`);
    socket.destroy();
    return;
  }

  // Taken before the handshake so upgrades still in progress count against the limit
  const release = limiter.tryAcquire();
  if (!release) {
    console.log(`[voice-server] rejected upgrade: ${limiter.active()} connections already active`);
    socket.write("HTTP/1.1 503 Service Unavailable\r\nConnection: close\r\n\r\n");
    socket.destroy();
    return;
  }
  socket.once("close", release);

  const userId = url.searchParams.get("user_id") || ANONYMOUS_USER_ID;

  wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
    wss.emit("connection", ws, req);
    handleVoiceConnection(ws, manager, userId);
  });
}

/**
 * Register a connected WebSocket as a session and wire its events.
 *
 * @param ws - Connected WebSocket
 * @param manager - Session manager
 * @param userId - User the session belongs to
 */
function handleVoiceConnection(ws: WebSocket, manager: SessionManager, userId: string): void {
  const socket = createWsSessionSocket(ws);
  let sessionId: string | null = null;

  ws.on("error", (err) => {
    console.error(`[voice-server] WebSocket error (session ${sessionId ?? "pending"}): ${err.message}`);
  });

  ws.on("close", () => {
    if (sessionId) manager.disconnect(sessionId);
  });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    if (!sessionId) return;
    if (isBinary) {
      console.warn(`[voice-server] ${sessionId}: binary frame ignored`);
      return;
    }

    manager.handleMessage(sessionId, rawDataToString(data)).catch((err) => {
      console.error(`[voice-server] ${sessionId}: message handling failed: ${describeError(err)}`);
    });
  });

  manager
    .connect(socket, userId)
    .then((id) => {
      sessionId = id;
      // The socket may have closed while `connected` was being sent
      if (!socket.isOpen()) manager.disconnect(id);
    })
    .catch((err) => {
      console.error(`[voice-server] failed to open session for user ${userId}: ${describeError(err)}`);
      ws.close(1011, "Session setup failed");
    });
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Create a limiter with `max` slots. Each release function frees its slot once.
 */
export function createConnectionLimiter(max: number): ConnectionLimiter {
  let active = 0;

  function tryAcquire(): (() => void) | null {
    if (active >= max) return null;
    active++;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      active--;
    };
  }

  return { tryAcquire, active: () => active };
}

/**
 * Adapt a ws WebSocket to the SessionSocket interface.
 * Sends resolve once the frame is flushed, and resolve false instead of
 * throwing once the socket has closed.
 *
 * @param ws - Connected WebSocket
 * @returns A SessionSocket writing to `ws`
 */
function createWsSessionSocket(ws: WebSocket): SessionSocket {
  let wsClosed = false;

  ws.on("close", () => {
    wsClosed = true;
  });

  return {
    send(payload: string): Promise<boolean> {
      if (wsClosed || ws.readyState !== ws.OPEN) return Promise.resolve(false);

      return new Promise<boolean>((resolve) => {
        ws.send(payload, (err) => {
          if (err) {
            console.error(`[voice-server] send failed: ${err.message}`);
            resolve(false);
            return;
          }
          resolve(true);
        });
      });
    },
    isOpen: () => !wsClosed && ws.readyState === ws.OPEN,
    close: (code?: number, reason?: string) => ws.close(code, reason),
  };
}

/**
 * Convert a ws message payload to text.
 *
 * @param data - Payload as delivered by ws
 * @returns UTF-8 text
 */
function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
