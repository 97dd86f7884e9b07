import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import { WebSocket, WebSocketServer } from "ws";
import { CONFIG } from "../config.js";
import { isObject, getString } from "../tools/responseFields.js";
import {
  UnityCommandError,
  UnityCommandParams,
  UnityCommandSender,
  UnityHello,
  UnityResponse,
} from "./types.js";

/** The parts of a `ws` socket the connection relies on. */
export interface UnitySocket extends EventEmitter {
  send(data: string): void;
  close(): void;
}

export interface UnityConnectionOptions {
  port?: number;
  /** When false, no port is opened and sockets are handed in through `attach`. */
  listen?: boolean;
  commandTimeoutMs?: number;
  features?: string[];
}

interface PendingCommand {
  command: string;
  resolve: (value: UnityResponse) => void;
  reject: (reason: UnityCommandError) => void;
  timer: NodeJS.Timeout;
}

export class UnityConnection implements UnityCommandSender {
  private wsServer: WebSocketServer;
  private connection: UnitySocket | null = null;
  private readonly wsPort: number;
  private readonly commandTimeoutMs: number;
  private readonly features: string[];
  private pending = new Map<string, PendingCommand>();
  private connectionWaiters: (() => void)[] = [];

  constructor(options: UnityConnectionOptions = {}) {
    this.wsPort = options.port ?? CONFIG.WS_PORT;
    this.commandTimeoutMs = options.commandTimeoutMs ?? CONFIG.COMMAND_TIMEOUT_MS;
    this.features = options.features ?? [];

    if (options.listen === false) {
      this.wsServer = new WebSocketServer({ noServer: true });
    } else {
      this.wsServer = new WebSocketServer({ port: this.wsPort });
      this.setupWebSocket();
    }
  }

  private setupWebSocket() {
    console.error(`[Unity MCP] WebSocket server starting on port ${this.wsPort}`);

    this.wsServer.on("listening", () => {
      console.error(`[Unity MCP] WebSocket server is listening on port ${this.wsPort}`);
    });

    this.wsServer.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        console.error(`[Unity MCP] ERROR: Port ${this.wsPort} is already in use. Please ensure no other instance is running.`);
      } else if (error.code === "EACCES") {
        console.error(`[Unity MCP] ERROR: Permission denied for port ${this.wsPort}. Try using a port number > 1024.`);
      } else {
        console.error(`[Unity MCP] WebSocket server error: ${error.code || "UNKNOWN"}`, error.message);
      }
    });

    this.wsServer.on("connection", (ws: WebSocket) => {
      this.attach(ws);
    });
  }

  /** Adopt a socket as the current Unity Editor link, replacing any previous one. */
  public attach(socket: UnitySocket): void {
    console.error("[Unity MCP] Unity Editor connected");
    const previous = this.connection;
    if (previous && previous !== socket) {
      this.dropConnection(previous, "Unity Editor reconnected");
      previous.close();
    }
    this.connection = socket;

    socket.on("message", (data: { toString(): string }) => {
      let message: unknown;
      try {
        message = JSON.parse(data.toString());
      } catch (error) {
        console.error("[Unity MCP] Error parsing message:", error);
        return;
      }
      this.handleUnityMessage(message);
    });

    socket.on("error", (error: Error) => {
      console.error("[Unity MCP] WebSocket error:", error.message);
    });

    socket.on("close", () => {
      console.error("[Unity MCP] Unity Editor disconnected");
      this.dropConnection(socket, "Unity Editor disconnected");
    });

    const waiters = this.connectionWaiters;
    this.connectionWaiters = [];
    waiters.forEach((notify) => notify());
  }

  private dropConnection(socket: UnitySocket, reason: string) {
    if (this.connection !== socket) return;
    this.connection = null;
    this.rejectAll(reason, "disconnected");
  }

  private handleUnityMessage(message: unknown) {
    if (!isObject(message)) {
      console.error("[Unity MCP] Ignoring malformed message");
      return;
    }

    switch (message.type) {
      case "hello":
        if (isObject(message.data)) {
          this.handleHandshake({
            unityVersion: getString(message.data, "unityVersion"),
            platform: getString(message.data, "platform"),
          });
        }
        break;

      case "commandResult":
        this.handleCommandResult(message.data);
        break;

      default:
        console.error("[Unity MCP] Unknown message type:", message.type);
    }
  }

  private handleHandshake(data: UnityHello) {
    console.error(`[Unity MCP] Unity Version: ${data.unityVersion}, Platform: ${data.platform}`);
    this.sendMessage("welcome", {
      serverVersion: CONFIG.APP_VERSION,
      features: this.features,
      timestamp: new Date().toISOString(),
    });
  }

  private handleCommandResult(data: unknown) {
    const id = isObject(data) ? getString(data, "id") : undefined;
    const entry = id !== undefined ? this.pending.get(id) : undefined;
    if (!isObject(data) || id === undefined || !entry) {
      console.error("[Unity MCP] Received result for unknown command:", id);
      return;
    }

    this.pending.delete(id);
    clearTimeout(entry.timer);
    if (CONFIG.DEBUG) {
      console.error(`[Unity MCP] ${entry.command} completed`);
    }
    entry.resolve(isObject(data.result) ? data.result : {});
  }

  private rejectAll(reason: string, failure: "disconnected") {
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(new UnityCommandError(`${reason} while waiting for ${entry.command}`, failure, entry.command));
      this.pending.delete(id);
    }
  }

  // Public API
  public isConnected(): boolean {
    return this.connection !== null;
  }

  public sendMessage(type: string, data: unknown): boolean {
    if (!this.connection) {
      console.error("[Unity MCP] Cannot send message: Unity Editor not connected");
      return false;
    }
    this.connection.send(JSON.stringify({ type, data }));
    return true;
  }

  public sendCommand(
    command: string,
    params: UnityCommandParams,
    timeoutMs: number = this.commandTimeoutMs
  ): Promise<UnityResponse> {
    if (!this.connection) {
      return Promise.reject(
        new UnityCommandError("Unity Editor is not connected", "not_connected", command)
      );
    }

    const id = randomUUID();
    return new Promise<UnityResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(
          new UnityCommandError(
            `${command} timed out after ${timeoutMs / 1000} seconds. This may indicate an issue with the Unity Editor.`,
            "timeout",
            command
          )
        );
      }, timeoutMs);

      this.pending.set(id, { command, resolve, reject, timer });
      if (CONFIG.DEBUG) {
        console.error(`[Unity MCP] Sending ${command}`);
      }
      this.sendMessage("command", { id, command, params });
    });
  }

  public async waitForConnection(timeoutMs: number = 60000): Promise<boolean> {
    if (this.connection) return true;

    return new Promise<boolean>((resolve) => {
      const notify = () => {
        clearTimeout(timeout);
        resolve(true);
      };
      const timeout = setTimeout(() => {
        this.connectionWaiters = this.connectionWaiters.filter((w) => w !== notify);
        resolve(false);
      }, timeoutMs);
      this.connectionWaiters.push(notify);
    });
  }

  public close(): void {
    if (this.connection) {
      const socket = this.connection;
      this.dropConnection(socket, "Server shutting down");
      socket.close();
    }
    this.wsServer.close();
  }
}
