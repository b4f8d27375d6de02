import http from "http";
import { WebSocket, WebSocketServer } from "ws";
import { GameRuleError, Session } from "../engine/types";
import { ClientMessage, ServerMessage, buildSessionView } from "../shared/messages";
import { Logger } from "./logger";
import { AvalonService } from "./service";
import { RequestError, parseClientMessage } from "./validation";

/** The part of a socket the gateway writes to. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
}

interface ConnectionContext {
  playerName: string;
}

/**
 * WebSocket gateway responsible for:
 * - binding sockets to the seat name they watch,
 * - routing client messages into service calls, and
 * - pushing each subscriber its own redacted view after every committed change.
 */
export class WebSocketGateway {
  private contexts = new Map<ClientSocket, ConnectionContext>();
  private sockets = new Set<ClientSocket>();
  private unsubscribe: (() => void) | null = null;

  constructor(private service: AvalonService, private logger: Logger) {}

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): WebSocketServer {
    const wss = new WebSocketServer({ server, path: "/avalon/ws" });
    wss.on("connection", socket => {
      this.handleConnection(socket);
      socket.on("message", data => this.handleMessage(socket, data.toString()));
      socket.on("close", () => this.handleClose(socket));
      socket.on("error", err => this.logger.warn("WebSocket error", { err }));
    });
    this.listen();
    return wss;
  }

  /** Starts pushing state on every session change. Safe to call more than once. */
  listen(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.service.onChange(session => this.broadcastState(session));
  }

  close(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  handleConnection(socket: ClientSocket): void {
    this.sockets.add(socket);
  }

  handleClose(socket: ClientSocket): void {
    this.contexts.delete(socket);
    this.sockets.delete(socket);
  }

  /** Parses an incoming payload and dispatches typed client messages. */
  handleMessage(socket: ClientSocket, raw: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
      return;
    }

    try {
      this.handleClientMessage(socket, parseClientMessage(decoded));
    } catch (err) {
      if (err instanceof GameRuleError || err instanceof RequestError) {
        this.sendError(socket, err.code, err.message);
      } else {
        this.logger.error("Handler error", { err });
        this.sendError(socket, "SERVER_ERROR", "Internal error");
      }
    }
  }

  /** Executes the correct service call for the parsed client message. */
  private handleClientMessage(socket: ClientSocket, msg: ClientMessage): void {
    switch (msg.type) {
      case "SUBSCRIBE":
        this.subscribe(socket, msg.payload.playerName);
        break;
      case "RESET_GAME":
        this.service.reset(msg.payload);
        break;
      case "CLEAR_GAME":
        this.service.clear();
        break;
      case "END_GAME":
        this.service.endGame();
        break;
      case "JOIN":
        this.service.join(msg.payload.playerName);
        this.subscribe(socket, msg.payload.playerName.trim());
        break;
      case "PROPOSE_TEAM":
        this.service.proposeTeam(msg.payload.team, msg.payload.playerName);
        break;
      case "VOTE_TEAM":
        this.service.voteTeam(msg.payload.playerName, msg.payload.vote);
        break;
      case "VOTE_MISSION":
        this.service.voteMission(msg.payload.playerName, msg.payload.action);
        break;
      case "ASSIGN_EXCALIBUR":
        this.service.assignExcalibur(msg.payload.target);
        break;
      case "USE_EXCALIBUR":
        this.service.useExcalibur(msg.payload.target ?? null);
        break;
      case "LADY_OF_THE_LAKE":
        this.service.inspectWithLady(msg.payload.target);
        break;
      case "ASSASSINATE":
        this.service.assassinate(msg.payload.target);
        break;
      default: {
        const exhaustive: never = msg;
        throw new RequestError(`Unhandled message ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /** (Re)binds the socket to a seat name and sends that seat's current view. */
  private subscribe(socket: ClientSocket, playerName: string): void {
    this.contexts.set(socket, { playerName });
    this.send(socket, { type: "SUBSCRIBED", payload: { playerName } });
    this.send(socket, { type: "SESSION_STATE", payload: { session: this.service.view(playerName) } });
  }

  private send(socket: ClientSocket, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: ClientSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }

  /** Hydrates and sends a per-subscriber view of the committed session. */
  private broadcastState(session: Session): void {
    for (const socket of this.sockets) {
      const ctx = this.contexts.get(socket);
      if (!ctx) continue;
      try {
        const view = buildSessionView(session, ctx.playerName);
        this.send(socket, { type: "SESSION_STATE", payload: { session: view } });
      } catch (err) {
        this.logger.error("Failed to build view", { err, playerName: ctx.playerName });
      }
    }
  }
}
