import { WebSocketServer, type RawData } from "ws";

import logger from "../shared/utils/logger";
import { errorMessage } from "../engine/errors";
import type { AudioFaultCallback, AudioFrameCallback, AudioInputStream, AudioSource } from "../types/audio";
import type { ImageHandle } from "../types/avatar";
import { decodePcm } from "./audio/pcmStreamSource";
import type { RenderEventPayload, RenderSink, RenderSnapshot } from "../types/render";

const OPEN = 1;

export interface BridgeSocket {
  readonly readyState: number;
  send(data: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: () => void): unknown;
}

export type BridgeControlMessage =
  | { type: "position"; x: number; y: number }
  | { type: "settings"; settings: Record<string, unknown> };

type SocketBridgeOptions = {
  onControlMessage?: (message: BridgeControlMessage) => void;
};

const toBuffer = (raw: RawData): Buffer => {
  if (Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw);
  return Buffer.from(raw);
};

const isFiniteNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);

const isRecord = (v: unknown): v is Record<string, unknown> =>
  Boolean(v) && typeof v === "object" && !Array.isArray(v);

export function parseTextMessage(
  text: string
): { kind: "frames"; samples: number[] } | { kind: "control"; message: BridgeControlMessage } | null {
  let msg: unknown;
  try {
    msg = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(msg)) return null;
  const obj = msg;
  const type = typeof obj.type === "string" ? obj.type : "";

  if (type === "frames" && Array.isArray(obj.samples)) {
    return { kind: "frames", samples: obj.samples.filter(isFiniteNumber) };
  }
  if (type === "position" && isFiniteNumber(obj.x) && isFiniteNumber(obj.y)) {
    return { kind: "control", message: { type: "position", x: obj.x, y: obj.y } };
  }
  if (type === "settings" && isRecord(obj.settings)) {
    return { kind: "control", message: { type: "settings", settings: obj.settings } };
  }
  return null;
}

/**
 * SocketBridge - WebSocket link to the presentation layer.
 *
 * Inbound: binary messages are mono float32le PCM buffers captured by the
 * client; text messages carry JSON frames or control messages.
 * Outbound: every render call is broadcast as `{ type, data }` JSON, and each
 * new client first receives a `snapshot`.
 */
export class SocketBridge implements AudioSource, RenderSink {
  private server: WebSocketServer | null;
  private readonly clients: Set<BridgeSocket>;
  private readonly onControlMessage: SocketBridgeOptions["onControlMessage"];
  private frameListener: AudioFrameCallback | null;
  private faultListener: AudioFaultCallback | null;
  private delivering: boolean;
  private snapshot: RenderSnapshot;

  constructor({ onControlMessage }: SocketBridgeOptions = {}) {
    this.server = null;
    this.clients = new Set();
    this.onControlMessage = onControlMessage;
    this.frameListener = null;
    this.faultListener = null;
    this.delivering = false;
    this.snapshot = {
      level: 0,
      talking: false,
      variantImage: null,
      idleImage: null,
      fault: null,
    };
  }

  get clientCount() {
    return this.clients.size;
  }

  get currentSnapshot(): RenderSnapshot {
    return { ...this.snapshot };
  }

  listen(port: number, host = "127.0.0.1"): Promise<number> {
    if (this.server) return Promise.reject(new Error("SocketBridge is already listening"));
    return new Promise<number>((resolve, reject) => {
      const wss = new WebSocketServer({ port, host });
      this.server = wss;
      let listening = false;

      wss.on("listening", () => {
        listening = true;
        const address = wss.address();
        const boundPort = typeof address === "object" && address ? address.port : port;
        logger.log(`[SocketBridge] listening on ${host}:${boundPort}`);
        resolve(boundPort);
      });

      wss.on("connection", (ws) => this.handleConnection(ws));

      wss.on("error", (err: Error) => {
        logger.error("[SocketBridge] WebSocket error:", err);
        if (!listening) {
          this.server = null;
          reject(err);
          return;
        }
        this.faultListener?.(err);
      });
    });
  }

  handleConnection(ws: BridgeSocket) {
    this.clients.add(ws);
    logger.log("[SocketBridge] client connected");
    this.sendTo(ws, JSON.stringify({ type: "snapshot", data: this.currentSnapshot }));

    ws.on("close", () => {
      this.clients.delete(ws);
      logger.log("[SocketBridge] client disconnected");
    });

    ws.on("message", (raw, isBinary) => {
      if (isBinary) {
        this.deliverFrames(decodePcm(toBuffer(raw), "f32le"));
        return;
      }
      const parsed = parseTextMessage(toBuffer(raw).toString("utf-8"));
      if (!parsed) {
        logger.warn("[SocketBridge] unrecognized message, ignoring");
        return;
      }
      if (parsed.kind === "frames") {
        this.deliverFrames(parsed.samples);
        return;
      }
      try {
        this.onControlMessage?.(parsed.message);
      } catch (error) {
        logger.error("[SocketBridge] control message handler failed:", error);
      }
    });
  }

  private deliverFrames(frames: Float32Array | number[]) {
    if (!this.delivering || !this.frameListener) return;
    this.frameListener(frames);
  }

  openInputStream(onFrames: AudioFrameCallback, onFault?: AudioFaultCallback): AudioInputStream {
    if (this.frameListener) {
      throw new Error("SocketBridge already has an open input stream");
    }
    this.frameListener = onFrames;
    this.faultListener = onFault ?? null;
    this.delivering = true;

    return {
      stop: () => {
        this.delivering = false;
      },
      close: () => {
        this.delivering = false;
        this.frameListener = null;
        this.faultListener = null;
      },
    };
  }

  private sendTo(ws: BridgeSocket, text: string) {
    if (ws.readyState !== OPEN) return;
    try {
      ws.send(text);
    } catch (error) {
      logger.warn("[SocketBridge] send failed:", errorMessage(error));
    }
  }

  private broadcast(payload: RenderEventPayload) {
    const text = JSON.stringify(payload);
    this.clients.forEach((ws) => this.sendTo(ws, text));
  }

  onLevelUpdate(level: number) {
    this.snapshot.level = level;
    this.broadcast({ type: "level", data: { level } });
  }

  onTalkStateChanged(talking: boolean) {
    this.snapshot.talking = talking;
    this.broadcast({ type: "talk-state", data: { talking } });
  }

  onVariantChanged(image: ImageHandle | null) {
    this.snapshot.variantImage = image;
    this.broadcast({ type: "variant", data: { image } });
  }

  onIdleFrameChanged(image: ImageHandle | null) {
    this.snapshot.idleImage = image;
    this.broadcast({ type: "idle-frame", data: { image } });
  }

  onFault(message: string) {
    this.snapshot.fault = message;
    this.broadcast({ type: "fault", data: { message } });
  }

  async close() {
    const wss = this.server;
    this.server = null;
    this.clients.clear();
    if (!wss) return;
    wss.clients.forEach((client) => {
      try {
        client.close();
      } catch (error) {
        logger.warn("[SocketBridge] failed to close client:", errorMessage(error));
      }
    });
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
  }
}

export default SocketBridge;
