import WebSocket from "ws";
import { z } from "zod";
import { logger } from "../../logger.js";
import type { AppConfig } from "../../config.js";
import type { DeliveryOutcome, ReminderRecord } from "../../reminders/types.js";
import { targetFor, type ChatEvent, type SendMessage } from "../../types.js";
import { printOutbound } from "../../observability/console.js";
import { TimeoutError, errorMessage, withTimeout } from "../../utils/async.js";

const RECONNECT_DELAY_MS = 1500;

const gatewayMessageEventSchema = z.object({
  type: z.literal("message"),
  nick: z.string().min(1),
  channel: z.string().optional(),
  text: z.string(),
  time: z.number().optional()
});

type GatewayMessageEvent = z.infer<typeof gatewayMessageEventSchema>;

export type GatewayConfig = Pick<AppConfig, "GATEWAY_WS_URL" | "GATEWAY_TOKEN" | "DELIVERY_TIMEOUT_MS">;

/**
 * Bridge to the chat host over a WebSocket: message events come in as JSON frames,
 * `say` actions go out the same way.
 */
export class GatewayClient {
  private ws?: WebSocket;
  private reconnectTimer?: NodeJS.Timeout;
  private closing = false;
  private readonly wsUrl: string;

  constructor(private readonly config: GatewayConfig) {
    this.wsUrl = config.GATEWAY_WS_URL.replace(/\/+$/, "");
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  connect(onEvent: (evt: ChatEvent) => Promise<void>): void {
    this.closing = false;
    const headers: Record<string, string> = {};
    if (this.config.GATEWAY_TOKEN) headers["Authorization"] = `Bearer ${this.config.GATEWAY_TOKEN}`;

    const ws = new WebSocket(this.wsUrl, { headers });
    this.ws = ws;

    ws.on("open", () => {
      logger.info({ wsUrl: this.wsUrl }, "Gateway connected");
    });

    ws.on("close", (code: number, reason: Buffer) => {
      logger.debug({ code, reason: String(reason) }, "Gateway closed");
      if (this.closing || this.ws !== ws) return;
      this.reconnectTimer = setTimeout(() => this.connect(onEvent), RECONNECT_DELAY_MS);
    });

    ws.on("error", (err: Error) => {
      logger.error({ err }, "Gateway error");
    });

    ws.on("message", (data: WebSocket.RawData) => {
      const evt = this.parseFrame(data);
      if (!evt) return;
      onEvent(evt).catch((err: unknown) => {
        logger.error({ err, nick: evt.nick }, "Handle event failed");
      });
    });
  }

  close(): void {
    this.closing = true;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = undefined;
    this.ws?.close();
  }

  async send(msg: SendMessage): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) throw new Error("Gateway is not connected");
    const to = msg.target.kind === "private" ? msg.target.nick : msg.target.channel;
    const frame = JSON.stringify({ action: "say", target: to, text: msg.text });
    await new Promise<void>((resolve, reject) => {
      ws.send(frame, (err?: Error) => (err ? reject(err) : resolve()));
    });
    printOutbound(msg.target, msg.text);
  }

  /** Delivery callback for the reminder scheduler. */
  readonly deliver = async (rem: ReminderRecord): Promise<DeliveryOutcome> => {
    if (!this.connected) return { ok: false, reason: "not_connected" };
    const target = targetFor(rem.target, rem.channel);
    const text = target.kind === "channel" ? `${rem.target}: ${rem.message}` : rem.message;
    try {
      await withTimeout(this.send({ target, text }), this.config.DELIVERY_TIMEOUT_MS, "gateway send");
      return { ok: true };
    } catch (err) {
      if (err instanceof TimeoutError) return { ok: false, reason: "timeout" };
      return { ok: false, reason: errorMessage(err) };
    }
  };

  private parseFrame(data: WebSocket.RawData): ChatEvent | null {
    const buf = Array.isArray(data) ? Buffer.concat(data) : data instanceof ArrayBuffer ? Buffer.from(data) : data;
    const rawText = buf.toString("utf8");
    let json: unknown;
    try {
      json = JSON.parse(rawText);
    } catch {
      logger.debug({ size: rawText.length }, "Ignoring non-JSON gateway frame");
      return null;
    }
    const parsed = gatewayMessageEventSchema.safeParse(json);
    if (!parsed.success) return null;
    return this.toChatEvent(parsed.data);
  }

  private toChatEvent(e: GatewayMessageEvent): ChatEvent {
    return {
      nick: e.nick,
      channel: e.channel ?? "",
      text: e.text,
      timestampMs: e.time !== undefined ? e.time * 1000 : Date.now(),
      raw: e
    };
  }
}
