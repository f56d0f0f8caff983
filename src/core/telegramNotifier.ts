import TelegramBot from "node-telegram-bot-api";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { AlertKind, AlertPayload, AlertSink } from "./types.js";

const TITLES: Record<AlertKind, string> = {
  session_started: "Session started",
  session_stopped: "Session stopped",
  position_opened: "Position opened",
  position_closed: "Position closed",
  entry_failed: "Entry failed",
  exit_failed: "EXIT FAILED - manual action required",
  feed_disconnected: "Feed disconnected"
};

export const formatAlert = (kind: AlertKind, payload: AlertPayload): string => {
  const lines = Object.entries(payload)
    .filter(([, value]) => value !== null)
    .map(([key, value]) => `${key}: ${String(value)}`);
  return [TITLES[kind], ...lines].join("\n");
};

export interface MessageSender {
  sendMessage(chatId: string, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
}

/** Fire-and-forget alerts to one Telegram chat. Delivery errors are logged, never thrown. */
export class TelegramNotifier implements AlertSink {
  private readonly bot: MessageSender;
  private readonly chatId: string;
  private readonly logger: Logger;

  constructor(botToken: string, chatId: string, logger: Logger, bot?: MessageSender) {
    this.bot = bot ?? new TelegramBot(botToken, { polling: false });
    this.chatId = chatId;
    this.logger = logger;
  }

  notify(kind: AlertKind, payload: AlertPayload): void {
    const text = formatAlert(kind, payload);
    let delivery: Promise<unknown>;
    try {
      delivery = this.bot.sendMessage(this.chatId, text, { disable_web_page_preview: true });
    } catch (error) {
      this.logger.warn("alert_failed", { kind, error: errorMessage(error) });
      return;
    }
    void delivery.catch((error: unknown) => {
      this.logger.warn("alert_failed", { kind, error: errorMessage(error) });
    });
  }
}

/** Alert sink for runs without a chat configured: alerts become log lines. */
export class LogAlertSink implements AlertSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  notify(kind: AlertKind, payload: AlertPayload): void {
    const level = kind === "exit_failed" ? "error" : "info";
    this.logger[level]("alert", { kind, ...payload });
  }
}
