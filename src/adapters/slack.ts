// src/adapters/slack.ts
import { App } from "@slack/bolt";
import type { ChatAdapter, IncomingMessage } from "./types";
import { logger } from "../logger";

export interface SlackTokens {
  botToken: string;
  appToken: string;
}

export class SlackAdapter implements ChatAdapter {
  readonly platform = "slack";
  private app: App;
  private onMessage?: (msg: IncomingMessage) => void;

  constructor(tokens: SlackTokens) {
    this.app = new App({
      token: tokens.botToken,
      appToken: tokens.appToken,
      socketMode: true,
    });
  }

  private buildMessage(userId: string, text: string, say: (text: string) => Promise<unknown>): IncomingMessage {
    return {
      userId,
      platform: "slack",
      text,
      reply: async (replyText: string) => {
        await say(replyText);
      },
    };
  }

  async start(onMessage: (msg: IncomingMessage) => void): Promise<void> {
    this.onMessage = onMessage;

    // Direct messages
    this.app.message(async ({ message, say }) => {
      if (message.subtype) return;
      if (!("text" in message) || !message.text) return;
      if (!("user" in message) || !message.user) return;

      const msg = this.buildMessage(`slack:${message.user}`, message.text, (t) => say(t));
      logger.info("slack message received", { userId: msg.userId, text: message.text.slice(0, 100) });
      this.onMessage?.(msg);
    });

    // Mentions in channels
    this.app.event("app_mention", async ({ event, say }) => {
      if (!event.user) return;
      const text = event.text.replace(/<@[A-Z0-9]+>/g, "").trim();
      const msg = this.buildMessage(`slack:${event.user}`, text, (t) => say(t));
      logger.info("slack mention received", { userId: msg.userId, text: text.slice(0, 100) });
      this.onMessage?.(msg);
    });

    await this.app.start();
    logger.info("slack adapter started");
  }

  async stop(): Promise<void> {
    await this.app.stop();
    logger.info("slack adapter stopped");
  }

  async sendToUser(userId: string, text: string): Promise<void> {
    const slackUserId = userId.replace("slack:", "");
    try {
      const result = await this.app.client.conversations.open({
        users: slackUserId,
      });
      if (result.channel?.id) {
        await this.app.client.chat.postMessage({
          channel: result.channel.id,
          text,
        });
      }
    } catch (err) {
      logger.error("failed to send DM", { userId, error: String(err) });
    }
  }
}
