import type { ChatAdapter, IncomingMessage } from "./types";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface CliStreams {
  input: Readable;
  output: Writable;
}

export class CliAdapter implements ChatAdapter {
  readonly platform = "cli";
  private rl?: ReturnType<typeof createInterface>;
  private onMessage?: (msg: IncomingMessage) => void;
  private userId: string;
  private streams: CliStreams;

  constructor(userId: string = "cli:local", streams: CliStreams = { input: process.stdin, output: process.stdout }) {
    this.userId = userId;
    this.streams = streams;
  }

  private print(text: string) {
    this.streams.output.write(`${text}\n`);
  }

  async start(onMessage: (msg: IncomingMessage) => void): Promise<void> {
    this.onMessage = onMessage;

    this.rl = createInterface({
      input: this.streams.input,
      output: this.streams.output,
      prompt: "gerrit-relay> ",
      terminal: false,
    });

    this.print("--- gerrit-relay ---");
    this.print("Type 'help' for commands. Notifications for this console appear below.");
    this.rl.prompt();

    this.rl.on("line", (line) => {
      const text = line.trim();
      if (!text) {
        this.rl?.prompt();
        return;
      }

      const msg: IncomingMessage = {
        userId: this.userId,
        platform: "cli",
        text,
        reply: async (replyText: string) => {
          this.print(replyText);
          this.rl?.prompt();
        },
      };

      this.onMessage?.(msg);
    });
  }

  async stop(): Promise<void> {
    this.rl?.close();
  }

  async sendToUser(userId: string, text: string): Promise<void> {
    this.print(`${DIM}[${userId}]${RESET}\n${text}`);
  }
}
