import { logger } from "../logger";
import { Channel } from "./channel";
import { ChannelOpenError, type ExecChannel, type GerritSession } from "./session";

export type CommandResult = { ok: true; output: string } | { ok: false; error: string };

export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandError";
  }
}

/** Anything that can run a Gerrit command and hand back its stdout. */
export interface CommandExecutor {
  runCommand(command: string): Promise<string>;
}

/** Single-use response slot: resolved once by the worker, awaited once by the caller. */
class ResponseSlot {
  readonly result: Promise<CommandResult>;
  private readonly settle: (result: CommandResult) => void;
  private settled = false;

  constructor() {
    let settle: (result: CommandResult) => void = () => {};
    this.result = new Promise((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  resolve(result: CommandResult) {
    if (this.settled) return;
    this.settled = true;
    this.settle(result);
  }
}

interface CommandRequest {
  command: string;
  slot: ResponseSlot;
}

type CommandSession = Pick<GerritSession, "exec" | "reconnectRepeatedly" | "end">;

async function collectOutput(channel: ExecChannel): Promise<CommandResult> {
  let data = "";
  try {
    channel.output.setEncoding("utf8");
    for await (const chunk of channel.output) {
      data += String(chunk);
    }
  } catch (err) {
    channel.abort();
    return { ok: false, error: `failed to read from channel: ${String(err)}` };
  }

  let status: number | null;
  try {
    status = await channel.close();
  } catch (err) {
    return { ok: false, error: `failed to close command channel: ${String(err)}` };
  }

  if (status === 0) return { ok: true, output: data };
  if (status === null) return { ok: false, error: "command exited without an exit status" };
  return { ok: false, error: `command exited with status ${status}` };
}

/**
 * Runs ad hoc Gerrit commands over a dedicated session, one at a time and in
 * submission order. The session is never shared with the event stream.
 */
export class CommandRunner implements CommandExecutor {
  private readonly requests = new Channel<CommandRequest>(1);
  private readonly worker: Promise<void>;

  constructor(private readonly session: CommandSession) {
    this.worker = this.runCommands().catch((err) => {
      logger.error("command runner crashed", { error: String(err) });
      this.shutDown();
    });
  }

  async runCommand(command: string): Promise<string> {
    const slot = new ResponseSlot();
    try {
      await this.requests.send({ command, slot });
    } catch {
      throw new CommandError("command runner stopped before sending");
    }

    const result = await slot.result;
    if (!result.ok) throw new CommandError(result.error);
    return result.output;
  }

  /** Stops accepting commands, finishes the queued ones and ends the session. */
  async close(): Promise<void> {
    this.requests.close();
    await this.worker;
    this.session.end();
  }

  private async runCommands(): Promise<void> {
    let healthy = true;

    for await (const request of this.requests) {
      let result: CommandResult | undefined;

      while (result === undefined) {
        if (!healthy) {
          logger.info("reconnecting command session");
          try {
            await this.session.reconnectRepeatedly();
          } catch (err) {
            logger.error("reconnect failed permanently", { error: String(err) });
            request.slot.resolve({ ok: false, error: "command runner stopped after sending" });
            this.shutDown();
            return;
          }
          healthy = true;
        }

        let channel: ExecChannel;
        try {
          channel = await this.session.exec(request.command);
        } catch (err) {
          if (err instanceof ChannelOpenError) {
            logger.error("failed to create ssh session channel", { error: String(err) });
            healthy = false;
            continue;
          }
          logger.error("failed to request exec channel", { command: request.command, error: String(err) });
          result = { ok: false, error: `failed to request exec channel: ${String(err)}` };
          break;
        }

        result = await collectOutput(channel);
      }

      if (!result.ok) logger.debug("command failed", { command: request.command, error: result.error });
      request.slot.resolve(result);
    }

    logger.debug("command runner shutting down");
  }

  private shutDown() {
    this.requests.close();
    for (const request of this.requests.drain()) {
      request.slot.resolve({ ok: false, error: "command runner stopped after sending" });
    }
  }
}
