import type { Readable } from "node:stream";
import { logger } from "../logger";
import { Channel } from "./channel";
import type { ExecChannel, GerritSession } from "./session";
import { EventSchema, StreamError, type Event } from "./types";

export const STREAM_EVENTS_COMMAND = "gerrit stream-events -s comment-added -s reviewer-added";

export type StreamMessage = { ok: true; line: string } | { ok: false; error: StreamError };

type FeedSession = Pick<GerritSession, "exec" | "reconnectRepeatedly" | "end">;

/** Splits a byte stream into lines, without the trailing newline or carriage return. */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  input.setEncoding("utf8");
  let pending = "";
  for await (const chunk of input) {
    pending += String(chunk);
    let newline = pending.indexOf("\n");
    while (newline !== -1) {
      yield pending.slice(0, newline).replace(/\r$/, "");
      pending = pending.slice(newline + 1);
      newline = pending.indexOf("\n");
    }
  }
  if (pending.length > 0) yield pending.replace(/\r$/, "");
}

type PumpOutcome = "ended" | "failed" | "consumer-gone";

async function pumpLines(channel: ExecChannel, tx: Channel<StreamMessage>): Promise<PumpOutcome> {
  try {
    for await (const line of readLines(channel.output)) {
      try {
        await tx.send({ ok: true, line });
      } catch (err) {
        logger.debug("event consumer went away", { error: String(err) });
        return "consumer-gone";
      }
    }
    return "ended";
  } catch (err) {
    logger.error("could not read line from gerrit, will drop connection", { error: String(err) });
    return "failed";
  }
}

async function terminate(tx: Channel<StreamMessage>, reason: string) {
  logger.error("gerrit event stream terminated", { reason });
  try {
    await tx.send({ ok: false, error: new StreamError("terminated", reason) });
  } catch (err) {
    logger.debug("event consumer gone before termination", { error: String(err) });
  }
  tx.close();
}

/**
 * Feed loop: runs stream-events on the session and pushes every output line
 * into `tx`. A read failure or end of output reconnects and starts over;
 * failing to start the command ends the feed with one terminal error.
 */
async function runFeed(session: FeedSession, tx: Channel<StreamMessage>): Promise<void> {
  try {
    await feedLoop(session, tx);
  } finally {
    tx.close();
    session.end();
  }
}

async function feedLoop(session: FeedSession, tx: Channel<StreamMessage>): Promise<void> {
  let first = true;

  while (true) {
    if (!first) {
      try {
        await session.reconnectRepeatedly();
      } catch (err) {
        logger.error("reconnect gave up, this should not happen", { error: String(err) });
        await terminate(tx, `Could not connect to Gerrit: ${String(err)}`);
        return;
      }
      if (tx.isClosed) {
        logger.debug("event consumer went away during reconnect");
        return;
      }
    }
    first = false;

    let channel: ExecChannel;
    try {
      channel = await session.exec(STREAM_EVENTS_COMMAND);
    } catch (err) {
      await terminate(tx, `Could not execute gerrit stream-events command over ssh: ${String(err)}`);
      return;
    }
    logger.info("connected to gerrit");

    const outcome = await pumpLines(channel, tx);
    channel.abort();
    if (outcome === "consumer-gone") return;
    logger.warn("gerrit event stream interrupted, reconnecting", { outcome });
  }
}

/** Starts the feed loop and returns the channel it publishes raw lines to. */
export function startLineFeed(session: FeedSession): Channel<StreamMessage> {
  const tx = new Channel<StreamMessage>(1);
  runFeed(session, tx).catch((err) => logger.error("event feed crashed", { error: String(err) }));
  return tx;
}

/** Parses one stream-events line; undefined for anything that is not an accepted event. */
export function parseEvent(line: string): Event | undefined {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    logger.debug("ignoring malformed gerrit line", { error: String(err), line: line.slice(0, 200) });
    return undefined;
  }

  const parsed = EventSchema.safeParse(json);
  if (!parsed.success) {
    logger.debug("ignoring gerrit event", { error: parsed.error.message });
    return undefined;
  }
  return parsed.data;
}

/**
 * Lazily yields Gerrit events from the session, in the order Gerrit printed
 * them. Transient disconnects only pause delivery; a terminal failure is
 * thrown once as a StreamError. Leaving the loop stops the feed.
 */
export async function* eventStream(session: FeedSession): AsyncGenerator<Event> {
  const rx = startLineFeed(session);
  try {
    for await (const message of rx) {
      if (!message.ok) {
        throw new StreamError(message.error.kind, `Stream error from Gerrit: ${message.error.message}`);
      }
      const event = parseEvent(message.line);
      if (event) {
        logger.debug("incoming gerrit event", { type: event.type, change: event.change.id });
        yield event;
      }
    }
  } finally {
    rx.close();
  }
}
