import { logger } from "../logger";
import { CommandRunner, type CommandExecutor } from "./command-runner";
import type { GerritSession } from "./session";
import { eventStream } from "./stream";
import { ChangeSchema, type Change, type Event, type ExtendedInfo } from "./types";

export type ExtendedInfoPolicy = (event: Event) => Iterable<ExtendedInfo>;

export type EnrichedEvent = { ok: true; event: Event } | { ok: false; event: Event; error: string };

export function buildQuery(changeId: string, info: ReadonlySet<ExtendedInfo>): string {
  let query = "gerrit query --format=JSON";
  if (info.has("submit-records")) query += " --submit-records";
  if (info.has("inline-comments")) query += " --patch-sets --comments";
  return `${query} change:${changeId}`;
}

/** Decodes the first line of a query result; the lines after it are query stats. */
export function parseQueryResult(output: string): Change {
  const [line = ""] = output.split("\n", 1);
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    throw new Error(`failed to decode result: ${String(err)}`);
  }
  const parsed = ChangeSchema.safeParse(json);
  if (!parsed.success) throw new Error(`failed to decode result: ${parsed.error.message}`);
  return parsed.data;
}

/** Returns a copy of `event` carrying the queried patch set and submit records. */
export function mergeChange(event: Event, change: Change): Event {
  const patchSet = change.patchSets?.find((ps) => ps.number === event.patchSet.number) ?? event.patchSet;
  return {
    ...event,
    patchSet,
    change: { ...event.change, submitRecords: change.submitRecords },
  };
}

export async function fetchExtendedInfo(
  runner: CommandExecutor,
  event: Event,
  info: Iterable<ExtendedInfo>,
): Promise<Event> {
  const wanted = new Set(info);
  if (wanted.size === 0) return event;

  const output = await runner.runCommand(buildQuery(event.change.id, wanted));
  return mergeChange(event, parseQueryResult(output));
}

/**
 * Enriches each event of `events` as `policy` asks. A failed query is
 * reported on that event alone and the stream carries on.
 */
export async function* enrichEvents(
  events: AsyncIterable<Event>,
  runner: CommandExecutor,
  policy: ExtendedInfoPolicy,
): AsyncGenerator<EnrichedEvent> {
  for await (const event of events) {
    let enriched: EnrichedEvent;
    try {
      enriched = { ok: true, event: await fetchExtendedInfo(runner, event, policy(event)) };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.warn("failed to fetch extended info", { change: event.change.id, error });
      enriched = { ok: false, event, error };
    }
    yield enriched;
  }
}

/**
 * Event stream on `streamSession`, enriched through a command runner that
 * owns `commandSession`. Both sessions are ended when iteration stops.
 */
export async function* extendedEventStream(
  streamSession: GerritSession,
  commandSession: GerritSession,
  policy: ExtendedInfoPolicy,
): AsyncGenerator<EnrichedEvent> {
  const runner = new CommandRunner(commandSession);
  try {
    yield* enrichEvents(eventStream(streamSession), runner, policy);
  } finally {
    await runner.close();
  }
}
