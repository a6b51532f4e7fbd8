import { logger } from "./logger";
import { StreamError } from "./gerrit/types";
import type { EnrichedEvent } from "./gerrit/extended";
import type { ChatAdapter } from "./adapters/types";
import type { Notification } from "./bot";
import type { Event } from "./gerrit/types";

export interface NotificationSource {
  notificationsFor(event: Event): Notification[];
}

function adapterFor(adapters: ChatAdapter[], userId: string): ChatAdapter | undefined {
  const platform = userId.split(":", 1)[0];
  return adapters.find((a) => a.platform === platform);
}

/**
 * Delivers the notifications of every event until the stream ends. A terminal
 * stream error is logged and rethrown.
 */
export async function runRelay(
  events: AsyncIterable<EnrichedEvent>,
  bot: NotificationSource,
  adapters: ChatAdapter[],
): Promise<void> {
  try {
    for await (const outcome of events) {
      for (const { userId, text } of bot.notificationsFor(outcome.event)) {
        const adapter = adapterFor(adapters, userId);
        if (!adapter) {
          logger.warn("no adapter for user", { userId });
          continue;
        }
        await adapter.sendToUser(userId, text);
      }
    }
  } catch (err) {
    if (err instanceof StreamError) {
      logger.error("gerrit event stream stopped", { kind: err.kind, error: err.message });
    }
    throw err;
  }
}
