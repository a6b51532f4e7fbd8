import { parseCommand, HELP_TEXT } from "./commands";
import { findChatUsers, getGerritUsername } from "./config";
import { logger } from "./logger";
import type { Config } from "./config";
import type { UserStore } from "./users";
import type { IncomingMessage } from "./adapters/types";
import type { Approval, Event, ExtendedInfo, User } from "./gerrit/types";

export interface Notification {
  userId: string;
  text: string;
}

function displayName(user: User | undefined): string {
  if (!user) return "Someone";
  return user.name ? `${user.name} (${user.username})` : user.username;
}

function formatApproval(approval: Approval): string {
  const value = parseInt(approval.value, 10);
  const signed = Number.isNaN(value) ? approval.value : value > 0 ? `+${value}` : `${value}`;
  return `${approval.type} ${signed}`;
}

function changeHeadline(event: Event): string {
  return `[${event.change.project}] ${event.change.subject} ${event.change.url}`;
}

function invalidPatternMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Bot {
  constructor(
    private config: Config,
    private store: UserStore,
  ) {}

  handleCommand(msg: Pick<IncomingMessage, "userId" | "text">): string {
    const command = parseCommand(msg.text);
    logger.info("bot command", { userId: msg.userId, command: command.type });

    switch (command.type) {
      case "enable":
      case "disable": {
        const gerritUsername = getGerritUsername(this.config, msg.userId);
        if (!gerritUsername) {
          return "Your chat account is not linked to a Gerrit user. Ask an admin to add you to the users config.";
        }
        const enabled = command.type === "enable";
        this.store.setEnabled(msg.userId, enabled);
        return enabled
          ? `Notifications enabled for Gerrit user ${gerritUsername}.`
          : "Notifications disabled.";
      }

      case "status": {
        const settings = this.store.get(msg.userId);
        const count = this.store.countEnabled();
        return `Notifications are ${settings.enabled ? "on" : "off"} for you. ${count} user(s) have notifications enabled.`;
      }

      case "help":
        return HELP_TEXT;

      case "show-filter": {
        const { filter, filterEnabled } = this.store.get(msg.userId);
        if (filter === null) return "No filter set.";
        return `Filter: ${filter} (${filterEnabled ? "enabled" : "disabled"})`;
      }

      case "enable-filter": {
        if (this.store.get(msg.userId).filter === null) {
          return "No filter set. Use `filter <regex>` first.";
        }
        this.store.setFilterEnabled(msg.userId, true);
        return "Filter enabled.";
      }

      case "disable-filter":
        this.store.setFilterEnabled(msg.userId, false);
        return "Filter disabled.";

      case "set-filter": {
        try {
          new RegExp(command.filter);
        } catch (err) {
          return `Invalid filter: ${invalidPatternMessage(err)}`;
        }
        this.store.setFilter(msg.userId, command.filter);
        return `Filter set to ${command.filter} and enabled.`;
      }

      case "unknown":
        return 'Unknown command. Type "help" for the list of commands.';
    }
  }

  /** Gerrit username whose linked chat users would hear about `event`, if any. */
  private recipientOf(event: Event): string | undefined {
    if (event.type === "reviewer-added") return event.reviewer?.username;

    const owner = event.change.owner.username;
    if (event.author?.username === owner) return undefined;
    const hasApprovals = (event.approvals?.length ?? 0) > 0;
    if (!hasApprovals && !event.comment) return undefined;
    return owner;
  }

  private enabledChatUsers(gerritUsername: string): string[] {
    return findChatUsers(this.config, gerritUsername).filter((userId) => this.store.get(userId).enabled);
  }

  extendedInfoFor(event: Event): ExtendedInfo[] {
    if (event.type !== "comment-added") return [];
    const recipient = this.recipientOf(event);
    if (!recipient || this.enabledChatUsers(recipient).length === 0) return [];

    const info: ExtendedInfo[] = [];
    if ((event.approvals?.length ?? 0) > 0) info.push("submit-records");
    if (event.comment) info.push("inline-comments");
    return info;
  }

  formatEvent(event: Event): string {
    if (event.type === "reviewer-added") {
      return `You were added as a reviewer to ${changeHeadline(event)}`;
    }

    const lines = [changeHeadline(event)];
    const approvals = event.approvals ?? [];
    if (approvals.length > 0) {
      lines.push(`${displayName(event.author)}: ${approvals.map(formatApproval).join(", ")}`);
    } else {
      lines.push(`${displayName(event.author)} commented`);
    }
    if (event.comment) {
      lines.push(...event.comment.split("\n").map((line) => `> ${line}`));
    }

    const authorName = event.author?.username;
    const inline = (event.patchSet.comments ?? []).filter((c) => c.reviewer.username === authorName);
    for (const comment of inline) {
      lines.push(`${comment.file}:${comment.line}: ${comment.message}`);
    }

    if (event.change.submitRecords?.some((record) => record.status === "OK")) {
      lines.push("Ready to submit");
    }
    return lines.join("\n");
  }

  private suppressedByFilter(userId: string, text: string): boolean {
    const { filter, filterEnabled } = this.store.get(userId);
    if (!filterEnabled || filter === null) return false;
    try {
      return new RegExp(filter).test(text);
    } catch (err) {
      logger.warn("ignoring invalid filter", { userId, filter, error: String(err) });
      return false;
    }
  }

  notificationsFor(event: Event): Notification[] {
    const recipient = this.recipientOf(event);
    if (!recipient) return [];

    const userIds = this.enabledChatUsers(recipient);
    if (userIds.length === 0) return [];

    const text = this.formatEvent(event);
    return userIds
      .filter((userId) => !this.suppressedByFilter(userId, text))
      .map((userId) => ({ userId, text }));
  }
}
