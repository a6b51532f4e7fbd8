import Database from "better-sqlite3";
import { loadConfig } from "./config";
import { UserStore } from "./users";
import { Bot } from "./bot";
import { runRelay } from "./relay";
import { SlackAdapter } from "./adapters/slack";
import { CliAdapter } from "./adapters/cli";
import type { ChatAdapter, IncomingMessage } from "./adapters/types";
import { GerritSession } from "./gerrit/session";
import { ReconnectPolicy } from "./gerrit/backoff";
import { extendedEventStream } from "./gerrit/extended";
import { logger } from "./logger";

const config = loadConfig();
const db = new Database(config.dbPath);
db.pragma("journal_mode = WAL");
const store = new UserStore(db);
const bot = new Bot(config, store);

const adapters: ChatAdapter[] = [];

if (process.env.SLACK_BOT_TOKEN && process.env.SLACK_APP_TOKEN) {
  adapters.push(new SlackAdapter({ botToken: process.env.SLACK_BOT_TOKEN, appToken: process.env.SLACK_APP_TOKEN }));
}

if (process.env.CLI_MODE === "true" || adapters.length === 0) {
  adapters.push(new CliAdapter());
}

function handleMessage(msg: IncomingMessage) {
  let reply: string;
  try {
    reply = bot.handleCommand(msg);
  } catch (err) {
    logger.error("command failed", { userId: msg.userId, error: String(err) });
    reply = "Something went wrong handling that command.";
  }
  msg.reply(reply).catch((err) =>
    logger.warn("failed to send reply", { userId: msg.userId, error: String(err) })
  );
}

async function main() {
  const policy = new ReconnectPolicy(config.reconnect);
  const connectOptions = {
    host: config.gerrit.host,
    port: config.gerrit.port,
    username: config.gerrit.username,
    privateKeyPath: config.gerrit.privateKeyPath,
  };

  logger.info("gerrit-relay starting", { host: connectOptions.host, port: connectOptions.port, adapters: adapters.length });

  // A failed first connect is fatal; only established sessions reconnect.
  const streamSession = await GerritSession.connect(connectOptions, { policy });
  const commandSession = await GerritSession.connect(connectOptions, { policy });

  for (const adapter of adapters) {
    await adapter.start(handleMessage);
  }

  logger.info("chat adapters started", { platforms: adapters.map((a) => a.platform) });

  async function shutdown() {
    logger.info("shutting down...");
    for (const adapter of adapters) {
      await adapter.stop();
    }
    streamSession.end();
    commandSession.end();
    db.close();
    process.exit(0);
  }

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error("shutdown failed", { error: String(err) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  logger.info("gerrit-relay ready");

  const events = extendedEventStream(streamSession, commandSession, (event) => bot.extendedInfoFor(event));
  await runRelay(events, bot, adapters);
  throw new Error("gerrit event stream ended");
}

main().catch((err) => {
  logger.error("fatal error", { error: String(err) });
  process.exit(1);
});
