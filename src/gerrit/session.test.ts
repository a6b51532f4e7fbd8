import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Server, utils, type Connection } from "ssh2";
import {
  ChannelOpenError,
  ExecError,
  GerritSession,
  SessionError,
  connectSsh,
  publicKeyPath,
  type ConnectOptions,
  type ExecChannel,
} from "./session";
import { ReconnectPolicy } from "./backoff";
import { FakeConnection, FakeExecChannel, TEST_OPTIONS, scriptedConnector } from "./__fixtures__/fake-ssh";

const instantPolicy = () => new ReconnectPolicy({}, { sleep: async () => {}, random: () => 0.5 });

function echoConnection() {
  return new FakeConnection(async (command) => new FakeExecChannel(command).finish(command));
}

describe("publicKeyPath", () => {
  it("appends .pub to a key without extension", () => {
    expect(publicKeyPath("some_priv_key")).toBe("some_priv_key.pub");
    expect(publicKeyPath("/home/relay/.ssh/id_ed25519")).toBe("/home/relay/.ssh/id_ed25519.pub");
  });

  it("replaces an existing extension", () => {
    expect(publicKeyPath("keys/bot.key")).toBe("keys/bot.pub");
  });
});

describe("GerritSession", () => {
  it("connects once through the connector", async () => {
    const connection = echoConnection();
    const connector = scriptedConnector([connection]);
    const session = await GerritSession.connect(TEST_OPTIONS, { connector });

    const channel = await session.exec("gerrit version");
    expect(connection.commands).toEqual(["gerrit version"]);
    expect(channel).toBeInstanceOf(FakeExecChannel);
    expect(connector.calls).toBe(1);
  });

  it("does not retry a failed first connect", async () => {
    const connector = scriptedConnector([new SessionError("Could not authenticate: denied"), echoConnection()]);
    await expect(GerritSession.connect(TEST_OPTIONS, { connector })).rejects.toThrow("Could not authenticate: denied");
    expect(connector.calls).toBe(1);
  });

  it("reconnect swaps in a new connection and ends the old one", async () => {
    const first = echoConnection();
    const second = echoConnection();
    const session = await GerritSession.connect(TEST_OPTIONS, { connector: scriptedConnector([first, second]) });

    await session.reconnect();
    await session.exec("gerrit ls-projects");

    expect(first.ended).toBe(true);
    expect(first.commands).toEqual([]);
    expect(second.commands).toEqual(["gerrit ls-projects"]);
  });

  it("reconnectRepeatedly keeps trying through failures", async () => {
    const first = echoConnection();
    const last = echoConnection();
    const connector = scriptedConnector([first, new Error("refused"), new Error("refused"), last]);
    const session = await GerritSession.connect(TEST_OPTIONS, { connector, policy: instantPolicy() });

    await session.reconnectRepeatedly();
    await session.exec("gerrit version");

    expect(connector.calls).toBe(4);
    expect(first.ended).toBe(true);
    expect(last.commands).toEqual(["gerrit version"]);
  });
});

describe("connectSsh", () => {
  it("reports an unreadable private key as a session error", async () => {
    const err = await connectSsh({ ...TEST_OPTIONS, privateKeyPath: "/nonexistent/relay_test_key" }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(SessionError);
    expect(String(err)).toContain("Could not read private key /nonexistent/relay_test_key");
  });
});

/**
 * In-process SSH server on the loopback interface. `gerrit version` prints a
 * version and exits 0, `gerrit forbidden` is refused, anything else exits 1.
 */
class LocalGerrit {
  readonly connections: Connection[] = [];
  acceptKeys = true;
  private readonly server: Server;

  constructor() {
    const hostKey = utils.generateKeyPairSync("ed25519");
    this.server = new Server({ hostKeys: [hostKey.private] }, (client) => {
      this.connections.push(client);
      client.on("error", () => {});
      client.on("authentication", (ctx) => {
        if (ctx.method === "publickey" && this.acceptKeys) ctx.accept();
        else ctx.reject(["publickey"]);
      });
      client.on("session", (acceptSession) => {
        const session = acceptSession();
        session.on("exec", (accept, reject, info) => {
          if (info.command === "gerrit forbidden") {
            reject();
            return;
          }
          const stream = accept();
          if (info.command === "gerrit version") {
            stream.write("gerrit version 3.9.1\n");
            stream.exit(0);
          } else {
            stream.stderr.write("fatal: unknown command\n");
            stream.exit(1);
          }
          stream.end();
        });
      });
    });
  }

  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(0, "127.0.0.1", () => {
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("server has no port"));
          return;
        }
        resolve(address.port);
      });
    });
  }

  close(): Promise<void> {
    for (const connection of this.connections) connection.end();
    return new Promise((resolve) => this.server.close(() => resolve()));
  }
}

async function readAll(channel: ExecChannel): Promise<string> {
  let data = "";
  channel.output.setEncoding("utf8");
  for await (const chunk of channel.output) data += String(chunk);
  return data;
}

describe("ssh transport", () => {
  let gerrit: LocalGerrit;
  let keyDir: string;
  let options: ConnectOptions;

  beforeEach(async () => {
    gerrit = new LocalGerrit();
    const port = await gerrit.listen();
    keyDir = mkdtempSync(join(tmpdir(), "gerrit-relay-ssh-"));
    const privateKeyPath = join(keyDir, "id_ed25519");
    writeFileSync(privateKeyPath, utils.generateKeyPairSync("ed25519").private);
    options = { host: "127.0.0.1", port, username: "relay-bot", privateKeyPath };
  });

  afterEach(async () => {
    await gerrit.close();
    rmSync(keyDir, { recursive: true, force: true });
  });

  it("reports the exit status of a command", async () => {
    const connection = await connectSsh(options);

    const ok = await connection.exec("gerrit version");
    expect(await readAll(ok)).toBe("gerrit version 3.9.1\n");
    expect(await ok.close()).toBe(0);

    const failed = await connection.exec("gerrit frobnicate");
    expect(await readAll(failed)).toBe("");
    expect(await failed.close()).toBe(1);

    connection.end();
  });

  it("tells a refused command apart from a channel that cannot be opened", async () => {
    const connection = await connectSsh(options);
    await expect(connection.exec("gerrit forbidden")).rejects.toBeInstanceOf(ExecError);

    connection.end();
    await expect(connection.exec("gerrit version")).rejects.toBeInstanceOf(ChannelOpenError);
  });

  it("reconnects after the server drops the connection", async () => {
    const session = await GerritSession.connect(options);
    const [serverSide] = gerrit.connections;
    const dropped = new Promise<void>((resolve) => serverSide.once("close", () => resolve()));
    serverSide.end();
    await dropped;

    await expect(session.exec("gerrit version")).rejects.toBeInstanceOf(ChannelOpenError);

    await session.reconnect();
    const channel = await session.exec("gerrit version");
    expect(await readAll(channel)).toBe("gerrit version 3.9.1\n");
    expect(await channel.close()).toBe(0);
    session.end();
  });

  it("describes an authentication failure", async () => {
    gerrit.acceptKeys = false;
    const err = await connectSsh(options).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SessionError);
    expect(String(err)).toContain("Could not authenticate: ");
  });

  it("describes a refused connection", async () => {
    const { port } = options;
    await gerrit.close();
    const err = await connectSsh(options).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SessionError);
    expect(String(err)).toContain(`Could not connect to gerrit at 127.0.0.1:${port}: `);
  });
});
