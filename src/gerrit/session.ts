import { readFile } from "node:fs/promises";
import { format, parse } from "node:path";
import type { Readable } from "node:stream";
import { Client, type ClientChannel } from "ssh2";
import { logger } from "../logger";
import { ReconnectPolicy } from "./backoff";

export interface ConnectOptions {
  host: string;
  port: number;
  username: string;
  privateKeyPath: string;
}

/** One exec'd command on an SSH connection. */
export interface ExecChannel {
  /** The command's stdout. */
  readonly output: Readable;
  /** Closes the channel and resolves with the remote exit status once it is closed. */
  close(): Promise<number | null>;
  /** Tears the channel down without waiting for the remote side. */
  abort(): void;
}

export interface SshConnection {
  exec(command: string): Promise<ExecChannel>;
  end(): void;
}

export type SshConnector = (options: ConnectOptions) => Promise<SshConnection>;

/** TCP, handshake or authentication failure. */
export class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionError";
  }
}

/** The connection could not provide a new channel; the session must be rebuilt. */
export class ChannelOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChannelOpenError";
  }
}

/** A channel was opened but the server refused to run the command. */
export class ExecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExecError";
  }
}

export function publicKeyPath(privateKeyPath: string): string {
  const { dir, name } = parse(privateKeyPath);
  return format({ dir, name, ext: ".pub" });
}

function describeConnectError(err: Error, options: ConnectOptions): string {
  const level = "level" in err && typeof err.level === "string" ? err.level : undefined;
  if (level === "client-socket" || level === "client-timeout") {
    return `Could not connect to gerrit at ${options.host}:${options.port}: ${err.message}`;
  }
  if (level === "client-authentication") {
    return `Could not authenticate: ${err.message}`;
  }
  return `Could not connect to gerrit: ${err.message}`;
}

class Ssh2ExecChannel implements ExecChannel {
  private exitCode: number | null = null;
  private readonly closed: Promise<void>;

  constructor(private readonly stream: ClientChannel) {
    stream.on("exit", (code: unknown) => {
      if (typeof code === "number") this.exitCode = code;
    });
    this.closed = new Promise((resolve) => {
      stream.once("close", () => resolve());
    });
    // stderr is not used, but an unread stderr would stall the channel window
    stream.stderr.resume();
  }

  get output(): Readable {
    return this.stream;
  }

  async close(): Promise<number | null> {
    this.stream.close();
    await this.closed;
    return this.exitCode;
  }

  abort(): void {
    this.stream.destroy();
  }
}

class Ssh2Connection implements SshConnection {
  private connected = true;

  constructor(private readonly client: Client) {
    client.on("error", (err) => {
      this.connected = false;
      logger.warn("ssh connection error", { error: String(err) });
    });
    client.on("close", () => {
      this.connected = false;
    });
  }

  exec(command: string): Promise<ExecChannel> {
    if (!this.connected) {
      return Promise.reject(new ChannelOpenError("ssh connection is closed"));
    }
    return new Promise((resolve, reject) => {
      try {
        this.client.exec(command, (err, stream) => {
          if (err) {
            reject(/unable to exec/i.test(err.message) ? new ExecError(err.message) : new ChannelOpenError(err.message));
            return;
          }
          resolve(new Ssh2ExecChannel(stream));
        });
      } catch (err) {
        reject(new ChannelOpenError(String(err)));
      }
    });
  }

  end(): void {
    this.connected = false;
    this.client.end();
  }
}

export const connectSsh: SshConnector = async (options) => {
  let privateKey: Buffer;
  try {
    privateKey = await readFile(options.privateKeyPath);
  } catch (err) {
    throw new SessionError(`Could not read private key ${options.privateKeyPath}: ${String(err)}`);
  }

  logger.debug("connecting to gerrit", { host: options.host, port: options.port });
  const client = new Client();

  await new Promise<void>((resolve, reject) => {
    const onReady = () => {
      client.removeListener("error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      client.removeListener("ready", onReady);
      reject(new SessionError(describeConnectError(err, options)));
    };
    client.once("ready", onReady);
    client.once("error", onError);
    client.connect({
      host: options.host,
      port: options.port,
      username: options.username,
      privateKey,
    });
  });

  return new Ssh2Connection(client);
};

export interface SessionDeps {
  connector?: SshConnector;
  policy?: ReconnectPolicy;
}

/**
 * An authenticated SSH session to Gerrit that can rebuild itself from the
 * parameters it was opened with. Owned by exactly one worker loop.
 */
export class GerritSession {
  private constructor(
    private connection: SshConnection,
    readonly options: ConnectOptions,
    private readonly connector: SshConnector,
    private readonly policy: ReconnectPolicy,
  ) {}

  /** Opens the first connection. Failures are not retried. */
  static async connect(options: ConnectOptions, deps: SessionDeps = {}): Promise<GerritSession> {
    const connector = deps.connector ?? connectSsh;
    logger.debug("will use public key", { path: publicKeyPath(options.privateKeyPath) });
    const connection = await connector(options);
    return new GerritSession(connection, options, connector, deps.policy ?? new ReconnectPolicy());
  }

  exec(command: string): Promise<ExecChannel> {
    return this.connection.exec(command);
  }

  /** Replaces the connection with a fresh one; the old one is ended. */
  async reconnect(): Promise<void> {
    const next = await this.connector(this.options);
    const previous = this.connection;
    this.connection = next;
    previous.end();
  }

  /** Retries `reconnect` with backoff until it succeeds. */
  async reconnectRepeatedly(): Promise<void> {
    await this.policy.run(
      () => this.reconnect(),
      (err, attempt, delayMs) =>
        logger.error("reconnect failed", { host: this.options.host, attempt, retryInMs: delayMs, error: String(err) }),
    );
  }

  end(): void {
    this.connection.end();
  }
}
