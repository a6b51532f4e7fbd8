import { PassThrough } from "node:stream";
import type { ConnectOptions, ExecChannel, SshConnection, SshConnector } from "../session";

export const TEST_OPTIONS: ConnectOptions = {
  host: "gerrit.test",
  port: 29418,
  username: "relay-bot",
  privateKeyPath: "/keys/test_key",
};

export class FakeExecChannel implements ExecChannel {
  readonly output = new PassThrough();
  closed = false;
  aborted = false;

  constructor(
    readonly command: string,
    private readonly exitStatus: number | null = 0,
    private readonly onClose?: () => Promise<void>,
  ) {}

  /** Writes each line followed by a newline. */
  writeLines(...lines: string[]): this {
    for (const line of lines) this.output.write(line + "\n");
    return this;
  }

  finish(data = ""): this {
    this.output.end(data);
    return this;
  }

  async close(): Promise<number | null> {
    this.closed = true;
    await this.onClose?.();
    return this.exitStatus;
  }

  abort(): void {
    this.aborted = true;
    this.output.destroy();
  }
}

export type ExecHandler = (command: string) => Promise<ExecChannel>;

export class FakeConnection implements SshConnection {
  readonly commands: string[] = [];
  ended = false;

  constructor(private readonly handler: ExecHandler) {}

  exec(command: string): Promise<ExecChannel> {
    this.commands.push(command);
    return this.handler(command);
  }

  end(): void {
    this.ended = true;
  }
}

/**
 * Connector that hands out the given connections in order. An Error entry
 * makes that connect attempt fail; running out of entries fails too.
 */
export function scriptedConnector(entries: (FakeConnection | Error)[]): SshConnector & { calls: number } {
  const queue = [...entries];
  const connector = Object.assign(
    async (_options: ConnectOptions): Promise<SshConnection> => {
      connector.calls++;
      const next = queue.shift();
      if (next === undefined) throw new Error("no more scripted connections");
      if (next instanceof Error) throw next;
      return next;
    },
    { calls: 0 },
  );
  return connector;
}
