export interface IncomingMessage {
  userId: string;
  platform: string;
  text: string;
  reply: (text: string) => Promise<void>;
}

export interface ChatAdapter {
  /** Prefix of the user ids this adapter serves, e.g. "slack" for "slack:U123". */
  readonly platform: string;
  start(onMessage: (msg: IncomingMessage) => void): Promise<void>;
  stop(): Promise<void>;
  sendToUser(userId: string, text: string): Promise<void>;
}
