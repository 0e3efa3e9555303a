export type ChatEvent = {
  nick: string;
  /** Empty for a private message. */
  channel: string;
  text: string;
  timestampMs: number;
  raw: unknown;
};

export type SendTarget =
  | { kind: "private"; nick: string }
  | { kind: "channel"; channel: string; nick: string };

export type SendMessage = {
  target: SendTarget;
  text: string;
};

export function targetFor(nick: string, channel: string): SendTarget {
  if (!channel) return { kind: "private", nick };
  return { kind: "channel", channel, nick };
}
