import type { ChatEvent, SendTarget } from "../types.js";
import { errorMessage } from "../utils/async.js";

const MAX_PREVIEW = 160;

function where(nick: string, channel: string): string {
  return channel ? `${channel} <${nick}>` : `<${nick}> (pm)`;
}

function preview(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > MAX_PREVIEW ? `${flat.slice(0, MAX_PREVIEW)}…` : flat;
}

export function printInbound(evt: ChatEvent): void {
  console.log(`RX ${where(evt.nick, evt.channel)} : ${preview(evt.text)}`);
}

export function printOutbound(target: SendTarget, text: string): void {
  const to = target.kind === "channel" ? target.channel : `${target.nick} (pm)`;
  console.log(`TX ${to} : ${preview(text)}`);
}

export function printError(context: string, err: unknown): void {
  console.log(`ERR ${context} : ${errorMessage(err)}`);
}
