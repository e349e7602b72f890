import { decodeChosenVariation } from "../../experiments";
import type { ParsedArgs } from "../utils/args";
import { log } from "../utils/colors";

export function formatDecoded(cookieValue: string, experimentId: string): string {
  const variation = decodeChosenVariation(cookieValue, experimentId);
  return variation === null ? "none" : String(variation);
}

export function decode(args: ParsedArgs): void {
  const [, cookieValue, experimentId] = args.positional;
  if (cookieValue === undefined || !experimentId) {
    throw new Error("Usage: server-cx decode <cookieValue> <experimentId>");
  }

  log(formatDecoded(cookieValue, experimentId));
}
