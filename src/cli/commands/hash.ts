import { generateHash } from "../../experiments";
import type { ParsedArgs } from "../utils/args";
import { log } from "../utils/colors";

export function hash(args: ParsedArgs): void {
  const domainName = args.positional[1];
  if (domainName === undefined) {
    throw new Error("Usage: server-cx hash <domainName>");
  }

  log(String(generateHash(domainName.toLowerCase())));
}
