import { choose } from "./commands/choose";
import { decode } from "./commands/decode";
import { hash } from "./commands/hash";
import type { ParsedArgs } from "./utils/args";

export const VERSION = "1.0.0";

/**
 * Dispatches one CLI invocation; resolves to the process exit code
 */
export async function run(args: ParsedArgs): Promise<number> {
  const command = args.positional[0];

  if (args.flags.version || args.flags.v) {
    console.log(`server-cx v${VERSION}`);
    return 0;
  }

  if (args.flags.help || args.flags.h) {
    printHelp();
    return 0;
  }

  switch (command) {
    case "choose":
      await choose(args);
      return 0;
    case "decode":
      decode(args);
      return 0;
    case "hash":
      hash(args);
      return 0;
    case undefined:
      printHelp();
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp(console.error);
      return 1;
  }
}

export function printHelp(write: (message: string) => void = console.log) {
  write(`
  server-cx - Server-side content experiment variation chooser

  Usage: server-cx <command>

  Commands:
    choose <experimentId>            Choose a variation and print the cookies to set
      --domain <name>                  Cookie domain name (required)
      --utmx <value>                   Current assignment cookie value
      --utmxx <value>                  Current timestamp cookie value
      --cache-dir <dir>                Cache experiment data responses
      --timeout <ms>                   Request timeout
      --endpoint <url>                 Experiments script URL
      --debug                          Debug logging
    decode <cookieValue> <experimentId>  Print the stored variation, or "none"
    hash <domainName>                Print the domain hash

  Options:
    -v, --version    Show version number
    -h, --help       Show help

  Examples:
    $ server-cx choose ft-5xaLPSturFXCPgoFrKg --domain example.com
    $ server-cx decode "60493049.myExp\$0:1" myExp
`);
}
