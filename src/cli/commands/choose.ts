import { ContentExperiments } from "../../client";
import { cookieHeader, ORIGINAL_VARIATION, NOT_PARTICIPATING } from "../../experiments";
import { getNumberOption, getOption, type ParsedArgs } from "../utils/args";
import { colors, field, success, info, title } from "../utils/colors";

export function describeVariation(variation: number): string {
  switch (variation) {
    case ORIGINAL_VARIATION:
      return "original";
    case NOT_PARTICIPATING:
      return "not participating";
    default:
      return `variation ${variation}`;
  }
}

export async function choose(args: ParsedArgs): Promise<void> {
  const experimentId = args.positional[1];
  if (!experimentId) {
    throw new Error("Usage: server-cx choose <experimentId> --domain <name>");
  }

  const client = new ContentExperiments({
    domainName: getOption(args, "domain"),
    endpoint: getOption(args, "endpoint"),
    cacheDir: getOption(args, "cache-dir"),
    timeout: getNumberOption(args, "timeout"),
    debug: args.flags.debug ?? false,
  });

  const decision = await client.chooseVariation(experimentId, {
    __utmx: getOption(args, "utmx"),
    __utmxx: getOption(args, "utmxx"),
  });

  title(`Experiment ${experimentId}`);
  field("Variation", `${decision.variation} (${describeVariation(decision.variation)})`);

  if (!decision.isNewAssignment) {
    info("Prior assignment kept, no cookies to set");
    return;
  }

  success("New assignment");
  for (const cookie of decision.cookies) {
    field("Set-Cookie", colors.dim(cookieHeader(cookie)));
  }
}
