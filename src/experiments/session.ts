import {
  decodeChosenVariation,
  updateAssignmentCookie,
  updateTimestampCookie,
} from "./cookie-codec";
import { selectVariation } from "./selector";
import type {
  ChooseVariationInput,
  ChooseVariationResult,
  ExperimentDataProvider,
} from "./types";

/**
 * Decides a visitor's variation from their prior cookies.
 *
 * A stored variation is returned as is and the cookies are left untouched.
 * A stored 0 (the original) counts as no assignment, as it does in the
 * tracking client, so those visitors get a fresh draw on every decision.
 */
export class ExperimentSession {
  constructor(private readonly provider: ExperimentDataProvider) {}

  async chooseVariation(input: ChooseVariationInput): Promise<ChooseVariationResult> {
    const assignmentCookie = input.assignmentCookie ?? "";
    const timestampCookie = input.timestampCookie ?? "";

    const prior = decodeChosenVariation(assignmentCookie, input.experimentId);
    if (prior) {
      return {
        variation: prior,
        isNewAssignment: false,
        assignmentCookie,
        timestampCookie,
      };
    }

    const records = await this.provider.fetch(input.experimentId);
    const variation = selectVariation(records, input.draw);
    const domainName = input.domainName();

    return {
      variation,
      isNewAssignment: true,
      assignmentCookie: updateAssignmentCookie(
        assignmentCookie,
        input.experimentId,
        variation,
        domainName
      ),
      timestampCookie: updateTimestampCookie(
        timestampCookie,
        input.experimentId,
        input.now,
        domainName
      ),
    };
  }
}
