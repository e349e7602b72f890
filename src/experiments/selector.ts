import {
  ORIGINAL_VARIATION,
  NOT_PARTICIPATING,
  type ChosenVariation,
  type VariationRecord,
} from "./types";

/**
 * Weighted bucket pick over the records in their given order.
 * Probability mass not covered by the weights falls through to the original.
 *
 * @param draw - uniform value in [0, 1)
 */
export function selectVariation(
  records: readonly VariationRecord[],
  draw: number
): ChosenVariation {
  let remaining = draw;

  for (const record of records) {
    if (record.disabled) continue;

    if (remaining < record.weight) {
      return record.variationId !== null ? record.variationId : NOT_PARTICIPATING;
    }
    remaining -= record.weight;
  }

  return ORIGINAL_VARIATION;
}
