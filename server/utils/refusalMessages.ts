/**
 * Centralized Refusal Messages
 *
 * One fixed explanation per refusal category. Messages never contain
 * business data, so they are safe to show for any question.
 */

import { RefusalReason } from "@shared/schema";

export const REFUSAL_MESSAGES: Record<RefusalReason, string> = {
  [RefusalReason.InputInvalid]:
    "Please enter a question about the proposal records.",
  [RefusalReason.AmbiguousReference]:
    "I'm not sure which proposal you are referring to. Please mention the quote ID or business name.",
  [RefusalReason.NotFound]:
    "Data not available in proposal records.",
  [RefusalReason.BelowConfidenceThreshold]:
    "I couldn't find information in the proposal records that answers this question.",
  [RefusalReason.UpstreamTimeout]:
    "The answer took too long to prepare. Please try again.",
  [RefusalReason.UpstreamUnavailable]:
    "The answering service is temporarily unavailable. Please try again later.",
  [RefusalReason.InconsistentEvidence]:
    "The proposal index is out of sync with the records, so I can't give a reliable answer.",
  [RefusalReason.InternalError]:
    "Sorry, something went wrong while answering that question.",
};

export function getRefusalMessage(reason: RefusalReason): string {
  return REFUSAL_MESSAGES[reason];
}
