/**
 * Topic negotiation: extraction followed by feedback rounds until the
 * topics are confirmed.
 */

export {
  NegotiationStatus,
  ConfirmationSource,
  NegotiationStateSchema,
  type NegotiationState,
} from "./schema.js";

export {
  TopicNegotiation,
  canTransition,
  type NegotiationStep,
  type TopicNegotiationOptions,
} from "./machine.js";
