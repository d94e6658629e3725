/**
 * Schema barrel export — all Zod schemas for pubgate.
 */

export {
  EventKind,
  TriggerEvent,
} from "./trigger.js";

export {
  PublishMode,
  BuildOnlyDecision,
  BuildAndDeployDecision,
  PublishDecision,
} from "./decision.js";

export {
  DEFAULT_PUBLISH_BRANCH,
  DEFAULT_PAGES_BRANCH,
  BranchName,
  PublishPolicy,
  BuilderSettings,
  PublishConfig,
} from "./config.js";

export {
  EventType,
  BaseEvent,
} from "./event.js";

export type { TriggerEventInput } from "./trigger.js";
