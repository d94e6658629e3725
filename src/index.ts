export * from "./schemas/index.js";

export { evaluatePublish, validateTriggerEvent } from "./gate/publish-evaluator.js";
export {
  PublishGateError,
  InvalidEventKindError,
  InvalidBranchIdentifierError,
} from "./gate/errors.js";
export type { PublishGateErrorCode } from "./gate/errors.js";

export {
  resolveTriggerEvent,
  resolveTriggerEventFromPayload,
  branchFromRef,
  kindFromEventName,
  EventPayloadError,
} from "./github/event-resolver.js";
export type { GitHubActionsEnv } from "./github/event-resolver.js";
export { formatStepOutputs, serializeStepOutputs, writeStepOutputs } from "./github/outputs.js";
export type { StepOutputs } from "./github/outputs.js";

export { toBuilderEnv, toBuilderInvocation, formatBuilderEnv } from "./builder/invocation.js";
export type { BuilderEnv, BuilderInvocation } from "./builder/invocation.js";

export { buildWorkflow, renderWorkflow, writeWorkflow } from "./workflow/renderer.js";
export type { WorkflowDocument, WorkflowJob, WorkflowStep } from "./workflow/renderer.js";

export * from "./config/index.js";

export { EventLogger } from "./events/logger.js";
export type { EventCallback, EventLoggerOptions, EventQuery } from "./events/logger.js";

export { PublishGate } from "./service/publish-gate.js";
export type { PublishGateDependencies, PublishGateResult } from "./service/publish-gate.js";
