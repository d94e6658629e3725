import type { EventLogger } from "../events/logger.js";
import { evaluatePublish } from "../gate/publish-evaluator.js";
import { PublishGateError } from "../gate/errors.js";
import { toBuilderInvocation, type BuilderInvocation } from "../builder/invocation.js";
import { toPublishPolicy } from "../config/loader.js";
import type { PublishConfig, PublishPolicy } from "../schemas/config.js";
import type { PublishDecision } from "../schemas/decision.js";
import type { TriggerEventInput } from "../schemas/trigger.js";

export interface PublishGateDependencies {
  /** Decision journal. Nothing is journaled when absent. */
  logger?: EventLogger;
}

export interface PublishGateResult {
  decision: PublishDecision;
  invocation: BuilderInvocation;
}

/**
 * Caller side of the publish gate: evaluates an event against the
 * configured policy, journals the outcome, and builds the invocation for
 * the site builder.
 *
 * Rejections are journaled and rethrown unchanged. A failed journal write
 * is reported with a warning and never replaces the decision or the
 * rejection.
 */
export class PublishGate {
  private readonly config: PublishConfig;
  private readonly policy: PublishPolicy;
  private readonly logger?: EventLogger;

  constructor(config: PublishConfig, deps: PublishGateDependencies = {}) {
    this.config = config;
    this.policy = toPublishPolicy(config);
    this.logger = deps.logger;
  }

  getPolicy(): PublishPolicy {
    return { ...this.policy };
  }

  async decide(event: TriggerEventInput, actor: string): Promise<PublishGateResult> {
    let decision: PublishDecision;
    try {
      decision = evaluatePublish(event, this.policy);
    } catch (err) {
      if (err instanceof PublishGateError) {
        const rejection = err;
        await this.journal((logger) => logger.logRejection(actor, event, rejection));
      }
      throw err;
    }

    await this.journal((logger) => logger.logDecision(actor, event, decision));

    return {
      decision,
      invocation: toBuilderInvocation(decision, this.config.builder),
    };
  }

  private async journal(write: (logger: EventLogger) => Promise<unknown>): Promise<void> {
    if (!this.logger) return;
    try {
      await write(this.logger);
    } catch (err) {
      // Journal failures must not change the outcome
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[pubgate] Failed to journal decision: ${message}`);
    }
  }
}
