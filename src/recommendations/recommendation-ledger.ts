/**
 * Recommendation Ledger
 *
 * Applies cost recommendation deltas and the recommendation state machine:
 * `pending -> accepted | dismissed` by command, `pending -> expired` when a
 * recommendation is not refreshed within the staleness window.
 *
 * @module recommendations/recommendation-ledger
 */

import { v4 as uuidv4 } from "uuid";
import { InvalidTransitionError, NotFoundError } from "../errors.js";
import { createLogger, type Logger } from "../logging.js";
import type { GatewayTransaction } from "../persistence/gateway.js";
import type {
  CostRecommendation,
  RecommendationDelta,
  RecommendationStatus,
} from "../types.js";

export type RecommendationAction = "accept" | "dismiss" | "expire";

const RECOMMENDATION_TRANSITIONS: Readonly<
  Record<RecommendationStatus, Readonly<Partial<Record<RecommendationAction, RecommendationStatus>>>>
> = {
  pending: { accept: "accepted", dismiss: "dismissed", expire: "expired" },
  accepted: {},
  dismissed: {},
  expired: {},
};

export type LedgerAction = "created" | "refreshed";

export interface LedgerResult {
  recommendation: CostRecommendation;
  action: LedgerAction;
}

/**
 * Keep savings within [0, currentCost].
 */
export function clampSavings(currentCost: number, potentialSavings: number): number {
  const cost = Math.max(0, currentCost);
  return Math.min(Math.max(0, potentialSavings), cost);
}

export class RecommendationLedger {
  private readonly logger: Logger;

  constructor(
    private readonly newId: () => string = () => uuidv4(),
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger("recommendations");
  }

  /**
   * Refresh the pending recommendation for the same resource and strategy,
   * or open a new one.
   */
  async apply(
    tx: GatewayTransaction,
    delta: RecommendationDelta,
    now: Date,
  ): Promise<LedgerResult> {
    const at = now.toISOString();
    const currentCost = Math.max(0, delta.currentCost);
    const potentialSavings = clampSavings(currentCost, delta.potentialSavings);
    if (potentialSavings !== delta.potentialSavings) {
      this.logger.warn(
        `Clamped savings for ${delta.resourceId} (${delta.strategy}): ` +
          `${delta.potentialSavings} -> ${potentialSavings}`,
      );
    }

    const pending = await tx.findPendingRecommendation(delta.resourceId, delta.strategy);
    if (pending) {
      const refreshed: CostRecommendation = {
        ...pending,
        ...delta,
        currentCost,
        potentialSavings,
        updatedAt: at,
      };
      await tx.putRecommendation(refreshed);
      return { recommendation: refreshed, action: "refreshed" };
    }

    const created: CostRecommendation = {
      ...delta,
      id: this.newId(),
      currentCost,
      potentialSavings,
      status: "pending",
      createdAt: at,
      updatedAt: at,
    };
    await tx.putRecommendation(created);
    this.logger.info(
      `New ${delta.strategy} recommendation for ${delta.resourceId}: saves ${potentialSavings}/month`,
    );
    return { recommendation: created, action: "created" };
  }

  /**
   * Move a recommendation along the state machine.
   */
  async transition(
    tx: GatewayTransaction,
    id: string,
    action: RecommendationAction,
    now: Date,
  ): Promise<CostRecommendation> {
    const recommendation = await tx.getRecommendation(id);
    if (!recommendation) {
      throw new NotFoundError("recommendation", id);
    }
    const status = RECOMMENDATION_TRANSITIONS[recommendation.status][action];
    if (status === undefined) {
      throw new InvalidTransitionError("recommendation", id, recommendation.status, action);
    }
    const updated: CostRecommendation = { ...recommendation, status, updatedAt: now.toISOString() };
    await tx.putRecommendation(updated);
    return updated;
  }

  /**
   * Expire a pending recommendation; anything else was settled since the
   * handler looked and is left alone.
   */
  async expire(tx: GatewayTransaction, id: string, now: Date): Promise<CostRecommendation | null> {
    const recommendation = await tx.getRecommendation(id);
    if (!recommendation || recommendation.status !== "pending") {
      return null;
    }
    return this.transition(tx, id, "expire", now);
  }
}
