import { describe, expect, it } from "vitest";
import { makeRecommendation } from "../../__tests__/fixtures.js";
import { InvalidTransitionError, NotFoundError } from "../../errors.js";
import { silentLogger } from "../../logging.js";
import { MemoryGateway } from "../../persistence/memory-gateway.js";
import type { RecommendationDelta } from "../../types.js";
import { RecommendationLedger, clampSavings } from "../recommendation-ledger.js";

const T0 = new Date("2026-03-02T10:00:00.000Z");
const T1 = new Date("2026-03-02T11:00:00.000Z");

function delta(overrides: Partial<RecommendationDelta> = {}): RecommendationDelta {
  return {
    resourceType: "vm",
    resourceId: "vm-1",
    strategy: "rightsize",
    recommendation: "Downsize vm-1",
    currentCost: 100,
    potentialSavings: 40,
    confidence: "medium",
    effort: "medium",
    sampleCount: 30,
    ...overrides,
  };
}

function setup() {
  const gateway = new MemoryGateway();
  let next = 0;
  const ledger = new RecommendationLedger(() => `rec-${++next}`, silentLogger);
  return { gateway, ledger };
}

describe("clampSavings", () => {
  it("keeps savings within [0, currentCost]", () => {
    expect(clampSavings(100, 150)).toBe(100);
    expect(clampSavings(100, -5)).toBe(0);
    expect(clampSavings(-10, 5)).toBe(0);
    expect(clampSavings(100, 40)).toBe(40);
  });
});

describe("RecommendationLedger", () => {
  it("creates a pending recommendation", async () => {
    const { gateway, ledger } = setup();
    const result = await gateway.transaction((tx) => ledger.apply(tx, delta(), T0));

    expect(result.action).toBe("created");
    expect(result.recommendation).toEqual({
      ...delta(),
      id: "rec-1",
      status: "pending",
      createdAt: T0.toISOString(),
      updatedAt: T0.toISOString(),
    });
  });

  it("refreshes the pending row for the same resource and strategy", async () => {
    const { gateway, ledger } = setup();
    await gateway.transaction((tx) => ledger.apply(tx, delta(), T0));
    const result = await gateway.transaction((tx) =>
      ledger.apply(tx, delta({ potentialSavings: 45, sampleCount: 31 }), T1),
    );

    expect(result.action).toBe("refreshed");
    expect(result.recommendation.id).toBe("rec-1");
    expect(result.recommendation.potentialSavings).toBe(45);
    expect(result.recommendation.createdAt).toBe(T0.toISOString());
    expect(result.recommendation.updatedAt).toBe(T1.toISOString());
    expect(await gateway.listRecommendations()).toHaveLength(1);
  });

  it("opens a new row once the previous one was settled", async () => {
    const { gateway, ledger } = setup();
    await gateway.transaction((tx) => ledger.apply(tx, delta(), T0));
    await gateway.transaction((tx) => ledger.transition(tx, "rec-1", "dismiss", T0));

    const result = await gateway.transaction((tx) => ledger.apply(tx, delta(), T1));

    expect(result.action).toBe("created");
    expect(result.recommendation.id).toBe("rec-2");
  });

  it("clamps savings above the current cost", async () => {
    const { gateway, ledger } = setup();
    const result = await gateway.transaction((tx) =>
      ledger.apply(tx, delta({ potentialSavings: 250 }), T0),
    );
    expect(result.recommendation.potentialSavings).toBe(100);
  });

  it("accepts and dismisses pending recommendations only", async () => {
    const { gateway, ledger } = setup();
    await gateway.transaction(async (tx) => {
      await tx.putRecommendation(makeRecommendation({ id: "a" }));
      await tx.putRecommendation(makeRecommendation({ id: "b", resourceId: "vm-2" }));
    });

    const accepted = await gateway.transaction((tx) => ledger.transition(tx, "a", "accept", T1));
    expect(accepted.status).toBe("accepted");
    expect(accepted.updatedAt).toBe(T1.toISOString());

    await expect(
      gateway.transaction((tx) => ledger.transition(tx, "a", "dismiss", T1)),
    ).rejects.toThrow(InvalidTransitionError);
    await expect(
      gateway.transaction((tx) => ledger.transition(tx, "missing", "accept", T1)),
    ).rejects.toThrow(NotFoundError);

    const dismissed = await gateway.transaction((tx) => ledger.transition(tx, "b", "dismiss", T1));
    expect(dismissed.status).toBe("dismissed");
  });

  it("expires pending recommendations and leaves settled ones alone", async () => {
    const { gateway, ledger } = setup();
    await gateway.transaction(async (tx) => {
      await tx.putRecommendation(makeRecommendation({ id: "a" }));
      await tx.putRecommendation(makeRecommendation({ id: "b", status: "accepted" }));
    });

    const expired = await gateway.transaction((tx) => ledger.expire(tx, "a", T1));
    const untouched = await gateway.transaction((tx) => ledger.expire(tx, "b", T1));

    expect(expired?.status).toBe("expired");
    expect(untouched).toBeNull();
    expect((await gateway.getRecommendation("b"))?.status).toBe("accepted");
  });
});
