/**
 * Paired Order Executor - Two-leg execution of an approved trade intent
 *
 * - Build both immediate-or-cancel orders, then commit them
 * - parallel: both submitted at once and joined; sequential: A first, B cut by A's shortfall
 * - Outcome is filled, missed or partial; a partial is a result, never a throw
 * - Legs may differ in size (a CLOSE of size-mismatched holdings); a pair is
 *   filled when both legs fall short of their request by the same volume
 * - Optional compensating order reverses the excess on the over-filled leg
 */

import { v4 as uuidv4 } from "uuid";

import type { ExecutionOutcome, LegFill, LegOrder, TradeIntent, Volume } from "@pairs-arb/core";
import type { ExecutionPort, MarketDataPort, SubmitOrderRequest } from "@pairs-arb/adapters";
import { isTransportError } from "@pairs-arb/adapters";
import { createLogger } from "@pairs-arb/utils";

import type { LegSubmissionMode } from "../config";

const log = createLogger("executor");

export interface PairedOrderExecutorDeps {
  executionPort: ExecutionPort;
  /** Live touch for compensating orders */
  marketData: MarketDataPort;
  submission: LegSubmissionMode;
  compensatePartialFills: boolean;
  generateOrderId?: () => string;
}

/**
 * A leg plus how its submission went
 */
interface SubmittedLeg {
  fill: LegFill;
  attempted: boolean;
  transportFailure: boolean;
}

const signedVolume = (fill: LegFill): Volume => (fill.side === "buy" ? fill.filledVolume : -fill.filledVolume);

/**
 * Paired Order Executor
 */
export class PairedOrderExecutor {
  private readonly deps: PairedOrderExecutorDeps;
  private readonly generateOrderId: () => string;

  constructor(deps: PairedOrderExecutorDeps) {
    this.deps = deps;
    this.generateOrderId = deps.generateOrderId ?? (() => uuidv4());
  }

  async execute(intent: TradeIntent): Promise<ExecutionOutcome> {
    const [legA, legB] = intent.legs;

    // ─────────────────────────────────────────────────────────────────────────
    // Commit
    // ─────────────────────────────────────────────────────────────────────────
    let submittedA: SubmittedLeg;
    let submittedB: SubmittedLeg;

    if (this.deps.submission === "parallel") {
      [submittedA, submittedB] = await Promise.all([this.submitLeg(legA, legA.volume), this.submitLeg(legB, legB.volume)]);
    } else {
      submittedA = await this.submitLeg(legA, legA.volume);
      const volumeB = legB.volume - (legA.volume - submittedA.fill.filledVolume);
      submittedB =
        submittedA.fill.filledVolume > 0 && volumeB > 0 ? await this.submitLeg(legB, volumeB) : skipped(legB);
    }

    const legs: [LegFill, LegFill] = [submittedA.fill, submittedB.fill];
    const filledA = submittedA.fill.filledVolume;
    const filledB = submittedB.fill.filledVolume;
    const shortfallA = legA.volume - filledA;
    const shortfallB = legB.volume - filledB;

    // ─────────────────────────────────────────────────────────────────────────
    // Classify
    // ─────────────────────────────────────────────────────────────────────────
    if (filledA === 0 && filledB === 0) {
      const attempted = [submittedA, submittedB].filter(s => s.attempted);
      const transportFailure = attempted.length > 0 && attempted.every(s => s.transportFailure);

      log.info("Missed opportunity: neither leg filled", {
        signalType: intent.signalType,
        volume: intent.volume,
        transportFailure,
      });
      return { type: "missed", intent, legs, transportFailure };
    }

    if (shortfallA === shortfallB) {
      const volume = Math.min(filledA, filledB);
      log.info("Pair filled", {
        signalType: intent.signalType,
        volume,
        priceA: submittedA.fill.avgPrice,
        priceB: submittedB.fill.avgPrice,
      });
      return { type: "filled", intent, legs, volume };
    }

    log.error("CRITICAL partial fill: leg volumes differ", {
      signalType: intent.signalType,
      filledA,
      filledB,
      errorA: submittedA.fill.error?.message,
      errorB: submittedB.fill.error?.message,
    });

    const compensation =
      this.deps.compensatePartialFills ?
        await this.compensate(submittedA.fill, shortfallA, submittedB.fill, shortfallB)
      : undefined;
    const residualDelta =
      signedVolume(submittedA.fill) + signedVolume(submittedB.fill) + (compensation ? signedVolume(compensation) : 0);

    if (compensation) {
      log.warn("Compensating order result", {
        instrument: compensation.instrument,
        side: compensation.side,
        requested: compensation.requestedVolume,
        filled: compensation.filledVolume,
        residualDelta,
      });
    }

    return { type: "partial", intent, legs, compensation, residualDelta };
  }

  /**
   * Reverse the excess on the over-filled leg at the live touch
   *
   * The over-filled leg is the one with the smaller shortfall. The reversal
   * never exceeds what that leg actually filled.
   */
  private async compensate(
    fillA: LegFill,
    shortfallA: Volume,
    fillB: LegFill,
    shortfallB: Volume,
  ): Promise<LegFill | undefined> {
    const over = shortfallA < shortfallB ? fillA : fillB;
    const excess = Math.min(Math.abs(shortfallA - shortfallB), over.filledVolume);
    if (excess <= 0) return undefined;
    const side = over.side === "buy" ? "sell" : "buy";

    const base: LegFill = {
      leg: over.leg,
      instrument: over.instrument,
      side,
      requestedVolume: excess,
      filledVolume: 0,
    };

    const quote = this.deps.marketData.getQuote(over.instrument);
    if (quote.isErr()) {
      return { ...base, error: { type: quote.error.type, message: quote.error.message } };
    }

    const level = side === "buy" ? quote.value.bestAsk : quote.value.bestBid;
    if (!level) {
      return { ...base, error: { type: "no_market_data", message: `No ${side === "buy" ? "ask" : "bid"} to compensate against` } };
    }

    const submitted = await this.submitLeg(
      { leg: over.leg, instrument: over.instrument, side, limitPrice: level.price, volume: excess },
      excess,
    );
    return submitted.fill;
  }

  private async submitLeg(leg: LegOrder, volume: Volume): Promise<SubmittedLeg> {
    const request: SubmitOrderRequest = {
      clientOrderId: this.generateOrderId(),
      instrument: leg.instrument,
      side: leg.side,
      price: leg.limitPrice,
      volume,
      orderType: "immediate",
    };

    const result = await this.deps.executionPort.submitOrder(request);

    if (result.isErr()) {
      log.warn("Leg submission failed", {
        instrument: leg.instrument,
        side: leg.side,
        error: result.error.message,
      });
      return {
        fill: {
          leg: leg.leg,
          instrument: leg.instrument,
          side: leg.side,
          requestedVolume: volume,
          filledVolume: 0,
          error: { type: result.error.type, message: result.error.message },
        },
        attempted: true,
        transportFailure: isTransportError(result.error),
      };
    }

    return {
      fill: {
        leg: leg.leg,
        instrument: leg.instrument,
        side: leg.side,
        requestedVolume: volume,
        filledVolume: result.value.filledVolume,
        avgPrice: result.value.avgPrice,
      },
      attempted: true,
      transportFailure: false,
    };
  }
}

/**
 * Leg B not submitted: A filled nothing, or A's shortfall covers all of B
 */
function skipped(leg: LegOrder): SubmittedLeg {
  return {
    fill: {
      leg: leg.leg,
      instrument: leg.instrument,
      side: leg.side,
      requestedVolume: leg.volume,
      filledVolume: 0,
    },
    attempted: false,
    transportFailure: false,
  };
}
