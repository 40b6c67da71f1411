/**
 * Startup Reconciliation - Adopt the venue's holdings before trading
 *
 * - Connect with bounded retries
 * - Read positions, cash/P&L and both quotes
 * - Classify holdings through the ledger
 * - UNBALANCED: ask the policy callback; continue means OPEN signals stay frozen
 */

import { err, ok, type Result } from "neverthrow";

import type { HoldingsClass, Ms, PairInstruments, Volume } from "@pairs-arb/core";
import type { ExecutionPort, MarketDataPort } from "@pairs-arb/adapters";
import { createLogger } from "@pairs-arb/utils";

import type { UnbalancedPolicy } from "../config";
import type { PositionLedger } from "../services/position-ledger";

const log = createLogger("startup");

export interface UnbalancedHoldings {
  qtyA: Volume;
  qtyB: Volume;
  delta: Volume;
}

/**
 * Decides whether to run with unbalanced holdings
 */
export type UnbalancedDecision = (holdings: UnbalancedHoldings) => UnbalancedPolicy | Promise<UnbalancedPolicy>;

export interface StartupDeps {
  marketData: MarketDataPort;
  executionPort: ExecutionPort;
  ledger: PositionLedger;
  instruments: PairInstruments;
  connect: { attempts: number; retryDelayMs: number };
  /** Defaults to abort */
  decideUnbalanced?: UnbalancedDecision;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Ms;
}

export interface StartupReport {
  classification: HoldingsClass;
  qtyA: Volume;
  qtyB: Volume;
  cash: number;
  realizedPnl: number;
  openFrozen: boolean;
  connectAttempts: number;
}

export type StartupError =
  | { type: "connection_failed"; message: string; attempts: number }
  | { type: "venue_error"; message: string }
  | { type: "no_market_data"; message: string }
  | { type: "unbalanced_abort"; message: string; qtyA: Volume; qtyB: Volume };

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

async function connectWithRetry(deps: StartupDeps): Promise<Result<number, StartupError>> {
  const sleep = deps.sleep ?? defaultSleep;
  const { attempts, retryDelayMs } = deps.connect;
  let lastMessage = "no attempt made";

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const result = await deps.marketData.connect();
    if (result.isOk()) {
      log.info("Connected to venue", { attempt });
      return ok(attempt);
    }

    lastMessage = result.error.message;
    log.warn("Venue connection failed", { attempt, attempts, error: lastMessage });

    if (attempt < attempts) {
      await sleep(retryDelayMs);
    }
  }

  return err({
    type: "connection_failed",
    message: `Could not connect after ${String(attempts)} attempts: ${lastMessage}`,
    attempts,
  });
}

/**
 * Connect and reconcile the ledger with the venue
 */
export async function reconcileAtStartup(deps: StartupDeps): Promise<Result<StartupReport, StartupError>> {
  const { marketData, executionPort, ledger, instruments } = deps;

  const connected = await connectWithRetry(deps);
  if (connected.isErr()) return err(connected.error);

  const positions = await executionPort.getPositions();
  if (positions.isErr()) {
    return err({ type: "venue_error", message: `Failed to read positions: ${positions.error.message}` });
  }

  const account = await executionPort.getCashAndPnl();
  if (account.isErr()) {
    return err({ type: "venue_error", message: `Failed to read cash: ${account.error.message}` });
  }

  const quoteA = marketData.getQuote(instruments.a);
  const quoteB = marketData.getQuote(instruments.b);
  if (quoteA.isErr()) return err({ type: "venue_error", message: quoteA.error.message });
  if (quoteB.isErr()) return err({ type: "venue_error", message: quoteB.error.message });

  const qtyA = positions.value[instruments.a] ?? 0;
  const qtyB = positions.value[instruments.b] ?? 0;

  const reconciled = ledger.reconcile({
    qtyA,
    qtyB,
    cash: account.value.cash,
    realizedPnl: account.value.realizedPnl,
    quoteA: quoteA.value,
    quoteB: quoteB.value,
    nowMs: (deps.now ?? Date.now)(),
  });
  if (reconciled.isErr()) {
    return err({ type: "no_market_data", message: reconciled.error.message });
  }

  const classification = reconciled.value;

  if (classification === "UNBALANCED") {
    const delta = ledger.getDelta();
    const decide: UnbalancedDecision = deps.decideUnbalanced ?? (() => "abort");
    const decision = await decide({ qtyA, qtyB, delta });

    if (decision === "abort") {
      log.error("Unbalanced holdings at startup; refusing to trade", { qtyA, qtyB, delta });
      return err({
        type: "unbalanced_abort",
        message: `Unbalanced holdings at startup (A=${String(qtyA)}, B=${String(qtyB)}, delta=${String(delta)})`,
        qtyA,
        qtyB,
      });
    }

    ledger.freezeOpens("unbalanced_start");
    log.warn("Unbalanced holdings at startup; OPEN signals frozen", { qtyA, qtyB, delta });
  }

  return ok({
    classification,
    qtyA,
    qtyB,
    cash: account.value.cash,
    realizedPnl: account.value.realizedPnl,
    openFrozen: ledger.getState().openFrozen,
    connectAttempts: connected.value,
  });
}
