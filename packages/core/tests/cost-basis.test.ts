/**
 * Cost Basis Unit Tests
 */

import Decimal from "decimal.js";
import { describe, expect, test } from "vitest";

import { bookFill, emptyCostBasis, type CostBasis } from "../src/cost-basis";

const holding = (qty: number, avgCost: number): CostBasis => ({ qty: new Decimal(qty), avgCost: new Decimal(avgCost) });

describe("bookFill", () => {
  test("should open a long at the fill price and debit cash", () => {
    const booked = bookFill(emptyCostBasis(), "buy", 10, 100);

    expect(booked.holding.qty.toNumber()).toBe(10);
    expect(booked.holding.avgCost.toNumber()).toBe(100);
    expect(booked.cashDelta.toNumber()).toBe(-1_000);
    expect(booked.realizedPnl.toNumber()).toBe(0);
  });

  test("should blend the average cost when adding", () => {
    const booked = bookFill(holding(10, 100), "buy", 30, 104);

    expect(booked.holding.qty.toNumber()).toBe(40);
    expect(booked.holding.avgCost.toNumber()).toBe(103);
  });

  test("should realize against the average cost when reducing a short", () => {
    const booked = bookFill(holding(-10, 100.8), "buy", 4, 100.9);

    expect(booked.holding.qty.toNumber()).toBe(-6);
    expect(booked.holding.avgCost.toNumber()).toBe(100.8);
    expect(booked.realizedPnl.toNumber()).toBe(-0.4);
    expect(booked.cashDelta.toNumber()).toBe(-403.6);
  });

  test("should reset the average cost when closing out", () => {
    const booked = bookFill(holding(10, 100), "sell", 10, 101);

    expect(booked.holding.qty.toNumber()).toBe(0);
    expect(booked.holding.avgCost.toNumber()).toBe(0);
    expect(booked.realizedPnl.toNumber()).toBe(10);
    expect(booked.cashDelta.toNumber()).toBe(1_010);
  });

  test("should re-base at the fill price when flipping", () => {
    const booked = bookFill(holding(10, 100), "sell", 15, 98);

    expect(booked.holding.qty.toNumber()).toBe(-5);
    expect(booked.holding.avgCost.toNumber()).toBe(98);
    expect(booked.realizedPnl.toNumber()).toBe(-20);
  });

  test("should leave the input holding untouched", () => {
    const before = holding(10, 100);

    bookFill(before, "sell", 4, 101);

    expect(before.qty.toNumber()).toBe(10);
  });
});
