import { describe, it, expect } from "vitest";
import { OperationAggregator } from "../src/aggregator";
import { BondRole, Denomination, PriceSource } from "../src/enums";
import { ExchangeError } from "../src/errors";
import { OperationContext, RawBondRecord } from "../src/types";

const context: OperationContext = { operationId: "OMD_150625", settlementDate: "2025-06-15" };
const INDEX_SPOT = 300;
const INFLATION = 0.05;

function record(overrides: Partial<RawBondRecord>): RawBondRecord {
  return {
    identifier: "CO1234567890",
    maturity: "2026-06-15",
    denomination: Denomination.LOCAL_CURRENCY,
    couponPct: 0,
    yieldPct: 0,
    price: 100,
    faceValue: 0,
    role: BondRole.DELIVERED,
    ...overrides,
  };
}

// One year to maturity, coupon = yield: prices at par.
const parCollected = record({
  identifier: "CO000000PAR1",
  role: BondRole.COLLECTED,
  couponPct: 10,
  yieldPct: 10,
  faceValue: 1000,
});

// Zero yield, coupon anniversary (15 Dec) still ahead of the June settlement.
const deliveredWithCoupon = record({
  identifier: "CO000000DLV2",
  maturity: "2027-12-15",
  couponPct: 5,
  faceValue: 1000,
});

// Index-linked, entered with a negative face value already.
const indexCollected = record({
  identifier: "CO000000UVR3",
  role: BondRole.COLLECTED,
  denomination: Denomination.INDEX_LINKED,
  faceValue: -10,
});

const missingMaturity = record({ identifier: "CO000000BAD4", maturity: null, faceValue: 500 });
const impossibleMaturity = record({ identifier: "CO000000BAD5", maturity: "2025-02-30", faceValue: 500 });

const valid = [parCollected, deliveredWithCoupon, indexCollected];

describe("OperationAggregator.valueRecord", () => {
  it("signs collected face values negative whatever was entered", () => {
    const bond = OperationAggregator.valueRecord(parCollected, 0, INDEX_SPOT, INFLATION, context);

    expect(bond.faceValue).toBe(-1000);
    expect(bond.localFaceValue).toBe(-1000);
    expect(bond.dirtyPrice).toBeCloseTo(100, 10);
    expect(bond.costValue).toBeCloseTo(-1000, 8);
    expect(bond.couponEffect).toBe(0);
    expect(bond.indexation).toBe(0);
    expect(bond.indexSpot).toBeNull();
    expect(bond.indexForward).toBeNull();
  });

  it("converts rates from percent to fractions", () => {
    const bond = OperationAggregator.valueRecord(parCollected, 0, INDEX_SPOT, INFLATION, context);

    expect(bond.couponRate).toBe(0.1);
    expect(bond.yieldRate).toBe(0.1);
    expect(bond.couponPct).toBe(10);
  });

  it("charges the coupon effect on delivered bonds with a coupon still due", () => {
    const bond = OperationAggregator.valueRecord(deliveredWithCoupon, 1, INDEX_SPOT, INFLATION, context);

    expect(bond.dirtyPrice).toBeCloseTo(115, 10);
    expect(bond.costValue).toBeCloseTo(1150, 8);
    expect(bond.couponEffect).toBeCloseTo(50, 10);
  });

  it("converts index units to local currency and indexes them", () => {
    const bond = OperationAggregator.valueRecord(indexCollected, 2, INDEX_SPOT, INFLATION, context);
    const forward = 300 * Math.pow(1.05, 199 / 365);

    expect(bond.localFaceValue).toBe(-3000);
    expect(bond.indexSpot).toBe(300);
    expect(bond.indexForward).toBeCloseTo(forward, 10);
    expect(bond.indexation).toBeCloseTo(-10 * forward + 3000, 8);
    expect(bond.costValue).toBeCloseTo(-3000, 8);
  });

  it("uses the quoted price as dirty price in QUOTED mode", () => {
    const quoted = record({ maturity: "2027-12-15", couponPct: 5, price: 90.471, faceValue: 1000 });

    const bond = OperationAggregator.valueRecord(quoted, 0, INDEX_SPOT, INFLATION, {
      ...context,
      priceSource: PriceSource.QUOTED,
    });

    expect(bond.dirtyPrice).toBe(90.471);
    expect(bond.accruedInterest).toBeCloseTo(910 / 365, 12);
    expect(bond.cleanPrice).toBe(90.471 - bond.accruedInterest);
    expect(bond.costValue).toBeCloseTo(904.71, 8);
  });

  it("values a matured bond at zero without failing", () => {
    const matured = record({ maturity: "2025-01-01", role: BondRole.COLLECTED, faceValue: 700 });

    const bond = OperationAggregator.valueRecord(matured, 0, INDEX_SPOT, INFLATION, context);

    expect(bond.dirtyPrice).toBe(0);
    expect(bond.costValue).toBeCloseTo(0, 10);
    expect(bond.localFaceValue).toBe(-700);
  });

  it("values a matured bond at zero even when a quoted price is used", () => {
    const matured = record({ maturity: "2025-01-01", role: BondRole.COLLECTED, price: 90, faceValue: 700 });

    const bond = OperationAggregator.valueRecord(matured, 0, INDEX_SPOT, INFLATION, {
      ...context,
      priceSource: PriceSource.QUOTED,
    });

    expect(bond.dirtyPrice).toBe(0);
    expect(bond.cleanPrice).toBe(0);
    expect(bond.costValue).toBeCloseTo(0, 10);
  });

  it("rejects maturities that are not plain calendar dates", () => {
    for (const maturity of ["2026", "2026-W24", "2026-06-15T00:00:00-05:00"]) {
      expect(() => OperationAggregator.valueRecord(record({ maturity }), 4, INDEX_SPOT, INFLATION, context))
        .toThrow("Invalid bond record: maturity: Invalid ISO date");
    }
  });

  it("returns frozen results", () => {
    const bond = OperationAggregator.valueRecord(parCollected, 0, INDEX_SPOT, INFLATION, context);

    expect(Object.isFrozen(bond)).toBe(true);
  });
});

describe("OperationAggregator.run", () => {
  it("sums the operation totals", () => {
    const { totals, bonds, skipped } = OperationAggregator.run(valid, INDEX_SPOT, INFLATION, context);
    const forward = 300 * Math.pow(1.05, 199 / 365);
    const indexation = -10 * forward + 3000;

    expect(bonds).toHaveLength(3);
    expect(skipped).toEqual([]);
    expect(totals.operationId).toBe("OMD_150625");
    expect(totals.settlementDate).toBe("2025-06-15");
    expect(totals.amountExchanged).toBe(4000);
    expect(totals.debtBalance).toBe(-3000);
    expect(totals.grossOutlay).toBeCloseTo(2850, 6);
    expect(totals.totalCouponEffect).toBeCloseTo(50, 10);
    expect(totals.netFiscalCost).toBeCloseTo(2900, 6);
    expect(totals.totalIndexation).toBeCloseTo(indexation, 8);
    expect(totals.netFiscalCostWithIndexation).toBeCloseTo(2900 + indexation, 6);
    expect(totals.overallResult).toBeCloseTo(-3000 + 2900 + indexation, 6);
  });

  it("keeps collected face values non-positive and delivered non-negative", () => {
    const flipped = [
      { ...parCollected, faceValue: -1000 },
      { ...deliveredWithCoupon, faceValue: -1000 },
      { ...indexCollected, faceValue: 10 },
    ];

    const { bonds } = OperationAggregator.run(flipped, INDEX_SPOT, INFLATION, context);
    const sum = (role: BondRole) =>
      bonds.filter((b) => b.role === role).reduce((acc, b) => acc + b.faceValue, 0);

    expect(sum(BondRole.COLLECTED)).toBe(-1010);
    expect(sum(BondRole.DELIVERED)).toBe(1000);
  });

  it("excludes malformed rows from totals and reports them", () => {
    const clean = OperationAggregator.run(valid, INDEX_SPOT, INFLATION, context);
    const mixed = OperationAggregator.run(
      [parCollected, missingMaturity, deliveredWithCoupon, impossibleMaturity, indexCollected],
      INDEX_SPOT,
      INFLATION,
      context
    );

    expect(mixed.totals).toEqual(clean.totals);
    expect(mixed.bonds.map((b) => b.identifier)).toEqual(["CO000000PAR1", "CO000000DLV2", "CO000000UVR3"]);
    expect(mixed.skipped).toEqual([
      { index: 1, identifier: "CO000000BAD4", code: "ROW_COMPUTATION", message: "Missing maturity date" },
      {
        index: 3,
        identifier: "CO000000BAD5",
        code: "INVALID_RECORD",
        message: "Invalid bond record: maturity: Invalid ISO date",
      },
    ]);
  });

  it("skips rows whose valuation is not finite", () => {
    const degenerate = record({ identifier: "CO000000NAN6", maturity: "2027-12-15", couponPct: 5, yieldPct: -100 });

    const { skipped, bonds } = OperationAggregator.run([degenerate, parCollected], INDEX_SPOT, INFLATION, context);

    expect(bonds).toHaveLength(1);
    expect(skipped).toHaveLength(1);
    expect(skipped[0].identifier).toBe("CO000000NAN6");
    expect(skipped[0].message).toMatch(/^Non-finite result for /);
  });

  it("produces zero totals for an empty portfolio", () => {
    const { totals } = OperationAggregator.run([], INDEX_SPOT, INFLATION, context);

    expect(totals.grossOutlay).toBe(0);
    expect(totals.overallResult).toBe(0);
  });

  it("rejects an invalid settlement date or non-finite market inputs", () => {
    expect(() => OperationAggregator.run(valid, INDEX_SPOT, INFLATION, { ...context, settlementDate: "2025-13-01" }))
      .toThrow(ExchangeError);
    expect(() => OperationAggregator.run(valid, Number.NaN, INFLATION, context)).toThrow(ExchangeError);
  });
});

describe("OperationAggregator partial totals", () => {
  it("combines slices to the same totals in any order", () => {
    const bonds = valid.map((r, i) => OperationAggregator.valueRecord(r, i, INDEX_SPOT, INFLATION, context));
    const fold = (slice: typeof bonds) =>
      slice.reduce((acc, b) => OperationAggregator.accumulate(acc, b), OperationAggregator.emptyTotals());

    const whole = OperationAggregator.finish(fold(bonds), context);
    const split = OperationAggregator.finish(
      OperationAggregator.combine(fold(bonds.slice(2)), fold(bonds.slice(0, 2))),
      context
    );

    expect(split.amountExchanged).toBe(whole.amountExchanged);
    expect(split.debtBalance).toBe(whole.debtBalance);
    expect(split.grossOutlay).toBeCloseTo(whole.grossOutlay, 8);
    expect(split.totalIndexation).toBeCloseTo(whole.totalIndexation, 8);
    expect(split.overallResult).toBeCloseTo(whole.overallResult, 8);
  });
});
