import { DateTime } from "luxon";
import { BondAccrual } from "./accrual";
import { BondCashflow } from "./cashflow";
import { BondValuation } from "./types";
import { DAYS_PER_YEAR, DayCountCalculator } from "./utils";

const REDEMPTION = 100;

const ZERO_VALUATION: BondValuation = Object.freeze({
    cleanPrice: 0,
    accruedInterest: 0,
    dirtyPrice: 0,
});

/**
 * BondPricing discounts the remaining annual cash flows of a bond at its yield.
 */
export class BondPricing {

    /**
     * Compute clean price, accrued interest and dirty price, all in percent of par.
     *
     * Dirty = Σ_{i=1..n} C / (1+y)^(i-1+f) + 100 / (1+y)^(n-1+f)
     *
     * where C = 100 × coupon, f = days to next coupon / 365 and n = coupons left.
     * A settlement on or after maturity values to zero.
     *
     * @param yieldRate annual yield as a fraction (0.10655 for 10,655%)
     * @param couponRate annual coupon as a fraction
     */
    static value(
        yieldRate: number,
        couponRate: number,
        maturity: DateTime,
        settlement: DateTime
    ): BondValuation {
        if (settlement >= maturity) {
            return { ...ZERO_VALUATION };
        }

        const { previous, next, remaining: n } = BondCashflow.couponDates(settlement, maturity);

        const f = DayCountCalculator.days(settlement, next) / DAYS_PER_YEAR;
        const coupon = REDEMPTION * couponRate;
        const base = 1 + yieldRate;

        let dirtyPrice = 0;
        for (let i = 1; i <= n; i++) {
            dirtyPrice += coupon / Math.pow(base, i - 1 + f);
        }
        dirtyPrice += REDEMPTION / Math.pow(base, n - 1 + f);

        const accruedInterest = BondAccrual.accruedInterest(couponRate, previous, settlement);

        return {
            cleanPrice: dirtyPrice - accruedInterest,
            accruedInterest,
            dirtyPrice,
        };
    }
}
