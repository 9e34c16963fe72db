import { DateTime } from "luxon";
import { CouponSchedule } from "./types";
import { DayCountCalculator } from "./utils";

/** Leap reference year so 29 February maturities stay comparable. */
const REFERENCE_YEAR = 2000;

export interface CouponDates {
    previous: DateTime;
    next: DateTime;
    remaining: number;
}

export interface CouponEffectInput {
    settlement: DateTime;
    maturity: DateTime;

    /** Annual coupon rate as a fraction */
    couponRate: number;

    /** Signed face value; its sign decides the sign of the effect */
    faceValue: number;
}

/**
 * Annual coupon dates and the coupon-timing effect.
 * Coupons fall on the maturity's month/day every year.
 */
export class BondCashflow {

    /**
     * Locates the coupons around a settlement date by walking back from maturity
     * one year at a time. Requires settlement < maturity.
     */
    static couponDates(settlement: DateTime, maturity: DateTime): CouponDates {
        let next = maturity;
        let years = 1;

        while (true) {
            const candidate = maturity.minus({ years });
            if (candidate <= settlement) break;
            next = candidate;
            years++;
        }

        return {
            previous: next.minus({ years: 1 }),
            next,
            remaining: maturity.year - next.year + 1,
        };
    }

    static schedule(settlement: DateTime, maturity: DateTime): CouponSchedule {
        const { previous, next, remaining } = this.couponDates(settlement, maturity);
        return {
            previousCoupon: DayCountCalculator.toISODate(previous),
            nextCoupon: DayCountCalculator.toISODate(next),
            remainingCoupons: remaining,
        };
    }

    /**
     * Coupon effect: when the coupon anniversary still lies ahead in the settlement
     * year, the full annual coupon on the face value, signed like the face value.
     */
    static couponEffect({ settlement, maturity, couponRate, faceValue }: CouponEffectInput): number {
        const settlementDay = DateTime.utc(REFERENCE_YEAR, settlement.month, settlement.day);
        const anniversary = DateTime.utc(REFERENCE_YEAR, maturity.month, maturity.day);

        const magnitude = settlementDay < anniversary
            ? Math.abs(couponRate * Math.abs(faceValue))
            : 0;

        if (magnitude === 0) return 0;
        return faceValue < 0 ? -magnitude : magnitude;
    }
}
