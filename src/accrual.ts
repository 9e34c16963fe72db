import { DateTime } from "luxon";
import { DAYS_PER_YEAR, DayCountCalculator } from "./utils";

/**
 * BondAccrual
 *
 * Stateless straight-line accrual of the annual coupon since the previous coupon date.
 */
export class BondAccrual {

    /**
     * Accrued Interest =
     *   100 × Coupon Rate × (days from previous coupon to settlement) / 365
     *
     * @param couponRate annual coupon as a fraction
     * @returns accrued interest in percent of par
     */
    static accruedInterest(
        couponRate: number,
        previousCoupon: DateTime,
        settlement: DateTime
    ): number {
        const couponPerPeriod = 100 * couponRate;
        const daysAccrued = DayCountCalculator.days(previousCoupon, settlement);

        return couponPerPeriod * (daysAccrued / DAYS_PER_YEAR);
    }
}
