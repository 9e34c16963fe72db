import { DateTime } from "luxon";
import { Denomination } from "./enums";
import { DAYS_PER_YEAR, DayCountCalculator } from "./utils";

/**
 * BondIndexation projects the inflation index to year end and measures
 * the peso value that index-linked principal gains over that span.
 */
export class BondIndexation {

    /**
     * Index value at 31 December of the settlement year:
     *   spot × (1 + inflation)^(days to year end / 365)
     */
    static forward(indexSpot: number, annualInflation: number, settlement: DateTime): number {
        const daysRemaining = DayCountCalculator.daysToYearEnd(settlement);
        return indexSpot * Math.pow(1 + annualInflation, daysRemaining / DAYS_PER_YEAR);
    }

    /**
     * Indexation of a bond. Face value is in index units for index-linked bonds;
     * local-currency bonds never index.
     */
    static amount(
        denomination: Denomination,
        faceValueUnits: number,
        indexSpot: number,
        indexForward: number
    ): number {
        if (denomination !== Denomination.INDEX_LINKED) {
            return 0;
        }
        return faceValueUnits * indexForward - faceValueUnits * indexSpot;
    }
}
