import { BondRole, Denomination, PriceSource } from "./enums";
import { ExchangeError, RowComputationError } from "./errors";
import { BondCashflow } from "./cashflow";
import { BondIndexation } from "./indexation";
import { moduleLogger } from "./logger";
import { BondPricing } from "./pricing";
import { BondRecords } from "./records";
import {
    OperationContext,
    OperationResult,
    OperationTotals,
    RawBondRecord,
    SkippedRow,
    ValuedBond,
} from "./types";
import { DayCountCalculator } from "./utils";

const log = moduleLogger("aggregator");

/**
 * Running sums for a slice of the portfolio. Slices combine in any order.
 */
export interface PartialTotals {
    amountExchanged: number;
    debtBalance: number;
    costSum: number;
    totalCouponEffect: number;
    totalIndexation: number;
}

const NUMERIC_FIELDS = [
    "cleanPrice",
    "dirtyPrice",
    "accruedInterest",
    "localFaceValue",
    "costValue",
    "couponEffect",
    "indexation",
] as const;

function identifierOf(record: unknown): string {
    if (typeof record === "object" && record !== null && "identifier" in record) {
        const { identifier } = record;
        if (typeof identifier === "string") return identifier;
    }
    return "";
}

/**
 * OperationAggregator
 *
 * Values every record of an exchange operation and reduces them to operation totals.
 * A failing row is reported in `skipped` and left out of the totals; it never stops the run.
 */
export class OperationAggregator {

    static emptyTotals(): PartialTotals {
        return {
            amountExchanged: 0,
            debtBalance: 0,
            costSum: 0,
            totalCouponEffect: 0,
            totalIndexation: 0,
        };
    }

    static accumulate(partial: PartialTotals, bond: ValuedBond): PartialTotals {
        return {
            amountExchanged: partial.amountExchanged
                + (bond.role === BondRole.COLLECTED ? Math.abs(bond.localFaceValue) : 0),
            debtBalance: partial.debtBalance + bond.localFaceValue,
            costSum: partial.costSum + bond.costValue,
            totalCouponEffect: partial.totalCouponEffect + bond.couponEffect,
            totalIndexation: partial.totalIndexation + bond.indexation,
        };
    }

    static combine(a: PartialTotals, b: PartialTotals): PartialTotals {
        return {
            amountExchanged: a.amountExchanged + b.amountExchanged,
            debtBalance: a.debtBalance + b.debtBalance,
            costSum: a.costSum + b.costSum,
            totalCouponEffect: a.totalCouponEffect + b.totalCouponEffect,
            totalIndexation: a.totalIndexation + b.totalIndexation,
        };
    }

    /**
     * Turns running sums into operation totals. The cost sum is negated once here
     * to express the settlement outflow.
     */
    static finish(partial: PartialTotals, context: OperationContext): OperationTotals {
        const grossOutlay = partial.costSum === 0 ? 0 : -partial.costSum;
        const netFiscalCost = grossOutlay + partial.totalCouponEffect;

        return {
            operationId: context.operationId,
            settlementDate: context.settlementDate,
            amountExchanged: partial.amountExchanged,
            grossOutlay,
            totalCouponEffect: partial.totalCouponEffect,
            netFiscalCost,
            totalIndexation: partial.totalIndexation,
            netFiscalCostWithIndexation: netFiscalCost + partial.totalIndexation,
            debtBalance: partial.debtBalance,
            overallResult: partial.debtBalance + netFiscalCost + partial.totalIndexation,
        };
    }

    /**
     * Values one record.
     *
     * @param index position of the record in the submitted list, used in error reports
     * @throws {RowComputationError} when the record cannot be valued
     */
    static valueRecord(
        input: RawBondRecord,
        index: number,
        indexSpot: number,
        annualInflation: number,
        context: OperationContext
    ): ValuedBond {
        let record: RawBondRecord;
        try {
            record = BondRecords.parse(input);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new RowComputationError(index, identifierOf(input), message, "INVALID_RECORD", { cause: err });
        }

        const settlement = DayCountCalculator.toDateTime(context.settlementDate);
        if (!settlement) {
            throw new ExchangeError("INVALID_OPERATION", `Invalid settlement date: ${context.settlementDate}`);
        }

        if (!record.maturity) {
            throw new RowComputationError(index, record.identifier, "Missing maturity date");
        }
        const maturity = DayCountCalculator.toDateTime(record.maturity);
        if (!maturity) {
            throw new RowComputationError(index, record.identifier, `Invalid maturity date: ${record.maturity}`);
        }

        const couponRate = record.couponPct / 100;
        const yieldRate = record.yieldPct / 100;

        const model = BondPricing.value(yieldRate, couponRate, maturity, settlement);
        // A matured bond values to zero whatever price the memo quotes.
        const quoted = context.priceSource === PriceSource.QUOTED && settlement < maturity;
        const dirtyPrice = quoted ? record.price : model.dirtyPrice;
        const accruedInterest = model.accruedInterest;
        const cleanPrice = quoted ? dirtyPrice - accruedInterest : model.cleanPrice;

        const indexLinked = record.denomination === Denomination.INDEX_LINKED;
        const indexForward = indexLinked
            ? BondIndexation.forward(indexSpot, annualInflation, settlement)
            : null;

        const localFaceValue = indexLinked ? record.faceValue * indexSpot : record.faceValue;
        const costValue = localFaceValue * (dirtyPrice / 100);

        const couponEffect = BondCashflow.couponEffect({
            settlement,
            maturity,
            couponRate,
            faceValue: localFaceValue,
        });

        const indexation = indexForward === null
            ? 0
            : BondIndexation.amount(record.denomination, record.faceValue, indexSpot, indexForward);

        const bond: ValuedBond = {
            ...record,
            settlementDate: context.settlementDate,
            couponRate,
            yieldRate,
            cleanPrice,
            dirtyPrice,
            accruedInterest,
            localFaceValue,
            costValue,
            couponEffect,
            indexation,
            indexSpot: indexLinked ? indexSpot : null,
            indexForward,
        };

        const broken = NUMERIC_FIELDS.filter((field) => !Number.isFinite(bond[field]));
        if (broken.length) {
            throw new RowComputationError(
                index,
                record.identifier,
                `Non-finite result for ${broken.join(", ")}`
            );
        }

        return Object.freeze(bond);
    }

    /**
     * Values the whole portfolio and sums the operation totals.
     *
     * @param indexSpot index value on the settlement date
     * @param annualInflation observed inflation for the settlement year, as a fraction
     */
    static run(
        records: ReadonlyArray<RawBondRecord>,
        indexSpot: number,
        annualInflation: number,
        context: OperationContext
    ): OperationResult {
        if (!Number.isFinite(indexSpot) || !Number.isFinite(annualInflation)) {
            throw new ExchangeError("INVALID_REFERENCE_DATA", "Index spot and inflation must be finite numbers", {
                indexSpot,
                annualInflation,
            });
        }
        if (!DayCountCalculator.toDateTime(context.settlementDate)) {
            throw new ExchangeError("INVALID_OPERATION", `Invalid settlement date: ${context.settlementDate}`);
        }

        const bonds: ValuedBond[] = [];
        const skipped: SkippedRow[] = [];

        records.forEach((record, index) => {
            try {
                bonds.push(this.valueRecord(record, index, indexSpot, annualInflation, context));
            } catch (err) {
                const row: SkippedRow = err instanceof RowComputationError
                    ? { index, identifier: err.identifier, code: err.code, message: err.message }
                    : {
                        index,
                        identifier: identifierOf(record),
                        code: "ROW_COMPUTATION",
                        message: err instanceof Error ? err.message : String(err),
                    };
                log.warn({ operationId: context.operationId, ...row }, "row_skipped");
                skipped.push(row);
            }
        });

        const partial = bonds.reduce(
            (acc, bond) => this.accumulate(acc, bond),
            this.emptyTotals()
        );
        const totals = this.finish(partial, context);

        log.info(
            {
                operationId: context.operationId,
                valued: bonds.length,
                skipped: skipped.length,
                overallResult: totals.overallResult,
            },
            "operation_calculated"
        );

        return { bonds, totals, skipped };
    }
}
