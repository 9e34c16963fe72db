import Decimal from "decimal.js";
import { BondRole, Denomination } from "./enums";
import { ISODateString, OperationTotals, ValuedBond } from "./types";

/**
 * Flat operation summary, one per settlement run, as appended to the history sheet.
 */
export interface SummaryRow {
    year: number;
    operationId: string;
    settlementDate: ISODateString;
    amountExchanged: number;
    grossOutlay: number;
    couponEffects: number;
    netFiscalCost: number;
    indexation: number;
    netFiscalCostWithIndexation: number;
    debtBalance: number;
    overallResult: number;
}

/**
 * Flat per-bond row for the detail sheet and the printable tables.
 * Rates and prices stay in percent.
 */
export interface DetailRow {
    operationId: string;
    settlementDate: ISODateString;
    role: "Recogido" | "Entregado";
    identifier: string;
    denomination: "COP" | "UVR";
    maturity: ISODateString | null;
    couponPct: number;
    yieldPct: number;
    dirtyPrice: number;
    cleanPrice: number;
    accruedInterest: number;
    faceValue: number;
    costValue: number;
    localFaceValue: number;
    couponEffect: number;
    indexation: number;
}

/**
 * Shapes engine output for export collaborators. Rounding happens here and nowhere else.
 */
export class OperationReport {

    /**
     * Round half-even to a fixed number of decimals.
     */
    static round(value: number, decimals = 2): number {
        return new Decimal(value).toDecimalPlaces(decimals, Decimal.ROUND_HALF_EVEN).toNumber();
    }

    static summaryRow(totals: OperationTotals): SummaryRow {
        return {
            year: Number(totals.settlementDate.slice(0, 4)),
            operationId: totals.operationId,
            settlementDate: totals.settlementDate,
            amountExchanged: this.round(totals.amountExchanged),
            grossOutlay: this.round(totals.grossOutlay),
            couponEffects: this.round(totals.totalCouponEffect),
            netFiscalCost: this.round(totals.netFiscalCost),
            indexation: this.round(totals.totalIndexation),
            netFiscalCostWithIndexation: this.round(totals.netFiscalCostWithIndexation),
            debtBalance: this.round(totals.debtBalance),
            overallResult: this.round(totals.overallResult),
        };
    }

    static detailRows(operationId: string, bonds: readonly ValuedBond[]): DetailRow[] {
        return bonds.map((bond) => ({
            operationId,
            settlementDate: bond.settlementDate,
            role: bond.role === BondRole.COLLECTED ? "Recogido" : "Entregado",
            identifier: bond.identifier,
            denomination: bond.denomination === Denomination.INDEX_LINKED ? "UVR" : "COP",
            maturity: bond.maturity,
            couponPct: bond.couponPct,
            yieldPct: bond.yieldPct,
            dirtyPrice: this.round(bond.dirtyPrice, 6),
            cleanPrice: this.round(bond.cleanPrice, 6),
            accruedInterest: this.round(bond.accruedInterest, 6),
            faceValue: this.round(bond.faceValue),
            costValue: this.round(bond.costValue),
            localFaceValue: this.round(bond.localFaceValue),
            couponEffect: this.round(bond.couponEffect),
            indexation: this.round(bond.indexation),
        }));
    }
}
