import { BondRole, Denomination, PriceSource, TokenKind } from "./enums";

/**
 * Calendar date as `YYYY-MM-DD`.
 * Example: "2026-12-15"
 */
export type ISODateString = string;

/**
 * One bond row as extracted from a document or entered by a user.
 */
export interface RawBondRecord {
  /** ISIN or similar code; empty when the row could not be identified */
  identifier: string;

  /** Maturity date, `null` when it could not be parsed */
  maturity: ISODateString | null;

  denomination: Denomination;

  /**
   * Annual coupon rate as quoted, in percent.
   * Example: 7.25 = 7,25%
   */
  couponPct: number;

  /** Yield (tasa de corte) as quoted, in percent */
  yieldPct: number;

  /** Price as percent of par */
  price: number;

  /**
   * Face value in the bond's own unit (pesos or index units).
   * Negative for collected bonds once finalized.
   */
  faceValue: number;

  role: BondRole;

  /** Source line the row was extracted from */
  raw?: string;
}

/**
 * Row fields before a section role has been assigned.
 */
export type ExtractedRow = Omit<RawBondRecord, "role">;

/**
 * Tagged result of classifying a single token.
 */
export type ClassifiedToken =
  | { kind: TokenKind.DENOMINATION; text: string; value: Denomination }
  | { kind: TokenKind.DATE; text: string; value: ISODateString }
  | { kind: TokenKind.NUMBER; text: string; value: number }
  | { kind: TokenKind.UNRECOGNIZED; text: string };

/**
 * Result of scanning a whole operation document.
 */
export interface ScanResult {
  /** `null` when the document carries no recognizable dated header */
  settlementDate: ISODateString | null;

  collected: RawBondRecord[];

  delivered: RawBondRecord[];
}

/**
 * Price figures of one bond, all expressed as percent of par.
 */
export interface BondValuation {
  cleanPrice: number;
  accruedInterest: number;
  dirtyPrice: number;
}

/**
 * Annual coupon dates bracketing a settlement date.
 */
export interface CouponSchedule {
  previousCoupon: ISODateString;
  nextCoupon: ISODateString;

  /** Coupons still to be paid, the next one included */
  remainingCoupons: number;
}

/**
 * A record after valuation. Never mutated once created.
 */
export interface ValuedBond extends RawBondRecord {
  settlementDate: ISODateString;

  /** Coupon rate as a fraction (`couponPct / 100`) */
  couponRate: number;

  /** Yield as a fraction (`yieldPct / 100`) */
  yieldRate: number;

  cleanPrice: number;
  dirtyPrice: number;
  accruedInterest: number;

  /** Face value converted to local currency, signed by role */
  localFaceValue: number;

  /** `localFaceValue × dirtyPrice / 100` */
  costValue: number;

  couponEffect: number;
  indexation: number;

  /** Index value used for conversion; `null` for local-currency bonds */
  indexSpot: number | null;

  /** Projected year-end index value; `null` for local-currency bonds */
  indexForward: number | null;
}

/**
 * Portfolio-level figures for one exchange operation.
 */
export interface OperationTotals {
  operationId: string;
  settlementDate: ISODateString;

  /** Sum of |local face value| over collected bonds */
  amountExchanged: number;

  /** Negated sum of cost values (settlement outflow) */
  grossOutlay: number;

  totalCouponEffect: number;

  /** `grossOutlay + totalCouponEffect` */
  netFiscalCost: number;

  totalIndexation: number;

  /** `netFiscalCost + totalIndexation` */
  netFiscalCostWithIndexation: number;

  /** Sum of signed local face values */
  debtBalance: number;

  /** `debtBalance + netFiscalCost + totalIndexation` */
  overallResult: number;
}

/**
 * A row excluded from totals, with the reason.
 */
export interface SkippedRow {
  index: number;
  identifier: string;
  code: string;
  message: string;
}

export interface OperationResult {
  bonds: ValuedBond[];
  totals: OperationTotals;
  skipped: SkippedRow[];
}

/**
 * Operation-level inputs the aggregator needs besides the records.
 */
export interface OperationContext {
  operationId: string;
  settlementDate: ISODateString;

  /** @default PriceSource.MODEL */
  priceSource?: PriceSource;
}
