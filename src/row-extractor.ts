import { Denomination, TokenKind } from "./enums";
import { DateParser, NumberParser } from "./parsing";
import { ClassifiedToken, ExtractedRow } from "./types";

/**
 * Keywords that name a bond's denomination column.
 */
export const DENOMINATION_KEYWORDS: Record<string, Denomination> = {
    UVR: Denomination.INDEX_LINKED,
    COP: Denomination.LOCAL_CURRENCY,
    PESOS: Denomination.LOCAL_CURRENCY,
};

/** ISIN-like code: 10 to 12 uppercase letters or digits, at least one digit. */
const IDENTIFIER = /^(?=[A-Z]*\d)[A-Z0-9]{10,12}$/;

export interface PriceAnchorRange {
    min: number;
    max: number;
}

/** Percent-of-par range where a bond price is expected to fall. */
export const DEFAULT_PRICE_ANCHOR: PriceAnchorRange = { min: 40, max: 160 };

/**
 * Numeric fields of a row once mapped onto their columns.
 */
export interface NumericFields {
    couponPct: number;
    yieldPct: number;
    price: number;
    faceValue: number;

    /** false when the price anchor was missing and positions were used instead */
    anchored: boolean;
}

/**
 * Turns one bond line into a typed row in two stages:
 * token classification, then field mapping.
 *
 * Never throws; anything it cannot read defaults to 0 / null.
 */
export class RowExtractor {

    constructor(private readonly anchor: PriceAnchorRange = DEFAULT_PRICE_ANCHOR) {}

    static isIdentifier(token: string): boolean {
        return IDENTIFIER.test(token);
    }

    /**
     * Classifies a single token. Denomination keywords win over dates, dates over numbers.
     */
    static classify(token: string): ClassifiedToken {
        const keyword = DENOMINATION_KEYWORDS[token.toUpperCase()];
        if (keyword) {
            return { kind: TokenKind.DENOMINATION, text: token, value: keyword };
        }

        const date = DateParser.parse(token);
        if (date) {
            return { kind: TokenKind.DATE, text: token, value: date };
        }

        const number = NumberParser.parse(token);
        if (number !== null) {
            return { kind: TokenKind.NUMBER, text: token, value: number };
        }

        return { kind: TokenKind.UNRECOGNIZED, text: token };
    }

    /**
     * Maps the ordered numeric tokens of a row onto (coupon, yield, price, face value).
     *
     * The first value inside the price range anchors the row: the value after it is the
     * face value and the one or two before it are yield and coupon. Without an anchor the
     * values are taken by position.
     */
    mapNumbers(values: number[]): NumericFields {
        const i = values.findIndex((v) => v >= this.anchor.min && v <= this.anchor.max);

        if (i >= 0) {
            return {
                price: values[i],
                faceValue: i + 1 < values.length ? values[i + 1] : 0,
                yieldPct: i >= 1 ? values[i - 1] : 0,
                couponPct: i >= 2 ? values[i - 2] : 0,
                anchored: true,
            };
        }

        if (values.length >= 4) {
            return {
                couponPct: values[0],
                yieldPct: values[1],
                price: values[2],
                faceValue: values[3],
                anchored: false,
            };
        }

        if (values.length === 3) {
            return {
                couponPct: 0,
                yieldPct: values[0],
                price: values[1],
                faceValue: values[2],
                anchored: false,
            };
        }

        return { couponPct: 0, yieldPct: 0, price: 0, faceValue: 0, anchored: false };
    }

    /**
     * Extracts a row from a line whose first token is the bond identifier.
     */
    extract(line: string): ExtractedRow {
        const [first = "", ...rest] = line.trim().split(/\s+/);

        const row: ExtractedRow = {
            identifier: RowExtractor.isIdentifier(first) ? first : "",
            maturity: null,
            denomination: Denomination.LOCAL_CURRENCY,
            couponPct: 0,
            yieldPct: 0,
            price: 0,
            faceValue: 0,
            raw: line.trim(),
        };

        const numbers: number[] = [];

        for (const token of rest.map(RowExtractor.classify)) {
            switch (token.kind) {
                case TokenKind.DENOMINATION:
                    row.denomination = token.value;
                    break;
                case TokenKind.DATE:
                    row.maturity = token.value;
                    break;
                case TokenKind.NUMBER:
                    numbers.push(token.value);
                    break;
                case TokenKind.UNRECOGNIZED:
                    break;
            }
        }

        const { anchored: _anchored, ...fields } = this.mapNumbers(numbers);
        return { ...row, ...fields };
    }
}
