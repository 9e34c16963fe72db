import Decimal from "decimal.js";
import { ISODateString } from "./types";
import { DayCountCalculator } from "./utils";

/**
 * Three-letter Spanish month abbreviations as printed in maturity columns.
 */
export const MONTH_ABBREVIATIONS: ReadonlyMap<string, number> = new Map([
    ["ene", 1],
    ["feb", 2],
    ["mar", 3],
    ["abr", 4],
    ["may", 5],
    ["jun", 6],
    ["jul", 7],
    ["ago", 8],
    ["sep", 9],
    ["oct", 10],
    ["nov", 11],
    ["dic", 12],
]);

/**
 * Full Spanish month names used in dated document headers.
 */
export const MONTH_NAMES: ReadonlyMap<string, number> = new Map([
    ["enero", 1],
    ["febrero", 2],
    ["marzo", 3],
    ["abril", 4],
    ["mayo", 5],
    ["junio", 6],
    ["julio", 7],
    ["agosto", 8],
    ["septiembre", 9],
    ["setiembre", 9],
    ["octubre", 10],
    ["noviembre", 11],
    ["diciembre", 12],
]);

/** Removes diacritics: "Nación" → "Nacion". */
export function stripAccents(text: string): string {
    return text.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * Separator style of a Spanish-formatted number.
 * - `dotted`  → 1.234.567,89
 * - `comma`   → 1234567,89
 * - `grouped` → 1.234.567 (integers only)
 */
export type NumberStyle = "dotted" | "comma" | "grouped";

const PLAIN_NUMBER = /^[-+]?\d+(\.\d+)?$/;

export class NumberParser {

    /**
     * Parses a Spanish-formatted numeric token.
     *
     * '.' groups thousands and ',' marks decimals; a lone '.' is always a thousands
     * separator. A trailing '%' is dropped.
     *
     * @returns the value, or null when the token is not a number
     */
    static parse(token: string): number | null {
        let text = token.trim();
        if (text.endsWith("%")) {
            text = text.slice(0, -1).trim();
        }
        if (!text) return null;

        const hasDot = text.includes(".");
        const hasComma = text.includes(",");

        if (hasDot) {
            text = text.replace(/\./g, "");
        }
        if (hasComma) {
            text = text.replace(",", ".");
        }

        if (!PLAIN_NUMBER.test(text)) return null;

        const value = Number(text);
        return Number.isFinite(value) ? value : null;
    }

    /**
     * Renders a value in one of the Spanish separator styles.
     * `grouped` has no decimal separator, so the value is rounded to an integer.
     */
    static format(value: number, style: NumberStyle, decimals = 2): string {
        const dec = new Decimal(value);
        const negative = dec.isNegative() && !dec.isZero();
        const fixed = style === "grouped"
            ? dec.abs().toFixed(0)
            : dec.abs().toFixed(decimals);

        const [intPart, fracPart] = fixed.split(".");
        const sign = negative ? "-" : "";

        if (style === "comma") {
            return fracPart ? `${sign}${intPart},${fracPart}` : `${sign}${intPart}`;
        }

        const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ".");
        if (style === "grouped" || !fracPart) {
            return `${sign}${grouped}`;
        }
        return `${sign}${grouped},${fracPart}`;
    }
}

const ABBREVIATED_DATE = /^(\d{1,2})-([A-Za-z]{3})-(\d{2}|\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const SLASH_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const LONG_DATE = /(\d{1,2})\s+de\s+([A-Za-zÁÉÍÓÚáéíóúÑñ]+)\s+(?:de|del)\s+(\d{4})/gi;

/** Place line that opens a memo: "Bogotá D. C., 19 de diciembre de 2025". */
const DATED_HEADER = /Bogot[aá](?:\s*,)?(?:\s*D\.?\s*C\.?)?\s*,?\s*(\d{1,2})\s+de\s+([A-Za-zÁÉÍÓÚáéíóúÑñ]+)\s+(?:de|del)\s+(\d{4})/gi;

export class DateParser {

    /**
     * Parses a date token: `15-dic-26`, `15-DIC-2026`, `2026-12-15` or `15/12/2026`.
     * Two-digit years are 2000 + YY.
     *
     * @returns ISO date, or null for unknown shapes and impossible dates
     */
    static parse(token: string): ISODateString | null {
        const text = token.trim();

        const abbreviated = ABBREVIATED_DATE.exec(text);
        if (abbreviated) {
            const month = MONTH_ABBREVIATIONS.get(abbreviated[2].toLowerCase());
            if (!month) return null;
            const year = abbreviated[3].length === 2
                ? 2000 + Number(abbreviated[3])
                : Number(abbreviated[3]);
            return this.build(year, month, Number(abbreviated[1]));
        }

        const iso = ISO_DATE.exec(text);
        if (iso) {
            return this.build(Number(iso[1]), Number(iso[2]), Number(iso[3]));
        }

        const slash = SLASH_DATE.exec(text);
        if (slash) {
            return this.build(Number(slash[3]), Number(slash[2]), Number(slash[1]));
        }

        return null;
    }

    /**
     * Finds the settlement date of a memo. A date on the dated header line
     * ("Bogotá D. C., 19 de diciembre de 2025") wins; otherwise the first valid
     * long-form Spanish date anywhere in the text.
     */
    static findLongDate(text: string): ISODateString | null {
        return this.firstLongDate(text, DATED_HEADER) ?? this.firstLongDate(text, LONG_DATE);
    }

    private static firstLongDate(text: string, pattern: RegExp): ISODateString | null {
        for (const match of text.matchAll(pattern)) {
            const month = MONTH_NAMES.get(stripAccents(match[2]).toLowerCase());
            if (!month) continue;

            const date = this.build(Number(match[3]), month, Number(match[1]));
            if (date) return date;
        }
        return null;
    }

    private static build(year: number, month: number, day: number): ISODateString | null {
        const date = DayCountCalculator.fromParts(year, month, day);
        return date ? DayCountCalculator.toISODate(date) : null;
    }
}
