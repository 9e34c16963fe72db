import { z } from "zod";
import { BondRole, Denomination } from "./enums";
import { ExchangeError } from "./errors";
import { ExtractedRow, RawBondRecord } from "./types";
import { DayCountCalculator } from "./utils";

const isoDate = z
    .string()
    .refine((value) => DayCountCalculator.toDateTime(value) !== null, { message: "Invalid ISO date" });

/**
 * Shape every record must have before it reaches the valuation engine,
 * whatever produced it (scanner, editor, JSON).
 */
export const RawBondRecordSchema = z.object({
    identifier: z.string(),
    maturity: isoDate.nullable(),
    denomination: z.nativeEnum(Denomination),
    couponPct: z.number().finite(),
    yieldPct: z.number().finite(),
    price: z.number().finite(),
    faceValue: z.number().finite(),
    role: z.nativeEnum(BondRole),
    raw: z.string().optional(),
});

/**
 * Record construction and the single place where role decides the face-value sign.
 */
export class BondRecords {

    /**
     * Collected bonds carry a negative face value, delivered bonds a non-negative one,
     * whatever sign was entered.
     */
    static signedFaceValue(role: BondRole, faceValue: number): number {
        const magnitude = Math.abs(faceValue);
        if (magnitude === 0) return 0;
        return role === BondRole.COLLECTED ? -magnitude : magnitude;
    }

    /**
     * Tags a row with its role and normalizes its sign. Safe to apply more than once.
     */
    static finalize(row: ExtractedRow, role: BondRole): RawBondRecord {
        return {
            ...row,
            role,
            faceValue: this.signedFaceValue(role, row.faceValue),
        };
    }

    /**
     * Empty row for a role, as offered to the editor when a section has no bonds.
     */
    static blank(role: BondRole): RawBondRecord {
        return {
            identifier: "",
            maturity: null,
            denomination: Denomination.LOCAL_CURRENCY,
            couponPct: 0,
            yieldPct: 0,
            price: 0,
            faceValue: 0,
            role,
        };
    }

    /**
     * Validates untyped input and returns a finalized record.
     *
     * @throws {ExchangeError} INVALID_RECORD with the failing fields
     */
    static parse(input: unknown): RawBondRecord {
        const parsed = RawBondRecordSchema.safeParse(input);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`);
            throw new ExchangeError("INVALID_RECORD", `Invalid bond record: ${issues.join("; ")}`, { issues });
        }
        const { role, ...row } = parsed.data;
        return this.finalize(row, role);
    }
}
