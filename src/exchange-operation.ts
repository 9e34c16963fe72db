import { DateTime } from "luxon";
import { z } from "zod";
import { OperationAggregator } from "./aggregator";
import { EngineConfig, loadConfig } from "./config";
import { BondRole, PriceSource } from "./enums";
import { ExchangeError } from "./errors";
import { BondRecords, RawBondRecordSchema } from "./records";
import { ReferenceData, StaticIndexSeries, StaticInflationTable } from "./reference-data";
import { DocumentTableScanner } from "./scanner";
import { ISODateString, OperationResult, RawBondRecord } from "./types";
import { DayCountCalculator } from "./utils";

/** Identifier used when the document carries no settlement date. */
export const FALLBACK_OPERATION_ID = "OMD_010125";

/**
 * Initialization parameters for an exchange operation.
 */
export interface ExchangeOperationParams {
    /**
     * Operation label.
     * @default `OMD_ddMMyy` of the settlement date
     */
    operationId?: string;

    settlementDate?: ISODateString | null;

    collected?: RawBondRecord[];
    delivered?: RawBondRecord[];

    /** @default PriceSource.MODEL */
    priceSource?: PriceSource;
}

const OperationJSONSchema = z.object({
    operationId: z.string().min(1),
    settlementDate: z.string().nullable(),
    priceSource: z.nativeEnum(PriceSource),
    records: z.array(RawBondRecordSchema),
});

/**
 * One debt-management exchange: a settlement date plus the bonds collected and delivered on it.
 *
 * Holds editable records; valuation happens on `calculate` and never mutates them.
 */
export class ExchangeOperation {

    operationId: string;
    settlementDate: ISODateString | null;
    records: RawBondRecord[];
    priceSource: PriceSource;

    private constructor(params: {
        operationId: string;
        settlementDate: ISODateString | null;
        records: RawBondRecord[];
        priceSource: PriceSource;
    }) {
        this.operationId = params.operationId;
        this.settlementDate = params.settlementDate;
        this.records = params.records;
        this.priceSource = params.priceSource;
    }

    /**
     * Default label for an operation settling on a date: `OMD_ddMMyy`.
     */
    static defaultOperationId(settlementDate: ISODateString | null): string {
        const date = settlementDate ? DayCountCalculator.toDateTime(settlementDate) : null;
        return date ? `OMD_${date.toFormat("ddMMyy")}` : FALLBACK_OPERATION_ID;
    }

    /**
     * Create an operation with sensible defaults.
     */
    static initialize(params: ExchangeOperationParams = {}): ExchangeOperation {
        const settlementDate = params.settlementDate ?? null;
        if (settlementDate !== null && !DayCountCalculator.toDateTime(settlementDate)) {
            throw new ExchangeError("INVALID_OPERATION", `Invalid settlement date: ${settlementDate}`);
        }

        const records = [
            ...(params.collected ?? []).map((r) => BondRecords.finalize(r, BondRole.COLLECTED)),
            ...(params.delivered ?? []).map((r) => BondRecords.finalize(r, BondRole.DELIVERED)),
        ];

        return new ExchangeOperation({
            operationId: params.operationId?.trim() || this.defaultOperationId(settlementDate),
            settlementDate,
            records,
            priceSource: params.priceSource ?? PriceSource.MODEL,
        });
    }

    /**
     * Reference data with no observations: every lookup returns the configured default.
     */
    static defaultReference(config: EngineConfig = loadConfig()): ReferenceData {
        return {
            indexSeries: new StaticIndexSeries({}, config.defaultIndexValue),
            inflationTable: new StaticInflationTable({}, config.defaultInflationRate),
        };
    }

    /**
     * Scans an operation memo's text. Sections without bonds get one blank row so the
     * editor always shows both tables.
     */
    static fromDocument(
        text: string,
        options: { config?: EngineConfig; priceSource?: PriceSource; operationId?: string } = {}
    ): ExchangeOperation {
        const config = options.config ?? loadConfig();
        const scanner = new DocumentTableScanner({ min: config.priceAnchorMin, max: config.priceAnchorMax });
        const { settlementDate, collected, delivered } = scanner.scan(text);

        return this.initialize({
            operationId: options.operationId,
            settlementDate,
            collected: collected.length ? collected : [BondRecords.blank(BondRole.COLLECTED)],
            delivered: delivered.length ? delivered : [BondRecords.blank(BondRole.DELIVERED)],
            priceSource: options.priceSource,
        });
    }

    get collected(): RawBondRecord[] {
        return this.records.filter((r) => r.role === BondRole.COLLECTED);
    }

    get delivered(): RawBondRecord[] {
        return this.records.filter((r) => r.role === BondRole.DELIVERED);
    }

    // --- Setter methods (chainable) ---

    setOperationId(operationId: string): this {
        if (!operationId?.trim()) throw new ExchangeError("INVALID_OPERATION", "Operation id cannot be empty");
        this.operationId = operationId.trim();
        return this;
    }

    setSettlementDate(date: ISODateString): this {
        const parsed = DayCountCalculator.toDateTime(date);
        if (!parsed) throw new ExchangeError("INVALID_OPERATION", `Invalid settlement date: ${date}`);
        this.settlementDate = DayCountCalculator.toISODate(parsed);
        return this;
    }

    setPriceSource(source: PriceSource): this {
        this.priceSource = source;
        return this;
    }

    /**
     * Replace every record, e.g. with the rows returned by the editor.
     * Records are finalized; invalid ones are kept and reported by `calculate`.
     */
    setRecords(records: RawBondRecord[]): this {
        this.records = records.map((r) => BondRecords.finalize(r, r.role));
        return this;
    }

    addRecord(record: RawBondRecord): this {
        this.records = [...this.records, BondRecords.finalize(record, record.role)];
        return this;
    }

    removeRecord(index: number): this {
        if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
            throw new ExchangeError("INVALID_OPERATION", `No record at index ${index}`, { index });
        }
        this.records = this.records.filter((_, i) => i !== index);
        return this;
    }

    // --- Valuation ---

    /**
     * Market inputs on the settlement date.
     */
    resolveMarketInputs(reference: ReferenceData): { indexSpot: number; annualInflation: number } {
        const settlement = this.requireSettlement();
        return {
            indexSpot: reference.indexSeries.lookup(DayCountCalculator.toISODate(settlement)),
            annualInflation: reference.inflationTable.lookup(settlement.year),
        };
    }

    /**
     * Values every record and sums the operation totals.
     *
     * @param reference index and inflation lookups; defaults apply for missing entries
     * @throws {ExchangeError} MISSING_SETTLEMENT_DATE when no date is known
     */
    calculate(reference: ReferenceData = ExchangeOperation.defaultReference()): OperationResult {
        const settlement = this.requireSettlement();
        const { indexSpot, annualInflation } = this.resolveMarketInputs(reference);

        return OperationAggregator.run(this.records, indexSpot, annualInflation, {
            operationId: this.operationId,
            settlementDate: DayCountCalculator.toISODate(settlement),
            priceSource: this.priceSource,
        });
    }

    private requireSettlement(): DateTime {
        const settlement = this.settlementDate ? DayCountCalculator.toDateTime(this.settlementDate) : null;
        if (!settlement) {
            throw new ExchangeError(
                "MISSING_SETTLEMENT_DATE",
                "Settlement date is unknown; set it before calculating"
            );
        }
        return settlement;
    }

    /**
     * Generates a new instance from a JSON string or object.
     *
     * @throws {ExchangeError} INVALID_OPERATION when the payload does not match
     */
    static parseFromJSON(json: string | object): ExchangeOperation {
        let raw: unknown;
        try {
            raw = typeof json === "string" ? JSON.parse(json) : json;
        } catch (err) {
            throw new ExchangeError("INVALID_OPERATION", "Operation JSON is not valid JSON", undefined, { cause: err });
        }

        const parsed = OperationJSONSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
            throw new ExchangeError("INVALID_OPERATION", `Invalid operation JSON: ${issues.join("; ")}`, { issues });
        }

        const { operationId, settlementDate, priceSource, records } = parsed.data;
        return this.initialize({ operationId, settlementDate, priceSource }).setRecords(records);
    }

    /**
    * Converts the current instance to a plain JSON object.
    */
    toJSON(): z.infer<typeof OperationJSONSchema> {
        return {
            operationId: this.operationId,
            settlementDate: this.settlementDate,
            priceSource: this.priceSource,
            records: this.records.map((r) => ({ ...r })),
        };
    }
}
