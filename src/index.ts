export * from "./enums";
export * from "./types";
export * from "./errors";
export { CONFIG_DEFAULTS, DEFAULT_CONFIG, loadConfig } from "./config";
export type { ConfigKey, EngineConfig } from "./config";
export { logger } from "./logger";
export { DAYS_PER_YEAR, DayCountCalculator } from "./utils";
export { DateParser, NumberParser, stripAccents } from "./parsing";
export type { NumberStyle } from "./parsing";
export { DEFAULT_PRICE_ANCHOR, DENOMINATION_KEYWORDS, RowExtractor } from "./row-extractor";
export type { NumericFields, PriceAnchorRange } from "./row-extractor";
export { DocumentTableScanner, SECTION_HEADERS, TABLE_HEADER_MARKERS } from "./scanner";
export { BondRecords, RawBondRecordSchema } from "./records";
export { BondCashflow } from "./cashflow";
export type { CouponDates, CouponEffectInput } from "./cashflow";
export { BondAccrual } from "./accrual";
export { BondPricing } from "./pricing";
export { BondIndexation } from "./indexation";
export { OperationAggregator } from "./aggregator";
export type { PartialTotals } from "./aggregator";
export { StaticIndexSeries, StaticInflationTable } from "./reference-data";
export type { IndexSeries, InflationTable, ReferenceData } from "./reference-data";
export { OperationReport } from "./report";
export type { DetailRow, SummaryRow } from "./report";
export { ExchangeOperation, FALLBACK_OPERATION_ID } from "./exchange-operation";
export type { ExchangeOperationParams } from "./exchange-operation";
