import { BondRole, ScanSection } from "./enums";
import { moduleLogger } from "./logger";
import { DateParser, stripAccents } from "./parsing";
import { BondRecords } from "./records";
import { DEFAULT_PRICE_ANCHOR, PriceAnchorRange, RowExtractor } from "./row-extractor";
import { RawBondRecord, ScanResult } from "./types";

const log = moduleLogger("scanner");

/**
 * Section headers, compared upper-cased and without accents.
 */
export const SECTION_HEADERS: Record<Exclude<ScanSection, ScanSection.NONE>, string[]> = {
    [ScanSection.COLLECTED]: ["TES RECIBIDOS POR LA NACION", "TITULOS RECOGIDOS"],
    [ScanSection.DELIVERED]: ["TES ENTREGADOS POR LA NACION", "TITULOS ENTREGADOS"],
};

/** Column-title fragments; a line containing any of them is not data. */
export const TABLE_HEADER_MARKERS = ["CODIGO ISIN", "VENCIMIENTO"];

const ROLE_BY_SECTION = {
    [ScanSection.COLLECTED]: BondRole.COLLECTED,
    [ScanSection.DELIVERED]: BondRole.DELIVERED,
} as const;

function normalizeLine(line: string): string {
    return stripAccents(line).toUpperCase();
}

/**
 * Walks an operation memo's text and splits its bond tables into collected and delivered rows.
 */
export class DocumentTableScanner {
    private readonly extractor: RowExtractor;

    constructor(anchor: PriceAnchorRange = DEFAULT_PRICE_ANCHOR) {
        this.extractor = new RowExtractor(anchor);
    }

    /**
     * Section a line opens, or null when it is not a section header.
     */
    static sectionHeader(line: string): ScanSection.COLLECTED | ScanSection.DELIVERED | null {
        const normalized = normalizeLine(line);
        if (SECTION_HEADERS[ScanSection.COLLECTED].some((h) => normalized.includes(h))) {
            return ScanSection.COLLECTED;
        }
        if (SECTION_HEADERS[ScanSection.DELIVERED].some((h) => normalized.includes(h))) {
            return ScanSection.DELIVERED;
        }
        return null;
    }

    static isTableHeader(line: string): boolean {
        const normalized = normalizeLine(line);
        return TABLE_HEADER_MARKERS.some((marker) => normalized.includes(marker));
    }

    scan(text: string): ScanResult {
        const settlementDate = DateParser.findLongDate(text);
        const collected: RawBondRecord[] = [];
        const delivered: RawBondRecord[] = [];

        let section = ScanSection.NONE;

        text.split(/\r?\n/).forEach((rawLine, lineNumber) => {
            const line = rawLine.trim();
            if (!line) return;

            const header = DocumentTableScanner.sectionHeader(line);
            if (header) {
                section = header;
                log.debug({ lineNumber, section }, "section_start");
                return;
            }

            if (DocumentTableScanner.isTableHeader(line)) return;

            const [first = ""] = line.split(/\s+/);
            if (!RowExtractor.isIdentifier(first)) return;

            if (section === ScanSection.NONE) {
                log.debug({ lineNumber, identifier: first }, "bond_line_outside_section");
                return;
            }

            const record = BondRecords.finalize(this.extractor.extract(line), ROLE_BY_SECTION[section]);
            (section === ScanSection.COLLECTED ? collected : delivered).push(record);
        });

        log.info(
            { settlementDate, collected: collected.length, delivered: delivered.length },
            "document_scanned"
        );

        return { settlementDate, collected, delivered };
    }
}
