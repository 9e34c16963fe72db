
/**
 * Unit the bond's principal is denominated in.
 */
export enum Denomination {
    /** Nominal expressed directly in local currency (COP) */
    LOCAL_CURRENCY = "LOCAL_CURRENCY",

    /** Nominal expressed in inflation-index units (UVR) */
    INDEX_LINKED = "INDEX_LINKED",
}

/**
 * Side of the exchange a bond belongs to.
 */
export enum BondRole {
    /** Retired / bought back by the issuer */
    COLLECTED = "COLLECTED",

    /** Newly issued / handed over by the issuer */
    DELIVERED = "DELIVERED",
}

/**
 * Which dirty price feeds the cost of a bond.
 */
export enum PriceSource {
    /** Dirty price computed by discounting cash flows at the quoted yield */
    MODEL = "MODEL",

    /** Dirty price as quoted in the operation document */
    QUOTED = "QUOTED",
}

/**
 * Classification of a single whitespace-separated token in a bond row.
 */
export enum TokenKind {
    DENOMINATION = "DENOMINATION",
    DATE = "DATE",
    NUMBER = "NUMBER",
    UNRECOGNIZED = "UNRECOGNIZED",
}

/**
 * Scanner state while walking a document line by line.
 */
export enum ScanSection {
    NONE = "NONE",
    COLLECTED = "COLLECTED",
    DELIVERED = "DELIVERED",
}
