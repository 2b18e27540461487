export const RAW_ROW_SOURCE = Symbol('RAW_ROW_SOURCE');

/** One submission from the external sheet: column name to cell text. */
export type RawSourceRow = Readonly<Record<string, string>>;

export interface RawRowBatch {
    /** Group type applied to rows that do not carry their own. */
    groupType?: string;
    rows: RawSourceRow[];
}

export interface IRawRowSource {
    fetchBatches(): Promise<RawRowBatch[]>;
}
