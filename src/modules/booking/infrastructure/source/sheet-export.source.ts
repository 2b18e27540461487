import axios from 'axios';
import { IRawRowSource, RawRowBatch, RawSourceRow } from '../../domain/gateways/raw-row-source.interface';

/**
 * Reads submissions from a JSON export of the booking sheet:
 * `[{ "groupType": "district", "rows": [{ "Column": "cell" }] }]`.
 */
export class SheetExportRowSource implements IRawRowSource {
    constructor(
        private readonly url: string,
        private readonly timeoutMs: number,
    ) {}

    async fetchBatches(): Promise<RawRowBatch[]> {
        try {
            const response = await axios.get<unknown>(this.url, {
                timeout: this.timeoutMs,
                headers: { Accept: 'application/json' },
            });
            return SheetExportRowSource.parseExport(response.data);
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new Error(`Sheet export unavailable (${error.code ?? error.response?.status ?? 'unknown'}): ${error.message}`);
            }
            throw error;
        }
    }

    static parseExport(payload: unknown): RawRowBatch[] {
        if (!Array.isArray(payload)) {
            throw new Error('Sheet export must be an array of batches');
        }

        return payload.map((batch: unknown, index) => {
            if (!isRecord(batch) || !Array.isArray(batch.rows)) {
                throw new Error(`Sheet export batch ${index} has no rows array`);
            }
            const groupType = batch.groupType;
            if (groupType !== undefined && typeof groupType !== 'string') {
                throw new Error(`Sheet export batch ${index} has a non-string groupType`);
            }
            return {
                groupType,
                rows: batch.rows.map((row: unknown, rowIndex) => toRow(row, index, rowIndex)),
            };
        });
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRow(value: unknown, batchIndex: number, rowIndex: number): RawSourceRow {
    if (!isRecord(value)) {
        throw new Error(`Sheet export batch ${batchIndex} row ${rowIndex} is not an object`);
    }
    const row: Record<string, string> = {};
    for (const [column, cell] of Object.entries(value)) {
        row[column] = cell === null || cell === undefined ? '' : String(cell);
    }
    return row;
}
