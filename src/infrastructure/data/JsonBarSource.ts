import { readFile } from 'fs/promises';
import { injectable, inject } from 'inversify';
import { IBarSource } from '../../domain/interfaces/IBarSource';
import { Bar } from '../../domain/entities/Bar';
import { InputFormatError } from '../../domain/errors/TurtleErrors';
import { JsonBarMapper } from './JsonBarMapper';
import { JsonBarFile, jsonBarFileSchema } from './types/JsonBarTypes';
import { TYPES } from '../../config/types';

/**
 * Reads bars from a JSON file shaped `{ "<symbol>": [ { timestamp, open, ... } ] }`.
 * The file is read once and kept in memory.
 */
@injectable()
export class JsonBarSource implements IBarSource {
    private file: JsonBarFile | null = null;

    constructor(
        @inject(TYPES.BarsPath) private readonly filePath: string
    ) {}

    async listSymbols(): Promise<string[]> {
        const file = await this.load();
        return Object.keys(file);
    }

    async getBars(symbol: string): Promise<Bar[]> {
        const file = await this.load();
        const records = file[symbol];
        if (!records) return [];
        return JsonBarMapper.toDomainArray(records, symbol);
    }

    private async load(): Promise<JsonBarFile> {
        if (this.file) return this.file;

        const content = await readFile(this.filePath, 'utf-8');
        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new InputFormatError(this.filePath, [`JSON parse error: ${message}`]);
        }

        const result = jsonBarFileSchema.safeParse(raw);
        if (!result.success) {
            throw new InputFormatError(
                this.filePath,
                result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
            );
        }

        this.file = result.data;
        return this.file;
    }
}
