import { Bar } from '../../domain/entities/Bar';
import { JsonBarRecord } from './types/JsonBarTypes';

export class JsonBarMapper {
    static toDomain(data: JsonBarRecord, symbol: string): Bar {
        // ISO strings are parsed, numbers are taken as epoch milliseconds
        const timestamp = typeof data.timestamp === 'string' ? Date.parse(data.timestamp) : data.timestamp;

        return new Bar(
            timestamp,
            data.open ?? NaN,
            data.high ?? NaN,
            data.low ?? NaN,
            data.close ?? NaN,
            // absent volume reads as 0, an explicit null marks the bar malformed
            data.volume === null ? NaN : data.volume ?? 0,
            symbol
        );
    }

    static toDomainArray(dataArray: JsonBarRecord[], symbol: string): Bar[] {
        return dataArray.map(data => this.toDomain(data, symbol));
    }
}
