import { z } from 'zod';

// Prices may be null in exported files; such rows become malformed bars.
const price = z.number().nullable();

export const jsonBarRecordSchema = z.object({
    timestamp: z.union([z.number(), z.string()]),
    open: price,
    high: price,
    low: price,
    close: price,
    volume: price.optional()
});

export const jsonBarFileSchema = z.record(z.string(), z.array(jsonBarRecordSchema));

export type JsonBarRecord = z.infer<typeof jsonBarRecordSchema>;
export type JsonBarFile = z.infer<typeof jsonBarFileSchema>;
