/**
 * Configuration Loader
 *
 * Reads config.yaml, validates the `trading` and `logging` sections and maps
 * the snake_case file keys onto {@link TurtleConfig}. Keys missing from the
 * file fall back to {@link DefaultTurtleConfig}; keys the engine does not use
 * are ignored.
 */

import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { DefaultTurtleConfig, TurtleConfig } from './turtle.config';
import { ConfigValidationError } from '../domain/errors/TurtleErrors';
import { LogLevel } from '../shared/logger/Logger';

const positiveInt = z.number().int().positive();

const tradingSchema = z.object({
    system1_length: positiveInt.optional(),
    system2_length: positiveInt.optional(),
    use_system2: z.boolean().optional(),
    atr_period: positiveInt.optional(),
    stop_atr_multiple: z.number().positive().optional(),
    exit_length_s1: positiveInt.optional(),
    exit_length_s2: positiveInt.optional(),
    max_units_per_position: positiveInt.optional(),
    pyramid_increment: z.number().positive().optional(),
    max_position_time: positiveInt.optional(),
    sma_window: positiveInt.optional()
});

const loggingSchema = z.object({
    level: z
        .preprocess((v) => (typeof v === 'string' ? v.toUpperCase() : v), z.nativeEnum(LogLevel))
        .optional()
});

const fileSchema = z.object({
    trading: tradingSchema.default({}),
    logging: loggingSchema.default({})
});

export interface LoadedConfig {
    trading: TurtleConfig;
    logLevel: LogLevel;
}

export function parseTurtleConfig(raw: unknown, source: string = 'inline config'): LoadedConfig {
    const result = fileSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigValidationError(
            source,
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const t = result.data.trading;
    return {
        trading: {
            system1Length: t.system1_length ?? DefaultTurtleConfig.system1Length,
            system2Length: t.system2_length ?? DefaultTurtleConfig.system2Length,
            useSystem2: t.use_system2 ?? DefaultTurtleConfig.useSystem2,
            atrPeriod: t.atr_period ?? DefaultTurtleConfig.atrPeriod,
            stopAtrMultiple: t.stop_atr_multiple ?? DefaultTurtleConfig.stopAtrMultiple,
            exitLengthS1: t.exit_length_s1 ?? DefaultTurtleConfig.exitLengthS1,
            exitLengthS2: t.exit_length_s2 ?? DefaultTurtleConfig.exitLengthS2,
            maxUnitsPerPosition: t.max_units_per_position ?? DefaultTurtleConfig.maxUnitsPerPosition,
            pyramidIncrement: t.pyramid_increment ?? DefaultTurtleConfig.pyramidIncrement,
            maxPositionTime: t.max_position_time ?? DefaultTurtleConfig.maxPositionTime,
            smaWindow: t.sma_window ?? DefaultTurtleConfig.smaWindow
        },
        logLevel: result.data.logging.level ?? LogLevel.INFO
    };
}

export function loadTurtleConfig(configPath: string): LoadedConfig {
    if (!existsSync(configPath)) {
        throw new ConfigValidationError(configPath, ['file not found']);
    }

    const content = readFileSync(configPath, 'utf-8');
    let raw: unknown;
    try {
        raw = parse(content);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigValidationError(configPath, [`YAML parse error: ${message}`]);
    }

    return parseTurtleConfig(raw, configPath);
}
