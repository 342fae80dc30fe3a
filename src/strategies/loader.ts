/**
 * Strategy Loader
 *
 * Reads strategy definitions from a JSON file: an array of
 * { kind, name?, params? } entries. Anything malformed is a ConfigError.
 */

import fs from 'fs';
import path from 'path';
import { ConfigError } from '../core/errors';
import { LOG_PREFIX } from '../config/constants';
import logger from '../utils/logger';
import { StrategyConfig } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy numeric params from untyped JSON, rejecting unknown keys and non-numbers
 */
function readParams<K extends string>(
    raw: unknown,
    allowed: readonly K[],
    where: string
): Partial<Record<K, number>> {
    if (raw === undefined) return {};
    if (!isRecord(raw)) {
        throw new ConfigError(`${where}: params must be an object`);
    }

    const params: Partial<Record<K, number>> = {};
    for (const [key, value] of Object.entries(raw)) {
        const match = allowed.find(k => k === key);
        if (match === undefined) {
            throw new ConfigError(`${where}: unknown param "${key}" (allowed: ${allowed.join(', ')})`);
        }
        if (typeof value !== 'number') {
            throw new ConfigError(`${where}: param "${key}" must be a number, got ${typeof value}`);
        }
        params[match] = value;
    }
    return params;
}

export function parseStrategyConfig(raw: unknown, index: number = 0): StrategyConfig {
    const where = `strategies[${index}]`;
    if (!isRecord(raw)) {
        throw new ConfigError(`${where}: expected an object`);
    }

    const { kind, name, params } = raw;
    if (name !== undefined && typeof name !== 'string') {
        throw new ConfigError(`${where}: name must be a string`);
    }
    const displayName = typeof name === 'string' ? name : undefined;

    switch (kind) {
        case 'ma_crossover':
            return {
                kind: 'ma_crossover',
                name: displayName,
                params: readParams(params, ['shortWindow', 'longWindow', 'quantity'], where),
            };
        case 'momentum':
            return {
                kind: 'momentum',
                name: displayName,
                params: readParams(params, ['lookback', 'buyThreshold', 'sellThreshold', 'quantity'], where),
            };
        case 'macd':
            return {
                kind: 'macd',
                name: displayName,
                params: readParams(params, ['fastPeriod', 'slowPeriod', 'signalPeriod', 'quantity'], where),
            };
        default:
            throw new ConfigError(`${where}: unknown strategy kind ${String(kind)}`);
    }
}

export function parseStrategyConfigs(raw: unknown): StrategyConfig[] {
    if (!Array.isArray(raw)) {
        throw new ConfigError('Strategy definitions must be a JSON array');
    }
    return raw.map((entry: unknown, index) => parseStrategyConfig(entry, index));
}

export function loadStrategyConfigs(filePath: string): StrategyConfig[] {
    const resolved = path.resolve(filePath);
    logger.info(`${LOG_PREFIX.CONFIG} loading strategies from ${resolved}`);

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Cannot read strategy file ${resolved}: ${reason}`, { file: resolved });
    }

    const configs = parseStrategyConfigs(parsed);
    logger.info(`${LOG_PREFIX.CONFIG} loaded ${configs.length} strategies`);
    return configs;
}
