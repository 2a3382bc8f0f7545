/**
 * @module core/config
 * @description Library-wide configuration
 *
 * Holds the logger vectors report lifecycle events to and the default options used
 * when a vector is rendered with `toString()`.
 */

import { ConfigError } from './errors';
import { SilentLogger, type Logger } from './logging';

// ==================== Types ====================

/**
 * Rendering options for vectors and extremum results
 */
export interface FormatOptions {
    /** Rendering of a vector without storage */
    empty: string;
    /** Separator placed between elements */
    separator: string;
    /** Fixed number of decimals for number elements (bigint elements ignore it) */
    precision?: number;
}

/**
 * Resolved configuration
 */
export interface NumvecConfig {
    logger: Logger;
    format: FormatOptions;
}

/**
 * Partial configuration accepted by `configure`
 */
export interface NumvecConfigInput {
    logger?: Logger;
    format?: Partial<FormatOptions>;
}

/**
 * Result of configuration validation
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Defaults ====================

export const DEFAULT_FORMAT: Readonly<FormatOptions> = {
    empty: '[]',
    separator: ', ',
};

function createDefaultConfig(): NumvecConfig {
    return {
        logger: new SilentLogger(),
        format: { ...DEFAULT_FORMAT },
    };
}

let current: NumvecConfig = createDefaultConfig();

// ==================== Validation ====================

/**
 * Validate a configuration input
 */
export function validateConfig(input: NumvecConfigInput): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (typeof input !== 'object' || input === null) {
        return { valid: false, errors: ['config must be an object'], warnings };
    }

    if (input.logger !== undefined) {
        if (typeof input.logger !== 'object' || input.logger === null || typeof input.logger.logEvent !== 'function') {
            errors.push('logger must implement logEvent()');
        }
    }

    const format = input.format;
    if (format !== undefined) {
        if (format.empty !== undefined && typeof format.empty !== 'string') {
            errors.push('format.empty must be a string');
        }
        if (format.separator !== undefined && typeof format.separator !== 'string') {
            errors.push('format.separator must be a string');
        }
        if (
            format.precision !== undefined &&
            (!Number.isInteger(format.precision) || format.precision < 0 || format.precision > 100)
        ) {
            errors.push('format.precision must be an integer between 0 and 100');
        }

        if (typeof format.empty === 'string' && format.empty !== DEFAULT_FORMAT.empty) {
            warnings.push(
                `format.empty is '${format.empty}': empty vectors will not render as ${DEFAULT_FORMAT.empty}`
            );
        }
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

// ==================== Accessors ====================

/**
 * Validate and merge configuration into the current settings
 */
export function configure(input: NumvecConfigInput): NumvecConfig {
    const result = validateConfig(input);
    if (!result.valid) {
        throw new ConfigError(result.errors);
    }

    current = {
        logger: input.logger ?? current.logger,
        format: { ...current.format, ...input.format },
    };
    return getConfig();
}

export function getConfig(): NumvecConfig {
    return current;
}

/**
 * Restore the defaults (silent logger, canonical formatting)
 */
export function resetConfig(): NumvecConfig {
    current = createDefaultConfig();
    return current;
}
