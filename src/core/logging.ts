/**
 * @module core/logging
 * @description Structured logging of buffer lifecycle events
 *
 * Vectors report allocations, reallocations, releases, adoptions and moves to the
 * configured logger. A reallocation invalidates any view previously obtained from
 * the vector, so those events are the ones worth watching.
 *
 * Errors are never logged here: they are thrown to the caller.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Buffer lifecycle event
 */
export type VectorEventType = 'allocate' | 'reallocate' | 'release' | 'adopt' | 'move';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Logical source of the entry (library consumer, test name...) */
    source: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Event reported by a vector
 */
export interface VectorEvent {
    event: VectorEventType;
    level: LogLevel;
    /** Operation that triggered the event (resize, insert, adopt...) */
    operation: string;
    /** Element kind of the vector */
    kind: string;
    previousLength: number;
    length: number;
}

/**
 * Vector event log entry
 */
export interface VectorLogEntry extends BaseLogEntry, VectorEvent {
    logType: 'vector';
}

/**
 * Logger interface
 */
export interface Logger {
    /** Log a vector lifecycle event */
    logEvent(event: VectorEvent): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Source name stamped on every entry */
    source?: string;
    /** Minimum level to record */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';
const DEFAULT_SOURCE = 'numvec';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Level attached to each lifecycle event
 */
export const EVENT_LEVELS: Record<VectorEventType, LogLevel> = {
    allocate: 'debug',
    release: 'debug',
    move: 'debug',
    adopt: 'info',
    reallocate: 'info',
};

/**
 * Check whether `level` passes the `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

// ==================== Silent Logger ====================

/**
 * Silent Logger: discards everything (library default)
 */
export class SilentLogger implements Logger {
    logEvent(_event: VectorEvent): void { /* no-op */ }
    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console (for debugging)
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private source: string;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.source = DEFAULT_SOURCE;
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.source = levelOrConfig.source ?? DEFAULT_SOURCE;
        }
    }

    logEvent(event: VectorEvent): void {
        if (!isLevelEnabled(event.level, this.level)) {
            return;
        }
        console.log(
            `[${event.event.toUpperCase()}] ${this.source} ${event.operation}<${event.kind}>: ` +
            `length ${event.previousLength} -> ${event.length}`
        );
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for inspecting reallocation behaviour.
 */
export class MemoryLogger implements Logger {
    private config: { source: string; level: LogLevel; schemaVersion: string };
    public entries: VectorLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.config = {
            source: config.source ?? DEFAULT_SOURCE,
            level: config.level ?? 'debug',
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            source: this.config.source,
            timestamp: Date.now(),
        };
    }

    logEvent(event: VectorEvent): void {
        if (!isLevelEnabled(event.level, this.config.level)) {
            return;
        }
        this.entries.push({
            ...this.createBaseEntry(),
            logType: 'vector',
            ...event,
        });
    }

    /** Entries of a given event type */
    byEvent(event: VectorEventType): VectorLogEntry[] {
        return this.entries.filter(entry => entry.event === event);
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({ entries: this.entries }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.entries.map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.entries = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logEvent(event: VectorEvent): void {
        for (const logger of this.loggers) {
            logger.logEvent(event);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory' | 'silent',
    config: LoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
        case 'silent':
            return new SilentLogger();
    }
}
