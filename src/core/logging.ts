/**
 * @module core/logging
 * @description Structured logging for device construction and link evaluation
 *
 * Entries follow fixed, versioned field schemas (append-only) so that logs written by
 * different scenario runs can be compared. ConsoleLogger and MemoryLogger work in all
 * environments.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Scenario identifier */
    scenario: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Device construction entry
 */
export interface DeviceLogEntry extends BaseLogEntry {
    logType: 'device';
    deviceId: string;
    kind: string;
    carrierFreqGhz: number;
    fsplConstantDb: number;
}

/**
 * Link evaluation entry
 */
export interface LinkLogEntry extends BaseLogEntry {
    logType: 'link';
    txId: string;
    rxId: string;
    distanceM: number;
    txPowerDbm: number;
    pathLossDb: number;
    rxPowerDbm: number;
    snrDb: number;
    marginDb: number;
    feasible: boolean;
}

/**
 * Union of all log entry types
 */
export type LogEntry = DeviceLogEntry | LinkLogEntry;

/** Fields filled in by the logger itself */
type LoggerManagedFields = 'logType' | 'schemaVersion' | 'scenario' | 'timestamp';

export type DeviceLogInput = Omit<DeviceLogEntry, LoggerManagedFields>;
export type LinkLogInput = Omit<LinkLogEntry, LoggerManagedFields>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a device construction */
    logDevice(entry: DeviceLogInput): void;
    /** Log a link evaluation */
    logLink(entry: LinkLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Scenario name */
    scenario: string;
    /** Schema version */
    schemaVersion?: string;
    /** Minimum console level (ConsoleLogger only) */
    level?: LogLevel;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console
 *
 * Device entries print at `debug`, feasible links at `info`, infeasible links at `warn`.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private scenario: string;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.scenario = 'default';
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.scenario = levelOrConfig.scenario;
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logDevice(entry: DeviceLogInput): void {
        if (this.enabled('debug')) {
            console.debug(
                `[DEVICE] ${this.scenario} ${entry.kind} ${entry.deviceId}: ` +
                `f=${entry.carrierFreqGhz}GHz, fsplConst=${entry.fsplConstantDb.toFixed(2)}dB`
            );
        }
    }

    logLink(entry: LinkLogInput): void {
        const line =
            `[LINK] ${this.scenario} ${entry.txId}->${entry.rxId}: ` +
            `d=${entry.distanceM}m, PL=${entry.pathLossDb.toFixed(2)}dB, ` +
            `SNR=${entry.snrDb.toFixed(2)}dB, margin=${entry.marginDb.toFixed(2)}dB`;

        if (entry.feasible) {
            if (this.enabled('info')) console.info(line);
        } else if (this.enabled('warn')) {
            console.warn(line);
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for post-run inspection of a scenario.
 */
export class MemoryLogger implements Logger {
    private config: { scenario: string; schemaVersion: string };
    public devices: DeviceLogEntry[] = [];
    public links: LinkLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            scenario: config.scenario,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            scenario: this.config.scenario,
            timestamp: Date.now(),
        };
    }

    logDevice(entry: DeviceLogInput): void {
        this.devices.push({
            ...this.createBaseEntry(),
            logType: 'device',
            ...entry,
        });
    }

    logLink(entry: LinkLogInput): void {
        this.links.push({
            ...this.createBaseEntry(),
            logType: 'link',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.devices, ...this.links];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            devices: this.devices,
            links: this.links,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.devices = [];
        this.links = [];
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

    logDevice(entry: DeviceLogInput): void {
        for (const logger of this.loggers) {
            logger.logDevice(entry);
        }
    }

    logLink(entry: LinkLogInput): void {
        for (const logger of this.loggers) {
            logger.logLink(entry);
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
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
