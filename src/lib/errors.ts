// src/lib/errors.ts

/**
 * Fatal setup error - the run must not start
 * (numStations > numSlots, invalid environment, unsatisfiable demand)
 */
export class ConfigurationError extends Error {
    public statusCode = 400;
    public details?: Record<string, unknown>;

    constructor(message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'ConfigurationError';
        this.details = details;
    }
}

export class ValidationError extends Error {
    public statusCode = 400;
    public details?: Record<string, unknown>;

    constructor(message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'ValidationError';
        this.details = details;
    }
}

/**
 * External decision source failed (transport, timeout, bad payload)
 * Always recovered locally by the validator fallback
 */
export class DecisionSourceError extends Error {
    public stationId?: string;

    constructor(message: string, stationId?: string) {
        super(message);
        this.name = 'DecisionSourceError';
        this.stationId = stationId;
    }
}

/**
 * Success-record store could not be read or written
 */
export class PersistenceError extends Error {
    public statusCode = 500;
    public path?: string;

    constructor(message: string, path?: string) {
        super(message);
        this.name = 'PersistenceError';
        this.path = path;
    }
}

export class RunTerminatedError extends Error {
    public statusCode = 409;

    constructor(message = 'Run has terminated; no further rounds will be negotiated') {
        super(message);
        this.name = 'RunTerminatedError';
    }
}

export class RoundInProgressError extends Error {
    public statusCode = 409;

    constructor(message = 'A negotiation round is already in progress') {
        super(message);
        this.name = 'RoundInProgressError';
    }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
