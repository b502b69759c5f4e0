export type CarbonErrorCode =
    | "PROFILE_NOT_FOUND"
    | "UNKNOWN_GRID_INTENSITY"
    | "INVALID_SAMPLE"
    | "CONFIGURATION_ERROR"
    | "INVALID_INPUT";

export class CarbonMeterError extends Error {
    readonly code: CarbonErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(code: CarbonErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
    }
}

export class ProfileNotFound extends CarbonMeterError {
    readonly instanceClass: string;

    constructor(instanceClass: string) {
        super("PROFILE_NOT_FOUND", `no hardware profile for instance class '${instanceClass}'`, { instanceClass });
        this.instanceClass = instanceClass;
    }
}

export class UnknownGridIntensity extends CarbonMeterError {
    readonly region: string;

    constructor(region: string) {
        super("UNKNOWN_GRID_INTENSITY", `no grid carbon intensity for region '${region}'`, { region });
        this.region = region;
    }
}

export class InvalidSample extends CarbonMeterError {
    constructor(reason: string, details?: Record<string, unknown>) {
        super("INVALID_SAMPLE", `invalid usage sample: ${reason}`, details);
    }
}

export class ConfigurationError extends CarbonMeterError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("CONFIGURATION_ERROR", message, details);
    }
}

export class InvalidInput extends CarbonMeterError {
    constructor(message: string, details?: Record<string, unknown>) {
        super("INVALID_INPUT", message, details);
    }
}

/**
 * Per-sample failures: the sample is excluded and counted, the run continues.
 */
export function isRecoverable(error: unknown): error is ProfileNotFound | UnknownGridIntensity | InvalidSample {
    return error instanceof ProfileNotFound
        || error instanceof UnknownGridIntensity
        || error instanceof InvalidSample;
}
