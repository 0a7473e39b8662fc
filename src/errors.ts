export type ScenarioErrorCode =
    | "NO_ROUTES"
    | "NO_POINTS"
    | "MISSING_ENTRY"
    | "INVALID_OPTIONS"
    | "FRAME_STATE";

// Fatal: nothing gets written once one of these is thrown.
export class ScenarioError extends Error {
    readonly code: ScenarioErrorCode;

    constructor(code: ScenarioErrorCode, message: string) {
        super(message);
        this.name = "ScenarioError";
        this.code = code;

        Error.captureStackTrace(this, this.constructor);
    }
}
