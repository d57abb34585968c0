/*
|----------------------------------------------------------------------------
| log.ts — prefixed console logging for sheets and dismissal interception
|----------------------------------------------------------------------------
*/

const PREFIX_SHEET = '[Sheet]';
const PREFIX_INTERCEPT = '[Intercept]';

export type LogPayload = { detent?: string; reason?: string; [key: string]: unknown };

let verbose = false;

export function setLogVerbose(value: boolean): void {
    verbose = value;
}

export function isLogVerbose(): boolean {
    return verbose;
}

function format(prefix: string, message: string, payload?: LogPayload): string {
    const parts = [prefix, message];
    if (payload && Object.keys(payload).length > 0) {
        parts.push(JSON.stringify(payload));
    }
    return parts.join(' ');
}

export function logSheet(message: string, payload?: LogPayload): void {
    if (verbose) console.log(format(PREFIX_SHEET, message, payload));
}

export function logIntercept(message: string, payload?: LogPayload): void {
    if (verbose) console.log(format(PREFIX_INTERCEPT, message, payload));
}

/** Always printed, verbose or not. */
export function warnSheet(message: string, payload?: LogPayload): void {
    console.warn(format(PREFIX_SHEET, message, payload));
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
