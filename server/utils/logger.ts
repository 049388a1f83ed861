// =============================================================================
// Logging
// =============================================================================

export type LogData = Record<string, unknown>;

function serialize(event: string, data: LogData): string {
    return JSON.stringify({
        ts: new Date().toISOString(),
        event,
        ...data
    });
}

export function log(event: string, data: LogData = {}): void {
    console.log(serialize(event, data));
}

export function logError(event: string, error: unknown, data: LogData = {}): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(serialize(event, { ...data, error: message }));
}
