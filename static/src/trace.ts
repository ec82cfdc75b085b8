/** Receives one line of diagnostic output. Parsing is silent unless one is passed in. */
export type TraceHook = (message: string) => void;

/** Trace hook printing to the console */
export const consoleTrace: TraceHook = (message) => {
    console.log(message);
};

export function hex(value: number, digits: number = 2): string {
    return `0x${value.toString(16).toUpperCase().padStart(digits, "0")}`;
}
