/**
 * An area of interest. Geometry stays with the caller: the toolkit only
 * needs a name for outputs and a buffered outline to crop with.
 */
export interface Site {
    /** Prefix for output file names, joined with `_`. */
    basename: string;
    /** Outline grown by `distance` map units, as WKT. */
    bufferedWkt(distance: number): string;
}

export function isSite(value: unknown): value is Site {
    return (
        typeof value === "object" &&
        value !== null &&
        "basename" in value &&
        typeof value.basename === "string" &&
        "bufferedWkt" in value &&
        typeof value.bufferedWkt === "function"
    );
}
