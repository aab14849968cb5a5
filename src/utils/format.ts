/**
 * Display helpers for the CLI
 */

import type { ParsedHeader } from "../core/types";

const MAX_VALUE_LENGTH = 50;

/**
 * One line per tag, in stream order: `Name [VR] : value`
 */
export function formatHeaderLines(header: ParsedHeader): string[] {
    const lines: string[] = [];
    for (const [name, tag] of header) {
        lines.push(`${name} [${tag.vr}] : ${formatValue(tag.values)}`);
    }
    return lines;
}

/**
 * Display form of a tag's values, truncated to fit one line
 */
export function formatValue(values: unknown[]): string {
    let displayValue: string;
    if (values.length === 0) {
        displayValue = "(empty)";
    } else {
        displayValue = values
            .map((value) => {
                if (value instanceof Uint8Array) {
                    return `[Binary Data: ${value.length} bytes]`;
                }
                if (typeof value === "object" && value !== null) {
                    return "[Protocol]";
                }
                return String(value);
            })
            .join(", ");
    }

    if (displayValue.length > MAX_VALUE_LENGTH) {
        displayValue = displayValue.substring(0, MAX_VALUE_LENGTH - 3) + "...";
    }
    return displayValue;
}
