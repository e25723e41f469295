//
//
//

import { Duration } from "./time";

export function sleep(duration: Duration): Promise<void> {
    // eslint-disable-next-line no-promise-executor-return
    return new Promise((resolve) => setTimeout(resolve, duration.milliseconds));
}

/**
 * Pads or truncates the given text so that it is exactly `width` characters long.
 * Width is measured in code points, so box-drawing glyphs count as one.
 */
export function fitText(text: string, width: number): string {
    const chars = Array.from(text);
    if (chars.length >= width) {
        return chars.slice(0, Math.max(0, width)).join("");
    }

    return text + " ".repeat(width - chars.length);
}
