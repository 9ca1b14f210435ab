import { MISSING_VALUE_MARKERS, WIND_UNITS } from '../../../constants';
import type { WindReading } from '../../../types';

export type UnitKind = 'temperature' | 'percentage' | 'inches';

const DECIMAL_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;

const clean = (raw: string | null | undefined): string | null => {
    if (raw === null || raw === undefined) return null;
    const text = raw.replace(/\s+/g, ' ').trim();
    return MISSING_VALUE_MARKERS.includes(text) ? null : text;
};

const toDecimal = (text: string): number | null => {
    if (!DECIMAL_PATTERN.test(text)) return null;
    const n = Number(text);
    return Number.isFinite(n) ? n : null;
};

const toInteger = (text: string): number | null => {
    if (!INTEGER_PATTERN.test(text)) return null;
    const n = Number.parseInt(text, 10);
    return Number.isSafeInteger(n) ? n : null;
};

/** `"55 °F"`, `"55°"`, `"12.5 °C"` → number. */
export function parseTemperature(raw: string | null | undefined): number | null {
    const text = clean(raw);
    if (text === null) return null;
    return toDecimal(text.replace(/\s*°\s*[FCfc]?$/, '').trim());
}

/** `"77 %"` → 77. Fractional percentages are rejected. */
export function parsePercentage(raw: string | null | undefined): number | null {
    const text = clean(raw);
    if (text === null) return null;
    return toInteger(text.replace(/\s*%$/, '').trim());
}

/** Pressure and precipitation in inches: `"29.60 in"` → 29.6. */
export function parseInches(raw: string | null | undefined): number | null {
    const text = clean(raw);
    if (text === null) return null;
    return toDecimal(text.replace(/\s*in$/i, '').trim());
}

/**
 * Parses a combined wind token such as `"12 mph E"`, `"12 mph"` or `"7 SW"`.
 * The combined form never carries a gust, so `gust` is always null here.
 */
export function parseWind(raw: string | null | undefined): WindReading {
    const absent: WindReading = { speed: null, direction: null, gust: null };
    const text = clean(raw);
    if (text === null) return absent;

    const parts = text.split(' ');
    const speed = toDecimal(parts[0] ?? '');
    if (speed === null) return absent;

    let direction: string | null = null;
    if (parts.length > 1) {
        const last = parts[parts.length - 1];
        if (!WIND_UNITS.includes(last.toLowerCase())) {
            direction = last;
        }
    }

    return { speed, direction, gust: null };
}

export function parseValue(raw: string | null | undefined, kind: UnitKind): number | null {
    switch (kind) {
        case 'temperature':
            return parseTemperature(raw);
        case 'percentage':
            return parsePercentage(raw);
        case 'inches':
            return parseInches(raw);
    }
}

/** Free text such as a condition phrase; blank and placeholder values become null. */
export function parseText(raw: string | null | undefined): string | null {
    return clean(raw);
}
