import { describe, it, expect } from 'vitest';
import {
    parseInches,
    parsePercentage,
    parseTemperature,
    parseText,
    parseValue,
    parseWind,
} from '../src/services/unitParser';

describe('parseTemperature', () => {
    it('strips the degree symbol and unit letter', () => {
        expect(parseTemperature('55 °F')).toBe(55);
        expect(parseTemperature('55°F')).toBe(55);
        expect(parseTemperature('12.5 °C')).toBe(12.5);
        expect(parseTemperature('-3 °')).toBe(-3);
        expect(parseTemperature('48')).toBe(48);
    });

    it('returns null for missing or non-numeric content', () => {
        expect(parseTemperature('')).toBeNull();
        expect(parseTemperature('N/A')).toBeNull();
        expect(parseTemperature(undefined)).toBeNull();
        expect(parseTemperature('°F')).toBeNull();
        expect(parseTemperature('55 °F approx')).toBeNull();
        expect(parseTemperature('warm')).toBeNull();
    });
});

describe('parsePercentage', () => {
    it('parses whole percentages', () => {
        expect(parsePercentage('77 %')).toBe(77);
        expect(parsePercentage('77%')).toBe(77);
        expect(parsePercentage(' 0 % ')).toBe(0);
    });

    it('rejects fractions and text', () => {
        expect(parsePercentage('77.5 %')).toBeNull();
        expect(parsePercentage('%')).toBeNull();
        expect(parsePercentage('N/A')).toBeNull();
    });
});

describe('parseInches', () => {
    it('strips the inch suffix', () => {
        expect(parseInches('29.60 in')).toBe(29.6);
        expect(parseInches('0.0 in')).toBe(0);
        expect(parseInches('0.01in')).toBe(0.01);
    });

    it('returns null for unreadable amounts', () => {
        expect(parseInches('in')).toBeNull();
        expect(parseInches('-- in')).toBeNull();
        expect(parseInches('')).toBeNull();
    });
});

describe('parseWind', () => {
    it('reads speed and direction from the combined token', () => {
        expect(parseWind('12 mph E')).toEqual({ speed: 12, direction: 'E', gust: null });
        expect(parseWind('  9   mph   ENE ')).toEqual({ speed: 9, direction: 'ENE', gust: null });
        expect(parseWind('7 SW')).toEqual({ speed: 7, direction: 'SW', gust: null });
    });

    it('does not mistake the unit for a direction', () => {
        expect(parseWind('12 mph')).toEqual({ speed: 12, direction: null, gust: null });
        expect(parseWind('12 MPH')).toEqual({ speed: 12, direction: null, gust: null });
        expect(parseWind('20 km/h')).toEqual({ speed: 20, direction: null, gust: null });
    });

    it('blanks every field when the speed is unreadable', () => {
        const absent = { speed: null, direction: null, gust: null };
        expect(parseWind('')).toEqual(absent);
        expect(parseWind('Calm')).toEqual(absent);
        expect(parseWind('mph E')).toEqual(absent);
        expect(parseWind(undefined)).toEqual(absent);
    });
});

describe('parseValue', () => {
    it('dispatches on the unit kind', () => {
        expect(parseValue('55 °F', 'temperature')).toBe(55);
        expect(parseValue('77 %', 'percentage')).toBe(77);
        expect(parseValue('29.60 in', 'inches')).toBe(29.6);
    });

    it('never throws and yields null for inputs without a number', () => {
        const junk = ['', 'N/A', '--', '   ', '°', '%', 'in', 'NaN', 'Infinity', '1e', '\u0000', '∞ °F', '12 34'];
        for (const text of junk) {
            for (const kind of ['temperature', 'percentage', 'inches'] as const) {
                expect(() => parseValue(text, kind)).not.toThrow();
                expect(parseValue(text, kind)).toBeNull();
            }
            expect(() => parseWind(text)).not.toThrow();
        }
    });
});

describe('parseText', () => {
    it('keeps text and drops placeholders', () => {
        expect(parseText(' Mostly  Cloudy ')).toBe('Mostly Cloudy');
        expect(parseText('N/A')).toBeNull();
        expect(parseText('')).toBeNull();
    });
});
