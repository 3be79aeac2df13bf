import { describe, it, expect } from 'vitest';
import {
  cleanText,
  parseAge,
  parseControlTime,
  parseCount,
  parseDecimal,
  parseEventDate,
  parseFraction,
  parseHeight,
  parsePercentage,
  parseReach,
  parseRecord,
  parseWeight,
} from '../../src/pipeline/normalizer.js';

describe('parseControlTime', () => {
  it('should convert M:SS to seconds', () => {
    expect(parseControlTime('4:32')).toBe(272);
    expect(parseControlTime('0:00')).toBe(0);
    expect(parseControlTime(' 15:07 ')).toBe(907);
  });

  it('should equal 60*M+SS across the minute range', () => {
    for (let minutes = 0; minutes <= 25; minutes++) {
      for (const seconds of [0, 1, 30, 59]) {
        const text = `${minutes}:${String(seconds).padStart(2, '0')}`;
        expect(parseControlTime(text)).toBe(60 * minutes + seconds);
      }
    }
  });

  it('should map blank markers to 0', () => {
    expect(parseControlTime('')).toBe(0);
    expect(parseControlTime('--')).toBe(0);
    expect(parseControlTime('---')).toBe(0);
  });

  it('should map malformed times to 0', () => {
    expect(parseControlTime('4:32:10')).toBe(0);
    expect(parseControlTime('four')).toBe(0);
    expect(parseControlTime('4:xx')).toBe(0);
  });
});

describe('parseFraction', () => {
  it('should parse "X of Y"', () => {
    expect(parseFraction('12 of 34')).toEqual({ landed: 12, attempted: 34 });
    expect(parseFraction('0 of 0')).toEqual({ landed: 0, attempted: 0 });
  });

  it('should treat a bare integer as landed with nothing attempted', () => {
    expect(parseFraction('5')).toEqual({ landed: 5, attempted: 0 });
  });

  it('should fall back to 0/0', () => {
    expect(parseFraction('')).toEqual({ landed: 0, attempted: 0 });
    expect(parseFraction('---')).toEqual({ landed: 0, attempted: 0 });
    expect(parseFraction('of 5')).toEqual({ landed: 0, attempted: 0 });
    expect(parseFraction('-3')).toEqual({ landed: 0, attempted: 0 });
  });
});

describe('parseCount', () => {
  it('should parse digits and default everything else to 0', () => {
    expect(parseCount('2')).toBe(2);
    expect(parseCount(' 11 ')).toBe(11);
    expect(parseCount('--')).toBe(0);
    expect(parseCount('1.5')).toBe(0);
  });
});

describe('parseEventDate', () => {
  it('should convert long-form dates to ISO-8601', () => {
    expect(parseEventDate('February 21, 2026')).toBe('2026-02-21');
    expect(parseEventDate('March 1, 2026')).toBe('2026-03-01');
    expect(parseEventDate('  December 31, 1999 ')).toBe('1999-12-31');
  });

  it('should accept month names in any case', () => {
    expect(parseEventDate('MARCH 1, 2026')).toBe('2026-03-01');
  });

  it('should pass unparseable dates through trimmed', () => {
    expect(parseEventDate('TBD')).toBe('TBD');
    expect(parseEventDate(' Feb 21, 2026 ')).toBe('Feb 21, 2026');
    expect(parseEventDate('February 30, 2026')).toBe('February 30, 2026');
    expect(parseEventDate('')).toBe('');
  });
});

describe('parseAge', () => {
  const today = new Date(2026, 9, 18);

  it('should count whole years up to today', () => {
    expect(parseAge('Jul 19, 1996', today)).toBe(30);
    expect(parseAge('Oct 18, 1990', today)).toBe(36);
    expect(parseAge('Oct 19, 1990', today)).toBe(35);
  });

  it('should accept full month names', () => {
    expect(parseAge('December 1, 2000', today)).toBe(25);
  });

  it('should return null for missing or malformed dates', () => {
    expect(parseAge('--', today)).toBeNull();
    expect(parseAge('', today)).toBeNull();
    expect(parseAge(undefined, today)).toBeNull();
    expect(parseAge('1996-07-19', today)).toBeNull();
  });
});

describe('parsePercentage', () => {
  it('should convert percentages to fractions', () => {
    expect(parsePercentage('50%')).toBe(0.5);
    expect(parsePercentage('48%')).toBe(0.48);
    expect(parsePercentage('100%')).toBe(1);
    expect(parsePercentage('0%')).toBe(0);
  });

  it('should return null for blanks and junk', () => {
    expect(parsePercentage('--')).toBeNull();
    expect(parsePercentage('')).toBeNull();
    expect(parsePercentage(undefined)).toBeNull();
    expect(parsePercentage('n/a')).toBeNull();
  });
});

describe('parseDecimal', () => {
  it('should parse decimal averages', () => {
    expect(parseDecimal('4.12')).toBe(4.12);
    expect(parseDecimal('0.00')).toBe(0);
  });

  it('should return null for blanks and junk', () => {
    expect(parseDecimal('--')).toBeNull();
    expect(parseDecimal('abc')).toBeNull();
  });
});

describe('parseHeight', () => {
  it('should convert feet and inches to inches', () => {
    expect(parseHeight(`5' 7"`)).toBe(67);
    expect(parseHeight(`6' 0"`)).toBe(72);
  });

  it('should treat a missing inches segment as whole feet', () => {
    expect(parseHeight(`6'`)).toBe(72);
    expect(parseHeight('6')).toBe(72);
  });

  it('should return null for blanks and junk', () => {
    expect(parseHeight('--')).toBeNull();
    expect(parseHeight(`five' 7"`)).toBeNull();
    expect(parseHeight(`5' x"`)).toBeNull();
  });
});

describe('parseWeight', () => {
  it('should strip the unit', () => {
    expect(parseWeight('155 lbs.')).toBe(155);
    expect(parseWeight('205.5 lbs.')).toBe(205);
  });

  it('should return null for non-numeric weights', () => {
    expect(parseWeight('--')).toBeNull();
    expect(parseWeight('heavy')).toBeNull();
  });
});

describe('parseReach', () => {
  it('should strip the inch mark', () => {
    expect(parseReach('72"')).toBe(72);
    expect(parseReach('70.5"')).toBe(70);
  });

  it('should return null for non-numeric reach', () => {
    expect(parseReach('--')).toBeNull();
  });
});

describe('parseRecord', () => {
  it('should split wins, losses and ties', () => {
    expect(parseRecord('12-3-1')).toEqual({ wins: 12, losses: 3, ties: 1 });
    expect(parseRecord('Record: 20-5-0')).toEqual({ wins: 20, losses: 5, ties: 0 });
  });

  it('should default missing components to 0', () => {
    expect(parseRecord('12-3')).toEqual({ wins: 12, losses: 3, ties: 0 });
    expect(parseRecord('12')).toEqual({ wins: 12, losses: 0, ties: 0 });
  });

  it('should keep the leading count when a note follows it', () => {
    expect(parseRecord('Record: 7-2-0 (1 NC)')).toEqual({ wins: 7, losses: 2, ties: 0 });
  });

  it('should null components without digits', () => {
    expect(parseRecord('--')).toEqual({ wins: null, losses: null, ties: null });
  });
});

describe('cleanText', () => {
  it('should trim and null out placeholders', () => {
    expect(cleanText(' Orthodox ')).toBe('Orthodox');
    expect(cleanText('')).toBeNull();
    expect(cleanText('--')).toBeNull();
    expect(cleanText(undefined)).toBeNull();
  });
});
