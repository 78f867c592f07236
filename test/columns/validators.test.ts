import { describe, expect, it } from 'vitest';
import type { ColumnDefinition } from '../../src/columns/types.js';
import {
  formatDuration,
  isoWeekOf,
  parseDuration,
  readOptions,
  validateCheckbox,
  validateColor,
  validateCountry,
  validateDate,
  validateDropdown,
  validateEmail,
  validateHour,
  validateIdList,
  validateLink,
  validateLocation,
  validateNumber,
  validatePhone,
  validateRating,
  validateStatus,
  validateText,
  validateTimeTracking,
  validateTimeline,
  validateTimezone,
  validateWeek,
} from '../../src/columns/validators.js';

function column(type: string, settings: Record<string, unknown> = {}, title = 'Field'): ColumnDefinition {
  return { id: `${type}_col`, title, type, settings };
}

const statusColumn = column('status', { labels: { '0': 'Working on it', '1': 'Done', '2': 'Stuck' } }, 'Status');
const dropdownColumn = column('dropdown', { labels: [{ id: 2, name: 'Blue' }, { id: 1, name: 'Red' }] }, 'Colors');

describe('validateText', () => {
  it('collapses whitespace', () => {
    expect(validateText(column('text'), '  hello \n  world ')).toEqual({ ok: true, value: 'hello world' });
  });

  it('rejects blank text and non-scalars', () => {
    const blank = validateText(column('text'), '   ');
    expect(blank.ok).toBe(false);
    if (!blank.ok) expect(blank.error.reason).toBe('Text cannot be empty');

    const object = validateText(column('text'), {});
    expect(object.ok).toBe(false);
    if (!object.ok) expect(object.error.reason).toBe('Expected text, got an object');
  });
});

describe('validateNumber', () => {
  it('accepts numbers and numeric strings', () => {
    expect(validateNumber(column('numbers'), 3)).toEqual({ ok: true, value: 3 });
    expect(validateNumber(column('numbers'), ' 42.5 ')).toEqual({ ok: true, value: 42.5 });
  });

  it('rejects non-numeric and non-finite input', () => {
    const text = validateNumber(column('numbers'), 'abc');
    expect(text.ok).toBe(false);
    if (!text.ok) expect(text.error.reason).toBe('Expected a finite number, got "abc"');

    expect(validateNumber(column('numbers'), Infinity).ok).toBe(false);
    expect(validateNumber(column('numbers'), '').ok).toBe(false);
  });

  it('takes strings in decimal notation only', () => {
    expect(validateNumber(column('numbers'), '-7')).toEqual({ ok: true, value: -7 });
    for (const raw of ['0x10', '1e3', 'Infinity', '1.', '+5']) {
      expect(validateNumber(column('numbers'), raw).ok).toBe(false);
    }
  });
});

describe('validateDate', () => {
  const dateColumn: ColumnDefinition = { id: 'date_col', title: 'Due', type: 'date', settings: {} };

  it('accepts an ISO calendar date', () => {
    expect(validateDate(dateColumn, '2025-03-09')).toEqual({ ok: true, value: { date: '2025-03-09' } });
  });

  it('rejects dates that do not exist', () => {
    const result = validateDate(dateColumn, '2025-02-30');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('"2025-02-30" is not a real calendar date');
  });

  it('splits a local date-time into date and time', () => {
    expect(validateDate(dateColumn, '2025-03-09T14:30')).toEqual({
      ok: true,
      value: { date: '2025-03-09', time: '14:30:00' },
    });
  });

  it('converts offsets to UTC, crossing the day boundary', () => {
    expect(validateDate(dateColumn, '2025-03-09T23:30:00+02:00')).toEqual({
      ok: true,
      value: { date: '2025-03-09', time: '21:30:00' },
    });
    expect(validateDate(dateColumn, '2025-03-09T23:30:00-02:00')).toEqual({
      ok: true,
      value: { date: '2025-03-10', time: '01:30:00' },
    });
  });

  it('accepts a {date, time} object', () => {
    expect(validateDate(dateColumn, { date: '2025-03-09', time: '08:05' })).toEqual({
      ok: true,
      value: { date: '2025-03-09', time: '08:05:00' },
    });
  });

  it('rejects DD/MM/YYYY without guessing when both readings are valid', () => {
    const result = validateDate(dateColumn, '03/09/2025');
    expect(result).toEqual({
      ok: false,
      error: {
        field: 'date_col',
        title: 'Due',
        value: '03/09/2025',
        reason: 'Ambiguous date format "03/09/2025"; use ISO 8601 YYYY-MM-DD',
      },
    });
  });

  it('suggests the ISO form when only one reading is a real date', () => {
    const result = validateDate(dateColumn, '25/12/2025');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.suggestions).toEqual(['2025-12-25']);
  });

  it('rejects slash-separated year-first dates with a suggestion', () => {
    const result = validateDate(dateColumn, '2025/03/09');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('Unsupported date format "2025/03/09"; use ISO 8601 YYYY-MM-DD');
      expect(result.error.suggestions).toEqual(['2025-03-09']);
    }
  });
});

describe('validateEmail', () => {
  it('accepts a well-formed address', () => {
    expect(validateEmail(column('email'), ' ana@example.com ')).toEqual({ ok: true, value: 'ana@example.com' });
  });

  it('rejects anything else', () => {
    expect(validateEmail(column('email'), 'not-an-email').ok).toBe(false);
    expect(validateEmail(column('email'), 12).ok).toBe(false);
  });
});

describe('validatePhone', () => {
  it('strips separators', () => {
    expect(validatePhone(column('phone'), '+1 (555) 123-4567')).toEqual({ ok: true, value: { phone: '+15551234567' } });
  });

  it('normalizes the country code of an object value', () => {
    expect(validatePhone(column('phone'), { phone: '555 123 4567', country: 'us' })).toEqual({
      ok: true,
      value: { phone: '5551234567', country: 'US' },
    });
  });

  it('rejects short numbers and unknown countries', () => {
    const short = validatePhone(column('phone'), '123');
    expect(short.ok).toBe(false);
    if (!short.ok) expect(short.error.reason).toBe('Phone numbers must be 7 to 15 digits with an optional leading +');

    const country = validatePhone(column('phone'), { phone: '5551234567', country: 'XX' });
    expect(country.ok).toBe(false);
    if (!country.ok) expect(country.error.reason).toBe('Unknown country code "XX" for phone number');
  });
});

describe('validateCheckbox', () => {
  it('maps words and numbers to booleans', () => {
    expect(validateCheckbox(column('checkbox'), 'Yes')).toEqual({ ok: true, value: true });
    expect(validateCheckbox(column('checkbox'), 'unchecked')).toEqual({ ok: true, value: false });
    expect(validateCheckbox(column('checkbox'), 0)).toEqual({ ok: true, value: false });
    expect(validateCheckbox(column('checkbox'), true)).toEqual({ ok: true, value: true });
  });

  it('rejects other words', () => {
    expect(validateCheckbox(column('checkbox'), 'maybe').ok).toBe(false);
  });
});

describe('validateLink', () => {
  it('adds https when the scheme is missing', () => {
    expect(validateLink(column('link'), 'example.com/docs')).toEqual({
      ok: true,
      value: { url: 'https://example.com/docs', text: 'https://example.com/docs' },
    });
  });

  it('keeps the link text of an object value', () => {
    expect(validateLink(column('link'), { url: 'http://a.io', text: ' Docs ' })).toEqual({
      ok: true,
      value: { url: 'http://a.io', text: 'Docs' },
    });
  });

  it('rejects non-http schemes', () => {
    const result = validateLink(column('link'), 'ftp://files.example.com');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('"ftp://files.example.com" is not a valid http(s) URL');
  });
});

describe('readOptions', () => {
  it('reads both label layouts sorted by id', () => {
    expect(readOptions(statusColumn)).toEqual([
      { id: 0, label: 'Working on it' },
      { id: 1, label: 'Done' },
      { id: 2, label: 'Stuck' },
    ]);
    expect(readOptions(dropdownColumn)).toEqual([
      { id: 1, label: 'Red' },
      { id: 2, label: 'Blue' },
    ]);
  });
});

describe('validateStatus', () => {
  it('matches the exact label', () => {
    expect(validateStatus(statusColumn, 'Done')).toEqual({ ok: true, value: { id: 1, label: 'Done' } });
  });

  it('is case-sensitive and suggests the closest labels', () => {
    const result = validateStatus(statusColumn, 'done');
    expect(result).toEqual({
      ok: false,
      error: {
        field: 'status_col',
        title: 'Status',
        value: 'done',
        reason: '"done" is not one of the configured options (matching is case-sensitive)',
        suggestions: ['Done', 'Stuck', 'Working on it'],
      },
    });
  });

  it('fails when the column has no options', () => {
    const result = validateStatus(column('status'), 'Done');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('Column "Field" has no configured options');
  });
});

describe('validateDropdown', () => {
  it('splits comma-separated labels and drops repeats', () => {
    expect(validateDropdown(dropdownColumn, 'Red, Blue, Red')).toEqual({
      ok: true,
      value: [
        { id: 1, label: 'Red' },
        { id: 2, label: 'Blue' },
      ],
    });
  });

  it('reports the whole input when one label is unknown', () => {
    const result = validateDropdown(dropdownColumn, ['Red', 'Green']);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.value).toEqual(['Red', 'Green']);
      expect(result.error.reason).toBe('"Green" is not one of the configured options (matching is case-sensitive)');
    }
  });

  it('rejects an empty list', () => {
    expect(validateDropdown(dropdownColumn, []).ok).toBe(false);
  });

  it('matches a label that itself contains a comma', () => {
    const shades = column('dropdown', { labels: [{ id: 1, name: 'Red, dark' }, { id: 2, name: 'Blue' }] });

    expect(validateDropdown(shades, 'Red, dark')).toEqual({ ok: true, value: [{ id: 1, label: 'Red, dark' }] });
    expect(validateDropdown(shades, 'Blue,Red, dark').ok).toBe(false);
    expect(validateDropdown(shades, ['Blue', 'Red, dark'])).toEqual({
      ok: true,
      value: [
        { id: 2, label: 'Blue' },
        { id: 1, label: 'Red, dark' },
      ],
    });
  });
});

describe('validateLocation', () => {
  it('parses "lat,lng,address" text', () => {
    expect(validateLocation(column('location'), '40.4168,-3.7038,Madrid, Spain')).toEqual({
      ok: true,
      value: { lat: 40.4168, lng: -3.7038, address: 'Madrid, Spain' },
    });
  });

  it('defaults the address to the coordinates', () => {
    expect(validateLocation(column('location'), { lat: 1.5, lng: 2 })).toEqual({
      ok: true,
      value: { lat: 1.5, lng: 2, address: '1.5, 2' },
    });
  });

  it('requires both coordinates in range', () => {
    const missing = validateLocation(column('location'), { lat: 40 });
    expect(missing.ok).toBe(false);
    if (!missing.ok) expect(missing.error.reason).toBe('Location requires both lat and lng');

    const range = validateLocation(column('location'), { lat: 91, lng: 0 });
    expect(range.ok).toBe(false);
    if (!range.ok) expect(range.error.reason).toBe('Latitude must be a number between -90 and 90');
  });
});

describe('validateCountry', () => {
  it('accepts a code in any case or an exact name', () => {
    expect(validateCountry(column('country'), 'es')).toEqual({ ok: true, value: { code: 'ES', name: 'Spain' } });
    expect(validateCountry(column('country'), 'Germany')).toEqual({ ok: true, value: { code: 'DE', name: 'Germany' } });
  });

  it('suggests country names for a near miss', () => {
    const result = validateCountry(column('country'), 'Spainn');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('"Spainn" is not a known country code or name');
      expect(result.error.suggestions?.[0]).toBe('Spain');
    }
  });
});

describe('durations', () => {
  it('parses seconds and clock notation', () => {
    expect(parseDuration(90)).toBe(90);
    expect(parseDuration('600')).toBe(600);
    expect(parseDuration('01:30')).toBe(5400);
    expect(parseDuration('01:30:15')).toBe(5415);
    expect(parseDuration('1:75')).toBeUndefined();
    expect(parseDuration(-1)).toBeUndefined();
  });

  it('formats seconds as HH:MM:SS', () => {
    expect(formatDuration(3725)).toBe('01:02:05');
  });
});

describe('validateTimeTracking', () => {
  it('accepts running and stopped', () => {
    expect(validateTimeTracking(column('time_tracking'), { status: 'running', duration: '00:10' })).toEqual({
      ok: true,
      value: { running: true, duration: 600 },
    });
  });

  it('rejects other states', () => {
    const result = validateTimeTracking(column('time_tracking'), { status: 'paused', duration: 1 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('Time tracking status must be one of: running, stopped');
  });
});

describe('validateIdList', () => {
  it('accepts ids as numbers, strings or lists', () => {
    const validate = validateIdList('user');
    expect(validate(column('people'), 7)).toEqual({ ok: true, value: [7] });
    expect(validate(column('people'), '12, 34')).toEqual({ ok: true, value: [12, 34] });
    expect(validate(column('people'), ['5', 6])).toEqual({ ok: true, value: [5, 6] });
  });

  it('rejects anything that is not a positive integer', () => {
    const result = validateIdList('user')(column('people'), 'abc');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('Expected one or more positive integer user ids');
  });
});

describe('validateRating', () => {
  it('uses the configured limit', () => {
    const ten = column('rating', { limit: 10 });
    expect(validateRating(ten, 7)).toEqual({ ok: true, value: 7 });

    const over = validateRating(ten, 11);
    expect(over.ok).toBe(false);
    if (!over.ok) expect(over.error.reason).toBe('Rating must be a whole number between 0 and 10');
  });

  it('defaults to five stars', () => {
    expect(validateRating(column('rating'), '5')).toEqual({ ok: true, value: 5 });
    expect(validateRating(column('rating'), 6).ok).toBe(false);
  });
});

describe('validateHour', () => {
  it('parses HH:MM', () => {
    expect(validateHour(column('hour'), '9:05')).toEqual({ ok: true, value: { hour: 9, minute: 5 } });
  });

  it('rejects out-of-range times', () => {
    const result = validateHour(column('hour'), '24:00');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('Hour must be between 00:00 and 23:59');
  });
});

describe('weeks', () => {
  it('resolves an ISO week to its Monday-Sunday range', () => {
    expect(validateWeek(column('week'), '2025-W10')).toEqual({
      ok: true,
      value: { week: 10, year: 2025, startDate: '2025-03-03', endDate: '2025-03-09' },
    });
    expect(validateWeek(column('week'), { week: 10, year: 2025 })).toEqual(validateWeek(column('week'), '2025W10'));
  });

  it('knows which years have 53 weeks', () => {
    const result = validateWeek(column('week'), { week: 53, year: 2025 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('Week must be between 1 and 52 for 2025');

    expect(validateWeek(column('week'), { week: 53, year: 2026 }).ok).toBe(true);
  });

  it('finds the ISO week of a date', () => {
    expect(isoWeekOf('2025-03-09')).toEqual({ week: 10, year: 2025 });
    expect(isoWeekOf('2024-12-30')).toEqual({ week: 1, year: 2025 });
    expect(isoWeekOf('2025-13-01')).toBeUndefined();
  });
});

describe('validateTimeline', () => {
  it('accepts an ordered range', () => {
    expect(validateTimeline(column('timeline'), { from: '2025-03-01', to: '2025-03-01' })).toEqual({
      ok: true,
      value: { from: '2025-03-01', to: '2025-03-01' },
    });
  });

  it('rejects a reversed range', () => {
    const result = validateTimeline(column('timeline'), { from: '2025-03-10', to: '2025-03-01' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('Timeline end date cannot be before its start date');
  });
});

describe('validateTimezone', () => {
  it('accepts IANA zones and rejects unknown ones', () => {
    expect(validateTimezone(column('world_clock'), 'Europe/Madrid')).toEqual({ ok: true, value: 'Europe/Madrid' });
    expect(validateTimezone(column('world_clock'), 'Mars/Olympus_Mons').ok).toBe(false);
  });
});

describe('validateColor', () => {
  it('normalizes hex codes', () => {
    expect(validateColor(column('color_picker'), 'f0a')).toEqual({ ok: true, value: '#FF00AA' });
    expect(validateColor(column('color_picker'), { hex: '#00ff00' })).toEqual({ ok: true, value: '#00FF00' });
  });

  it('rejects color names', () => {
    expect(validateColor(column('color_picker'), 'red').ok).toBe(false);
  });
});
