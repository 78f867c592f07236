import { z } from 'zod';
import { ColumnDefinition, ValidationResult, Validator, fail, isRecord, ok } from './types.js';
import { suggestOptions } from './suggest.js';
import { Country, findCountryByCode, findCountryByName, listCountries } from './countries.js';

// ============================================
// COERCION HELPERS
// ============================================

function coerceString(raw: unknown): string | undefined {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
  if (typeof raw === 'boolean') return String(raw);
  return undefined;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function describe(raw: unknown): string {
  if (raw === null) return 'null';
  if (Array.isArray(raw)) return 'a list';
  return typeof raw === 'object' ? 'an object' : JSON.stringify(raw);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** Integer ids from a number, a digit string, a comma-separated string or a list of those. */
function coerceIdList(raw: unknown): number[] | undefined {
  const parts: unknown[] = Array.isArray(raw)
    ? raw
    : typeof raw === 'string'
      ? raw.split(',').map((p) => p.trim()).filter((p) => p.length > 0)
      : [raw];

  const ids: number[] = [];
  for (const part of parts) {
    const id = typeof part === 'number' ? part : typeof part === 'string' && /^\d+$/.test(part) ? Number(part) : NaN;
    if (!Number.isSafeInteger(id) || id <= 0) return undefined;
    ids.push(id);
  }
  return ids.length > 0 ? ids : undefined;
}

// ============================================
// OPTION SETS (status / dropdown)
// ============================================

export interface ColumnOption {
  id: number;
  label: string;
}

/**
 * Labels configured on a status or dropdown column. monday stores them either
 * as `{ "0": "Working on it", "1": "Done" }` or as `[{ id, name }]`.
 */
export function readOptions(column: ColumnDefinition): ColumnOption[] {
  const labels = column.settings.labels;
  const options: ColumnOption[] = [];

  if (Array.isArray(labels)) {
    for (const entry of labels) {
      if (!isRecord(entry)) continue;
      const id = Number(entry.id);
      const label = typeof entry.name === 'string' ? entry.name : typeof entry.label === 'string' ? entry.label : undefined;
      if (Number.isInteger(id) && label) options.push({ id, label });
    }
  } else if (isRecord(labels)) {
    for (const [key, label] of Object.entries(labels)) {
      const id = Number(key);
      if (Number.isInteger(id) && typeof label === 'string' && label.length > 0) {
        options.push({ id, label });
      }
    }
  }

  return options.sort((a, b) => a.id - b.id);
}

function matchOption(column: ColumnDefinition, raw: unknown, options: ColumnOption[]): ValidationResult<ColumnOption> {
  const label = coerceString(raw);
  if (label === undefined) {
    return fail(column, raw, `Expected a label, got ${describe(raw)}`);
  }
  if (options.length === 0) {
    return fail(column, raw, `Column "${column.title}" has no configured options`);
  }

  const match = options.find((option) => option.label === label);
  if (match) return ok(match);

  const labels = options.map((option) => option.label);
  return fail(
    column,
    raw,
    `"${label}" is not one of the configured options (matching is case-sensitive)`,
    suggestOptions(label, labels)
  );
}

// ============================================
// BASIC TYPES
// ============================================

export const validateText: Validator<string> = (column, raw) => {
  const text = coerceString(raw);
  if (text === undefined) {
    return fail(column, raw, `Expected text, got ${describe(raw)}`);
  }
  const normalized = collapseWhitespace(text);
  if (!normalized) {
    return fail(column, raw, 'Text cannot be empty');
  }
  return ok(normalized);
};

export const validateLongText: Validator<string> = (column, raw) => {
  const text = coerceString(raw);
  if (text === undefined) {
    return fail(column, raw, `Expected text, got ${describe(raw)}`);
  }
  if (!text.trim()) {
    return fail(column, raw, 'Text cannot be empty');
  }
  return ok(text);
};

// Decimal notation only; Number() alone also takes hex and exponents
const DECIMAL = /^-?\d+(\.\d+)?$/;

export const validateNumber: Validator<number> = (column, raw) => {
  const value = typeof raw === 'number'
    ? raw
    : typeof raw === 'string' && DECIMAL.test(raw.trim()) ? Number(raw.trim()) : NaN;

  if (!Number.isFinite(value)) {
    return fail(column, raw, `Expected a finite number, got ${describe(raw)}`);
  }
  return ok(value);
};

export interface DateValue {
  date: string;
  time?: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;
const DAY_MONTH_YEAR = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const YEAR_SLASH = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function formatDate(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

function offsetMinutes(zone: string): number {
  if (zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/** Strict ISO 8601 calendar date (no time). */
export function parseIsoDate(text: string): string | undefined {
  const match = ISO_DATE.exec(text);
  if (!match) return undefined;
  const [, y, m, d] = match;
  return isCalendarDate(Number(y), Number(m), Number(d)) ? text : undefined;
}

export const validateDate: Validator<DateValue> = (column, raw) => {
  if (isRecord(raw) && typeof raw.date === 'string') {
    const time = typeof raw.time === 'string' && raw.time ? `T${raw.time}` : '';
    return validateDate(column, `${raw.date}${time}`);
  }

  const text = typeof raw === 'string' ? raw.trim() : undefined;
  if (!text) {
    return fail(column, raw, `Expected an ISO 8601 date (YYYY-MM-DD), got ${describe(raw)}`);
  }

  const dateOnly = ISO_DATE.exec(text);
  if (dateOnly) {
    return parseIsoDate(text)
      ? ok({ date: text })
      : fail(column, raw, `"${text}" is not a real calendar date`);
  }

  const dateTime = ISO_DATE_TIME.exec(text);
  if (dateTime) {
    const [, y, mo, d, h, mi, s, zone] = dateTime;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = s ? Number(s) : 0;

    if (!isCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
      return fail(column, raw, `"${text}" is not a real calendar date and time`);
    }

    if (!zone) {
      return ok({ date: formatDate(year, month, day), time: `${pad(hour)}:${pad(minute)}:${pad(second)}` });
    }

    // monday stores date columns in UTC
    const utc = new Date(Date.UTC(year, month - 1, day, hour, minute, second) - offsetMinutes(zone) * 60000);
    return ok({
      date: formatDate(utc.getUTCFullYear(), utc.getUTCMonth() + 1, utc.getUTCDate()),
      time: `${pad(utc.getUTCHours())}:${pad(utc.getUTCMinutes())}:${pad(utc.getUTCSeconds())}`,
    });
  }

  const dmy = DAY_MONTH_YEAR.exec(text);
  if (dmy) {
    const first = Number(dmy[1]);
    const second = Number(dmy[2]);
    const year = Number(dmy[3]);
    const candidates: string[] = [];
    if (isCalendarDate(year, first, second)) candidates.push(formatDate(year, first, second));
    if (first !== second && isCalendarDate(year, second, first)) candidates.push(formatDate(year, second, first));
    // only suggest when the day/month order can be told apart
    return fail(
      column,
      raw,
      `Ambiguous date format "${text}"; use ISO 8601 YYYY-MM-DD`,
      candidates.length === 1 ? candidates : []
    );
  }

  const ymd = YEAR_SLASH.exec(text);
  if (ymd) {
    const year = Number(ymd[1]);
    const month = Number(ymd[2]);
    const day = Number(ymd[3]);
    return fail(
      column,
      raw,
      `Unsupported date format "${text}"; use ISO 8601 YYYY-MM-DD`,
      isCalendarDate(year, month, day) ? [formatDate(year, month, day)] : []
    );
  }

  return fail(column, raw, `"${text}" is not an ISO 8601 date (YYYY-MM-DD)`);
};

const EmailSchema = z.string().email();

export const validateEmail: Validator<string> = (column, raw) => {
  const text = coerceString(raw)?.trim();
  if (!text || !EmailSchema.safeParse(text).success) {
    return fail(column, raw, `Expected an email address like name@example.com, got ${describe(raw)}`);
  }
  return ok(text);
};

export interface PhoneValue {
  phone: string;
  country?: string;
}

const PHONE_SEPARATORS = /[\s\-().]/g;
const PHONE_DIGITS = /^\+?\d{7,15}$/;

export const validatePhone: Validator<PhoneValue> = (column, raw) => {
  let number: string | undefined;
  let country: string | undefined;

  if (isRecord(raw)) {
    number = coerceString(raw.phone);
    const code = coerceString(raw.country ?? raw.countryShortName);
    if (code !== undefined) {
      const found = findCountryByCode(code);
      if (!found) {
        return fail(column, raw, `Unknown country code "${code}" for phone number`);
      }
      country = found.code;
    }
  } else {
    number = coerceString(raw);
  }

  const compact = number?.replace(PHONE_SEPARATORS, '');
  if (!compact || !PHONE_DIGITS.test(compact)) {
    return fail(column, raw, 'Phone numbers must be 7 to 15 digits with an optional leading +');
  }

  return ok(country ? { phone: compact, country } : { phone: compact });
};

const TRUE_WORDS = new Set(['true', 'yes', '1', 'checked', 'on']);
const FALSE_WORDS = new Set(['false', 'no', '0', 'unchecked', 'off']);

export const validateCheckbox: Validator<boolean> = (column, raw) => {
  if (typeof raw === 'boolean') return ok(raw);
  if (raw === 1 || raw === 0) return ok(raw === 1);
  if (typeof raw === 'string') {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return ok(true);
    if (FALSE_WORDS.has(word)) return ok(false);
  }
  return fail(column, raw, `Expected true or false, got ${describe(raw)}`);
};

export interface LinkValue {
  url: string;
  text: string;
}

const UrlSchema = z.string().url();

export const validateLink: Validator<LinkValue> = (column, raw) => {
  const input = isRecord(raw) ? coerceString(raw.url) : coerceString(raw);
  const label = isRecord(raw) ? coerceString(raw.text) : undefined;

  let url = input?.trim();
  if (!url) {
    return fail(column, raw, 'Expected a URL or an object with a url field');
  }
  if (!/^[a-z][a-z0-9+.-]*:/i.test(url)) {
    url = `https://${url}`;
  }
  if (!/^https?:\/\//i.test(url) || !UrlSchema.safeParse(url).success) {
    return fail(column, raw, `"${input}" is not a valid http(s) URL`);
  }

  return ok({ url, text: label?.trim() || url });
};

// ============================================
// ADVANCED TYPES
// ============================================

export const validateStatus: Validator<ColumnOption> = (column, raw) =>
  matchOption(column, raw, readOptions(column));

/** A comma-separated string is a list only when it is not itself an option label. */
function dropdownLabels(raw: unknown, options: ColumnOption[]): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (typeof raw !== 'string' || !raw.includes(',') || options.some((option) => option.label === raw)) {
    return [raw];
  }
  return raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
}

export const validateDropdown: Validator<ColumnOption[]> = (column, raw) => {
  const options = readOptions(column);
  const labels = dropdownLabels(raw, options);

  if (labels.length === 0) {
    return fail(column, raw, 'Select at least one option');
  }

  const selected: ColumnOption[] = [];
  for (const label of labels) {
    const result = matchOption(column, label, options);
    if (!result.ok) {
      return { ok: false, error: { ...result.error, value: raw } };
    }
    if (!selected.some((option) => option.id === result.value.id)) {
      selected.push(result.value);
    }
  }
  return ok(selected);
};

export interface LocationValue {
  lat: number;
  lng: number;
  address: string;
}

function parseCoordinate(raw: unknown): number | undefined {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined;
  if (typeof raw === 'string' && /^-?\d+(\.\d+)?$/.test(raw.trim())) return Number(raw.trim());
  return undefined;
}

export const validateLocation: Validator<LocationValue> = (column, raw) => {
  let latRaw: unknown;
  let lngRaw: unknown;
  let address: string | undefined;

  if (isRecord(raw)) {
    latRaw = raw.lat;
    lngRaw = raw.lng;
    address = coerceString(raw.address)?.trim();
  } else if (typeof raw === 'string') {
    const [lat, lng, ...rest] = raw.split(',').map((part) => part.trim());
    latRaw = lat;
    lngRaw = lng;
    address = rest.join(', ') || undefined;
  } else {
    return fail(column, raw, 'Expected {lat, lng, address} or "lat,lng[,address]"');
  }

  if (latRaw === undefined || latRaw === '' || lngRaw === undefined || lngRaw === '') {
    return fail(column, raw, 'Location requires both lat and lng');
  }

  const lat = parseCoordinate(latRaw);
  const lng = parseCoordinate(lngRaw);
  if (lat === undefined || lat < -90 || lat > 90) {
    return fail(column, raw, 'Latitude must be a number between -90 and 90');
  }
  if (lng === undefined || lng < -180 || lng > 180) {
    return fail(column, raw, 'Longitude must be a number between -180 and 180');
  }

  return ok({ lat, lng, address: address || `${lat}, ${lng}` });
};

export const validateCountry: Validator<Country> = (column, raw) => {
  const text = isRecord(raw) ? coerceString(raw.countryCode ?? raw.code) : coerceString(raw);
  if (!text?.trim()) {
    return fail(column, raw, 'Expected an ISO 3166-1 alpha-2 country code or a country name');
  }

  const value = text.trim();
  const country = (/^[A-Za-z]{2}$/.test(value) ? findCountryByCode(value) : undefined) ?? findCountryByName(value);
  if (country) return ok(country);

  return fail(
    column,
    raw,
    `"${value}" is not a known country code or name`,
    suggestOptions(value, listCountries().map((c) => c.name))
  );
};

export interface TimeTrackingValue {
  running: boolean;
  duration: number;
}

const TIME_TRACKING_STATES = ['running', 'stopped'] as const;

/** Seconds from a number or `HH:MM[:SS]`. */
export function parseDuration(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw >= 0 ? Math.floor(raw) : undefined;
  }
  if (typeof raw !== 'string') return undefined;

  const text = raw.trim();
  if (/^\d+$/.test(text)) return Number(text);

  const match = /^(\d+):([0-5]\d)(?::([0-5]\d))?$/.exec(text);
  if (!match) return undefined;
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + (match[3] ? Number(match[3]) : 0);
}

export function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}

export const validateTimeTracking: Validator<TimeTrackingValue> = (column, raw) => {
  if (!isRecord(raw)) {
    return fail(column, raw, 'Expected {status, duration} for time tracking');
  }

  const status = raw.status;
  if (typeof status !== 'string' || !TIME_TRACKING_STATES.some((s) => s === status)) {
    const label = coerceString(status) ?? '';
    return fail(
      column,
      raw,
      `Time tracking status must be one of: ${TIME_TRACKING_STATES.join(', ')}`,
      suggestOptions(label, TIME_TRACKING_STATES)
    );
  }

  if (raw.duration === undefined) {
    return fail(column, raw, 'Time tracking requires a duration');
  }
  const duration = parseDuration(raw.duration);
  if (duration === undefined) {
    return fail(column, raw, 'Duration must be non-negative seconds or HH:MM[:SS]');
  }

  return ok({ running: status === 'running', duration });
};

export const validateIdList = (noun: string): Validator<number[]> => (column, raw) => {
  const ids = coerceIdList(raw);
  return ids
    ? ok(ids)
    : fail(column, raw, `Expected one or more positive integer ${noun} ids`);
};

export function ratingLimit(column: ColumnDefinition): number {
  const limit = Number(column.settings.limit ?? column.settings.max_rating ?? 5);
  return Number.isInteger(limit) && limit > 0 ? limit : 5;
}

export const validateRating: Validator<number> = (column, raw) => {
  const max = ratingLimit(column);
  const value = typeof raw === 'number' ? raw : typeof raw === 'string' && /^\d+$/.test(raw.trim()) ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value < 0 || value > max) {
    return fail(column, raw, `Rating must be a whole number between 0 and ${max}`);
  }
  return ok(value);
};

export interface HourValue {
  hour: number;
  minute: number;
}

export const validateHour: Validator<HourValue> = (column, raw) => {
  const match = typeof raw === 'string' ? /^(\d{1,2}):(\d{2})$/.exec(raw.trim()) : null;
  if (!match) {
    return fail(column, raw, 'Hour must be in HH:MM format');
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return fail(column, raw, 'Hour must be between 00:00 and 23:59');
  }
  return ok({ hour, minute });
};

export interface WeekValue {
  week: number;
  year: number;
  startDate: string;
  endDate: string;
}

function isoWeeksInYear(year: number): number {
  const p = (y: number) => (y + Math.floor(y / 4) - Math.floor(y / 100) + Math.floor(y / 400)) % 7;
  return p(year) === 4 || p(year - 1) === 3 ? 53 : 52;
}

function isoDate(date: Date): string {
  return formatDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/** ISO week number and week-year of a `YYYY-MM-DD` date. */
export function isoWeekOf(date: string): { week: number; year: number } | undefined {
  if (!parseIsoDate(date)) return undefined;
  const d = new Date(`${date}T00:00:00Z`);
  const dayNum = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - dayNum);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / 86400000 + 1) / 7);
  return { week, year: d.getUTCFullYear() };
}

export const validateWeek: Validator<WeekValue> = (column, raw) => {
  let week: number;
  let year: number;

  const match = typeof raw === 'string' ? /^(\d{4})-?W(\d{1,2})$/i.exec(raw.trim()) : null;
  if (match) {
    year = Number(match[1]);
    week = Number(match[2]);
  } else if (isRecord(raw)) {
    week = Number(raw.week);
    year = Number(raw.year);
  } else {
    return fail(column, raw, 'Expected {week, year} or YYYY-Www');
  }

  if (!Number.isInteger(year) || year < 1900 || year > 9999) {
    return fail(column, raw, 'Week requires a four-digit year');
  }
  const weeks = isoWeeksInYear(year);
  if (!Number.isInteger(week) || week < 1 || week > weeks) {
    return fail(column, raw, `Week must be between 1 and ${weeks} for ${year}`);
  }

  const jan4 = new Date(Date.UTC(year, 0, 4));
  const start = new Date(jan4.getTime() - ((jan4.getUTCDay() || 7) - 1) * 86400000 + (week - 1) * 7 * 86400000);
  const end = new Date(start.getTime() + 6 * 86400000);

  return ok({ week, year, startDate: isoDate(start), endDate: isoDate(end) });
};

export interface TimelineValue {
  from: string;
  to: string;
}

export const validateTimeline: Validator<TimelineValue> = (column, raw) => {
  if (!isRecord(raw)) {
    return fail(column, raw, 'Expected {from, to} with ISO 8601 dates');
  }
  const from = typeof raw.from === 'string' ? parseIsoDate(raw.from.trim()) : undefined;
  const to = typeof raw.to === 'string' ? parseIsoDate(raw.to.trim()) : undefined;
  if (!from || !to) {
    return fail(column, raw, 'Timeline from and to must both be ISO 8601 dates (YYYY-MM-DD)');
  }
  if (to < from) {
    return fail(column, raw, 'Timeline end date cannot be before its start date');
  }
  return ok({ from, to });
};

export const validateTimezone: Validator<string> = (column, raw) => {
  const zone = coerceString(raw)?.trim();
  if (!zone) {
    return fail(column, raw, 'Expected an IANA time zone such as Europe/Madrid');
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
  } catch (error) {
    const reason = error instanceof RangeError ? 'unknown time zone' : String(error);
    return fail(column, raw, `"${zone}" is not a valid IANA time zone (${reason})`);
  }
  return ok(zone);
};

export const validateColor: Validator<string> = (column, raw) => {
  const text = isRecord(raw) ? coerceString(raw.color ?? raw.hex) : coerceString(raw);
  const match = text ? /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(text.trim()) : null;
  if (!match) {
    return fail(column, raw, 'Color must be a hex code such as #FF0000');
  }
  const hex = match[1].length === 3
    ? match[1].split('').map((c) => c + c).join('')
    : match[1];
  return ok(`#${hex.toUpperCase()}`);
};

export const validateGeneric: Validator<string> = (column, raw) => {
  const text = coerceString(raw)?.trim();
  if (!text) {
    return fail(column, raw, `Expected a non-empty value, got ${describe(raw)}`);
  }
  return ok(text);
};
