import { ColumnCell, ColumnHandler, isRecord } from './types.js';
import { cellText, defineHandler, readOnlyHandler } from './handler.js';
import { findCountryByCode } from './countries.js';
import {
  formatDuration,
  isoWeekOf,
  ratingLimit,
  readOptions,
  validateColor,
  validateCountry,
  validateDropdown,
  validateHour,
  validateIdList,
  validateLocation,
  validateRating,
  validateStatus,
  validateTimeTracking,
  validateTimeline,
  validateTimezone,
  validateWeek,
} from './validators.js';

function numberList(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value
    .map((entry) => (typeof entry === 'number' ? entry : Number(entry)))
    .filter((entry) => Number.isSafeInteger(entry));
}

function splitText(cell: ColumnCell): string[] | null {
  const text = cellText(cell);
  return text ? text.split(',').map((part) => part.trim()).filter((part) => part.length > 0) : null;
}

/** Cell text split back into labels, keeping configured labels that contain commas whole. */
function splitLabels(cell: ColumnCell, labels: string[]): string[] | null {
  const parts = splitText(cell);
  if (!parts) return null;

  const known = new Set(labels);
  const result: string[] = [];
  let start = 0;
  while (start < parts.length) {
    let end = parts.length;
    while (end > start + 1 && !known.has(parts.slice(start, end).join(', '))) end--;
    result.push(parts.slice(start, end).join(', '));
    start = end;
  }
  return result;
}

function nonEmpty<T>(list: T[]): T[] | null {
  return list.length > 0 ? list : null;
}

/** `linkedPulseIds: [{ linkedPulseId }]` on reads, `item_ids` on writes. */
function linkedItemIds(parsed: unknown): number[] {
  if (!isRecord(parsed)) return [];
  if (Array.isArray(parsed.linkedPulseIds)) {
    return numberList(parsed.linkedPulseIds.map((link) => (isRecord(link) ? link.linkedPulseId : undefined)));
  }
  return numberList(parsed.item_ids);
}

const itemLinkHandler = (name: string) =>
  defineHandler({
    name,
    family: 'advanced',
    validate: validateIdList('item'),
    encode: (ids) => ({ item_ids: ids }),
    decode: (parsed) => nonEmpty(linkedItemIds(parsed)),
  });

export const ADVANCED_HANDLERS: Record<string, ColumnHandler> = {
  status: defineHandler({
    name: 'status',
    family: 'advanced',
    validate: validateStatus,
    encode: (option) => ({ index: option.id }),
    decode: (parsed, cell, column) => {
      if (isRecord(parsed) && parsed.index !== undefined && parsed.index !== null) {
        const index = Number(parsed.index);
        const option = readOptions(column).find((o) => o.id === index);
        if (option) return option.label;
      }
      return cellText(cell);
    },
    rules: (column) => ({
      options: readOptions(column).map((o) => o.label),
      case_sensitive: true,
    }),
  }),

  dropdown: defineHandler({
    name: 'dropdown',
    family: 'advanced',
    validate: validateDropdown,
    encode: (options) => ({ ids: options.map((o) => o.id) }),
    decode: (parsed, cell, column) => {
      const ids = isRecord(parsed) ? numberList(parsed.ids) : [];
      const options = readOptions(column);
      if (ids.length === 0) return splitLabels(cell, options.map((o) => o.label));
      return ids.map((id) => options.find((o) => o.id === id)?.label ?? String(id));
    },
    rules: (column) => ({
      options: readOptions(column).map((o) => o.label),
      case_sensitive: true,
      multiple: true,
    }),
  }),

  location: defineHandler({
    name: 'location',
    family: 'advanced',
    validate: validateLocation,
    // coordinates travel as strings
    encode: (loc) => ({ lat: String(loc.lat), lng: String(loc.lng), address: loc.address }),
    decode: (parsed, cell) => {
      if (!isRecord(parsed)) return cellText(cell);
      const lat = Number(parsed.lat);
      const lng = Number(parsed.lng);
      if (!Number.isFinite(lat) || !Number.isFinite(lng)) return cellText(cell);
      const address = typeof parsed.address === 'string' && parsed.address ? parsed.address : `${lat}, ${lng}`;
      return { lat, lng, address };
    },
    rules: () => ({ lat: '[-90, 90]', lng: '[-180, 180]', geocoding: false }),
  }),

  country: defineHandler({
    name: 'country',
    family: 'advanced',
    validate: validateCountry,
    encode: (country) => ({ countryCode: country.code, countryName: country.name }),
    decode: (parsed, cell) => {
      if (isRecord(parsed) && typeof parsed.countryCode === 'string') {
        const known = findCountryByCode(parsed.countryCode);
        const name = typeof parsed.countryName === 'string' ? parsed.countryName : known?.name ?? parsed.countryCode;
        return { code: parsed.countryCode.toUpperCase(), name };
      }
      return cellText(cell);
    },
    rules: () => ({ format: 'ISO 3166-1 alpha-2 code or exact country name' }),
  }),

  time_tracking: defineHandler({
    name: 'time_tracking',
    family: 'advanced',
    validate: validateTimeTracking,
    encode: (value) => ({ running: value.running ? 'true' : 'false', duration: value.duration }),
    decode: (parsed, cell) => {
      if (!isRecord(parsed)) return cellText(cell);
      const duration = Number(parsed.duration ?? 0);
      const seconds = Number.isFinite(duration) && duration >= 0 ? Math.floor(duration) : 0;
      const running = parsed.running === 'true' || parsed.running === true;
      return { status: running ? 'running' : 'stopped', duration: seconds, formatted: formatDuration(seconds) };
    },
    rules: () => ({ status: ['running', 'stopped'], duration: 'seconds or HH:MM[:SS]' }),
  }),

  tags: defineHandler({
    name: 'tags',
    family: 'advanced',
    validate: validateIdList('tag'),
    encode: (ids) => ({ tag_ids: ids }),
    decode: (parsed, cell) => {
      const ids = isRecord(parsed) ? numberList(parsed.tag_ids) : [];
      return ids.length > 0 ? ids : splitText(cell);
    },
  }),

  rating: defineHandler({
    name: 'rating',
    family: 'advanced',
    validate: validateRating,
    encode: (rating) => ({ rating }),
    decode: (parsed) => {
      const rating = isRecord(parsed) ? Number(parsed.rating) : NaN;
      return Number.isInteger(rating) ? rating : null;
    },
    rules: (column) => ({ min: 0, max: ratingLimit(column) }),
  }),

  hour: defineHandler({
    name: 'hour',
    family: 'advanced',
    validate: validateHour,
    encode: (value) => ({ hour: value.hour, minute: value.minute }),
    decode: (parsed, cell) => {
      if (!isRecord(parsed)) return cellText(cell);
      const hour = Number(parsed.hour);
      const minute = Number(parsed.minute ?? 0);
      if (!Number.isInteger(hour) || !Number.isInteger(minute)) return cellText(cell);
      return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
    },
    rules: () => ({ format: 'HH:MM (24h)' }),
  }),

  week: defineHandler({
    name: 'week',
    family: 'advanced',
    validate: validateWeek,
    encode: (value) => ({ week: { startDate: value.startDate, endDate: value.endDate } }),
    decode: (parsed, cell) => {
      const range = isRecord(parsed) && isRecord(parsed.week) ? parsed.week : undefined;
      const startDate = typeof range?.startDate === 'string' ? range.startDate : undefined;
      const endDate = typeof range?.endDate === 'string' ? range.endDate : undefined;
      const iso = startDate ? isoWeekOf(startDate) : undefined;
      if (!iso || !startDate || !endDate) return cellText(cell);
      return { week: iso.week, year: iso.year, startDate, endDate };
    },
    rules: () => ({ format: '{week, year} or YYYY-Www', week_start: 'Monday' }),
  }),

  timeline: defineHandler({
    name: 'timeline',
    family: 'advanced',
    validate: validateTimeline,
    encode: (range) => ({ from: range.from, to: range.to }),
    decode: (parsed, cell) => {
      if (isRecord(parsed) && typeof parsed.from === 'string' && typeof parsed.to === 'string') {
        return { from: parsed.from, to: parsed.to };
      }
      return cellText(cell);
    },
    rules: () => ({ format: '{from: YYYY-MM-DD, to: YYYY-MM-DD}', order: 'to >= from' }),
  }),

  world_clock: defineHandler({
    name: 'world_clock',
    family: 'advanced',
    validate: validateTimezone,
    encode: (timezone) => ({ timezone }),
    decode: (parsed, cell) =>
      isRecord(parsed) && typeof parsed.timezone === 'string' ? parsed.timezone : cellText(cell),
    rules: () => ({ format: 'IANA time zone' }),
  }),

  color_picker: defineHandler({
    name: 'color_picker',
    family: 'advanced',
    validate: validateColor,
    encode: (hex) => ({ color: { hex } }),
    decode: (parsed, cell) => {
      const color = isRecord(parsed) && isRecord(parsed.color) ? parsed.color.hex : undefined;
      return typeof color === 'string' ? color : cellText(cell);
    },
    rules: () => ({ format: '#RRGGBB' }),
  }),

  people: defineHandler({
    name: 'people',
    family: 'advanced',
    validate: validateIdList('user'),
    encode: (ids) => ({ personsAndTeams: ids.map((id) => ({ id, kind: 'person' })) }),
    decode: (parsed, cell) => {
      const entries = isRecord(parsed) && Array.isArray(parsed.personsAndTeams) ? parsed.personsAndTeams : [];
      const ids = numberList(entries.map((entry) => (isRecord(entry) ? entry.id : undefined)));
      return ids.length > 0 ? ids : splitText(cell);
    },
    rules: () => ({ format: 'user id or list of user ids' }),
  }),

  board_relation: itemLinkHandler('board_relation'),
  dependency: itemLinkHandler('dependency'),

  formula: readOnlyHandler('formula', 'computed field'),
  mirror: readOnlyHandler('mirror', 'mirrors a column of a connected board'),
  item_id: readOnlyHandler('item_id', 'assigned by monday.com'),
  auto_number: readOnlyHandler('auto_number', 'assigned by monday.com'),
  creation_log: readOnlyHandler('creation_log', 'recorded by monday.com'),
  last_updated: readOnlyHandler('last_updated', 'recorded by monday.com'),
  button: readOnlyHandler('button', 'triggers automations and holds no value'),
  progress: readOnlyHandler('progress', 'computed from status columns'),
  vote: readOnlyHandler('vote', 'changed only by users voting'),
  file: readOnlyHandler('file', 'files are uploaded through the assets API'),
  doc: readOnlyHandler('doc', 'documents are edited in monday.com'),
};
