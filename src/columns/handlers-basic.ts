import { ColumnHandler, isRecord, WireValue } from './types.js';
import { cellText, defineHandler } from './handler.js';
import {
  validateCheckbox,
  validateDate,
  validateEmail,
  validateLink,
  validateLongText,
  validateNumber,
  validatePhone,
  validateText,
} from './validators.js';

function stringField(parsed: unknown, key: string): string | undefined {
  if (!isRecord(parsed)) return undefined;
  const value = parsed[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

const textHandler = (name: string): ColumnHandler =>
  defineHandler({
    name,
    family: 'basic',
    validate: validateText,
    encode: (value) => value,
    decode: (parsed, cell) => (typeof parsed === 'string' && parsed !== '' ? parsed : cellText(cell)),
    rules: () => ({ whitespace: 'collapsed' }),
  });

export const BASIC_HANDLERS: Record<string, ColumnHandler> = {
  name: textHandler('name'),
  text: textHandler('text'),

  long_text: defineHandler({
    name: 'long_text',
    family: 'basic',
    validate: validateLongText,
    encode: (text) => ({ text }),
    decode: (parsed, cell) => stringField(parsed, 'text') ?? cellText(cell),
  }),

  numbers: defineHandler({
    name: 'numbers',
    family: 'basic',
    validate: validateNumber,
    // monday stores numbers as decimal strings
    encode: (value) => String(value),
    decode: (parsed, cell) => {
      const source = typeof parsed === 'string' || typeof parsed === 'number' ? parsed : cellText(cell);
      if (source === null || source === '') return null;
      const value = Number(source);
      return Number.isFinite(value) ? value : null;
    },
    rules: (column) => ({
      format: 'finite number',
      unit: isRecord(column.settings.unit) && typeof column.settings.unit.symbol === 'string'
        ? column.settings.unit.symbol
        : null,
    }),
  }),

  date: defineHandler({
    name: 'date',
    family: 'basic',
    validate: validateDate,
    encode: (value): WireValue => (value.time ? { date: value.date, time: value.time } : { date: value.date }),
    decode: (parsed, cell) => {
      const date = stringField(parsed, 'date');
      if (!date) return cellText(cell);
      const time = stringField(parsed, 'time');
      return time ? `${date} ${time}` : date;
    },
    rules: () => ({
      format: 'YYYY-MM-DD',
      time_format: 'HH:MM[:SS]',
      timezone: 'UTC',
      rejects: 'DD/MM/YYYY and MM/DD/YYYY',
    }),
  }),

  email: defineHandler({
    name: 'email',
    family: 'basic',
    validate: validateEmail,
    encode: (email) => ({ email, text: email }),
    decode: (parsed, cell) => stringField(parsed, 'email') ?? cellText(cell),
    rules: () => ({ format: 'name@domain' }),
  }),

  phone: defineHandler({
    name: 'phone',
    family: 'basic',
    validate: validatePhone,
    encode: (value): WireValue => (value.country
      ? { phone: value.phone, countryShortName: value.country }
      : { phone: value.phone }),
    decode: (parsed, cell) => stringField(parsed, 'phone') ?? cellText(cell),
    rules: () => ({ digits: '7-15', leading_plus: 'optional', strips: 'spaces, dashes, dots, parentheses' }),
  }),

  checkbox: defineHandler({
    name: 'checkbox',
    family: 'basic',
    validate: validateCheckbox,
    // null unchecks the box
    encode: (checked) => (checked ? { checked: 'true' } : null),
    decode: (parsed) => isRecord(parsed) && (parsed.checked === 'true' || parsed.checked === true),
    rules: () => ({ accepts: 'true/false, yes/no, 1/0' }),
  }),

  link: defineHandler({
    name: 'link',
    family: 'basic',
    validate: validateLink,
    encode: (link) => ({ url: link.url, text: link.text }),
    decode: (parsed, cell) => {
      const url = stringField(parsed, 'url');
      if (!url) return cellText(cell);
      const text = stringField(parsed, 'text');
      return text && text !== url ? { url, text } : url;
    },
    rules: () => ({ schemes: ['http', 'https'], default_scheme: 'https' }),
  }),
};
