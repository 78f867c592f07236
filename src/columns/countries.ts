import { readFileSync } from 'node:fs';
import { z } from 'zod';

const CountryListSchema = z.array(
  z.object({
    code: z.string().regex(/^[A-Z]{2}$/),
    name: z.string().min(1),
  })
);

export type Country = z.infer<typeof CountryListSchema>[number];

// src/columns and dist/columns both sit two levels below the package root
const COUNTRIES_FILE = new URL('../../data/countries.json', import.meta.url);

let countries: Country[] | null = null;
let byCode: Map<string, Country> | null = null;
let byName: Map<string, Country> | null = null;

function load(): { list: Country[]; codes: Map<string, Country>; names: Map<string, Country> } {
  if (!countries || !byCode || !byName) {
    countries = CountryListSchema.parse(JSON.parse(readFileSync(COUNTRIES_FILE, 'utf8')));
    byCode = new Map(countries.map((c) => [c.code, c]));
    byName = new Map(countries.map((c) => [c.name, c]));
  }
  return { list: countries, codes: byCode, names: byName };
}

export function listCountries(): Country[] {
  return load().list;
}

export function findCountryByCode(code: string): Country | undefined {
  return load().codes.get(code.toUpperCase());
}

/** Exact, case-sensitive name match. */
export function findCountryByName(name: string): Country | undefined {
  return load().names.get(name);
}
