import { describe, it, expect } from 'vitest';
import type { Lead } from '@leadscout/shared';
import { EXPORT_HEADERS } from './columns.js';
import { escapeCsvField, leadsToCsv } from './csv.js';

const HEADER_LINE =
  'Business Name,Address,Phone Number,Website,Rating,Number of Reviews,Business Status,Business Types,Opening Hours,Google Maps URL,Latitude,Longitude';

function buildLead(overrides: Partial<Lead> = {}): Lead {
  return {
    placeId: 'place-1',
    name: 'Ace Plumbing',
    address: null,
    phone: null,
    website: null,
    rating: null,
    reviewCount: null,
    businessStatus: null,
    types: [],
    openingHours: [],
    googleMapsUrl: null,
    lat: 30.25,
    lng: -97.75,
    ...overrides,
  };
}

describe('escapeCsvField', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsvField('Ace Plumbing')).toBe('Ace Plumbing');
    expect(escapeCsvField(4.5)).toBe('4.5');
  });

  it('renders null as empty', () => {
    expect(escapeCsvField(null)).toBe('');
  });

  it('quotes fields with commas or line breaks', () => {
    expect(escapeCsvField('1 Main St, Austin')).toBe('"1 Main St, Austin"');
    expect(escapeCsvField('a\nb')).toBe('"a\nb"');
    expect(escapeCsvField('a\rb')).toBe('"a\rb"');
  });

  it('doubles embedded quotes', () => {
    expect(escapeCsvField('Joe "The Pipe" Smith')).toBe('"Joe ""The Pipe"" Smith"');
  });

  it('prefixes text that would run as a formula', () => {
    expect(escapeCsvField('=HYPERLINK("http://evil.example","Click")')).toBe(
      '"\'=HYPERLINK(""http://evil.example"",""Click"")"'
    );
    expect(escapeCsvField('+1 555')).toBe("'+1 555");
    expect(escapeCsvField('-2+3')).toBe("'-2+3");
    expect(escapeCsvField('@SUM(A1)')).toBe("'@SUM(A1)");
    expect(escapeCsvField('\tcmd')).toBe("'\tcmd");
  });

  it('leaves negative numbers and inner operators alone', () => {
    expect(escapeCsvField(-97.75)).toBe('-97.75');
    expect(escapeCsvField('A+ Plumbing')).toBe('A+ Plumbing');
  });
});

describe('leadsToCsv', () => {
  it('writes only the header for no leads', () => {
    expect(leadsToCsv([])).toBe(`${HEADER_LINE}\r\n`);
    expect(EXPORT_HEADERS).toHaveLength(12);
  });

  it('writes one row per lead', () => {
    const csv = leadsToCsv([
      buildLead({
        address: '1 Main St, Austin',
        phone: '(555) 010-0100',
        rating: 4.5,
        reviewCount: 7,
        businessStatus: 'OPERATIONAL',
        types: ['plumber', 'store'],
        openingHours: ['Monday: 9 AM', 'Tuesday: Closed'],
        googleMapsUrl: 'https://maps.google.com/?cid=1',
      }),
      buildLead({ placeId: 'place-2', name: 'Bob "Fast" Drains' }),
    ]);

    expect(csv.split('\r\n')).toEqual([
      HEADER_LINE,
      'Ace Plumbing,"1 Main St, Austin",(555) 010-0100,,4.5,7,OPERATIONAL,"plumber, store","Monday: 9 AM\nTuesday: Closed",https://maps.google.com/?cid=1,30.25,-97.75',
      '"Bob ""Fast"" Drains",,,,,,,,,,30.25,-97.75',
      '',
    ]);
  });

  it('neutralizes formula cells in a row', () => {
    const csv = leadsToCsv([
      buildLead({ name: '=HYPERLINK("http://evil.example","Click")', phone: '+1 555' }),
    ]);

    expect(csv.split('\r\n')[1]).toBe(
      '"\'=HYPERLINK(""http://evil.example"",""Click"")",,\'+1 555,,,,,,,,30.25,-97.75'
    );
  });
});
