import { describe, it, expect } from 'vitest';
import {
  basicExtraction,
  detectContractKind,
  extractAmounts,
  extractDates,
  extractCompanies,
  extractPersons,
  extractParties,
} from '../entityExtractor.js';

const EMPLOYMENT_TEXT =
  'EMPLOYMENT AGREEMENT between TechVision Solutions Private Limited and Mr. Rajesh Kumar Sharma, ' +
  'dated January 15, 2024. Salary: INR 150000 per month.';

const SERVICE_TEXT =
  'SERVICE AGREEMENT\n' +
  'This agreement is made on March 1, 2024 between Orion Retail Pvt. Ltd. and BlueWave Analytics Limited.\n' +
  'The monthly fee is INR 2,50,000/month plus a deposit of INR 5,00,000 refundable. Late fee Rs. 500 per day. ' +
  'Signed by Ms. Priya Nair and Dr. Arjun Mehta Rao.\n' +
  'Services commence on April 1, 2024. Effective March 1, 2024.';

/* ============= Contract type ============= */

describe('detectContractKind', () => {
  it('checks markers in priority order', () => {
    expect(detectContractKind('Employment and service terms')).toBe('employment');
    expect(detectContractKind('Master Service Agreement')).toBe('service');
    expect(detectContractKind('Mutual Non-Disclosure Agreement')).toBe('nda');
    expect(detectContractKind('Mutual NDA')).toBe('nda');
    expect(detectContractKind('Agreement for Sale of Goods')).toBe('sale');
    expect(detectContractKind('Lease Deed')).toBe('unknown');
  });

  it('only looks at the first 500 characters', () => {
    expect(detectContractKind('x'.repeat(500) + ' EMPLOYMENT')).toBe('unknown');
  });
});

/* ============= Amounts ============= */

describe('extractAmounts', () => {
  it('captures currency figures with a rate qualifier', () => {
    expect(extractAmounts(EMPLOYMENT_TEXT)).toEqual(['INR 150000 per month']);
  });

  it('keeps adjacent figures separate', () => {
    expect(extractAmounts('Fee of USD 1,200.50 and INR 100 and INR 2,000 paid')).toEqual([
      'USD 1,200.50',
      'INR 100',
      'INR 2,000',
    ]);
  });

  it('handles Indian digit grouping and slash rates', () => {
    expect(extractAmounts(SERVICE_TEXT)).toEqual(['INR 2,50,000/month', 'INR 5,00,000', 'Rs. 500 per day']);
  });

  it('dedupes and caps at five', () => {
    const text = ['INR 1', 'INR 2', 'INR 1', 'INR 3', 'INR 4', 'INR 5', 'INR 6'].join('; ');
    expect(extractAmounts(text)).toEqual(['INR 1', 'INR 2', 'INR 3', 'INR 4', 'INR 5']);
  });

  it('ignores a currency code glued to another word', () => {
    expect(extractAmounts('MINR 5')).toEqual([]);
  });
});

/* ============= Dates ============= */

describe('extractDates', () => {
  it('labels a date with the words before it', () => {
    expect(extractDates(EMPLOYMENT_TEXT)).toEqual([
      'January 15, 2024 — and Mr. Rajesh Kumar Sharma, dated',
    ]);
  });

  it('dedupes by first occurrence', () => {
    expect(extractDates(SERVICE_TEXT)).toEqual([
      'March 1, 2024 — AGREEMENT This agreement is made on',
      'April 1, 2024 — Arjun Mehta Rao. Services commence on',
    ]);
  });

  it('returns a bare date at the start of the text', () => {
    expect(extractDates('March 3, 2025 is the start')).toEqual(['March 3, 2025']);
  });

  it('returns a bare date when the context is too short', () => {
    expect(extractDates('On: May 5, 2023')).toEqual(['May 5, 2023']);
  });
});

/* ============= Parties ============= */

describe('party extraction', () => {
  it('stops company names at lowercase words', () => {
    expect(extractCompanies(EMPLOYMENT_TEXT)).toEqual(['TechVision Solutions Private Limited']);
  });

  it('accepts abbreviated and plain suffixes', () => {
    expect(extractCompanies(SERVICE_TEXT)).toEqual(['Orion Retail Pvt. Ltd.', 'BlueWave Analytics Limited']);
  });

  it('finds honorific-prefixed names of two or more words', () => {
    expect(extractPersons(SERVICE_TEXT)).toEqual(['Priya Nair', 'Arjun Mehta Rao']);
    expect(extractPersons('Signed by Mr. Kumar.')).toEqual([]);
  });

  it('finds a name on the line after its honorific', () => {
    expect(extractPersons('between the Company and Mr.\nRajesh Kumar Sharma, residing at Pune')).toEqual([
      'Rajesh Kumar Sharma',
    ]);
    expect(extractPersons('Witness: Ms. Priya\nNair')).toEqual([]);
  });

  it('assigns roles by contract kind and order', () => {
    expect(extractParties(SERVICE_TEXT, 'service')).toEqual([
      'Client: Orion Retail Pvt. Ltd.',
      'Service Provider: BlueWave Analytics Limited',
      'Signatory: Priya Nair',
      'Signatory: Arjun Mehta Rao',
    ]);
    expect(extractParties(SERVICE_TEXT, 'nda')).toEqual([
      'Disclosing Party: Orion Retail Pvt. Ltd.',
      'Receiving Party: BlueWave Analytics Limited',
      'Signatory: Priya Nair',
      'Signatory: Arjun Mehta Rao',
    ]);
    expect(extractParties(SERVICE_TEXT, 'unknown')).toEqual([
      'Party: Orion Retail Pvt. Ltd.',
      'Party: BlueWave Analytics Limited',
      'Individual: Priya Nair',
      'Individual: Arjun Mehta Rao',
    ]);
  });
});

/* ============= basicExtraction ============= */

describe('basicExtraction', () => {
  it('extracts the employment scenario', () => {
    const result = basicExtraction(EMPLOYMENT_TEXT, 'english');

    expect(result.contract_type).toBe('Employment Agreement');
    expect(result.parties).toEqual([
      'Employer: TechVision Solutions Private Limited',
      'Employee: Rajesh Kumar Sharma',
    ]);
    expect(result.dates[0]).toContain('January 15, 2024');
    expect(result.amounts[0]).toContain('INR 150000');
    expect(result.clauses.map((c) => c.type)).toEqual(['Payment Terms']);
  });

  it('fills every list with placeholders when nothing is found', () => {
    const result = basicExtraction('a short note', 'english');

    expect(result).toEqual({
      contract_type: 'Unknown',
      parties: ['Unable to identify parties'],
      dates: ['No dates found'],
      amounts: ['No financial terms found'],
      clauses: [
        {
          type: 'General Contract Terms',
          risk_level: 'Medium',
          explanation:
            'Standard contractual terms detected. Review recommended to ensure fairness to both parties.',
        },
      ],
    });
  });

  it('localizes labels and placeholders for Hindi', () => {
    const result = basicExtraction('Service terms only', 'hindi');

    expect(result.contract_type).toBe('सेवा समझौता');
    expect(result.parties).toEqual(['पक्षों की पहचान नहीं हो सकी']);
    expect(result.dates).toEqual(['कोई तिथि नहीं मिली']);
    expect(result.amounts).toEqual(['कोई राशि नहीं मिली']);
    expect(result.clauses[0].type).toBe('सामान्य अनुबंध शर्तें');
    expect(result.clauses[0].risk_level).toBe('Medium');
  });
});
