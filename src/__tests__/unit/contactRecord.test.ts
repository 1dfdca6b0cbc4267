import {
  CONTACT_RECORD_KEYS,
  formatContactSummary,
  mergeContactRecord,
} from '../../helpers/contactRecord.helper';
import { acmeRecord } from '../helpers/fakes';

const regexFields = { Phone: '+1 555-123-4567', Email: 'john@acme.com', Website: 'www.acme.com' };

describe('mergeContactRecord', () => {
  test('takes contact fields from regex and descriptive fields from the AI', () => {
    const record = mergeContactRecord(regexFields, {
      Name: 'John Doe',
      Designation: 'CEO',
      Company: 'Acme Corp',
      Address: '1 Main St',
      Industry: 'Software',
      Services: 'Consulting',
    });

    expect(record).toEqual({
      Name: 'John Doe',
      Designation: 'CEO',
      Company: 'Acme Corp',
      Phone: '+1 555-123-4567',
      Email: 'john@acme.com',
      Website: 'www.acme.com',
      Address: '1 Main St',
      Industry: 'Software',
      Services: 'Consulting',
    });
  });

  test('defaults every missing AI key to "Not Found"', () => {
    const record = mergeContactRecord(regexFields, { Name: 'John Doe' });

    expect(record.Name).toBe('John Doe');
    expect(record.Designation).toBe('Not Found');
    expect(record.Company).toBe('Not Found');
    expect(record.Address).toBe('Not Found');
    expect(record.Industry).toBe('Not Found');
    expect(record.Services).toBe('Not Found');
  });

  test('always yields exactly the nine record keys in display order', () => {
    const aiFields: Record<string, unknown> = { Name: 'A', Phone: '000', Notes: 'extra' };
    const record = mergeContactRecord(regexFields, aiFields);

    expect(Object.keys(record)).toEqual([...CONTACT_RECORD_KEYS]);
    expect(record.Phone).toBe('+1 555-123-4567');
  });

  test('never keeps blank or non-text AI values', () => {
    const record = mergeContactRecord(regexFields, {
      Name: '   ',
      Designation: null,
      Company: { name: 'Acme' },
      Address: '  12 High Rd  ',
      Industry: 42,
      Services: ['Audit', ' Tax ', '', 7],
    });

    expect(record.Name).toBe('Not Found');
    expect(record.Designation).toBe('Not Found');
    expect(record.Company).toBe('Not Found');
    expect(record.Address).toBe('12 High Rd');
    expect(record.Industry).toBe('42');
    expect(record.Services).toBe('Audit, Tax');
  });

  test('returns a frozen record', () => {
    expect(Object.isFrozen(mergeContactRecord(regexFields, {}))).toBe(true);
  });
});

describe('formatContactSummary', () => {
  test('renders one bold key per line in record order', () => {
    expect(formatContactSummary(acmeRecord())).toBe(
      [
        '*Name*: John Doe',
        '*Designation*: CEO',
        '*Company*: Acme Corp',
        '*Phone*: +1 555-123-4567',
        '*Email*: john@acme.com',
        '*Website*: www.acme.com',
        '*Address*: Not Found',
        '*Industry*: Software',
        '*Services*: Consulting',
      ].join('\n')
    );
  });

  test('escapes Markdown characters inside values', () => {
    const summary = formatContactSummary(acmeRecord({ Name: 'john_doe *admin*' }));

    expect(summary.split('\n')[0]).toBe('*Name*: john\\_doe \\*admin\\*');
  });
});
