import { extractContactFields } from '../../services/contactExtractor.service';

describe('extractContactFields', () => {
  test('pulls phone, email and website out of a single OCR line', () => {
    const text = 'John Doe CEO Acme Corp john@acme.com +1 555-123-4567 www.acme.com';

    expect(extractContactFields(text)).toEqual({
      Phone: '+1 555-123-4567',
      Email: 'john@acme.com',
      Website: 'www.acme.com',
    });
  });

  test('returns "Not Found" for every field when nothing matches', () => {
    expect(extractContactFields('Jane Smith Head of Design')).toEqual({
      Phone: 'Not Found',
      Email: 'Not Found',
      Website: 'Not Found',
    });
  });

  test('returns "Not Found" for empty input', () => {
    expect(extractContactFields('')).toEqual({
      Phone: 'Not Found',
      Email: 'Not Found',
      Website: 'Not Found',
    });
  });

  test('takes the first match in document order', () => {
    const text = 'sales@acme.io support@acme.io +91 98765 43210 +44 20 7946 0958 www.acme.io https://acme.io/contact';

    expect(extractContactFields(text)).toEqual({
      Phone: '+91 98765 43210',
      Email: 'sales@acme.io',
      Website: 'www.acme.io',
    });
  });

  test('ignores digit runs that are too short to be a phone number', () => {
    expect(extractContactFields('Suite 1204, Floor 12').Phone).toBe('Not Found');
  });

  test('does not validate or normalize what it captures', () => {
    const result = extractContactFields('mail: Foo.Bar@host. visit http://Example.COM/Path?x=1,');

    expect(result.Email).toBe('Foo.Bar@host.');
    expect(result.Website).toBe('http://Example.COM/Path?x=1,');
  });

  test('website match is case-sensitive on the prefix', () => {
    expect(extractContactFields('WWW.ACME.COM').Website).toBe('Not Found');
  });

  test('phone match stops at the last digit before the next word', () => {
    expect(extractContactFields('Tel 022-2345-6789 - Fax').Phone).toBe('022-2345-6789');
  });

  test('accepts an eight-digit number followed by a space', () => {
    expect(extractContactFields('Tel 24567890 Fax').Phone).toBe('24567890');
  });

  test('accepts a short number whose match runs into a trailing separator', () => {
    expect(extractContactFields('Ph 1234567 - x').Phone).toBe('1234567');
  });
});
