import { parseBasicCredentials, safeEquals } from '../basic-credentials';

const basic = (value: string): string =>
  `Basic ${Buffer.from(value).toString('base64')}`;

describe('parseBasicCredentials', () => {
  it('splits id and secret at the first colon', () => {
    expect(parseBasicCredentials(basic('client:se:cret'))).toEqual({
      clientId: 'client',
      clientSecret: 'se:cret',
    });
  });

  it('accepts a lower-case scheme', () => {
    expect(parseBasicCredentials(`basic ${Buffer.from('a:b').toString('base64')}`)).toEqual({
      clientId: 'a',
      clientSecret: 'b',
    });
  });

  it.each([
    ['missing header', undefined],
    ['bearer scheme', 'Bearer abc'],
    ['no colon', basic('client')],
    ['empty id', basic(':secret')],
  ])('returns null for %s', (_label, header) => {
    expect(parseBasicCredentials(header)).toBeNull();
  });
});

describe('safeEquals', () => {
  it('compares by content', () => {
    expect(safeEquals('secret', 'secret')).toBe(true);
    expect(safeEquals('secret', 'secreT')).toBe(false);
    expect(safeEquals('secret', 'secrets')).toBe(false);
  });
});
