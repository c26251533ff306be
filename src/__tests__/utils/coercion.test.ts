import { coerceDate, coerceNumber, coerceText } from '../../utils/coercion';

describe('coerceDate', () => {
  it('should keep ISO calendar dates', () => {
    expect(coerceDate('2024-01-01')).toBe('2024-01-01');
    expect(coerceDate('2024-02-29')).toBe('2024-02-29');
  });

  it('should normalise slashes and single-digit parts', () => {
    expect(coerceDate('2024/2/9')).toBe('2024-02-09');
  });

  it('should take the date part of an ISO timestamp', () => {
    expect(coerceDate('2024-01-01T10:30:00Z')).toBe('2024-01-01');
    expect(coerceDate('2024-01-01 08:00')).toBe('2024-01-01');
  });

  it('should trim surrounding whitespace', () => {
    expect(coerceDate(' 2024-05-06 ')).toBe('2024-05-06');
  });

  it('should return null for days that do not exist', () => {
    expect(coerceDate('2024-02-30')).toBeNull();
    expect(coerceDate('2023-02-29')).toBeNull();
    expect(coerceDate('2024-13-01')).toBeNull();
  });

  it('should read numbers as spreadsheet serial days', () => {
    expect(coerceDate(45292)).toBe('2024-01-01');
    expect(coerceDate(45306)).toBe('2024-01-15');
    expect(coerceDate(45306.75)).toBe('2024-01-15');
    expect(coerceDate(1)).toBe('1899-12-31');
  });

  it('should return null for serial days out of range', () => {
    expect(coerceDate(0)).toBeNull();
    expect(coerceDate(-5)).toBeNull();
    expect(coerceDate(3000000)).toBeNull();
    expect(coerceDate(Number.NaN)).toBeNull();
  });

  it('should return null for blanks and free text', () => {
    expect(coerceDate('')).toBeNull();
    expect(coerceDate(null)).toBeNull();
    expect(coerceDate('yesterday')).toBeNull();
    expect(coerceDate('01/02/2024')).toBeNull();
  });
});

describe('coerceNumber', () => {
  it('should pass finite numbers through', () => {
    expect(coerceNumber(5000000)).toBe(5000000);
    expect(coerceNumber(0.25)).toBe(0.25);
  });

  it('should parse decimal strings', () => {
    expect(coerceNumber(' 1500.5 ')).toBe(1500.5);
    expect(coerceNumber('-20')).toBe(-20);
    expect(coerceNumber('.5')).toBe(0.5);
    expect(coerceNumber('1e3')).toBe(1000);
  });

  it('should fall back to zero for anything else', () => {
    expect(coerceNumber('abc')).toBe(0);
    expect(coerceNumber('')).toBe(0);
    expect(coerceNumber(null)).toBe(0);
    expect(coerceNumber('1,000')).toBe(0);
    expect(coerceNumber('0x10')).toBe(0);
    expect(coerceNumber(Number.NaN)).toBe(0);
    expect(coerceNumber(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('coerceText', () => {
  it('should turn blanks into empty strings', () => {
    expect(coerceText(null)).toBe('');
  });

  it('should stringify numbers and keep strings', () => {
    expect(coerceText(42)).toBe('42');
    expect(coerceText('Salary')).toBe('Salary');
  });
});
