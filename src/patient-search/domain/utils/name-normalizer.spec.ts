import { normalizePatientName, toComparisonForm } from './name-normalizer';

describe('normalizePatientName', () => {
  it('should keep an already canonical name unchanged', () => {
    expect(
      normalizePatientName('ALANIS VILLAGRAN, MARIA DE LOS ANGELES'),
    ).toBe('ALANIS VILLAGRAN, MARIA DE LOS ANGELES');
  });

  it('should strip diacritics and uppercase', () => {
    expect(normalizePatientName('  Núñez Peña,  José  ')).toBe(
      'NUNEZ PENA, JOSE',
    );
  });

  it('should canonicalize comma spacing', () => {
    expect(normalizePatientName('perez ,juan')).toBe('PEREZ, JUAN');
    expect(normalizePatientName('PEREZ,JUAN')).toBe('PEREZ, JUAN');
  });

  it('should collapse extra commas and drop empty sides', () => {
    expect(normalizePatientName('PEREZ, JUAN, CARLOS')).toBe(
      'PEREZ, JUAN CARLOS',
    );
    expect(normalizePatientName(', JUAN')).toBe('JUAN');
    expect(normalizePatientName('PEREZ,')).toBe('PEREZ');
  });

  it('should turn separators into spaces and drop other punctuation', () => {
    expect(normalizePatientName("o'brien-smith.ann")).toBe('OBRIEN SMITH ANN');
  });

  it('should not reorder words', () => {
    expect(normalizePatientName('maria alanis')).toBe('MARIA ALANIS');
  });

  it('should return empty string for blank input', () => {
    expect(normalizePatientName('  ¡!  ')).toBe('');
  });

  it('should be idempotent', () => {
    for (const raw of [
      ' gómez,  ana-lucía ',
      'PEREZ,,JUAN',
      'x_y_z',
      'ñandú',
    ]) {
      const once = normalizePatientName(raw);
      expect(normalizePatientName(once)).toBe(once);
    }
  });
});

describe('toComparisonForm', () => {
  it('should drop the comma', () => {
    expect(toComparisonForm('PEREZ, JUAN')).toBe('PEREZ JUAN');
  });
});
