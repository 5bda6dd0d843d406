import { describe, it, expect } from 'vitest';
import { validateAndParseCSV } from '../csv-validator';
import { generateSampleData } from '../sample-data';

describe('generateSampleData', () => {
  it('is deterministic', () => {
    expect(generateSampleData()).toEqual(generateSampleData());
  });

  it('starts the broadcast scenario at the base time', () => {
    const [first] = generateSampleData(Date.UTC(2030, 5, 1));
    expect(first).toEqual({
      sender: 'deals@bulk-promo.test',
      recipient: 'user00@corp.test',
      weight: 8,
      timestamp: '2030-06-01T00:00:00.000Z',
    });
  });

  it('round-trips through the CSV validator', () => {
    const records = generateSampleData();
    const csv = [
      'sender,recipient,count,timestamp',
      ...records.map((r) => `${r.sender},${r.recipient},${r.weight ?? 1},${String(r.timestamp)}`),
    ].join('\n');
    const result = validateAndParseCSV(csv);

    expect(result.success).toBe(true);
    expect(result.records).toEqual(records);
  });
});
