import { describe, it, expect } from 'vitest';
import { recordStatistics, validateAndParseCSV } from '../csv-validator';

describe('validateAndParseCSV', () => {
  it('parses counts and timestamps, defaulting the count to 1', () => {
    const result = validateAndParseCSV(
      'sender,recipient,count,timestamp\n' +
        'a@x.test,b@x.test,3,2024-01-01T00:00:00Z\n' +
        'c@x.test,d@x.test,,\n'
    );

    expect(result).toEqual({
      success: true,
      records: [
        { sender: 'a@x.test', recipient: 'b@x.test', weight: 3, timestamp: '2024-01-01T00:00:00Z' },
        { sender: 'c@x.test', recipient: 'd@x.test', weight: 1 },
      ],
      errors: [],
      warnings: [],
    });
  });

  it('accepts header aliases in any case', () => {
    const result = validateAndParseCSV('Sender,RECIPIENT,Frequency\r\na,b,7\r\n');
    expect(result.records).toEqual([{ sender: 'a', recipient: 'b', weight: 7 }]);
  });

  it('rejects an empty file', () => {
    expect(validateAndParseCSV('  \n').errors).toEqual(['File is empty']);
  });

  it('needs at least one data row', () => {
    expect(validateAndParseCSV('sender,recipient').errors).toEqual([
      'File must have a header row and at least one data row',
    ]);
  });

  it('names missing required columns', () => {
    expect(validateAndParseCSV('from,to\na,b').errors).toEqual([
      'Missing required columns: sender, recipient. Required: sender, recipient',
    ]);
  });

  it('reports bad rows and keeps the good ones', () => {
    const result = validateAndParseCSV(
      'sender,recipient,count,timestamp\n' +
        'a,b,0,\n' +
        'a,b\n' +
        ',b,1,\n' +
        'a,b,1,yesterday-ish\n' +
        'a,b,2,\n'
    );

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      'Row 2: Invalid count "0" - must be a positive integer',
      'Row 3: Expected 4 columns but got 2',
      'Row 4: Missing sender',
      'Row 5: Invalid timestamp "yesterday-ish"',
    ]);
    expect(result.records).toEqual([{ sender: 'a', recipient: 'b', weight: 2 }]);
  });

  it('warns about self-addressed mail without rejecting it', () => {
    const result = validateAndParseCSV('sender,recipient\na,a');
    expect(result.success).toBe(true);
    expect(result.warnings).toEqual(['Row 2: Self-addressed email from a']);
    expect(result.records).toHaveLength(1);
  });

  it('collapses more than ten errors into a summary', () => {
    const rows = Array.from({ length: 12 }, () => ',b').join('\n');
    const result = validateAndParseCSV(`sender,recipient\n${rows}`);

    expect(result.success).toBe(false);
    expect(result.records).toEqual([]);
    expect(result.errors[0]).toBe('Too many errors (12). First 10:');
    expect(result.errors).toHaveLength(11);
  });
});

describe('recordStatistics', () => {
  it('totals senders, recipients and volume', () => {
    expect(
      recordStatistics([
        { sender: 'a', recipient: 'b', weight: 3 },
        { sender: 'a', recipient: 'c' },
        { sender: 'b', recipient: 'c', weight: 2 },
      ])
    ).toEqual({
      totalRecords: 3,
      uniqueSenders: 2,
      uniqueRecipients: 2,
      totalEmails: 6,
      averageEmailsPerRecord: 2,
    });
  });

  it('is zero for no records', () => {
    expect(recordStatistics([]).averageEmailsPerRecord).toBe(0);
  });
});
